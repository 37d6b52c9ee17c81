/**
 * Gmail integration: inbox listings, counters, sending and cleanup
 */

import { google, gmail_v1 } from 'googleapis';
import { classifyProviderError, ValidationError } from '../utils/errors';
import { createChildLogger } from '../utils/logger';
import { createGoogleAuth, GoogleCredentials } from './googleAuth';

const log = createChildLogger('gmail');

const GMAIL_SCOPES = ['https://www.googleapis.com/auth/gmail.modify'];
const ADDRESS = /^[^\s@<>]+@[^\s@<>]+\.[^\s@<>]+$/;

export interface EmailSummary {
  id: string;
  from: string;
  subject: string;
  snippet: string;
  receivedAt?: Date;
  unread: boolean;
}

export interface EmailStats {
  unread: number;
  receivedToday: number;
  importantUnread: number;
}

export interface MailProvider {
  listMessages(query: string, count: number): Promise<EmailSummary[]>;
  stats(): Promise<EmailStats>;
  send(to: string, subject: string, body: string): Promise<string>;
  trash(messageId: string): Promise<void>;
  archive(messageId: string): Promise<void>;
}

function header(message: gmail_v1.Schema$Message, name: string): string | undefined {
  const found = message.payload?.headers?.find(h => h.name?.toLowerCase() === name.toLowerCase());
  return found?.value ?? undefined;
}

/** RFC 2047 encoded-word for headers that are not plain ASCII */
function encodeHeader(value: string): string {
  return /^[\x20-\x7e]*$/.test(value)
    ? value
    : `=?UTF-8?B?${Buffer.from(value, 'utf8').toString('base64')}?=`;
}

/**
 * Build a base64url RFC 822 message. Header values lose any line breaks.
 */
export function buildRawMessage(to: string, subject: string, body: string): string {
  const cleanTo = to.replace(/[\r\n]+/g, ' ').trim();
  if (!ADDRESS.test(cleanTo)) {
    throw new ValidationError(`"${to}" is not a valid email address`);
  }
  const mime = [
    `To: ${cleanTo}`,
    `Subject: ${encodeHeader(subject.replace(/[\r\n]+/g, ' ').trim())}`,
    'MIME-Version: 1.0',
    'Content-Type: text/plain; charset="UTF-8"',
    '',
    body
  ].join('\r\n');
  return Buffer.from(mime, 'utf8').toString('base64url');
}

export class GmailService implements MailProvider {
  private gmail: gmail_v1.Gmail;

  constructor(credentials: GoogleCredentials, gmail?: gmail_v1.Gmail) {
    this.gmail = gmail ?? google.gmail({
      version: 'v1',
      auth: createGoogleAuth(credentials, GMAIL_SCOPES)
    });
  }

  async listMessages(query: string, count: number): Promise<EmailSummary[]> {
    const listing = await this.call('list messages', () =>
      this.gmail.users.messages.list({ userId: 'me', q: query, maxResults: count })
    );

    const ids = (listing.data.messages ?? [])
      .map(message => message.id)
      .filter((id): id is string => typeof id === 'string');

    return Promise.all(ids.map(async id => {
      const response = await this.call('get message', () =>
        this.gmail.users.messages.get({
          userId: 'me',
          id,
          format: 'metadata',
          metadataHeaders: ['From', 'Subject', 'Date']
        })
      );
      const message = response.data;
      const date = header(message, 'Date');
      const parsed = date ? new Date(date) : undefined;
      return {
        id,
        from: header(message, 'From') ?? 'Unknown sender',
        subject: header(message, 'Subject') || '(no subject)',
        snippet: message.snippet ?? '',
        receivedAt: parsed && !Number.isNaN(parsed.getTime()) ? parsed : undefined,
        unread: (message.labelIds ?? []).includes('UNREAD')
      };
    }));
  }

  async stats(): Promise<EmailStats> {
    const [unread, receivedToday, importantUnread] = await Promise.all([
      this.estimate('is:unread'),
      this.estimate('newer_than:1d'),
      this.estimate('is:important is:unread')
    ]);
    return { unread, receivedToday, importantUnread };
  }

  async send(to: string, subject: string, body: string): Promise<string> {
    const raw = buildRawMessage(to, subject, body);
    const response = await this.call('send message', () =>
      this.gmail.users.messages.send({ userId: 'me', requestBody: { raw } })
    );
    log.info({ messageId: response.data.id }, 'Email sent');
    return response.data.id ?? '';
  }

  async trash(messageId: string): Promise<void> {
    await this.call('trash message', () =>
      this.gmail.users.messages.trash({ userId: 'me', id: messageId })
    );
  }

  async archive(messageId: string): Promise<void> {
    await this.call('archive message', () =>
      this.gmail.users.messages.modify({
        userId: 'me',
        id: messageId,
        requestBody: { removeLabelIds: ['INBOX'] }
      })
    );
  }

  private async estimate(query: string): Promise<number> {
    const response = await this.call('count messages', () =>
      this.gmail.users.messages.list({ userId: 'me', q: query, maxResults: 1 })
    );
    return response.data.resultSizeEstimate ?? 0;
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const classified = classifyProviderError(error, `Gmail ${operation}`);
      log.debug({ err: error, operation, code: classified.code }, 'Gmail request failed');
      throw classified;
    }
  }
}

/**
 * Gmail needs OAuth user credentials with the gmail.modify scope
 * (GOOGLE_CLIENT_ID / GOOGLE_CLIENT_SECRET / GOOGLE_REFRESH_TOKEN).
 * A service account only works with domain-wide delegation.
 */
