/**
 * Email capabilities plus the inbox formatting shared with chat commands
 */

import { Type } from '@sinclair/typebox';
import { DateTime } from 'luxon';
import { NOTICES } from '../core/notices';
import { EmailStats, EmailSummary, MailProvider } from '../services/gmailService';
import { ToolRegistry } from './registry';

export const MAX_EMAIL_COUNT = 20;

export function clampCount(count: number, fallback = 10): number {
  if (!Number.isFinite(count)) return fallback;
  return Math.min(MAX_EMAIL_COUNT, Math.max(1, Math.trunc(count)));
}

/** "Jane Doe <jane@example.com>" → "Jane Doe" */
export function senderName(from: string): string {
  const match = from.match(/^\s*"?([^"<]+?)"?\s*<[^>]+>\s*$/);
  return match ? match[1] : from.trim();
}

export function formatEmailList(title: string, emails: EmailSummary[], zone: string): string {
  if (emails.length === 0) return `${title}: nothing here.`;
  const lines = emails.map(email => {
    const when = email.receivedAt
      ? DateTime.fromJSDate(email.receivedAt, { zone }).toFormat('LL/dd HH:mm')
      : '';
    const marker = email.unread ? '●' : '○';
    return `${marker} ${email.subject}\n   from ${senderName(email.from)}${when ? ` · ${when}` : ''} · id ${email.id}`;
  });
  return `${title} (${emails.length})\n\n${lines.join('\n')}`;
}

export function formatEmailStats(stats: EmailStats): string {
  return [
    'Inbox summary',
    `• Unread: ${stats.unread}`,
    `• Received in the last day: ${stats.receivedToday}`,
    `• Important and unread: ${stats.importantUnread}`
  ].join('\n');
}

const CountParams = Type.Object({
  count: Type.Integer({ description: 'How many messages (1-20)', default: 10 })
});

const RecentParams = Type.Object({
  count: Type.Integer({ description: 'How many messages (1-20)', default: 10 }),
  query: Type.String({ description: 'Gmail search query to narrow the listing', default: 'in:inbox' })
});

const SearchParams = Type.Object({
  query: Type.String({ description: 'Gmail search query, e.g. "from:alex subject:invoice"' }),
  count: Type.Integer({ description: 'How many messages (1-20)', default: 10 })
});

const SendParams = Type.Object({
  to_email: Type.String({ description: 'Recipient address' }),
  subject: Type.String(),
  body: Type.String({ description: 'Plain text body' })
});

const MessageParams = Type.Object({
  email_id: Type.String({ description: 'Message id as shown in a listing' })
});

export function registerEmailTools(registry: ToolRegistry, mail: MailProvider | undefined, timezone: string): void {
  const withMail = <T>(fn: (provider: MailProvider) => Promise<T>): Promise<T> | string =>
    mail ? fn(mail) : NOTICES.emailUnavailable;

  registry.register('get_recent_emails',
    args => withMail(async provider =>
      formatEmailList('Recent emails', await provider.listMessages(args.query || 'in:inbox', clampCount(args.count)), timezone)),
    RecentParams,
    'Most recent messages in the inbox');

  registry.register('get_unread_emails',
    args => withMail(async provider =>
      formatEmailList('Unread emails', await provider.listMessages('is:unread', clampCount(args.count)), timezone)),
    CountParams,
    'Unread messages, newest first');

  registry.register('search_emails',
    args => withMail(async provider =>
      formatEmailList(`Emails matching "${args.query}"`, await provider.listMessages(args.query, clampCount(args.count)), timezone)),
    SearchParams,
    'Search the mailbox with Gmail query syntax');

  registry.register('get_email_stats',
    () => withMail(async provider => formatEmailStats(await provider.stats())),
    Type.Object({}),
    'Unread, recent and important-unread counts');

  registry.register('send_email',
    args => withMail(async provider => {
      await provider.send(args.to_email, args.subject, args.body);
      return `Email sent to ${args.to_email}: "${args.subject}"`;
    }),
    SendParams,
    'Send a plain text email');

  registry.register('delete_email',
    args => withMail(async provider => {
      await provider.trash(args.email_id);
      return `Moved message ${args.email_id} to the trash.`;
    }),
    MessageParams,
    'Move a message to the trash');

  registry.register('archive_email',
    args => withMail(async provider => {
      await provider.archive(args.email_id);
      return `Archived message ${args.email_id}.`;
    }),
    MessageParams,
    'Remove a message from the inbox without deleting it');
}
