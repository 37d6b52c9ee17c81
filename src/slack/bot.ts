/**
 * Slack transport over Socket Mode.
 * Direct messages and mentions become assistant turns; `/concierge <command>`
 * runs a chat command.
 */

import { App } from '@slack/bolt';
import { createServices, Services } from '../bootstrap';
import { loadConfig, requireSlack } from '../config';
import { Assistant } from '../core/assistant';
import { NOTICES } from '../core/notices';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger('slack');

/** Remove `<@U123>` mention tokens */
export function stripMentions(text: string): string {
  return text.replace(/<@[A-Z0-9]+(?:\|[^>]*)?>/g, '').trim();
}

async function deliver(chunks: Iterable<string>, send: (text: string) => Promise<unknown>): Promise<void> {
  for (const chunk of chunks) {
    await send(chunk);
  }
}

export function registerHandlers(app: App, assistant: Assistant): void {
  app.event('app_mention', async ({ event, say }) => {
    const userId = event.user ?? 'unknown';
    const text = stripMentions(event.text);
    log.info({ userId, channel: event.channel }, 'Mention received');

    try {
      await deliver(await assistant.handleUserTurn(userId, text), chunk => say(chunk));
    } catch (error) {
      log.error({ err: error, userId }, 'Failed to answer mention');
      await say(NOTICES.failed);
    }
  });

  app.message(async ({ message, say }) => {
    // edits, joins and bot echoes carry a subtype
    if (message.subtype !== undefined || message.channel_type !== 'im' || !message.text) {
      return;
    }

    const userId = message.user;
    log.info({ userId }, 'Direct message received');

    try {
      await deliver(await assistant.handleUserTurn(userId, message.text), chunk => say(chunk));
    } catch (error) {
      log.error({ err: error, userId }, 'Failed to answer direct message');
      await say(NOTICES.failed);
    }
  });

  app.command('/concierge', async ({ command, ack, respond }) => {
    await ack();
    const text = command.text.trim() ? `!${command.text.trim()}` : '!help';
    log.info({ userId: command.user_id, text }, 'Slash command received');

    try {
      await deliver(await assistant.handleUserTurn(command.user_id, text), chunk => respond(chunk));
    } catch (error) {
      log.error({ err: error, userId: command.user_id }, 'Failed to answer slash command');
      await respond(NOTICES.failed);
    }
  });
}

export async function startBot(): Promise<{ app: App; services: Services }> {
  const config = loadConfig();
  const slack = requireSlack(config);
  const services = await createServices(config);

  const app = new App({
    token: slack.botToken,
    signingSecret: slack.signingSecret,
    socketMode: true,
    appToken: slack.appToken
  });
  registerHandlers(app, services.assistant);

  await app.start();
  log.info('Assistant is running in Socket Mode');

  const shutdown = (signal: string) => {
    log.info({ signal }, 'Shutting down');
    void app.stop()
      .catch(error => log.error({ err: error }, 'Slack app did not stop cleanly'))
      .finally(() => {
        services.close();
        process.exit(0);
      });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  return { app, services };
}
