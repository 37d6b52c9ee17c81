/**
 * Entry point for one inbound user message: commands, then the per-user
 * guard, then an assistant run, then chunking for the transport.
 */

import { createChildLogger } from '../utils/logger';
import { CommandRouter, parseCommand } from './commands';
import { ConcurrencyGuard } from './concurrencyGuard';
import { ConversationEngine } from './conversation';
import { NOTICES } from './notices';
import { buildTurnPrompt, PromptContext } from './prompt';
import { assemble } from './responseAssembler';

const log = createChildLogger('assistant');

export interface AssistantOptions {
  conversation: ConversationEngine;
  guard: ConcurrencyGuard;
  commands: CommandRouter;
  maxMessageLength: number;
  /** Calendar names and integrations known when the turn starts */
  promptContext(): Omit<PromptContext, 'now'>;
  now?: () => Date;
}

export class Assistant {
  private readonly now: () => Date;

  constructor(private readonly options: AssistantOptions) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Handle one message and return the reply as transport-sized chunks.
   * Never throws: every failure is already a user-facing notice.
   */
  async handleUserTurn(userId: string, text: string): Promise<Iterable<string>> {
    const message = text.trim();
    if (!message) return this.reply(NOTICES.empty);

    const command = parseCommand(message);
    if (command && this.options.commands.has(command.name)) {
      return this.reply(await this.options.commands.run(command, userId));
    }

    const lease = await this.options.guard.acquire(userId);
    if (!lease) {
      log.info({ userId }, 'Turn rejected, previous turn still running');
      return this.reply(NOTICES.busy);
    }

    try {
      const now = this.now();
      if (this.options.guard.shouldThrottle(userId, now.getTime())) {
        log.info({ userId }, 'Turn throttled');
        return this.reply(NOTICES.throttled);
      }
      this.options.guard.recordAccepted(userId, now.getTime());

      const prompt = buildTurnPrompt(message, { ...this.options.promptContext(), now });
      const outcome = await this.options.conversation.runTurn(userId, prompt);
      if (outcome.kind !== 'completed') {
        log.info({ userId, outcome: outcome.kind, runId: outcome.runId }, 'Turn ended without a reply');
        return this.reply(outcome.notice);
      }
      return this.reply(outcome.text);
    } finally {
      lease.release();
    }
  }

  private reply(text: string): Iterable<string> {
    return assemble(text, { maxChunkLength: this.options.maxMessageLength });
  }
}
