/**
 * Conversation state machine: one provider thread per user, one run per turn.
 *
 *   created → queued → in_progress ⇄ requires_action → completed
 *                                                    ↘ failed | cancelled
 *   any active state → timed_out when the poll budget runs out
 */

import { ConversationThread, LlmProvider, RunSnapshot, RunState, ThreadStore, ToolOutput, TurnOutcome } from '../types/core';
import { ToolRegistry } from '../tools/registry';
import { AssistantError, ConcurrencyConflictError, NotFoundError, ProviderTransientError, TimeoutError } from '../utils/errors';
import { createChildLogger } from '../utils/logger';
import { NOTICES } from './notices';
import { PollPolicy, pollUntil, realSleep, retry, Sleep } from './retry';

const log = createChildLogger('conversation');

// Provider polls can skip intermediate states, and a run goes back to queued after tool outputs land
const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  created: ['queued', 'failed', 'cancelled'],
  queued: ['in_progress', 'requires_action', 'completed', 'failed', 'cancelled', 'timed_out'],
  in_progress: ['queued', 'requires_action', 'completed', 'failed', 'cancelled', 'timed_out'],
  requires_action: ['queued', 'in_progress', 'completed', 'failed', 'cancelled', 'timed_out'],
  completed: [],
  failed: [],
  cancelled: [],
  timed_out: []
};

type TerminalProviderState = 'completed' | 'failed' | 'cancelled';

export class RunTracker {
  private state: RunState = 'created';
  readonly history: RunState[] = ['created'];
  /** Outputs already produced for this run, reused if a submission has to be repeated */
  readonly outputs = new Map<string, ToolOutput>();
  runId = '';

  constructor(readonly userId: string, readonly threadId: string) {}

  get current(): RunState {
    return this.state;
  }

  transition(next: RunState): void {
    if (next === this.state) return;
    if (!TRANSITIONS[this.state].includes(next)) {
      throw new AssistantError(`Illegal run transition ${this.state} → ${next}`, 'INVALID_TRANSITION');
    }
    log.debug({ runId: this.runId, from: this.state, to: next }, 'Run transition');
    this.state = next;
    this.history.push(next);
  }
}

export interface ConversationOptions {
  provider: LlmProvider;
  threads: ThreadStore;
  tools: ToolRegistry;
  poll: PollPolicy;
  /** Retry for appending while the provider still reports an active run */
  appendRetry?: { attempts: number; delayMs: number };
  sleep?: Sleep;
  now?: () => number;
}

export class ConversationEngine {
  private readonly provider: LlmProvider;
  private readonly threads: ThreadStore;
  private readonly tools: ToolRegistry;
  private readonly poll: PollPolicy;
  private readonly appendRetry: { attempts: number; delayMs: number };
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly activeRuns = new Map<string, RunTracker>();

  constructor(options: ConversationOptions) {
    this.provider = options.provider;
    this.threads = options.threads;
    this.tools = options.tools;
    this.poll = options.poll;
    this.appendRetry = options.appendRetry ?? { attempts: 2, delayMs: 3000 };
    this.sleep = options.sleep ?? realSleep;
    this.now = options.now ?? Date.now;
  }

  activeRunCount(): number {
    return this.activeRuns.size;
  }

  /**
   * Drive one user turn to a terminal outcome. Never throws; every failure
   * becomes a stable notice and the detail goes to the log.
   */
  async runTurn(userId: string, text: string): Promise<TurnOutcome> {
    try {
      return await this.exclusive(userId, () => this.executeTurn(userId, text));
    } catch (error) {
      if (error instanceof ConcurrencyConflictError) {
        log.info({ userId }, 'Turn rejected, run already active');
        return { kind: 'error', notice: NOTICES.busy };
      }
      if (error instanceof TimeoutError) {
        log.warn({ userId, runId: error.runId, detail: error.message }, 'Run timed out');
        return { kind: 'timed_out', notice: NOTICES.timedOut, runId: error.runId };
      }
      log.error({ err: error, userId }, 'Conversation turn failed');
      return { kind: 'error', notice: NOTICES.failed };
    }
  }

  /**
   * Hold the user's active-run slot for the duration of `fn`
   */
  private async exclusive<T>(userId: string, fn: () => Promise<T>): Promise<T> {
    if (this.activeRuns.has(userId)) {
      throw new ConcurrencyConflictError(`A run is already active for ${userId}`);
    }
    // placeholder tracker claims the slot until the thread is known
    this.activeRuns.set(userId, new RunTracker(userId, ''));
    try {
      return await fn();
    } finally {
      this.activeRuns.delete(userId);
    }
  }

  private async executeTurn(userId: string, text: string): Promise<TurnOutcome> {
    const threadId = await this.appendToThread(userId, text);
    const tracker = new RunTracker(userId, threadId);
    this.activeRuns.set(userId, tracker);
    return this.driveRun(tracker);
  }

  private async driveRun(tracker: RunTracker): Promise<TurnOutcome> {
    tracker.runId = await this.provider.createRun(tracker.threadId);
    tracker.transition('queued');
    log.info({ userId: tracker.userId, runId: tracker.runId }, 'Run created');

    const outcome = await pollUntil(() => this.step(tracker), this.poll, this.sleep);

    if (outcome.status === 'timed_out') {
      const lastState = tracker.current;
      tracker.transition('timed_out');
      throw new TimeoutError(`Run still ${lastState} after ${outcome.attempts} polls`, tracker.runId);
    }

    if (outcome.value !== 'completed') {
      return { kind: outcome.value, notice: NOTICES.failed, runId: tracker.runId };
    }

    const reply = await this.provider.getLatestAssistantMessage(tracker.threadId);
    if (!reply) {
      log.warn({ runId: tracker.runId }, 'Completed run left no assistant message');
      return { kind: 'error', notice: NOTICES.unclear, runId: tracker.runId };
    }
    return { kind: 'completed', text: reply, runId: tracker.runId };
  }

  /**
   * One poll attempt. Returns the terminal state, or undefined to keep polling.
   */
  private async step(tracker: RunTracker): Promise<TerminalProviderState | undefined> {
    let snapshot: RunSnapshot;
    try {
      snapshot = await this.provider.getRunStatus(tracker.threadId, tracker.runId);
    } catch (error) {
      if (error instanceof ProviderTransientError) {
        log.warn({ err: error, runId: tracker.runId }, 'Run status poll failed');
        return undefined;
      }
      throw error;
    }

    tracker.transition(snapshot.status);

    switch (snapshot.status) {
      case 'requires_action':
        if (await this.resolveActions(tracker, snapshot)) {
          tracker.transition('in_progress');
        }
        return undefined;
      case 'failed':
      case 'cancelled':
        log.warn({ runId: tracker.runId, status: snapshot.status, lastError: snapshot.lastError }, 'Run ended unsuccessfully');
        return snapshot.status;
      case 'completed':
        return 'completed';
      default:
        return undefined;
    }
  }

  /**
   * Produce an output for every requested call and submit them as one batch.
   * Returns false when a transient submission failure leaves the run waiting.
   */
  private async resolveActions(tracker: RunTracker, snapshot: RunSnapshot): Promise<boolean> {
    const calls = snapshot.requestedToolCalls;
    if (calls.length === 0) {
      log.warn({ runId: tracker.runId }, 'Run requires action but listed no tool calls');
      return false;
    }

    const pending = calls.filter(call => !tracker.outputs.has(call.callId));
    const produced = await this.tools.dispatchBatch(pending, { userId: tracker.userId });
    for (const output of produced) {
      tracker.outputs.set(output.callId, output);
    }

    const batch: ToolOutput[] = [];
    for (const call of calls) {
      const output = tracker.outputs.get(call.callId);
      if (output) batch.push(output);
    }

    try {
      await this.provider.submitToolOutputs(tracker.threadId, tracker.runId, batch);
    } catch (error) {
      if (error instanceof ProviderTransientError) {
        log.warn({ err: error, runId: tracker.runId }, 'Tool output submission failed, will resubmit');
        return false;
      }
      throw error;
    }
    log.info({ runId: tracker.runId, count: batch.length }, 'Submitted tool outputs');
    return true;
  }

  private async appendToThread(userId: string, text: string): Promise<string> {
    const existing = await this.threads.get(userId);
    const thread = existing ?? await this.createThread(userId);

    try {
      await this.appendWithRetry(thread.threadId, text);
      return thread.threadId;
    } catch (error) {
      if (!(error instanceof NotFoundError) || !existing) throw error;

      log.warn({ userId, threadId: thread.threadId }, 'Stored thread is stale, replacing it');
      const replacement = await this.createThread(userId);
      await this.appendWithRetry(replacement.threadId, text);
      return replacement.threadId;
    }
  }

  private async createThread(userId: string): Promise<ConversationThread> {
    const thread: ConversationThread = {
      userId,
      threadId: await this.provider.createThread(),
      createdAt: this.now()
    };
    await this.threads.save(thread);
    log.info({ userId, threadId: thread.threadId }, 'Created conversation thread');
    return thread;
  }

  private appendWithRetry(threadId: string, text: string): Promise<void> {
    return retry(
      () => this.provider.appendMessage(threadId, text),
      {
        attempts: this.appendRetry.attempts,
        delayMs: this.appendRetry.delayMs,
        shouldRetry: error => error instanceof ProviderTransientError
      },
      this.sleep
    );
  }
}
