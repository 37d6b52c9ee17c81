/**
 * Per-user in-flight marker and throttle.
 *
 * State lives in memory for the lifetime of the process; it orders turns,
 * it does not make them durable.
 */

import { pollUntil, realSleep, Sleep } from './retry';

export interface GuardOptions {
  minIntervalMs: number;   // minimum gap between accepted turns
  busyWaitMs?: number;     // how long acquire() waits for an active turn to finish
  busyPollMs?: number;
}

export interface TurnLease {
  readonly userId: string;
  release(): void;
}

interface RateState {
  lastAcceptedAt?: number;
  inFlight: boolean;
}

export class ConcurrencyGuard {
  private readonly states = new Map<string, RateState>();
  private readonly busyWaitMs: number;
  private readonly busyPollMs: number;

  constructor(private readonly options: GuardOptions, private readonly sleep: Sleep = realSleep) {
    this.busyWaitMs = options.busyWaitMs ?? 0;
    this.busyPollMs = options.busyPollMs ?? 250;
  }

  /**
   * Take the in-flight marker for a user, or null when a turn is already active
   */
  tryAcquire(userId: string): TurnLease | null {
    const state = this.stateFor(userId);
    if (state.inFlight) return null;

    state.inFlight = true;
    let released = false;
    return {
      userId,
      release: () => {
        if (released) return;
        released = true;
        state.inFlight = false;
      }
    };
  }

  /**
   * Like tryAcquire, but waits up to busyWaitMs for the active turn to finish
   */
  async acquire(userId: string): Promise<TurnLease | null> {
    const immediate = this.tryAcquire(userId);
    if (immediate || this.busyWaitMs <= 0) return immediate;

    const outcome = await pollUntil(
      async () => this.tryAcquire(userId) ?? undefined,
      { intervalMs: this.busyPollMs, maxAttempts: Math.ceil(this.busyWaitMs / this.busyPollMs) },
      this.sleep
    );
    return outcome.status === 'done' ? outcome.value : null;
  }

  isActive(userId: string): boolean {
    return this.states.get(userId)?.inFlight ?? false;
  }

  shouldThrottle(userId: string, now: number): boolean {
    const last = this.states.get(userId)?.lastAcceptedAt;
    return last !== undefined && now - last < this.options.minIntervalMs;
  }

  recordAccepted(userId: string, now: number): void {
    this.stateFor(userId).lastAcceptedAt = now;
  }

  activeCount(): number {
    let count = 0;
    for (const state of this.states.values()) {
      if (state.inFlight) count++;
    }
    return count;
  }

  private stateFor(userId: string): RateState {
    let state = this.states.get(userId);
    if (!state) {
      state = { inFlight: false };
      this.states.set(userId, state);
    }
    return state;
  }
}
