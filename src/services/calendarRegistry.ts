/**
 * Calendar source registry: the calendars that answered a reachability probe.
 * Read-only once probing completes.
 */

import { CalendarCandidate, CalendarKind, CalendarProvider, CalendarSource } from '../types/calendar';
import { errorMessage, NotFoundError, ProviderFatalError } from '../utils/errors';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger('calendar-registry');

const PROBE_WINDOW_MS = 30 * 24 * 60 * 60 * 1000;

const ICON_HINTS: Record<CalendarKind, string> = {
  calendar: '📅',
  tasks: '✅'
};

export function toSource(candidate: CalendarCandidate): CalendarSource {
  const kind = candidate.kind ?? 'calendar';
  return {
    displayName: candidate.name,
    sourceId: candidate.sourceId,
    kind,
    iconHint: ICON_HINTS[kind]
  };
}

/**
 * Admit each candidate whose minimal read (one upcoming event) succeeds.
 * An unreachable candidate is logged and left out; it never fails the probe.
 */
export async function probeSources(
  provider: CalendarProvider,
  candidates: CalendarCandidate[],
  now: Date = new Date()
): Promise<CalendarSource[]> {
  const windowEnd = new Date(now.getTime() + PROBE_WINDOW_MS);

  const results = await Promise.all(candidates.map(async candidate => {
    try {
      await provider.listEvents(candidate.sourceId, now, windowEnd, 1);
      log.info({ calendar: candidate.name }, 'Calendar reachable');
      return toSource(candidate);
    } catch (error) {
      const reason = error instanceof NotFoundError ? 'not found'
        : error instanceof ProviderFatalError ? 'not authorized'
        : 'unreachable';
      log.warn({ calendar: candidate.name, reason, detail: errorMessage(error) }, 'Calendar excluded');
      return null;
    }
  }));

  return results.filter((source): source is CalendarSource => source !== null);
}

export class CalendarSourceRegistry {
  private constructor(private readonly sources: readonly CalendarSource[]) {}

  /**
   * Probe the configured candidates; when none answers, try the fallback (usually `primary`)
   */
  static async probe(
    provider: CalendarProvider,
    candidates: CalendarCandidate[],
    fallback?: CalendarCandidate,
    now?: Date
  ): Promise<CalendarSourceRegistry> {
    let sources = await probeSources(provider, candidates, now);
    if (sources.length === 0 && fallback) {
      log.warn({ fallback: fallback.name }, 'No configured calendar reachable, probing fallback');
      sources = await probeSources(provider, [fallback], now);
    }
    log.info({ calendars: sources.map(s => s.displayName) }, 'Calendar registry ready');
    return new CalendarSourceRegistry(Object.freeze([...sources]));
  }

  static of(sources: CalendarSource[]): CalendarSourceRegistry {
    return new CalendarSourceRegistry(Object.freeze([...sources]));
  }

  list(): readonly CalendarSource[] {
    return this.sources;
  }

  isEmpty(): boolean {
    return this.sources.length === 0;
  }

  /**
   * Resolve a requested calendar type to a source: exact kind, then keyword
   * match on name or kind, then `primary`, then the first source.
   */
  resolveTarget(requested: string): CalendarSource | undefined {
    return this.findByType(requested)
      ?? this.sources.find(s => s.sourceId === 'primary' || s.displayName.toLowerCase().includes('primary'))
      ?? this.sources[0];
  }

  /**
   * Strict lookup for moves: exact kind or keyword only, no fallback
   */
  findByType(requested: string): CalendarSource | undefined {
    const wanted = requested.trim().toLowerCase();
    return this.sources.find(s => s.kind === wanted)
      ?? this.sources.find(s => wanted !== '' && (s.displayName.toLowerCase().includes(wanted) || s.kind.includes(wanted)));
  }
}
