/**
 * Calendar aggregation: query every source for a window, tag, merge, and
 * order everything into one timeline in the user's zone.
 *
 * Each source is queried on its own; a failing source contributes nothing
 * and never aborts the others.
 */

import { DateTime } from 'luxon';
import { CalendarEvent, CalendarProvider, CalendarSource, EventInstant, RawCalendarEvent, RawEventTime } from '../types/calendar';
import { errorMessage, SourceUnavailableError } from '../utils/errors';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger('calendar-aggregator');

export type SourceResult =
  | { status: 'ok'; source: CalendarSource; events: CalendarEvent[] }
  | { status: 'unavailable'; source: CalendarSource; error: SourceUnavailableError };

export interface SourceCount {
  sourceName: string;
  count: number;
}

export type UnifiedTimeline =
  | { status: 'unavailable'; reason: string }
  | {
      status: 'ok';
      events: CalendarEvent[];
      total: number;                  // merged count before the display cap
      perSource: SourceCount[];
      unavailableSources: string[];
    };

export interface UnifiedQuery {
  windowStart: Date;
  windowEnd: Date;
  maxPerSource: number;
  displayCap?: number;
}

function toInstant(time: RawEventTime | undefined, zone: string): EventInstant | null {
  if (time?.dateTime) {
    const parsed = DateTime.fromISO(time.dateTime, { zone: time.timeZone || zone });
    return parsed.isValid ? { kind: 'timed', at: parsed.toJSDate() } : null;
  }
  if (time?.date && DateTime.fromISO(time.date).isValid) {
    return { kind: 'date', date: time.date };
  }
  return null;
}

/**
 * Normalize one raw event; null when it has no usable start.
 * A missing end makes it a zero-duration point event.
 */
export function normalizeEvent(raw: RawCalendarEvent, source: CalendarSource, zone: string): CalendarEvent | null {
  const start = toInstant(raw.start, zone);
  if (!start) return null;

  let end = toInstant(raw.end, zone) ?? start;
  if (start.kind === 'timed' && end.kind === 'timed' && end.at < start.at) {
    end = start;
  }

  const attendees = new Set<string>();
  for (const attendee of raw.attendees ?? []) {
    if (attendee.email) attendees.add(attendee.email);
  }

  return {
    title: raw.summary || 'Untitled event',
    start,
    end,
    allDay: start.kind === 'date',
    sourceName: source.displayName,
    sourceId: source.sourceId,
    externalId: raw.id ?? '',
    location: raw.location || undefined,
    description: raw.description || undefined,
    attendees,
    link: raw.htmlLink || undefined
  };
}

/**
 * Sort key in epoch ms: the UTC instant for timed events, local midnight for all-day ones
 */
export function sortKey(instant: EventInstant, zone: string): number {
  if (instant.kind === 'timed') return instant.at.getTime();
  return DateTime.fromISO(instant.date, { zone }).startOf('day').toMillis();
}

export class CalendarAggregator {
  constructor(
    private readonly provider: CalendarProvider,
    readonly timezone: string
  ) {}

  async querySource(source: CalendarSource, start: Date, end: Date, maxPerSource: number): Promise<SourceResult> {
    try {
      const raw = await this.provider.listEvents(source.sourceId, start, end, maxPerSource);
      const events: CalendarEvent[] = [];
      for (const item of raw.slice(0, maxPerSource)) {
        const event = normalizeEvent(item, source, this.timezone);
        if (event) {
          events.push(event);
        } else {
          log.debug({ calendar: source.displayName, eventId: item.id }, 'Skipped event without a start');
        }
      }
      return { status: 'ok', source, events };
    } catch (error) {
      const failure = new SourceUnavailableError(source.displayName, errorMessage(error), error);
      log.warn({ calendar: source.displayName, detail: failure.message }, 'Calendar source unavailable');
      return { status: 'unavailable', source, error: failure };
    }
  }

  async listUnifiedEvents(sources: readonly CalendarSource[], query: UnifiedQuery): Promise<UnifiedTimeline> {
    if (sources.length === 0) {
      return { status: 'unavailable', reason: 'no reachable calendars' };
    }

    const results = await Promise.all(
      sources.map(source => this.querySource(source, query.windowStart, query.windowEnd, query.maxPerSource))
    );

    if (results.every(result => result.status === 'unavailable')) {
      return { status: 'unavailable', reason: 'every calendar failed to answer' };
    }

    const tagged: Array<{ event: CalendarEvent; key: number; rank: number; sourceIndex: number; index: number }> = [];
    const perSource: SourceCount[] = [];
    const unavailableSources: string[] = [];

    results.forEach((result, sourceIndex) => {
      if (result.status === 'unavailable') {
        unavailableSources.push(result.source.displayName);
        return;
      }
      perSource.push({ sourceName: result.source.displayName, count: result.events.length });
      result.events.forEach((event, index) => {
        tagged.push({
          event,
          key: sortKey(event.start, this.timezone),
          rank: event.allDay ? 0 : 1,
          sourceIndex,
          index
        });
      });
    });

    // all-day entries lead their date; ties fall back to registration order
    tagged.sort((a, b) =>
      a.key - b.key || a.rank - b.rank || a.sourceIndex - b.sourceIndex || a.index - b.index
    );

    const merged = tagged.map(entry => entry.event);
    return {
      status: 'ok',
      events: query.displayCap !== undefined ? merged.slice(0, query.displayCap) : merged,
      total: merged.length,
      perSource,
      unavailableSources
    };
  }
}
