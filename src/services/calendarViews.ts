/**
 * Read-only calendar views: today, upcoming, briefing and free slots.
 * Rendered as plain text for both chat commands and tool outputs.
 */

import { DateTime } from 'luxon';
import { NOTICES } from '../core/notices';
import { formatClock } from '../parsers/timeParser';
import { CalendarEvent } from '../types/calendar';
import { CalendarAggregator, sortKey, UnifiedTimeline } from './calendarAggregator';
import { CalendarSourceRegistry } from './calendarRegistry';

export const TODAY_DISPLAY_CAP = 15;
export const UPCOMING_MAX_DATES = 7;
export const UPCOMING_EVENTS_PER_DATE = 6;
export const TOMORROW_PREVIEW_CAP = 4;
export const FREE_SLOTS_SHOWN = 5;

const WEEKDAYS = ['monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday'];

export interface FreeTimeRequest {
  durationMinutes: number;
  daysAhead: number;
  preferredDays?: string[];
  preferredHours?: number[];
}

export interface FreeSlot {
  start: DateTime;
  end: DateTime;
}

export function clampDays(days: number, min = 1, max = 30): number {
  if (!Number.isFinite(days)) return min;
  return Math.min(max, Math.max(min, Math.trunc(days)));
}

function pluralize(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

export class CalendarViews {
  private readonly icons: Map<string, string>;

  constructor(
    private readonly aggregator: CalendarAggregator,
    private readonly registry: CalendarSourceRegistry,
    private readonly maxPerSource: number,
    private readonly now: () => Date = () => new Date()
  ) {
    this.icons = new Map(registry.list().map(source => [source.sourceId, source.iconHint]));
  }

  get timezone(): string {
    return this.aggregator.timezone;
  }

  formatEventLine(event: CalendarEvent): string {
    const icon = this.icons.get(event.sourceId) ?? '📅';
    const when = event.start.kind === 'timed'
      ? formatClock(DateTime.fromJSDate(event.start.at, { zone: this.timezone }))
      : 'All day';
    const location = event.location ? ` @ ${event.location}` : '';
    return `• ${when} ${icon} ${event.title}${location}`;
  }

  async todaySchedule(): Promise<string> {
    const today = this.localNow().startOf('day');
    const timeline = await this.timeline(today, today.plus({ days: 1 }), TODAY_DISPLAY_CAP);
    const heading = `*Today's schedule* (${today.toFormat('cccc, LLLL d')})`;

    if (timeline.status === 'unavailable') return NOTICES.calendarUnavailable;
    if (timeline.total === 0) {
      return `${heading}\nNo events today. Your calendar is clear.${this.unreachableNote(timeline)}`;
    }

    const breakdown = timeline.perSource
      .filter(entry => entry.count > 0)
      .map(entry => `${entry.count} ${entry.sourceName}`)
      .join(', ');
    const lines = timeline.events.map(event => this.formatEventLine(event));
    const hidden = timeline.total - timeline.events.length;
    if (hidden > 0) lines.push(`…and ${pluralize(hidden, 'more event')}`);

    return `${heading}\n${pluralize(timeline.total, 'event')} (${breakdown})\n\n${lines.join('\n')}${this.unreachableNote(timeline)}`;
  }

  async upcoming(days: number): Promise<string> {
    const span = clampDays(days);
    const start = this.localNow();
    const timeline = await this.timeline(start, start.plus({ days: span }));
    const heading = `*Upcoming ${pluralize(span, 'day')}*`;

    if (timeline.status === 'unavailable') return NOTICES.calendarUnavailable;
    if (timeline.total === 0) {
      return `${heading}\nNothing scheduled.${this.unreachableNote(timeline)}`;
    }

    const groups = new Map<string, CalendarEvent[]>();
    for (const event of timeline.events) {
      const day = this.localDateOf(event);
      const bucket = groups.get(day) ?? [];
      bucket.push(event);
      groups.set(day, bucket);
    }

    const sections: string[] = [];
    for (const [day, events] of [...groups.entries()].slice(0, UPCOMING_MAX_DATES)) {
      const label = DateTime.fromISO(day, { zone: this.timezone }).toFormat('ccc LL/dd');
      const lines = events.slice(0, UPCOMING_EVENTS_PER_DATE).map(event => this.formatEventLine(event));
      if (events.length > UPCOMING_EVENTS_PER_DATE) {
        lines.push(`…and ${events.length - UPCOMING_EVENTS_PER_DATE} more`);
      }
      sections.push(`*${label}*\n${lines.join('\n')}`);
    }
    if (groups.size > UPCOMING_MAX_DATES) {
      sections.push(`…and ${pluralize(groups.size - UPCOMING_MAX_DATES, 'more day')}`);
    }

    return `${heading}: ${pluralize(timeline.total, 'event')}\n\n${sections.join('\n\n')}${this.unreachableNote(timeline)}`;
  }

  async briefing(weatherLine?: string): Promise<string> {
    const now = this.localNow();
    const parts = [`*Briefing for ${now.toFormat('cccc, LLLL d')}*`];
    if (weatherLine) parts.push(weatherLine);

    parts.push(await this.todaySchedule());

    const tomorrow = now.startOf('day').plus({ days: 1 });
    const preview = await this.timeline(tomorrow, tomorrow.plus({ days: 1 }), TOMORROW_PREVIEW_CAP);
    if (preview.status === 'ok') {
      const lines = preview.total === 0
        ? ['Nothing scheduled.']
        : preview.events.map(event => this.formatEventLine(event));
      if (preview.total > preview.events.length) {
        lines.push(`…and ${preview.total - preview.events.length} more`);
      }
      parts.push(`*Tomorrow*\n${lines.join('\n')}`);
    }

    return parts.join('\n\n');
  }

  /**
   * Hourly candidate slots that do not overlap a timed event.
   * All-day entries never block a slot.
   */
  async freeSlots(request: FreeTimeRequest): Promise<FreeSlot[] | null> {
    const now = this.localNow();
    const daysAhead = clampDays(request.daysAhead, 1, 14);
    const windowStart = now.startOf('day');
    const timeline = await this.timeline(windowStart, windowStart.plus({ days: daysAhead }));
    if (timeline.status === 'unavailable') return null;

    const busy = timeline.events
      .filter(event => event.start.kind === 'timed')
      .map(event => ({ start: sortKey(event.start, this.timezone), end: sortKey(event.end, this.timezone) }));

    const days = (request.preferredDays ?? WEEKDAYS.slice(0, 5)).map(day => day.toLowerCase());
    const hours = request.preferredHours ?? [9, 10, 11, 12, 13, 14, 15, 16];
    const slots: FreeSlot[] = [];

    for (let offset = 0; offset < daysAhead; offset++) {
      const day = windowStart.plus({ days: offset });
      if (!days.includes(WEEKDAYS[day.weekday - 1])) continue;

      for (const hour of hours) {
        const start = day.set({ hour, minute: 0, second: 0, millisecond: 0 });
        const end = start.plus({ minutes: request.durationMinutes });
        if (start <= now) continue;
        const clash = busy.some(block => start.toMillis() < block.end && block.start < end.toMillis());
        if (!clash) slots.push({ start, end });
      }
    }
    return slots;
  }

  async findFreeTime(request: FreeTimeRequest): Promise<string> {
    const slots = await this.freeSlots(request);
    if (slots === null) return NOTICES.calendarUnavailable;
    if (slots.length === 0) {
      return `No free ${request.durationMinutes}-minute slots found in the next ${pluralize(clampDays(request.daysAhead, 1, 14), 'day')}.`;
    }

    const lines = slots.slice(0, FREE_SLOTS_SHOWN).map(slot =>
      `• ${slot.start.toFormat('cccc LL/dd')} ${formatClock(slot.start)}-${formatClock(slot.end)}`
    );
    if (slots.length > FREE_SLOTS_SHOWN) {
      lines.push(`…and ${slots.length - FREE_SLOTS_SHOWN} more options`);
    }
    return `*Free ${request.durationMinutes}-minute slots*\n${lines.join('\n')}`;
  }

  private timeline(start: DateTime, end: DateTime, displayCap?: number): Promise<UnifiedTimeline> {
    return this.aggregator.listUnifiedEvents(this.registry.list(), {
      windowStart: start.toJSDate(),
      windowEnd: end.toJSDate(),
      maxPerSource: this.maxPerSource,
      displayCap
    });
  }

  private localNow(): DateTime {
    return DateTime.fromJSDate(this.now(), { zone: this.timezone });
  }

  private localDateOf(event: CalendarEvent): string {
    if (event.start.kind === 'date') return event.start.date;
    return DateTime.fromJSDate(event.start.at, { zone: this.timezone }).toISODate() ?? '';
  }

  private unreachableNote(timeline: UnifiedTimeline): string {
    if (timeline.status !== 'ok' || timeline.unavailableSources.length === 0) return '';
    return `\n\n_Not reachable right now: ${timeline.unavailableSources.join(', ')}_`;
  }
}
