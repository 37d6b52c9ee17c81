/**
 * Calendar write operations: create, update, reschedule, move and delete.
 * Events are located by a case-insensitive title search across every source.
 */

import { DateTime } from 'luxon';
import { NOTICES } from '../core/notices';
import { formatClock, formatDay, hasTimeOfDay, parseDateTimeInput } from '../parsers/timeParser';
import { CalendarEvent, CalendarProvider, CalendarSource, EventInput, EventInstant } from '../types/calendar';
import { NotFoundError, ValidationError } from '../utils/errors';
import { createChildLogger } from '../utils/logger';
import { CalendarAggregator, normalizeEvent } from './calendarAggregator';
import { CalendarSourceRegistry } from './calendarRegistry';

const log = createChildLogger('calendar-actions');

const SEARCH_LOOKBACK_DAYS = 7;
const SEARCH_LOOKAHEAD_DAYS = 30;
const SEARCH_LIMIT = 250;
const DEFAULT_START = '15:00';
const DEFAULT_END = '16:00';

export interface CreateEventRequest {
  title: string;
  startTime: string;
  endTime?: string;
  calendarType?: string;
  description?: string;
  location?: string;
}

export interface UpdateEventRequest {
  eventSearch: string;
  newTitle?: string;
  newStartTime?: string;
  newEndTime?: string;
  newDescription?: string;
  newLocation?: string;
}

export interface FoundEvent {
  event: CalendarEvent;
  source: CalendarSource;
}

export class CalendarActions {
  constructor(
    private readonly provider: CalendarProvider,
    private readonly registry: CalendarSourceRegistry,
    private readonly aggregator: CalendarAggregator,
    private readonly now: () => Date = () => new Date()
  ) {}

  private get zone(): string {
    return this.aggregator.timezone;
  }

  /**
   * First event whose title contains `search`, scanning sources in registration order
   */
  async findEvent(search: string, daysAhead = SEARCH_LOOKAHEAD_DAYS): Promise<FoundEvent | null> {
    const needle = search.trim().toLowerCase();
    if (!needle) throw new ValidationError('An event title to search for is required');

    const now = DateTime.fromJSDate(this.now(), { zone: this.zone });
    const start = now.minus({ days: SEARCH_LOOKBACK_DAYS }).toJSDate();
    const end = now.plus({ days: daysAhead }).toJSDate();

    for (const source of this.registry.list()) {
      const result = await this.aggregator.querySource(source, start, end, SEARCH_LIMIT);
      if (result.status !== 'ok') continue;
      const event = result.events.find(candidate => candidate.title.toLowerCase().includes(needle));
      if (event) return { event, source };
    }
    return null;
  }

  async createEvent(request: CreateEventRequest): Promise<string> {
    if (this.registry.isEmpty()) return NOTICES.calendarUnavailable;
    const title = request.title.trim();
    if (!title) throw new ValidationError('An event title is required');

    const target = this.registry.resolveTarget(request.calendarType ?? 'calendar');
    if (!target) return NOTICES.calendarUnavailable;

    const start = parseDateTimeInput(request.startTime, this.zone, DEFAULT_START);
    const end = request.endTime
      ? parseDateTimeInput(request.endTime, this.zone, DEFAULT_END)
      : hasTimeOfDay(request.startTime) ? start.plus({ hours: 1 }) : parseDateTimeInput(request.startTime, this.zone, DEFAULT_END);
    if (end < start) throw new ValidationError('The end time is before the start time');

    const created = await this.provider.createEvent(target.sourceId, {
      summary: title,
      description: request.description,
      location: request.location,
      start: this.toEventTime(start),
      end: this.toEventTime(end)
    });
    log.info({ calendar: target.displayName, eventId: created.id }, 'Event created');

    return this.confirmation('Created', title, start, end, target, created.htmlLink ?? undefined);
  }

  async updateEvent(request: UpdateEventRequest): Promise<string> {
    const found = await this.findEvent(request.eventSearch);
    if (!found) return this.notFound(request.eventSearch);
    const { event, source } = found;

    const patch: EventInput = {};
    const changes: string[] = [];
    if (request.newTitle?.trim()) {
      patch.summary = request.newTitle.trim();
      changes.push(`title → ${patch.summary}`);
    }
    if (request.newDescription !== undefined) {
      patch.description = request.newDescription;
      changes.push('description updated');
    }
    if (request.newLocation !== undefined) {
      patch.location = request.newLocation;
      changes.push(`location → ${request.newLocation}`);
    }

    let start = this.toLocal(event.start);
    let end = this.toLocal(event.end);
    if (request.newStartTime) {
      const duration = end.diff(start);
      start = parseDateTimeInput(request.newStartTime, this.zone, this.clockOf(event.start, DEFAULT_START));
      end = request.newEndTime ? end : start.plus(duration);
      changes.push(`start → ${formatDay(start)} ${formatClock(start)}`);
    }
    if (request.newEndTime) {
      end = parseDateTimeInput(request.newEndTime, this.zone, this.clockOf(event.end, DEFAULT_END));
      changes.push(`end → ${formatClock(end)}`);
    }
    if (request.newStartTime || request.newEndTime) {
      if (end < start) throw new ValidationError('The end time is before the start time');
      patch.start = this.toEventTime(start);
      patch.end = this.toEventTime(end);
    }

    if (changes.length === 0) {
      return `Nothing to change on "${event.title}".`;
    }

    await this.provider.updateEvent(source.sourceId, event.externalId, patch);
    log.info({ calendar: source.displayName, eventId: event.externalId, changes: changes.length }, 'Event updated');
    return `Updated *${event.title}* in ${source.displayName}:\n${changes.map(change => `• ${change}`).join('\n')}`;
  }

  /**
   * Move an event in time. Without a new end the original duration is kept.
   */
  async rescheduleEvent(eventSearch: string, newStartTime: string, newEndTime?: string): Promise<string> {
    const found = await this.findEvent(eventSearch);
    if (!found) return this.notFound(eventSearch);
    const { event, source } = found;

    const originalStart = this.toLocal(event.start);
    const originalEnd = this.toLocal(event.end);
    const duration = originalEnd > originalStart ? originalEnd.diff(originalStart) : { hours: 1 };

    const start = parseDateTimeInput(newStartTime, this.zone, this.clockOf(event.start, DEFAULT_START));
    const end = newEndTime ? parseDateTimeInput(newEndTime, this.zone, DEFAULT_END) : start.plus(duration);
    if (end < start) throw new ValidationError('The end time is before the start time');

    await this.provider.updateEvent(source.sourceId, event.externalId, {
      start: this.toEventTime(start),
      end: this.toEventTime(end)
    });
    log.info({ calendar: source.displayName, eventId: event.externalId }, 'Event rescheduled');

    const from = event.start.kind === 'timed' ? `${formatDay(originalStart)} ${formatClock(originalStart)}` : formatDay(originalStart);
    return `Rescheduled *${event.title}*\nFrom: ${from}\nTo: ${formatDay(start)} ${formatClock(start)}-${formatClock(end)}`;
  }

  /**
   * Copy the event into the target calendar, then remove the original
   */
  async moveEvent(eventSearch: string, targetCalendar: string): Promise<string> {
    const target = this.registry.findByType(targetCalendar);
    if (!target) {
      const names = this.registry.list().map(source => source.displayName).join(', ') || 'none';
      return `No calendar matches "${targetCalendar}". Available: ${names}.`;
    }

    const found = await this.findEvent(eventSearch);
    if (!found) return this.notFound(eventSearch);
    const { event, source } = found;
    if (source.sourceId === target.sourceId) {
      return `*${event.title}* is already in ${target.displayName}.`;
    }

    const original = await this.provider.getEvent(source.sourceId, event.externalId);
    const created = await this.provider.createEvent(target.sourceId, {
      summary: original.summary ?? event.title,
      description: original.description ?? undefined,
      location: original.location ?? undefined,
      start: original.start,
      end: original.end
    });

    try {
      await this.provider.deleteEvent(source.sourceId, event.externalId);
    } catch (error) {
      log.error({ err: error, eventId: event.externalId, copyId: created.id }, 'Moved event copied but original not removed');
      throw error;
    }
    log.info({ from: source.displayName, to: target.displayName, eventId: event.externalId }, 'Event moved');

    const moved = normalizeEvent(created, target, this.zone);
    const when = moved ? this.describeWhen(moved) : '';
    return `Moved *${event.title}* from ${source.displayName} to ${target.displayName}${when ? `\n${when}` : ''}`;
  }

  async deleteEvent(eventSearch: string): Promise<string> {
    const found = await this.findEvent(eventSearch);
    if (!found) return this.notFound(eventSearch);
    const { event, source } = found;

    try {
      await this.provider.deleteEvent(source.sourceId, event.externalId);
    } catch (error) {
      // already gone counts as deleted
      if (!(error instanceof NotFoundError)) throw error;
    }
    log.info({ calendar: source.displayName, eventId: event.externalId }, 'Event deleted');
    return `Deleted *${event.title}* from ${source.displayName}\nWas: ${this.describeWhen(event)}`;
  }

  private notFound(search: string): string {
    if (this.registry.isEmpty()) return NOTICES.calendarUnavailable;
    return `No event matching "${search}" found between ${SEARCH_LOOKBACK_DAYS} days ago and ${SEARCH_LOOKAHEAD_DAYS} days ahead.`;
  }

  private confirmation(verb: string, title: string, start: DateTime, end: DateTime, target: CalendarSource, link?: string): string {
    const lines = [
      `${verb} *${title}*`,
      `${formatDay(start)}, ${formatClock(start)}-${formatClock(end)}`,
      `Calendar: ${target.iconHint} ${target.displayName}`
    ];
    if (link) lines.push(link);
    return lines.join('\n');
  }

  private describeWhen(event: CalendarEvent): string {
    const start = this.toLocal(event.start);
    if (event.start.kind === 'date') return `${formatDay(start)} (all day)`;
    return `${formatDay(start)}, ${formatClock(start)}-${formatClock(this.toLocal(event.end))}`;
  }

  private toLocal(instant: EventInstant): DateTime {
    return instant.kind === 'timed'
      ? DateTime.fromJSDate(instant.at, { zone: this.zone })
      : DateTime.fromISO(instant.date, { zone: this.zone }).startOf('day');
  }

  private clockOf(instant: EventInstant, fallback: string): string {
    return instant.kind === 'timed' ? formatClock(this.toLocal(instant)) : fallback;
  }

  private toEventTime(value: DateTime): { dateTime: string; timeZone: string } {
    return { dateTime: value.toISO({ suppressMilliseconds: true }) ?? value.toUTC().toString(), timeZone: this.zone };
  }
}
