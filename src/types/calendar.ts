/**
 * Calendar domain types shared by the registry, aggregator and tools
 */

export type CalendarKind = 'calendar' | 'tasks';

export interface CalendarCandidate {
  name: string;
  sourceId: string;
  kind?: CalendarKind;
}

export interface CalendarSource {
  displayName: string;
  sourceId: string;
  kind: CalendarKind;
  iconHint: string;
}

/** Either an absolute instant or a date-only (all-day) value in yyyy-MM-dd form */
export type EventInstant =
  | { kind: 'timed'; at: Date }
  | { kind: 'date'; date: string };

export interface CalendarEvent {
  title: string;
  start: EventInstant;
  end: EventInstant;
  allDay: boolean;
  sourceName: string;
  sourceId: string;
  externalId: string;
  location?: string;
  description?: string;
  attendees: ReadonlySet<string>;
  link?: string;
}

export interface RawEventTime {
  dateTime?: string | null;
  date?: string | null;
  timeZone?: string | null;
}

/** Shape returned by the calendar provider; structurally matches Google's Schema$Event */
export interface RawCalendarEvent {
  id?: string | null;
  summary?: string | null;
  description?: string | null;
  location?: string | null;
  htmlLink?: string | null;
  start?: RawEventTime;
  end?: RawEventTime;
  attendees?: Array<{ email?: string | null }>;
}

export interface EventInput {
  summary?: string;
  description?: string;
  location?: string;
  start?: RawEventTime;
  end?: RawEventTime;
}

/**
 * Calendar backend. Implementations throw NotFoundError, ProviderFatalError
 * (forbidden) or ProviderTransientError.
 */
export interface CalendarProvider {
  listEvents(sourceId: string, start: Date, end: Date, limit: number): Promise<RawCalendarEvent[]>;
  getEvent(sourceId: string, eventId: string): Promise<RawCalendarEvent>;
  createEvent(sourceId: string, input: EventInput): Promise<RawCalendarEvent>;
  updateEvent(sourceId: string, eventId: string, input: EventInput): Promise<RawCalendarEvent>;
  deleteEvent(sourceId: string, eventId: string): Promise<void>;
}
