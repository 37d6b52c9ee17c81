/**
 * Google Calendar integration: raw event reads and writes per calendar id
 */

import { google, calendar_v3 } from 'googleapis';
import { CalendarProvider, EventInput, RawCalendarEvent } from '../types/calendar';
import { classifyProviderError } from '../utils/errors';
import { createChildLogger } from '../utils/logger';
import { createGoogleAuth, GoogleCredentials } from './googleAuth';

const log = createChildLogger('google-calendar');

const CALENDAR_SCOPES = ['https://www.googleapis.com/auth/calendar'];

export class CalendarService implements CalendarProvider {
  private calendar: calendar_v3.Calendar;

  constructor(credentials: GoogleCredentials, calendar?: calendar_v3.Calendar) {
    this.calendar = calendar ?? google.calendar({
      version: 'v3',
      auth: createGoogleAuth(credentials, CALENDAR_SCOPES)
    });
  }

  async listEvents(sourceId: string, start: Date, end: Date, limit: number): Promise<RawCalendarEvent[]> {
    const response = await this.call('list events', sourceId, () =>
      this.calendar.events.list({
        calendarId: sourceId,
        timeMin: start.toISOString(),
        timeMax: end.toISOString(),
        maxResults: limit,
        singleEvents: true,
        orderBy: 'startTime'
      })
    );
    return response.data.items ?? [];
  }

  async getEvent(sourceId: string, eventId: string): Promise<RawCalendarEvent> {
    const response = await this.call('get event', sourceId, () =>
      this.calendar.events.get({ calendarId: sourceId, eventId })
    );
    return response.data;
  }

  async createEvent(sourceId: string, input: EventInput): Promise<RawCalendarEvent> {
    const response = await this.call('create event', sourceId, () =>
      this.calendar.events.insert({ calendarId: sourceId, requestBody: input })
    );
    return response.data;
  }

  async updateEvent(sourceId: string, eventId: string, input: EventInput): Promise<RawCalendarEvent> {
    const response = await this.call('update event', sourceId, () =>
      this.calendar.events.patch({ calendarId: sourceId, eventId, requestBody: input })
    );
    return response.data;
  }

  async deleteEvent(sourceId: string, eventId: string): Promise<void> {
    await this.call('delete event', sourceId, () =>
      this.calendar.events.delete({ calendarId: sourceId, eventId })
    );
  }

  private async call<T>(operation: string, sourceId: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const classified = classifyProviderError(error, `Google Calendar ${operation} (${sourceId})`);
      log.debug({ err: error, operation, sourceId, code: classified.code }, 'Calendar request failed');
      throw classified;
    }
  }
}

/**
 * Setup for Google Calendar:
 *
 * Either share the calendars with a service account and set
 *    GOOGLE_SERVICE_ACCOUNT_JSON={...}
 * or create OAuth2 credentials, get a refresh token via the OAuth playground and set
 *    GOOGLE_CLIENT_ID / GOOGLE_CLIENT_SECRET / GOOGLE_REFRESH_TOKEN
 */
