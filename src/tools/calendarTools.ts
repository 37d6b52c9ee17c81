/**
 * Calendar capabilities exposed to the assistant run
 */

import { Type } from '@sinclair/typebox';
import { NOTICES } from '../core/notices';
import { CalendarActions } from '../services/calendarActions';
import { CalendarViews } from '../services/calendarViews';
import { formatWeather, WeatherService } from '../services/weatherService';
import { errorMessage } from '../utils/errors';
import { createChildLogger } from '../utils/logger';
import { ToolRegistry } from './registry';

const log = createChildLogger('calendar-tools');

export interface CalendarToolDeps {
  views: CalendarViews;
  actions: CalendarActions;
  weather?: WeatherService;
}

const NoParams = Type.Object({});

const UpcomingParams = Type.Object({
  days: Type.Integer({ description: 'Number of days to look ahead (1-30)', default: 7 })
});

const FreeTimeParams = Type.Object({
  duration_minutes: Type.Integer({ description: 'Length of the slot in minutes', minimum: 5, default: 60 }),
  days_ahead: Type.Integer({ description: 'How many days to search (1-14)', default: 7 }),
  preferred_days: Type.Optional(Type.Array(Type.String(), { description: 'Weekday names, e.g. ["monday", "friday"]' })),
  preferred_hours: Type.Optional(Type.Array(Type.Integer({ minimum: 0, maximum: 23 }), { description: 'Start hours in 24h form' }))
});

const CreateEventParams = Type.Object({
  title: Type.String({ description: 'Event title' }),
  start_time: Type.String({ description: 'Start as YYYY-MM-DDTHH:mm in the user timezone, or YYYY-MM-DD' }),
  end_time: Type.Optional(Type.String({ description: 'End as YYYY-MM-DDTHH:mm; defaults to one hour after the start' })),
  calendar_type: Type.Optional(Type.String({ description: 'Which calendar: "calendar" or "tasks"', default: 'calendar' })),
  description: Type.Optional(Type.String()),
  location: Type.Optional(Type.String())
});

const UpdateEventParams = Type.Object({
  event_search: Type.String({ description: 'Part of the title of the event to change' }),
  new_title: Type.Optional(Type.String()),
  new_start_time: Type.Optional(Type.String({ description: 'YYYY-MM-DDTHH:mm or YYYY-MM-DD' })),
  new_end_time: Type.Optional(Type.String({ description: 'YYYY-MM-DDTHH:mm or YYYY-MM-DD' })),
  new_description: Type.Optional(Type.String()),
  new_location: Type.Optional(Type.String())
});

const RescheduleParams = Type.Object({
  event_search: Type.String({ description: 'Part of the title of the event to move' }),
  new_start_time: Type.String({ description: 'New start as YYYY-MM-DDTHH:mm' }),
  new_end_time: Type.Optional(Type.String({ description: 'New end; the original duration is kept when omitted' }))
});

const MoveParams = Type.Object({
  task_search: Type.String({ description: 'Part of the title of the event or task to move' }),
  target_calendar: Type.String({ description: 'Destination calendar: "calendar" or "tasks"', default: 'tasks' })
});

const DeleteParams = Type.Object({
  event_search: Type.String({ description: 'Part of the title of the event to delete' })
});

function unavailable(): string {
  return NOTICES.calendarUnavailable;
}

/**
 * Register every calendar capability. Without a calendar backend the same
 * names are registered and answer with the unavailable notice.
 */
export function registerCalendarTools(registry: ToolRegistry, deps?: CalendarToolDeps): void {
  registry.register('get_today_schedule',
    () => deps ? deps.views.todaySchedule() : unavailable(),
    NoParams,
    "Today's events across every connected calendar");

  registry.register('get_upcoming_events',
    args => deps ? deps.views.upcoming(args.days) : unavailable(),
    UpcomingParams,
    'Events for the next few days, grouped by date');

  registry.register('get_morning_briefing',
    async () => {
      if (!deps) return unavailable();
      let weatherLine: string | undefined;
      if (deps.weather) {
        try {
          weatherLine = formatWeather(await deps.weather.current());
        } catch (error) {
          log.warn({ detail: errorMessage(error) }, 'Weather skipped in briefing');
        }
      }
      return deps.views.briefing(weatherLine);
    },
    NoParams,
    "Morning briefing: today's schedule, a preview of tomorrow and the weather");

  registry.register('find_free_time',
    args => deps
      ? deps.views.findFreeTime({
          durationMinutes: args.duration_minutes,
          daysAhead: args.days_ahead,
          preferredDays: args.preferred_days,
          preferredHours: args.preferred_hours
        })
      : unavailable(),
    FreeTimeParams,
    'Find open slots of a given length on weekdays during working hours');

  registry.register('create_calendar_event',
    args => deps
      ? deps.actions.createEvent({
          title: args.title,
          startTime: args.start_time,
          endTime: args.end_time,
          calendarType: args.calendar_type,
          description: args.description,
          location: args.location
        })
      : unavailable(),
    CreateEventParams,
    'Create an event in the chosen calendar');

  registry.register('update_calendar_event',
    args => deps
      ? deps.actions.updateEvent({
          eventSearch: args.event_search,
          newTitle: args.new_title,
          newStartTime: args.new_start_time,
          newEndTime: args.new_end_time,
          newDescription: args.new_description,
          newLocation: args.new_location
        })
      : unavailable(),
    UpdateEventParams,
    "Change an existing event's title, times, description or location");

  registry.register('reschedule_event',
    args => deps ? deps.actions.rescheduleEvent(args.event_search, args.new_start_time, args.new_end_time) : unavailable(),
    RescheduleParams,
    'Move an event to a new time, keeping its duration unless a new end is given');

  registry.register('move_task_between_calendars',
    args => deps ? deps.actions.moveEvent(args.task_search, args.target_calendar) : unavailable(),
    MoveParams,
    'Move an event or task from one calendar to another');

  registry.register('delete_calendar_event',
    args => deps ? deps.actions.deleteEvent(args.event_search) : unavailable(),
    DeleteParams,
    'Delete an event found by title');
}
