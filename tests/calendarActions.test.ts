import { describe, expect, it } from 'vitest';
import { NOTICES } from '../src/core/notices';
import { CalendarActions } from '../src/services/calendarActions';
import { CalendarAggregator } from '../src/services/calendarAggregator';
import { CalendarSourceRegistry, toSource } from '../src/services/calendarRegistry';
import { ValidationError } from '../src/utils/errors';
import { FakeCalendarProvider, timed } from './fakes';

const ZONE = 'America/Toronto';
const NOW = new Date('2026-03-10T14:00:00Z');

function setup(provider: FakeCalendarProvider, sources = [
  toSource({ name: 'Calendar', sourceId: 'cal-id', kind: 'calendar' }),
  toSource({ name: 'Tasks', sourceId: 'tasks-id', kind: 'tasks' })
]): CalendarActions {
  const registry = CalendarSourceRegistry.of(sources);
  return new CalendarActions(provider, registry, new CalendarAggregator(provider, ZONE), () => NOW);
}

function withTeamSync(): FakeCalendarProvider {
  // Wednesday 10:00-10:45 local
  return new FakeCalendarProvider()
    .add('cal-id', timed('evt_sync', 'Team sync', '2026-03-11T14:00:00Z', '2026-03-11T14:45:00Z'));
}

describe('CalendarActions.findEvent', () => {
  it('matches titles case-insensitively', async () => {
    const found = await setup(withTeamSync()).findEvent('TEAM');

    expect(found?.event.externalId).toBe('evt_sync');
    expect(found?.source.displayName).toBe('Calendar');
  });

  it('searches a week back and a month ahead in local time', async () => {
    const provider = withTeamSync();
    await setup(provider).findEvent('nothing');

    const [call] = provider.listCalls;
    expect(call.start.toISOString()).toBe('2026-03-03T15:00:00.000Z');
    expect(call.end.toISOString()).toBe('2026-04-09T14:00:00.000Z');
  });
});

describe('CalendarActions.createEvent', () => {
  it('defaults a date-only start to the afternoon slot in the chosen calendar', async () => {
    const provider = new FakeCalendarProvider();

    const text = await setup(provider).createEvent({ title: 'Dentist', startTime: '2026-03-12', calendarType: 'tasks' });

    expect(provider.created).toEqual([{
      sourceId: 'tasks-id',
      input: {
        summary: 'Dentist',
        description: undefined,
        location: undefined,
        start: { dateTime: '2026-03-12T15:00:00-04:00', timeZone: ZONE },
        end: { dateTime: '2026-03-12T16:00:00-04:00', timeZone: ZONE }
      }
    }]);
    expect(text).toBe('Created *Dentist*\nThursday, March 12, 2026, 15:00-16:00\nCalendar: ✅ Tasks');
  });

  it('makes a timed event one hour long when no end is given', async () => {
    const provider = new FakeCalendarProvider();

    await setup(provider).createEvent({ title: 'Call', startTime: '2026-03-12T09:30' });

    expect(provider.created[0].sourceId).toBe('cal-id');
    expect(provider.created[0].input.end).toEqual({ dateTime: '2026-03-12T10:30:00-04:00', timeZone: ZONE });
  });

  it('rejects unreadable times', async () => {
    await expect(setup(new FakeCalendarProvider()).createEvent({ title: 'Call', startTime: 'next tuesday' }))
      .rejects.toThrow(ValidationError);
  });

  it('reports an unavailable calendar when nothing is registered', async () => {
    const actions = setup(new FakeCalendarProvider(), []);

    expect(await actions.createEvent({ title: 'Call', startTime: '2026-03-12T09:30' })).toBe(NOTICES.calendarUnavailable);
  });
});

describe('CalendarActions.rescheduleEvent', () => {
  it('keeps the original duration', async () => {
    const provider = withTeamSync();

    const text = await setup(provider).rescheduleEvent('team', '2026-03-13T15:00');

    expect(provider.updated).toEqual([{
      sourceId: 'cal-id',
      eventId: 'evt_sync',
      input: {
        start: { dateTime: '2026-03-13T15:00:00-04:00', timeZone: ZONE },
        end: { dateTime: '2026-03-13T15:45:00-04:00', timeZone: ZONE }
      }
    }]);
    expect(text).toBe('Rescheduled *Team sync*\nFrom: Wednesday, March 11, 2026 10:00\nTo: Friday, March 13, 2026 15:00-15:45');
  });

  it('explains when no event matches', async () => {
    expect(await setup(withTeamSync()).rescheduleEvent('ghost', '2026-03-13T15:00'))
      .toBe('No event matching "ghost" found between 7 days ago and 30 days ahead.');
  });
});

describe('CalendarActions.updateEvent', () => {
  it('changes only the requested fields', async () => {
    const provider = withTeamSync();

    const text = await setup(provider).updateEvent({ eventSearch: 'sync', newTitle: 'Weekly sync' });

    expect(provider.updated).toEqual([{ sourceId: 'cal-id', eventId: 'evt_sync', input: { summary: 'Weekly sync' } }]);
    expect(text).toBe('Updated *Team sync* in Calendar:\n• title → Weekly sync');
  });

  it('keeps the time of day and duration for a date-only start', async () => {
    const provider = withTeamSync();

    await setup(provider).updateEvent({ eventSearch: 'sync', newStartTime: '2026-03-12' });

    expect(provider.updated[0].input.start).toEqual({ dateTime: '2026-03-12T10:00:00-04:00', timeZone: ZONE });
    expect(provider.updated[0].input.end).toEqual({ dateTime: '2026-03-12T10:45:00-04:00', timeZone: ZONE });
  });
});

describe('CalendarActions.moveEvent', () => {
  it('copies the event to the target calendar and removes the original', async () => {
    const provider = withTeamSync();

    const text = await setup(provider).moveEvent('team sync', 'tasks');

    expect(provider.created.map(entry => entry.sourceId)).toEqual(['tasks-id']);
    expect(provider.created[0].input.summary).toBe('Team sync');
    expect(provider.deleted).toEqual([{ sourceId: 'cal-id', eventId: 'evt_sync' }]);
    expect(text).toBe('Moved *Team sync* from Calendar to Tasks\nWednesday, March 11, 2026, 10:00-10:45');
  });

  it('names the available calendars for an unknown target', async () => {
    const provider = withTeamSync();

    expect(await setup(provider).moveEvent('team', 'archive')).toBe('No calendar matches "archive". Available: Calendar, Tasks.');
    expect(provider.deleted).toEqual([]);
  });
});

describe('CalendarActions.deleteEvent', () => {
  it('deletes the first match and describes it', async () => {
    const provider = withTeamSync();

    const text = await setup(provider).deleteEvent('team');

    expect(provider.deleted).toEqual([{ sourceId: 'cal-id', eventId: 'evt_sync' }]);
    expect(text).toBe('Deleted *Team sync* from Calendar\nWas: Wednesday, March 11, 2026, 10:00-10:45');
  });
});
