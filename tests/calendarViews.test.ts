import { describe, expect, it } from 'vitest';
import { NOTICES } from '../src/core/notices';
import { CalendarAggregator } from '../src/services/calendarAggregator';
import { CalendarSourceRegistry, toSource } from '../src/services/calendarRegistry';
import { CalendarViews, clampDays } from '../src/services/calendarViews';
import { ProviderTransientError } from '../src/utils/errors';
import { allDay, FakeCalendarProvider, timed } from './fakes';

const ZONE = 'America/Toronto';
// Tuesday, 10:00 in Toronto
const NOW = new Date('2026-03-10T14:00:00Z');

function setup(provider: FakeCalendarProvider): CalendarViews {
  const registry = CalendarSourceRegistry.of([
    toSource({ name: 'Calendar', sourceId: 'cal-id', kind: 'calendar' }),
    toSource({ name: 'Tasks', sourceId: 'tasks-id', kind: 'tasks' })
  ]);
  return new CalendarViews(new CalendarAggregator(provider, ZONE), registry, 100, () => NOW);
}

describe('clampDays', () => {
  it('keeps the range within bounds', () => {
    expect(clampDays(0)).toBe(1);
    expect(clampDays(90)).toBe(30);
    expect(clampDays(4.7)).toBe(4);
    expect(clampDays(Number.NaN)).toBe(1);
  });
});

describe('CalendarViews.todaySchedule', () => {
  it('lists every source with a per-source count', async () => {
    const views = setup(new FakeCalendarProvider()
      .add('cal-id', timed('e1', 'Standup', '2026-03-10T13:30:00Z'))
      .add('tasks-id', allDay('t1', 'Pay rent', '2026-03-10')));

    expect(await views.todaySchedule()).toBe([
      "*Today's schedule* (Tuesday, March 10)",
      '2 events (1 Calendar, 1 Tasks)',
      '',
      '• All day ✅ Pay rent',
      '• 09:30 📅 Standup'
    ].join('\n'));
  });

  it('says the day is clear when no source has events', async () => {
    const views = setup(new FakeCalendarProvider());

    expect(await views.todaySchedule()).toBe("*Today's schedule* (Tuesday, March 10)\nNo events today. Your calendar is clear.");
  });

  it('notes sources that could not be reached', async () => {
    const provider = new FakeCalendarProvider().add('cal-id', timed('e1', 'Standup', '2026-03-10T13:30:00Z'));
    provider.failing.set('tasks-id', new ProviderTransientError('503'));

    const text = await setup(provider).todaySchedule();

    expect(text.split('\n').slice(1, 4)).toEqual(['1 event (1 Calendar)', '', '• 09:30 📅 Standup']);
    expect(text.endsWith('\n\n_Not reachable right now: Tasks_')).toBe(true);
  });

  it('reports unavailability when every source fails', async () => {
    const provider = new FakeCalendarProvider();
    provider.failing.set('cal-id', new Error('down'));
    provider.failing.set('tasks-id', new Error('down'));

    expect(await setup(provider).todaySchedule()).toBe(NOTICES.calendarUnavailable);
  });

  it('caps the list at fifteen and counts the rest', async () => {
    const provider = new FakeCalendarProvider();
    for (let i = 0; i < 17; i++) {
      const minute = String(i * 3).padStart(2, '0');
      provider.add('cal-id', timed(`e${i}`, `Slot ${i}`, `2026-03-10T15:${minute}:00Z`));
    }

    const lines = (await setup(provider).todaySchedule()).split('\n');

    expect(lines[1]).toBe('17 events (17 Calendar)');
    expect(lines.filter(line => line.startsWith('• '))).toHaveLength(15);
    expect(lines[lines.length - 1]).toBe('…and 2 more events');
  });
});

describe('CalendarViews.upcoming', () => {
  it('groups events by local date', async () => {
    const views = setup(new FakeCalendarProvider()
      .add('cal-id', timed('e1', 'Dentist', '2026-03-11T18:00:00Z'), timed('e2', 'Lunch', '2026-03-10T16:00:00Z')));

    expect(await views.upcoming(2)).toBe([
      '*Upcoming 2 days*: 2 events',
      '',
      '*Tue 03/10*',
      '• 12:00 📅 Lunch',
      '',
      '*Wed 03/11*',
      '• 14:00 📅 Dentist'
    ].join('\n'));
  });

  it('clamps the range to thirty days', async () => {
    const provider = new FakeCalendarProvider();

    expect(await setup(provider).upcoming(90)).toBe('*Upcoming 30 days*\nNothing scheduled.');
    const call = provider.listCalls[0];
    expect(call.end.getTime() - call.start.getTime()).toBe(30 * 24 * 60 * 60 * 1000);
  });
});

describe('CalendarViews.briefing', () => {
  it('combines weather, today and a tomorrow preview', async () => {
    const views = setup(new FakeCalendarProvider()
      .add('cal-id', timed('e1', 'Standup', '2026-03-10T13:30:00Z'), timed('e2', 'Planning', '2026-03-11T14:00:00Z')));

    const text = await views.briefing('Toronto: 3°C');

    expect(text.startsWith('*Briefing for Tuesday, March 10*\n\nToronto: 3°C\n\n*Today\'s schedule*')).toBe(true);
    expect(text.endsWith('*Tomorrow*\n• 10:00 📅 Planning')).toBe(true);
  });
});

describe('CalendarViews.findFreeTime', () => {
  it('offers future hourly slots that avoid timed events', async () => {
    const views = setup(new FakeCalendarProvider()
      .add('cal-id', timed('e1', 'Review', '2026-03-10T15:00:00Z', '2026-03-10T16:00:00Z'))
      .add('tasks-id', allDay('t1', 'Pay rent', '2026-03-10')));

    const text = await views.findFreeTime({ durationMinutes: 60, daysAhead: 1, preferredHours: [9, 10, 11, 13] });

    expect(text).toBe('*Free 60-minute slots*\n• Tuesday 03/10 13:00-14:00');
  });

  it('skips days outside the preferred weekdays', async () => {
    const views = setup(new FakeCalendarProvider());

    expect(await views.findFreeTime({ durationMinutes: 60, daysAhead: 1, preferredDays: ['Saturday'] }))
      .toBe('No free 60-minute slots found in the next 1 day.');
  });

  it('lists the first five slots and counts the rest', async () => {
    const views = setup(new FakeCalendarProvider());

    const lines = (await views.findFreeTime({ durationMinutes: 30, daysAhead: 2 })).split('\n');

    // Tuesday 11:00-16:00 (6 slots) and Wednesday 09:00-16:00 (8 slots)
    expect(lines.slice(1, 3)).toEqual(['• Tuesday 03/10 11:00-11:30', '• Tuesday 03/10 12:00-12:30']);
    expect(lines[lines.length - 1]).toBe('…and 9 more options');
  });
});
