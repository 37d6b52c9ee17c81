import { describe, expect, it } from 'vitest';
import { hasTimeOfDay, parseDateTimeInput } from '../src/parsers/timeParser';
import { ValidationError } from '../src/utils/errors';

const ZONE = 'America/Toronto';

describe('parseDateTimeInput', () => {
  it('reads local date-times in the user zone', () => {
    expect(parseDateTimeInput('2026-03-12T09:30', ZONE).toISO()).toBe('2026-03-12T09:30:00.000-04:00');
    expect(parseDateTimeInput('2026-03-12 09:30', ZONE).toISO()).toBe('2026-03-12T09:30:00.000-04:00');
  });

  it('converts explicit offsets into the user zone', () => {
    expect(parseDateTimeInput('2026-03-12T14:00:00Z', ZONE).toISO()).toBe('2026-03-12T10:00:00.000-04:00');
    expect(parseDateTimeInput('2026-01-15T09:00:00+01:00', ZONE).toISO()).toBe('2026-01-15T03:00:00.000-05:00');
  });

  it('gives a bare date the default time', () => {
    expect(parseDateTimeInput('2026-03-12', ZONE).toFormat('HH:mm')).toBe('15:00');
    expect(parseDateTimeInput('2026-03-12', ZONE, '16:00').toFormat('HH:mm')).toBe('16:00');
  });

  it('rejects anything else', () => {
    expect(() => parseDateTimeInput('tomorrow at 3', ZONE)).toThrow(ValidationError);
    expect(() => parseDateTimeInput('2026-02-30T10:00', ZONE)).toThrow(ValidationError);
    expect(() => parseDateTimeInput('2026-03-12', ZONE, '3pm')).toThrow(ValidationError);
  });
});

describe('hasTimeOfDay', () => {
  it('tells dates from date-times', () => {
    expect(hasTimeOfDay('2026-03-12')).toBe(false);
    expect(hasTimeOfDay(' 2026-03-12T08:00 ')).toBe(true);
  });
});
