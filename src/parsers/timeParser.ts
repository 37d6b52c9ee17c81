/**
 * Deterministic date/time parsing for tool arguments.
 * Inputs without an offset are read in the user's zone.
 */

import { DateTime } from 'luxon';
import { ValidationError } from '../utils/errors';

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const TIME_OF_DAY = /^([01]?\d|2[0-3]):([0-5]\d)$/;

export function hasTimeOfDay(input: string): boolean {
  return !DATE_ONLY.test(input.trim());
}

/**
 * Parse "2026-10-20T14:30", "2026-10-20 14:30", "2026-10-20T14:30:00-04:00"
 * or a bare date, which takes `defaultTime` (HH:mm).
 */
export function parseDateTimeInput(input: string, zone: string, defaultTime = '15:00'): DateTime {
  const trimmed = input.trim().replace(/^(\d{4}-\d{2}-\d{2}) (?=\d)/, '$1T');
  if (!TIME_OF_DAY.test(defaultTime)) {
    throw new ValidationError(`Invalid default time "${defaultTime}", expected HH:mm`);
  }

  const withTime = DATE_ONLY.test(trimmed) ? `${trimmed}T${defaultTime}` : trimmed;
  const parsed = DateTime.fromISO(withTime, { zone });
  if (!parsed.isValid) {
    throw new ValidationError(`Invalid date/time "${input}", expected YYYY-MM-DDTHH:mm`);
  }
  return parsed.setZone(zone);
}

export function formatClock(value: DateTime): string {
  return value.toFormat('HH:mm');
}

export function formatDay(value: DateTime): string {
  return value.toFormat('cccc, LLLL d, yyyy');
}
