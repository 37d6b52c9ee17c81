/**
 * Wraps a user turn with the date context the assistant needs to resolve
 * "today" and "tomorrow" in the user's zone
 */

import { DateTime } from 'luxon';

export interface PromptContext {
  now: Date;
  timezone: string;
  calendarNames: string[];
  emailAvailable: boolean;
}

export function buildTurnPrompt(text: string, context: PromptContext): string {
  const today = DateTime.fromJSDate(context.now, { zone: context.timezone });
  const tomorrow = today.plus({ days: 1 });
  const calendars = context.calendarNames.length > 0 ? context.calendarNames.join(', ') : 'none';

  return [
    `USER REQUEST: ${text}`,
    '',
    'CURRENT DATE & TIME CONTEXT:',
    `- TODAY: ${today.toFormat('cccc, LLLL d, yyyy')} (${today.toISODate()})`,
    `- TOMORROW: ${tomorrow.toFormat('cccc, LLLL d, yyyy')} (${tomorrow.toISODate()})`,
    `- TIMEZONE: ${context.timezone}`,
    '',
    'GUIDELINES:',
    `- Available calendars: ${calendars}`,
    `- Email integration: ${context.emailAvailable ? 'available' : 'not available'}`,
    '- Use 24-hour times (14:30, not 2:30 PM) in the timezone above'
  ].join('\n');
}
