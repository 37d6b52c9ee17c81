/**
 * Stable user-facing wording. Provider details never reach these strings.
 */

export const NOTICES = {
  busy: 'Still working on your previous message. Give me a moment and send it again.',
  throttled: 'Please wait a few seconds before sending another message.',
  failed: 'Something went wrong on my end. Please try again.',
  timedOut: 'That took longer than expected. Please try again in a moment.',
  unclear: "I couldn't put together a reply to that. Try rephrasing your request.",
  empty: 'Send me a message or try `!help` to see what I can do.',
  calendarUnavailable: 'Calendar integration is not available right now.',
  emailUnavailable: 'Email integration is not available right now.',
  weatherUnavailable: 'Weather lookups are not configured.',
  searchUnavailable: 'Web search is not configured.'
} as const;
