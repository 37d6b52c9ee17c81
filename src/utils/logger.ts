/**
 * Shared pino logger; modules take a child tagged with their component name
 */

import pino from 'pino';

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: { service: 'calendar-concierge' }
});

export type Logger = pino.Logger;

export function createChildLogger(component: string): Logger {
  return logger.child({ component });
}
