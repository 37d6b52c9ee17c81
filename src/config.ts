/**
 * Environment configuration, read once at start-up
 */

import dotenv from 'dotenv';
import { IANAZone } from 'luxon';
import { GoogleCredentials } from './services/googleAuth';
import { CalendarCandidate } from './types/calendar';
import { ConfigError } from './utils/errors';

export type Env = Record<string, string | undefined>;

export interface AppConfig {
  openai: {
    apiKey: string;
    assistantId: string;
  };
  slack: {
    botToken?: string;
    appToken?: string;
    signingSecret?: string;
  };
  google?: GoogleCredentials;
  calendars: CalendarCandidate[];
  weather?: { apiKey: string; location: string };
  braveApiKey?: string;
  timezone: string;
  threadDbPath: string;
  pollIntervalMs: number;
  pollMaxAttempts: number;
  throttleMs: number;
  busyWaitMs: number;
  maxMessageLength: number;
  maxEventsPerSource: number;
  toolOutputLimit: number;
}

function optional(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function required(env: Env, name: string): string {
  const value = optional(env, name);
  if (!value) throw new ConfigError(`Missing required environment variable ${name}`);
  return value;
}

function integer(env: Env, name: string, fallback: number, min = 0): number {
  const raw = optional(env, name);
  if (raw === undefined) return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`${name} must be a whole number, got "${raw}"`);
  }
  const value = Number.parseInt(raw, 10);
  if (value < min) throw new ConfigError(`${name} must be at least ${min}, got ${value}`);
  return value;
}

function googleCredentials(env: Env): GoogleCredentials | undefined {
  const serviceAccount = optional(env, 'GOOGLE_SERVICE_ACCOUNT_JSON');
  if (serviceAccount) return { type: 'service_account', json: serviceAccount };

  const clientId = optional(env, 'GOOGLE_CLIENT_ID');
  const clientSecret = optional(env, 'GOOGLE_CLIENT_SECRET');
  const refreshToken = optional(env, 'GOOGLE_REFRESH_TOKEN');
  if (!clientId && !clientSecret && !refreshToken) return undefined;
  if (!clientId || !clientSecret || !refreshToken) {
    throw new ConfigError('GOOGLE_CLIENT_ID, GOOGLE_CLIENT_SECRET and GOOGLE_REFRESH_TOKEN must be set together');
  }
  return {
    type: 'oauth',
    credentials: { client_id: clientId, client_secret: clientSecret, refresh_token: refreshToken }
  };
}

function calendarCandidates(env: Env): CalendarCandidate[] {
  const candidates: CalendarCandidate[] = [];
  const calendarId = optional(env, 'GOOGLE_CALENDAR_ID');
  const tasksId = optional(env, 'GOOGLE_TASKS_CALENDAR_ID');
  if (calendarId) candidates.push({ name: 'Calendar', sourceId: calendarId, kind: 'calendar' });
  if (tasksId) candidates.push({ name: 'Tasks', sourceId: tasksId, kind: 'tasks' });
  return candidates;
}

/**
 * Build the configuration from `env` (process.env merged with .env by default)
 */
export function loadConfig(env: Env = loadDotenv()): AppConfig {
  const timezone = optional(env, 'USER_TIMEZONE') ?? 'America/Toronto';
  if (!IANAZone.isValidZone(timezone)) {
    throw new ConfigError(`USER_TIMEZONE "${timezone}" is not a known time zone`);
  }

  const weatherKey = optional(env, 'WEATHER_API_KEY');

  return {
    openai: {
      apiKey: required(env, 'OPENAI_API_KEY'),
      assistantId: required(env, 'ASSISTANT_ID')
    },
    slack: {
      botToken: optional(env, 'SLACK_BOT_TOKEN'),
      appToken: optional(env, 'SLACK_APP_TOKEN'),
      signingSecret: optional(env, 'SLACK_SIGNING_SECRET')
    },
    google: googleCredentials(env),
    calendars: calendarCandidates(env),
    weather: weatherKey
      ? { apiKey: weatherKey, location: optional(env, 'WEATHER_LOCATION') ?? 'Toronto' }
      : undefined,
    braveApiKey: optional(env, 'BRAVE_API_KEY'),
    timezone,
    threadDbPath: optional(env, 'THREAD_DB_PATH') ?? ':memory:',
    pollIntervalMs: integer(env, 'POLL_INTERVAL_MS', 2000, 1),
    pollMaxAttempts: integer(env, 'POLL_MAX_ATTEMPTS', 20, 1),
    throttleMs: integer(env, 'THROTTLE_MS', 5000),
    busyWaitMs: integer(env, 'BUSY_WAIT_MS', 0),
    maxMessageLength: integer(env, 'MAX_MESSAGE_LENGTH', 3900, 1),
    maxEventsPerSource: integer(env, 'MAX_EVENTS_PER_SOURCE', 100, 1),
    toolOutputLimit: integer(env, 'TOOL_OUTPUT_LIMIT', 1500, 1)
  };
}

function loadDotenv(): Env {
  dotenv.config();
  return process.env;
}

/**
 * Slack tokens are only needed by the bot; the CLI runs without them
 */
export function requireSlack(config: AppConfig): { botToken: string; appToken: string; signingSecret?: string } {
  const { botToken, appToken, signingSecret } = config.slack;
  if (!botToken) throw new ConfigError('Missing required environment variable SLACK_BOT_TOKEN');
  if (!appToken) throw new ConfigError('Missing required environment variable SLACK_APP_TOKEN');
  return { botToken, appToken, signingSecret };
}
