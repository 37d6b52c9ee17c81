import { describe, expect, it } from 'vitest';
import { loadConfig, requireSlack } from '../src/config';
import { ConfigError } from '../src/utils/errors';

const BASE = { OPENAI_API_KEY: 'test-key', ASSISTANT_ID: 'asst_test' };

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig(BASE);

    expect(config.timezone).toBe('America/Toronto');
    expect(config.threadDbPath).toBe(':memory:');
    expect(config.pollIntervalMs).toBe(2000);
    expect(config.pollMaxAttempts).toBe(20);
    expect(config.throttleMs).toBe(5000);
    expect(config.busyWaitMs).toBe(0);
    expect(config.maxMessageLength).toBe(3900);
    expect(config.maxEventsPerSource).toBe(100);
    expect(config.toolOutputLimit).toBe(1500);
    expect(config.google).toBeUndefined();
    expect(config.weather).toBeUndefined();
    expect(config.calendars).toEqual([]);
  });

  it('requires the assistant credentials', () => {
    expect(() => loadConfig({ OPENAI_API_KEY: 'test-key' })).toThrow('ASSISTANT_ID');
    expect(() => loadConfig({ ASSISTANT_ID: 'asst_test', OPENAI_API_KEY: '  ' })).toThrow(ConfigError);
  });

  it('rejects malformed numbers and zones', () => {
    expect(() => loadConfig({ ...BASE, POLL_INTERVAL_MS: 'fast' })).toThrow(ConfigError);
    expect(() => loadConfig({ ...BASE, MAX_MESSAGE_LENGTH: '0' })).toThrow(ConfigError);
    expect(() => loadConfig({ ...BASE, USER_TIMEZONE: 'Mars/Olympus' })).toThrow(ConfigError);
  });

  it('builds calendar candidates and Google credentials', () => {
    const config = loadConfig({
      ...BASE,
      GOOGLE_CLIENT_ID: 'client',
      GOOGLE_CLIENT_SECRET: 'test-secret',
      GOOGLE_REFRESH_TOKEN: 'refresh',
      GOOGLE_CALENDAR_ID: 'primary',
      GOOGLE_TASKS_CALENDAR_ID: 'tasks@group.calendar.google.com',
      WEATHER_API_KEY: 'weather-key'
    });

    expect(config.google).toEqual({
      type: 'oauth',
      credentials: { client_id: 'client', client_secret: 'test-secret', refresh_token: 'refresh' }
    });
    expect(config.calendars).toEqual([
      { name: 'Calendar', sourceId: 'primary', kind: 'calendar' },
      { name: 'Tasks', sourceId: 'tasks@group.calendar.google.com', kind: 'tasks' }
    ]);
    expect(config.weather).toEqual({ apiKey: 'weather-key', location: 'Toronto' });
  });

  it('rejects a partial OAuth setup', () => {
    expect(() => loadConfig({ ...BASE, GOOGLE_CLIENT_ID: 'client' })).toThrow(ConfigError);
  });

  it('prefers a service account when one is given', () => {
    const config = loadConfig({ ...BASE, GOOGLE_SERVICE_ACCOUNT_JSON: '{"client_email":"bot@example.com"}' });

    expect(config.google?.type).toBe('service_account');
  });
});

describe('requireSlack', () => {
  it('needs both socket mode tokens', () => {
    expect(() => requireSlack(loadConfig({ ...BASE, SLACK_BOT_TOKEN: 'xoxb-test' }))).toThrow('SLACK_APP_TOKEN');
    expect(requireSlack(loadConfig({ ...BASE, SLACK_BOT_TOKEN: 'xoxb-test', SLACK_APP_TOKEN: 'xapp-test' })))
      .toEqual({ botToken: 'xoxb-test', appToken: 'xapp-test', signingSecret: undefined });
  });
});
