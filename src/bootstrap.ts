/**
 * Wires configuration into services, tools and the assistant.
 * Shared by the Slack bot and the CLI.
 */

import { AppConfig } from './config';
import { Assistant } from './core/assistant';
import { CommandRouter } from './core/commands';
import { ConcurrencyGuard } from './core/concurrencyGuard';
import { ConversationEngine } from './core/conversation';
import { CalendarActions } from './services/calendarActions';
import { CalendarAggregator } from './services/calendarAggregator';
import { CalendarSourceRegistry } from './services/calendarRegistry';
import { CalendarService } from './services/calendarService';
import { CalendarViews } from './services/calendarViews';
import { GmailService, MailProvider } from './services/gmailService';
import { OpenAIService } from './services/openaiService';
import { SearchService } from './services/searchService';
import { ThreadStateService } from './services/threadStateService';
import { WeatherService } from './services/weatherService';
import { registerCalendarTools } from './tools/calendarTools';
import { registerEmailTools } from './tools/emailTools';
import { ToolRegistry } from './tools/registry';
import { registerWebTools } from './tools/webTools';
import { ThreadStore } from './types/core';
import { createChildLogger } from './utils/logger';

const log = createChildLogger('bootstrap');

const RUN_INSTRUCTIONS = [
  'You are a personal scheduling assistant with access to the user\'s calendars, email, weather and web search.',
  'Use the tools for anything about events, free time or messages; never invent calendar entries.',
  'Keep replies short and use 24-hour times.'
].join(' ');

const PRIMARY_FALLBACK = { name: 'Primary', sourceId: 'primary', kind: 'calendar' } as const;

export interface Services {
  assistant: Assistant;
  tools: ToolRegistry;
  openai: OpenAIService;
  calendars: CalendarSourceRegistry;
  views?: CalendarViews;
  threads: ThreadStore;
  close(): void;
}

export async function createServices(config: AppConfig, threads?: ThreadStore): Promise<Services> {
  const openai = new OpenAIService({
    apiKey: config.openai.apiKey,
    assistantId: config.openai.assistantId,
    instructions: RUN_INSTRUCTIONS
  });
  const store = threads ?? new ThreadStateService(config.threadDbPath);

  let calendars = CalendarSourceRegistry.of([]);
  let views: CalendarViews | undefined;
  let actions: CalendarActions | undefined;
  if (config.google) {
    const provider = new CalendarService(config.google);
    calendars = await CalendarSourceRegistry.probe(provider, config.calendars, PRIMARY_FALLBACK);
    if (!calendars.isEmpty()) {
      const aggregator = new CalendarAggregator(provider, config.timezone);
      views = new CalendarViews(aggregator, calendars, config.maxEventsPerSource);
      actions = new CalendarActions(provider, calendars, aggregator);
    }
  } else {
    log.warn('No Google credentials configured, calendar and email disabled');
  }

  const mail: MailProvider | undefined = config.google?.type === 'oauth' ? new GmailService(config.google) : undefined;
  const weather = config.weather ? new WeatherService(config.weather.apiKey, config.weather.location) : undefined;
  const search = config.braveApiKey ? new SearchService(config.braveApiKey) : undefined;

  const tools = new ToolRegistry({ maxOutputLength: config.toolOutputLimit });
  registerCalendarTools(tools, views && actions ? { views, actions, weather } : undefined);
  registerEmailTools(tools, mail, config.timezone);
  registerWebTools(tools, weather, search);

  const guard = new ConcurrencyGuard({ minIntervalMs: config.throttleMs, busyWaitMs: config.busyWaitMs });
  const conversation = new ConversationEngine({
    provider: openai,
    threads: store,
    tools,
    poll: { intervalMs: config.pollIntervalMs, maxAttempts: config.pollMaxAttempts }
  });

  const calendarNames = calendars.list().map(source => source.displayName);
  const status = async (): Promise<string> => [
    '*Status*',
    `• Calendars: ${calendarNames.length > 0 ? calendarNames.join(', ') : 'none reachable'}`,
    `• Email: ${mail ? 'connected' : 'not configured'}`,
    `• Weather: ${weather ? 'configured' : 'not configured'}`,
    `• Web search: ${search ? 'configured' : 'not configured'}`,
    `• Conversations: ${await store.count()}`,
    `• Turns in progress: ${guard.activeCount()}`,
    `• Time zone: ${config.timezone}`
  ].join('\n');

  const commands = new CommandRouter({ timezone: config.timezone, views, mail, weather, status });
  const assistant = new Assistant({
    conversation,
    guard,
    commands,
    maxMessageLength: config.maxMessageLength,
    promptContext: () => ({ timezone: config.timezone, calendarNames, emailAvailable: mail !== undefined })
  });

  log.info({
    calendars: calendarNames,
    email: mail !== undefined,
    weather: weather !== undefined,
    search: search !== undefined,
    tools: tools.names().length
  }, 'Services ready');

  return {
    assistant,
    tools,
    openai,
    calendars,
    views,
    threads: store,
    close: () => store.close()
  };
}
