/**
 * Chat commands answered directly, without an assistant run.
 * A command is a message starting with `!` or `/`; unknown names fall
 * through to the assistant as ordinary text.
 */

import { CalendarViews } from '../services/calendarViews';
import { MailProvider } from '../services/gmailService';
import { formatWeather, WeatherService } from '../services/weatherService';
import { clampCount, formatEmailList, formatEmailStats } from '../tools/emailTools';
import { errorMessage } from '../utils/errors';
import { createChildLogger } from '../utils/logger';
import { NOTICES } from './notices';

const log = createChildLogger('commands');

export interface ParsedCommand {
  name: string;
  args: string[];
}

export interface CommandDeps {
  timezone: string;
  views?: CalendarViews;
  mail?: MailProvider;
  weather?: WeatherService;
  status(): Promise<string>;
}

type CommandHandler = (args: string[]) => Promise<string>;

export const HELP_TEXT = [
  '*Commands*',
  '`!today`: today\'s schedule across all calendars',
  '`!upcoming [days]`: the next few days (1-30, default 7)',
  '`!briefing`: today, tomorrow and the weather (also `!daily`, `!morning`)',
  '`!emails [count]`: recent inbox messages',
  '`!unread [count]`: unread messages (1-20)',
  '`!emailstats`: inbox counters',
  '`!weather [city]`: current conditions',
  '`!status`: what is connected',
  '`!ping`: check that I am listening',
  '`!help`: this list',
  '',
  'Anything else is answered by the assistant, e.g. "move my dentist appointment to Friday at 14:00".'
].join('\n');

export function parseCommand(text: string): ParsedCommand | null {
  const match = text.trim().match(/^[!/]([a-z][\w-]*)(?:\s+([\s\S]*))?$/i);
  if (!match) return null;
  const rest = match[2]?.trim() ?? '';
  return {
    name: match[1].toLowerCase(),
    args: rest ? rest.split(/\s+/) : []
  };
}

function numberArg(args: string[], fallback: number): number {
  if (args.length === 0) return fallback;
  const value = Number.parseInt(args[0], 10);
  return Number.isNaN(value) ? fallback : value;
}

export class CommandRouter {
  private readonly handlers = new Map<string, CommandHandler>();

  constructor(private readonly deps: CommandDeps) {
    const briefing: CommandHandler = () => this.briefing();

    this.handlers.set('today', async () => this.deps.views ? this.deps.views.todaySchedule() : NOTICES.calendarUnavailable);
    this.handlers.set('upcoming', async args =>
      this.deps.views ? this.deps.views.upcoming(numberArg(args, 7)) : NOTICES.calendarUnavailable);
    this.handlers.set('briefing', briefing);
    this.handlers.set('daily', briefing);
    this.handlers.set('morning', briefing);
    this.handlers.set('emails', args => this.emails('Recent emails', 'in:inbox', args));
    this.handlers.set('unread', args => this.emails('Unread emails', 'is:unread', args));
    this.handlers.set('emailstats', async () =>
      this.deps.mail ? formatEmailStats(await this.deps.mail.stats()) : NOTICES.emailUnavailable);
    this.handlers.set('weather', async args =>
      this.deps.weather ? formatWeather(await this.deps.weather.current(args.join(' '))) : NOTICES.weatherUnavailable);
    this.handlers.set('status', () => this.deps.status());
    this.handlers.set('ping', async () => 'pong');
    this.handlers.set('help', async () => HELP_TEXT);
  }

  has(name: string): boolean {
    return this.handlers.has(name);
  }

  /**
   * Run a known command. Failures become a short notice; details go to the log.
   */
  async run(command: ParsedCommand, userId: string): Promise<string> {
    const handler = this.handlers.get(command.name);
    if (!handler) {
      return `Unknown command \`!${command.name}\`. Try \`!help\`.`;
    }

    log.info({ command: command.name, userId }, 'Running command');
    try {
      return await handler(command.args);
    } catch (error) {
      log.error({ err: error, command: command.name, detail: errorMessage(error) }, 'Command failed');
      return NOTICES.failed;
    }
  }

  private async emails(title: string, query: string, args: string[]): Promise<string> {
    if (!this.deps.mail) return NOTICES.emailUnavailable;
    const emails = await this.deps.mail.listMessages(query, clampCount(numberArg(args, 10)));
    return formatEmailList(title, emails, this.deps.timezone);
  }

  private async briefing(): Promise<string> {
    if (!this.deps.views) return NOTICES.calendarUnavailable;
    let weatherLine: string | undefined;
    if (this.deps.weather) {
      try {
        weatherLine = formatWeather(await this.deps.weather.current());
      } catch (error) {
        log.warn({ detail: errorMessage(error) }, 'Weather skipped in briefing');
      }
    }
    return this.deps.views.briefing(weatherLine);
  }
}
