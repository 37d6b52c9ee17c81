#!/usr/bin/env node
/**
 * CLI for trying the assistant without Slack
 * Usage: npm run cli -- chat "what's on my calendar today?"
 */

import { createServices } from './bootstrap';
import { loadConfig } from './config';
import { MemoryThreadStore } from './services/threadStateService';
import { errorMessage } from './utils/errors';

const CLI_USER = 'cli_user';

const USAGE = `
Calendar concierge CLI

Commands:
  chat "<message>"   - Run one assistant turn (commands like "!today" work too)
  today              - Today's schedule
  upcoming [days]    - Events for the next days (default 7)
  probe              - List the calendars that answered the probe
  tools              - Print the function definitions
  sync-tools         - Push the function definitions to the assistant

Examples:
  npm run cli -- chat "move dentist to Friday 14:00"
  npm run cli -- upcoming 3
`;

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];
  const input = args.slice(1).join(' ');

  if (!command || command === 'help') {
    console.log(USAGE);
    return;
  }

  const config = loadConfig();
  const services = await createServices(config, new MemoryThreadStore());

  try {
    switch (command) {
      case 'chat': {
        if (!input) {
          console.log('Usage: npm run cli -- chat "your message"');
          return;
        }
        printChunks(await services.assistant.handleUserTurn(CLI_USER, input));
        break;
      }

      case 'today':
        printChunks(await services.assistant.handleUserTurn(CLI_USER, '!today'));
        break;

      case 'upcoming':
        printChunks(await services.assistant.handleUserTurn(CLI_USER, `!upcoming ${input || '7'}`));
        break;

      case 'probe': {
        const sources = services.calendars.list();
        if (sources.length === 0) {
          console.log('No calendars reachable');
        }
        for (const source of sources) {
          console.log(`${source.iconHint} ${source.displayName} (${source.kind}) ${source.sourceId}`);
        }
        break;
      }

      case 'tools':
        console.log(JSON.stringify(services.tools.definitions(), null, 2));
        break;

      case 'sync-tools':
        await services.openai.syncTools(services.tools.definitions());
        console.log(`Synced ${services.tools.names().length} tools to assistant ${config.openai.assistantId}`);
        break;

      default:
        console.log(`Unknown command "${command}"`);
        console.log(USAGE);
        process.exitCode = 1;
    }
  } finally {
    services.close();
  }
}

function printChunks(chunks: Iterable<string>) {
  for (const chunk of chunks) {
    console.log(chunk);
  }
}

if (require.main === module) {
  main().catch(error => {
    console.error(`❌ ${errorMessage(error)}`);
    process.exit(1);
  });
}
