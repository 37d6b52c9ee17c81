#!/usr/bin/env node
/**
 * Entry point: start the Slack assistant
 */

import { startBot } from './slack/bot';
import { logger } from './utils/logger';

if (require.main === module) {
  startBot().catch(error => {
    logger.fatal({ err: error }, 'Assistant failed to start');
    process.exit(1);
  });
}
