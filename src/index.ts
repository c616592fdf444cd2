#!/usr/bin/env node
import { createLogger, getErrorMessage } from './common/logger.js';
import { loadConfig } from './core/config.js';
import { runServer } from './core/server.js';

const logger = createLogger();

try {
  await runServer(loadConfig(), logger);
} catch (error) {
  logger.error('Could not start server', { error: getErrorMessage(error) });
  process.exit(1);
}
