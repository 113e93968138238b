/**
 * Centralized Logger Service
 *
 * Provides structured logging using pino. Uses pino-pretty when
 * NODE_ENV=development and JSON output everywhere else.
 *
 * Usage:
 *   import { createLogger } from './logger.js';
 *   const log = createLogger('chat-orchestrator');
 *   log.info({ attempts: 2 }, 'Completion received');
 *   log.error({ err }, 'Request failed');
 */

import pino from 'pino';
import { loadConfig } from '../config/pipeline-config.js';

const config = loadConfig();
const isDev = process.env.NODE_ENV === 'development';

/**
 * Root logger instance
 */
export const logger = pino({
  name: 'kql-pilot',
  level: config.logLevel,
  redact: ['apiKey', 'azureApiKey', 'openaiApiKey', '*.apiKey'],
  // Pretty print in dev, structured JSON otherwise
  ...(isDev && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    },
  }),
});

/**
 * Create a child logger with a namespace
 *
 * @param namespace - The namespace for this logger (e.g., 'domain-classifier', 'kql-translator')
 * @returns A pino child logger
 */
export function createLogger(namespace: string) {
  return logger.child({ namespace });
}

/**
 * Re-export pino types for convenience
 */
export type { Logger } from 'pino';
