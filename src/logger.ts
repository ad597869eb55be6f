/**
 * Logger factory
 *
 * Logs go to stderr: stdout carries the stdio MCP transport.
 */

import { pino, type Logger } from 'pino';

import { SERVER_NAME, type LogLevel } from './config.js';

export function createLogger(level: LogLevel = 'info'): Logger {
  return pino({
    level,
    base: { service: SERVER_NAME },
    transport: {
      target: 'pino/file',
      options: { destination: 2 } // stderr
    }
  });
}
