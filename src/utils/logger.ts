/**
 * Logger utility using pino.
 * Level comes from DUELSEARCH_LOG_LEVEL; the CLI's --verbose flag raises it
 * to trace, which logs every alpha-beta cutoff.
 */
import pino from 'pino';

let globalLevel: string = process.env.DUELSEARCH_LOG_LEVEL ?? 'info';

// Module loggers are created at import time, before the CLI parses flags.
const loggers: pino.Logger[] = [];

export function setLogLevel(level: string): void {
  globalLevel = level;
  for (const logger of loggers) {
    logger.level = level;
  }
}

export function getLogLevel(): string {
  return globalLevel;
}

export function createLogger(name: string): pino.Logger {
  const logger = pino({
    name,
    level: globalLevel,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:HH:MM:ss',
        ignore: 'pid,hostname',
        destination: 2, // keep stdout for boards and results
      },
    },
  });
  loggers.push(logger);
  return logger;
}

export function enableVerbose(): void {
  setLogLevel('trace');
}
