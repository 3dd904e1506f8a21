/**
 * pino logger factory
 *
 * LOG_LEVEL sets the level (default info). LOG_PRETTY=true routes output
 * through pino-pretty for interactive use; otherwise logs are JSON lines.
 * Every named logger is a child of one root, so a run starts at most one
 * pretty transport.
 */

import pino from 'pino';

export type Logger = pino.Logger;

let root: Logger | null = null;

export function getRootLogger(): Logger {
  if (root) return root;

  const level = process.env.LOG_LEVEL || 'info';

  if (process.env.LOG_PRETTY === 'true') {
    root = pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    });
  } else {
    root = pino({ level });
  }
  return root;
}

export function createLogger(name: string): Logger {
  return getRootLogger().child({ name });
}
