import pino from 'pino';

import type { Env } from './env';

export type CliLogger = pino.Logger;

export const loggerRedactPaths = ['userId', 'link.userId'];

export function createCliLogger(options: Pick<Env, 'LOG_LEVEL' | 'LOG_FILE'>): CliLogger {
  const destination = options.LOG_FILE
    ? pino.destination({ dest: options.LOG_FILE, mkdir: true, sync: true })
    : pino.destination({ fd: 2, sync: true });

  return pino(
    {
      name: 'vless2json',
      level: options.LOG_LEVEL,
      redact: {
        paths: loggerRedactPaths,
        censor: '[REDACTED]',
      },
    },
    destination,
  );
}
