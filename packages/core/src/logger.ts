import pino from 'pino';

export type Logger = pino.Logger;

/** JSON logs go to stderr; stdout is reserved for the answer the CLI prints. */
export function createLogger(level: string): Logger {
  return pino({ level, base: { app: 'steward' } }, pino.destination({ dest: 2, sync: true }));
}

export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
