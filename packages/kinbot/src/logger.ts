import pino, { type Logger } from 'pino';

// JSON lines by default. LOG_PRETTY=true switches to pino-pretty for local runs.

const isPretty = process.env.LOG_PRETTY === 'true';

export const logger = pino({
  name: 'kinbot',
  level: process.env.LOG_LEVEL || 'info',
  ...(isPretty
    ? {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname',
          },
        },
      }
    : {}),
});

export type { Logger };

export function componentLogger(component: string): Logger {
  return logger.child({ component });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
