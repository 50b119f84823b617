import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger } from 'pino';

/**
 * Root logger. Silent under Vitest so test output stays readable.
 * Components take a child: `logger.child({ component: 'ToolRegistry' })`.
 */
export function createLogger(level: string = process.env.LOG_LEVEL || 'info'): Logger {
  const isTest = process.env.VITEST === 'true' || process.env.NODE_ENV === 'test';

  return pino({
    level,
    enabled: !isTest,
    base: { app: 'relay-agent' },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: ['apiKey', '*.apiKey', 'headers.authorization'], censor: '[REDACTED]' },
  });
}

export function createSilentLogger(): Logger {
  return pino({ enabled: false });
}

export const logger = createLogger();
