// ============================================================================
// @phasemint/engine — Logging
// ============================================================================

import { pino, type Logger } from 'pino';

export type { Logger };

const BASE_LEVEL = process.env.LOG_LEVEL ?? 'info';
const IS_TEST = process.env.NODE_ENV === 'test' || Boolean(process.env.VITEST);

/**
 * Create a named pino logger.
 *
 * Level comes from `LOG_LEVEL`. Output is pretty-printed in development and
 * plain JSON in production and under the test runner.
 */
export function createLogger(name: string): Logger {
  return pino({
    name,
    level: BASE_LEVEL,
    transport:
      process.env.NODE_ENV === 'production' || IS_TEST
        ? undefined
        : {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
            },
          },
  });
}
