import { pino } from 'pino';

import { env } from '../config/index.js';

const transport = env.isDevelopment
  ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        singleLine: true
      }
    }
  : undefined;

export const logger = pino({
  level: env.LOG_LEVEL,
  base: {
    app: 'image-fingerprint',
    env: env.NODE_ENV
  },
  transport
});

/**
 * Scoped logger carrying a `module` binding, as each hash and image module
 * uses for its own output
 */
export function createModuleLogger(module: string) {
  return logger.child({ module });
}

export type Logger = typeof logger;
