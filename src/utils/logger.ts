import pino from 'pino';
import { getConfig } from '../config/index.js';

let loggerInstance: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    const config = getConfig();
    loggerInstance = pino({
      level: config.logLevel,
      base: { service: 'notice-watch' },
      redact: ['token', 'botToken', 'apiKey', '*.token', '*.botToken', '*.apiKey'],
      transport: config.logPretty
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    });
  }
  return loggerInstance;
}

/**
 * Logger tagged with the component that owns it
 */
export function createChildLogger(name: string): pino.Logger {
  return getLogger().child({ component: name });
}
