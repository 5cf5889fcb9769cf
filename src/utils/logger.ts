import pino from 'pino';
import { AsyncLocalStorage } from 'async_hooks';

const contextStorage = new AsyncLocalStorage<Record<string, unknown>>();

// The logger is created before the app config, so it reads its own variables
const serviceName = process.env.SERVICE_NAME || 'api';
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';

function createTransports() {
  return pino.transport({
    targets: [
      {
        target: 'pino/file',
        options: {
          destination: `./logs/${serviceName}.log`,
          mkdir: true,
        },
      },
      // Always output to stdout with pretty formatting
      {
        target: 'pino-pretty',
        options: {
          destination: 1, // stdout
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      },
    ],
  });
}

const options: pino.LoggerOptions = {
  level: isTest ? 'silent' : process.env.LOG_LEVEL || 'debug',
  base: { service: serviceName },
  mixin: () => contextStorage.getStore() || {},
  timestamp: pino.stdTimeFunctions.unixTime,
};

export const logger = isTest ? pino(options) : pino(options, createTransports());

export function withContext<T>(context: Record<string, unknown>, fn: () => T): T {
  return contextStorage.run(context, fn);
}

export type { Logger } from 'pino';
