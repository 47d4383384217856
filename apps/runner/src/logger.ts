import pino, { type Logger } from 'pino';
import type { AppConfig } from './config';

export const createLogger = (config: Pick<AppConfig, 'logLevel' | 'isProduction'>): Logger => {
  const options: pino.LoggerOptions = {
    level: config.logLevel,
    base: { app: 'kasino-runner' },
  };

  if (!config.isProduction) {
    options.transport = {
      target: 'pino-pretty',
      options: { colorize: true, ignore: 'pid,hostname,app' },
    };
  }

  return pino(options);
};
