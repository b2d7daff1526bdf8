import pino from 'pino';
import { config } from '../config/index.js';

export const logger = pino({
  name: 'fire-safety-engine',
  level: config.server.logLevel,
  transport:
    config.server.nodeEnv === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname,name',
          },
        }
      : undefined,
});
