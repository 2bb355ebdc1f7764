import pino from 'pino';
import { config } from '../config/env.js';

function defaultLevel(): string {
  if (config.NODE_ENV === 'test') return 'silent';
  return config.NODE_ENV === 'production' ? 'info' : 'debug';
}

const logger = pino({
    level: config.LOG_LEVEL ?? defaultLevel(),
    transport:
        config.NODE_ENV === 'development'
            ? { target: 'pino-pretty', options: { colorize: true } }
            : undefined
});

export default logger;
