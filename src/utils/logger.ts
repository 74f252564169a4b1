import pino from 'pino';
import { config } from '../config.js';

const statusLabels: Record<number, string> = {
  10: 'trace',
  20: 'debug',
  30: 'info',
  40: 'warn',
  50: 'error',
  60: 'fatal',
};

export const logger = pino({
  level: config.NODE_ENV === 'test' ? 'silent' : config.LOG_LEVEL,
  formatters: {
    level: (label, number) => {
      return { status: statusLabels[number] || label };
    },
  },
  timestamp: () => `,"time":"${new Date().toISOString()}"`,
  base: undefined, // Remove pid, hostname, name
  redact: ['req.headers.authorization', 'passwordHash'],
});

export type LoggerLike = Pick<typeof logger, 'info' | 'warn' | 'error'>;
