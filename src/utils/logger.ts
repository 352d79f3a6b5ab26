/**
 * Agent Runtime Guard Logger
 */
import pino from 'pino';

function resolveLevel(): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

export const logger = pino({
  level: resolveLevel(),
  name: 'agent-runtime-guard',
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  ...(process.env.NODE_ENV === 'development' && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
      },
    },
  }),
});

export default logger;
