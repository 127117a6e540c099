// utils/logger.ts
import pino from 'pino';

// Pino default levels: trace:10, debug:20, info:30, warn:40, error:50, fatal:60
const customLevels = {
  http: 25,
};

const env = process.env.NODE_ENV;

const defaultLevel = env === 'development' ? 'debug' : env === 'test' ? 'silent' : 'info';

// Development: pretty printing. Production: JSON lines.
const logger = pino<'http'>({
  level: process.env.LOG_LEVEL || defaultLevel,
  customLevels,
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  transport: env === 'development'
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

export default logger;
