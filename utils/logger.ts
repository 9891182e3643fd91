// utils/logger.ts
import pino from 'pino';

// Pino default levels: trace:10, debug:20, info:30, warn:40, error:50, fatal:60
const customLevels = {
  http: 25, // Positioned between debug and info
};

const env = process.env.NODE_ENV;

const resolveLevel = (): string => {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (env === 'test') return 'silent';
  return env === 'development' ? 'debug' : 'info';
};

// Development: Pretty printing (Colors, readable timestamp)
// Production: JSON (Best for log shippers)
const logger = pino<'http'>({
  level: resolveLevel(),
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
          translateTime: 'SYS:standard', // YYYY-mm-dd HH:MM:ss
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

export default logger;
