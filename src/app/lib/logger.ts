import { createLogger, format, transports } from 'winston';

const isDevelopment = process.env.NODE_ENV === 'development';
const isTest = process.env.NODE_ENV === 'test';

/**
 * Application logger. Colorized single-line output in development, JSON elsewhere.
 */
export const logger = createLogger({
  level: process.env.LOG_LEVEL ?? (isDevelopment ? 'debug' : 'info'),
  silent: isTest,
  format: format.combine(
    format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    isDevelopment
      ? format.combine(
          format.colorize(),
          format.printf(({ timestamp, level, message, ...meta }) => {
            const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
            return `${String(timestamp)} [${level}]: ${String(message)}${metaStr}`;
          })
        )
      : format.json()
  ),
  transports: [new transports.Console()],
});
