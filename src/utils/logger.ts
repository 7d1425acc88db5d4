import winston from 'winston';

const { combine, timestamp, printf, colorize, errors, json } = winston.format;

const lineFormat = printf(({ level, message, timestamp, stack, ...meta }) => {
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${timestamp} [${level}]: ${stack || message}${extra}`;
});

const useJson = process.env.LOG_JSON === 'true';

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: process.env.NODE_ENV === 'test',
  format: combine(
    errors({ stack: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    useJson ? json() : lineFormat
  ),
  transports: [
    new winston.transports.Console({
      format: useJson ? json() : combine(colorize(), lineFormat)
    })
  ]
});

export function setLogLevel(level: string): void {
  logger.level = level;
}
