import winston from 'winston';

const { combine, timestamp, errors, json, colorize, printf } = winston.format;

const isDevelopment = process.env.NODE_ENV === 'development';

const devFormat = printf(({ level, message, timestamp: ts, ...meta }) => {
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${ts} ${level}: ${message}${extra}`;
});

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: process.env.NODE_ENV === 'test',
  format: isDevelopment
    ? combine(colorize(), timestamp(), errors({ stack: true }), devFormat)
    : combine(timestamp(), errors({ stack: true }), json()),
  transports: [new winston.transports.Console()],
});
