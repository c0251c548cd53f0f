import winston from 'winston';

const { combine, timestamp, errors, splat, json } = winston.format;

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: process.env.NODE_ENV === 'test',
  format: combine(timestamp(), errors({ stack: true }), splat(), json()),
  defaultMeta: { service: 'word-analyzer' },
  transports: [new winston.transports.Console()],
});

export default logger;
