import winston from 'winston';

const defaultLevel = process.env.NODE_ENV === 'production' ? 'info' : 'debug';

const lineFormat = winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  const trace = typeof stack === 'string' ? `\n${stack}` : '';
  return `${timestamp} [${level}] ${message}${extra}${trace}`;
});

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || defaultLevel,
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.errors({ stack: true }),
    winston.format.timestamp(),
    lineFormat
  ),
  transports: [new winston.transports.Console()]
});
