import path from 'path';
import winston from 'winston';
import { config } from '../config';
import { getBuildContext } from './buildContext';

const { combine, timestamp, printf, colorize, errors } = winston.format;

// Custom log format
const logFormat = printf(({ level, message, timestamp, ...metadata }) => {
  const ctx = getBuildContext();
  const ctxMeta: Record<string, string> = {};
  if (ctx?.buildId) ctxMeta.buildId = ctx.buildId;
  if (ctx?.mailbox) ctxMeta.mailbox = ctx.mailbox;
  const mergedMeta = { ...ctxMeta, ...metadata };

  let msg = `${timestamp} [${level}]: ${message}`;

  const metaKeys = Object.keys(mergedMeta);
  if (metaKeys.length > 0) {
    msg += ` ${JSON.stringify(mergedMeta)}`;
  }

  return msg;
});

// Create logger instance
const logger = winston.createLogger({
  level: config.logLevel,
  format: combine(
    errors({ stack: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    logFormat
  ),
  transports: [
    new winston.transports.Console({
      format: combine(
        colorize(),
        logFormat
      ),
    }),
  ],
});

// Add file transport in production
if (config.env === 'production') {
  logger.add(
    new winston.transports.File({
      filename: path.join(config.logDir, 'error.log'),
      level: 'error',
    })
  );
  logger.add(
    new winston.transports.File({
      filename: path.join(config.logDir, 'combined.log'),
    })
  );
}

export default logger;
