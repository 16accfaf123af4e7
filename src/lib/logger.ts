import winston from 'winston';
import { site } from '@/lib/site';

export const logger = winston.createLogger({
  level: site.logLevel,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
      const extra = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
      return `[${String(timestamp)}] [${level}] ${String(message)}${extra}`;
    }),
  ),
  transports: [new winston.transports.Console()],
});

export type LogMeta = Record<string, unknown>;

export const log = {
  info: (message: string, meta?: LogMeta) => logger.info(message, meta),
  debug: (message: string, meta?: LogMeta) => logger.debug(message, meta),
};
