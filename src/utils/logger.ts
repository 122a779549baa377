import { Request, Response, NextFunction } from 'express';
import winston from 'winston';
import { config } from '@/utils/config';

export const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.nodeEnv === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.json()
  ),
  defaultMeta: { service: 'sales-lens-api' },
  transports: [
    new winston.transports.Console({
      format: config.nodeEnv === 'production'
        ? winston.format.json()
        : winston.format.combine(winston.format.colorize(), winston.format.simple())
    })
  ]
});

/**
 * Logs method, path, status and duration once the response is finished.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const startedAt = Date.now();
  res.on('finish', () => {
    logger.info(`${req.method} ${req.originalUrl}`, {
      status: res.statusCode,
      durationMs: Date.now() - startedAt
    });
  });
  next();
}

export function errorLogger(err: unknown, req: Request, _res: Response, next: NextFunction) {
  logger.error(`Request failed: ${req.method} ${req.originalUrl}`, err);
  next(err);
}
