import compression from 'compression';
import rateLimit from 'express-rate-limit';
import cors from 'cors';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { AppConfig } from '../../config/app-config';
import { logger } from '../../utils/logger';

export { asyncHandler } from './asyncHandler';
export { createUpload } from './upload';

export const createCorsMiddleware = (config: AppConfig): RequestHandler => cors({
  origin: config.allowedOrigins,
  methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
  allowedHeaders: [
    'Content-Type',
    'Authorization',
    'Accept',
    'Origin'
  ],
  preflightContinue: false,
  optionsSuccessStatus: 204
});

export const compressionMiddleware = compression();

export const createRateLimiter = (config: AppConfig): RequestHandler => rateLimit({
  windowMs: config.rateLimitWindowMs,
  limit: config.rateLimitMax,
  standardHeaders: 'draft-7',
  legacyHeaders: false
});

export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const startedAt = Date.now();
  res.on('finish', () => {
    logger.http(`${req.method} ${req.originalUrl} ${res.statusCode} - ${Date.now() - startedAt}ms`);
  });
  next();
};
