import rateLimit from 'express-rate-limit';
import { Request, Response, NextFunction } from 'express';
import { config } from '../config/config';
import { AppError, ErrorCode } from '../types/errors';
import { logger } from '../utils/logger';

/**
 * In-memory rate limiter with the service's error envelope
 */
export const createRateLimiter = (options: {
  windowMs: number;
  max: number;
  errorMessage: string;
  skip?: (req: Request) => boolean;
}) => {
  return rateLimit({
    windowMs: options.windowMs,
    limit: options.max,

    // Headers configuration
    standardHeaders: true,
    legacyHeaders: false,

    // Rejections go through the global error handler
    handler: (req: Request, res: Response, next: NextFunction) => {
      const resetTime = new Date(Date.now() + options.windowMs);

      logger.warn('Rate limit exceeded', {
        ip: req.ip,
        path: req.path,
        method: req.method,
        limit: options.max,
        resetTime: resetTime.toISOString()
      });

      const error = new AppError(
        ErrorCode.RATE_LIMIT_EXCEEDED,
        options.errorMessage,
        429,
        {
          limit: options.max,
          windowMs: options.windowMs,
          retryAfter: Math.ceil(options.windowMs / 1000)
        }
      );

      next(error);
    },

    skip: options.skip ?? (() => config.nodeEnv === 'test')
  });
};

export const apiRateLimiter = createRateLimiter({
  windowMs: config.rateLimit.windowMs,
  max: config.rateLimit.maxRequests,
  errorMessage: `Too many requests. At most ${config.rateLimit.maxRequests} requests per window are allowed`
});
