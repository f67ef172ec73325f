import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import '../types/express';
import { logger } from '../utils/logger';

/**
 * Tag each request with an id (reusing X-Request-Id when the client sends one)
 * and log its completion with status and duration.
 */
export const requestLogger = (req: Request, res: Response, next: NextFunction): void => {
  const header = req.headers['x-request-id'];
  req.requestId = typeof header === 'string' && header ? header : uuidv4();
  req.startTime = Date.now();

  res.setHeader('X-Request-Id', req.requestId);

  res.on('finish', () => {
    const duration = Date.now() - (req.startTime ?? Date.now());
    const meta = {
      requestId: req.requestId,
      method: req.method,
      url: req.originalUrl,
      statusCode: res.statusCode,
      duration
    };

    if (res.statusCode >= 500) {
      logger.error('Request failed', meta);
    } else if (res.statusCode >= 400) {
      logger.warn('Request rejected', meta);
    } else {
      logger.info('Request completed', meta);
    }
  });

  next();
};
