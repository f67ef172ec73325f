import { Router, Request, Response } from 'express';
import { config } from '../config/config';
import { logger } from '../utils/logger';

const router = Router();

// GET /health - Health check endpoint
router.get('/', (req: Request, res: Response): void => {
  const healthCheck = {
    status: 'OK',
    service: 'Offer Invoice Reconciler',
    version: '1.0.0',
    uptime: process.uptime(),
    environment: config.nodeEnv,
    timestamp: new Date().toISOString(),
    engine: {
      priceTolerance: config.engine.priceTolerance,
      extractionMethod: config.engine.extractionMethod
    }
  };

  logger.debug('Health check requested', {
    ip: req.ip,
    userAgent: req.get('User-Agent')
  });

  res.status(200).json(healthCheck);
});

export default router;
