import { Router } from 'express';
import extractionsRouter from './extractions';
import reconciliationsRouter from './reconciliations';
import healthRouter from './health';

const router = Router();

// API version 1 routes
router.use('/api/v1/extractions', extractionsRouter);
router.use('/api/v1/reconciliations', reconciliationsRouter);
router.use('/health', healthRouter);

// Root endpoint
router.get('/', (req, res) => {
  res.json({
    message: 'Offer Invoice Reconciler API',
    version: '1.0.0',
    status: 'running',
    endpoints: {
      extract: 'POST /api/v1/extractions',
      reconcile: 'POST /api/v1/reconciliations',
      reconcilePdf: 'POST /api/v1/reconciliations/pdf',
      health: 'GET /health'
    },
    timestamp: new Date().toISOString()
  });
});

export default router;
