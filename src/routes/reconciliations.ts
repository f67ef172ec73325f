import { Router, Request, Response, NextFunction } from 'express';
import '../types/express';
import { validateRequest, schemas } from '../middleware/validation';
import { uploadComparisonDocuments, getUploadedDocuments } from '../middleware/upload';
import { asyncErrorHandler } from '../middleware/errorHandler';
import { config } from '../config/config';
import { comparisonService, ComparisonSettings } from '../services';
import { ApiResponse, ReconciliationReport, SourceDocument, parseExtractionMethod } from '../types';
import { createProcessingError } from '../types/errors';
import { logger, logError } from '../utils/logger';

interface ReconciliationOptionsBody {
  priceTolerance?: number;
  extractionMethod?: string;
}

interface ReconciliationRequestBody {
  offer: SourceDocument;
  invoices: SourceDocument[];
  options?: ReconciliationOptionsBody;
}

const router = Router();

// Request values win over the configured defaults
const resolveSettings = (options: ReconciliationOptionsBody = {}): ComparisonSettings => ({
  tolerance: options.priceTolerance ?? config.engine.priceTolerance,
  extractionMethod: options.extractionMethod === undefined
    ? config.engine.extractionMethod
    : parseExtractionMethod(options.extractionMethod)
});

const sendReport = (req: Request, res: Response, report: ReconciliationReport): void => {
  const response: ApiResponse<ReconciliationReport> = {
    success: true,
    requestId: req.requestId,
    data: report,
    processingTime: Date.now() - (req.startTime ?? Date.now()),
    timestamp: new Date()
  };

  res.status(200).json(response);
};

// POST /api/v1/reconciliations - Reconcile pre-parsed documents
router.post('/',
  validateRequest({ body: schemas.reconciliationRequest }),
  (req: Request, res: Response, next: NextFunction): void => {
    try {
      const { offer, invoices, options }: ReconciliationRequestBody = req.body;
      const settings = resolveSettings(options);

      logger.info('Reconciliation request received', {
        requestId: req.requestId,
        offer: offer.name,
        invoiceCount: invoices.length,
        priceTolerance: settings.tolerance,
        extractionMethod: settings.extractionMethod
      });

      sendReport(req, res, comparisonService.compareDocuments(offer, invoices, settings));
    } catch (error) {
      next(error);
    }
  }
);

// POST /api/v1/reconciliations/pdf - Reconcile uploaded PDF documents
router.post('/pdf',
  uploadComparisonDocuments,
  validateRequest({ body: schemas.pdfReconciliationFields }),
  asyncErrorHandler(async (req: Request, res: Response): Promise<void> => {
    const { offer, invoices } = getUploadedDocuments(req);
    const fields: ReconciliationOptionsBody = req.body;
    const settings = resolveSettings(fields);

    logger.info('PDF reconciliation request received', {
      requestId: req.requestId,
      offer: offer.originalname,
      invoices: invoices.map(invoice => invoice.originalname),
      priceTolerance: settings.tolerance,
      extractionMethod: settings.extractionMethod
    });

    let report: ReconciliationReport;
    try {
      report = await comparisonService.comparePdfs(
        { name: offer.originalname, buffer: offer.buffer },
        invoices.map(invoice => ({ name: invoice.originalname, buffer: invoice.buffer })),
        settings
      );
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      logError('PDF reconciliation failed', cause, { requestId: req.requestId });
      throw createProcessingError(cause, req.requestId);
    }

    sendReport(req, res, report);
  })
);

export default router;
