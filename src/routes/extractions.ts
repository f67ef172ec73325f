import { Router, Request, Response, NextFunction } from 'express';
import '../types/express';
import { validateRequest, schemas } from '../middleware/validation';
import { config } from '../config/config';
import { itemExtractionService, serializeItem } from '../services';
import { ApiResponse, SerializedItem, SourceDocument, parseExtractionMethod } from '../types';
import { logger } from '../utils/logger';

interface ExtractionResult {
  name: string | null;
  itemCount: number;
  items: SerializedItem[];
}

interface ExtractionRequestBody {
  document: SourceDocument;
  options?: { extractionMethod?: string };
}

const router = Router();

// POST /api/v1/extractions - Extract line items from one document
router.post('/',
  validateRequest({ body: schemas.extractionRequest }),
  (req: Request, res: Response, next: NextFunction): void => {
    try {
      const startTime = Date.now();
      const { document, options }: ExtractionRequestBody = req.body;
      const requested = options?.extractionMethod;
      const method = requested === undefined ? config.engine.extractionMethod : parseExtractionMethod(requested);

      const items = itemExtractionService.extract(document.pages, { method });

      logger.info('Extraction completed', {
        requestId: req.requestId,
        document: document.name,
        method,
        pageCount: document.pages.length,
        itemCount: items.length
      });

      const response: ApiResponse<ExtractionResult> = {
        success: true,
        requestId: req.requestId,
        data: {
          name: document.name ?? null,
          itemCount: items.length,
          items: items.map(serializeItem)
        },
        processingTime: Date.now() - startTime,
        timestamp: new Date()
      };

      res.status(200).json(response);
    } catch (error) {
      next(error);
    }
  }
);

export default router;
