import multer from 'multer';
import { Request } from 'express';
import '../types/express';
import { config } from '../config/config';
import { createInvalidFormatError, createMissingDocumentError } from '../types/errors';
import { logger } from '../utils/logger';

const PDF_MIME_TYPE = 'application/pdf';

// File filter function for multer
const fileFilter = (req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback): void => {
  const fileExtension = file.originalname.split('.').pop()?.toLowerCase();

  if (file.mimetype !== PDF_MIME_TYPE || fileExtension !== 'pdf') {
    logger.warn('Rejected non-PDF upload', {
      requestId: req.requestId,
      field: file.fieldname,
      filename: file.originalname,
      mimeType: file.mimetype
    });
    cb(createInvalidFormatError(file.mimetype, req.requestId));
    return;
  }

  cb(null, true);
};

// Configure multer for memory storage
const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: config.upload.maxFileSize,
    files: config.upload.maxInvoices + 1
  },
  fileFilter
});

// One offer PDF plus any number of invoice PDFs
export const uploadComparisonDocuments = upload.fields([
  { name: 'offer', maxCount: 1 },
  { name: 'invoices', maxCount: config.upload.maxInvoices }
]);

export interface UploadedDocuments {
  offer: Express.Multer.File;
  invoices: Express.Multer.File[];
}

/**
 * Pick the uploaded documents out of the request. Invoices keep their upload
 * order; the offer is mandatory.
 */
export const getUploadedDocuments = (req: Request): UploadedDocuments => {
  const files = req.files;
  const byField: Record<string, Express.Multer.File[]> = files && !Array.isArray(files) ? files : {};
  const offer = byField.offer?.[0];

  if (!offer) {
    throw createMissingDocumentError('offer', req.requestId);
  }

  return { offer, invoices: byField.invoices ?? [] };
};
