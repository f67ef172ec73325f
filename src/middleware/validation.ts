import { Request, Response, NextFunction } from 'express';
import '../types/express';
import Joi from 'joi';
import { config } from '../config/config';
import { ExtractionMethod } from '../types';
import { ValidationAppError, ValidationDetail } from '../types/errors';
import { logValidationError } from '../utils/logger';

const toValidationDetails = (error: Joi.ValidationError, source: string): ValidationDetail[] => {
  return error.details.map(detail => ({
    field: [source, ...detail.path].join('.'),
    value: detail.context?.value,
    constraint: detail.message
  }));
};

/**
 * Validation middleware: validated values replace the raw input, unknown keys
 * are stripped.
 */
export const validateRequest = (schema: {
  body?: Joi.ObjectSchema;
  query?: Joi.ObjectSchema;
  params?: Joi.ObjectSchema;
}) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const details: ValidationDetail[] = [];
    const options: Joi.ValidationOptions = { abortEarly: false, stripUnknown: true };

    // Validate request body
    if (schema.body) {
      const { error, value } = schema.body.validate(req.body ?? {}, options);
      if (error) {
        details.push(...toValidationDetails(error, 'body'));
      } else {
        req.body = value;
      }
    }

    // Validate query parameters
    if (schema.query) {
      const { error, value } = schema.query.validate(req.query, options);
      if (error) {
        details.push(...toValidationDetails(error, 'query'));
      } else {
        req.query = value;
      }
    }

    // Validate path parameters
    if (schema.params) {
      const { error, value } = schema.params.validate(req.params, options);
      if (error) {
        details.push(...toValidationDetails(error, 'params'));
      } else {
        req.params = value;
      }
    }

    if (details.length > 0) {
      logValidationError('Validation failed', details, {
        path: req.path,
        method: req.method,
        requestId: req.requestId
      });

      next(new ValidationAppError('Request validation failed', details, req.requestId));
      return;
    }

    next();
  };
};

// Mapped onto ExtractionMethod by parseExtractionMethod in the routes
const EXTRACTION_METHOD_SPELLINGS: string[] = [
  ...Object.values(ExtractionMethod),
  'table_only',
  'text_only',
  'table-only',
  'text-only'
];

const extractionMethod = Joi.string()
  .valid(...EXTRACTION_METHOD_SPELLINGS)
  .messages({
    'any.only': `extractionMethod must be one of: ${EXTRACTION_METHOD_SPELLINGS.join(', ')}`
  });

const priceTolerance = Joi.number()
  .min(0)
  .max(1)
  .messages({
    'number.base': 'priceTolerance must be a number',
    'number.min': 'priceTolerance cannot be negative',
    'number.max': 'priceTolerance is a fraction and cannot exceed 1'
  });

const cell = Joi.string().allow('', null);

const page = Joi.object({
  tables: Joi.array().items(Joi.array().items(Joi.array().items(cell))).default([]),
  text: Joi.string().allow('').default('')
});

const document = Joi.object({
  name: Joi.string().max(255).optional(),
  pages: Joi.array().items(page).required()
    .messages({ 'any.required': 'pages is required' })
});

export const schemas = {
  extractionRequest: Joi.object({
    document: document.required(),
    options: Joi.object({
      extractionMethod: extractionMethod.optional()
    }).optional()
  }),

  reconciliationRequest: Joi.object({
    offer: document.required()
      .messages({ 'any.required': 'offer document is required' }),
    invoices: Joi.array()
      .items(document)
      .max(config.upload.maxInvoices)
      .default([]),
    options: Joi.object({
      priceTolerance: priceTolerance.optional(),
      extractionMethod: extractionMethod.optional()
    }).optional()
  }),

  // Text fields sent next to the uploaded PDFs
  pdfReconciliationFields: Joi.object({
    priceTolerance: priceTolerance.optional(),
    extractionMethod: extractionMethod.optional()
  })
};
