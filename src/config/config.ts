import dotenv from 'dotenv';
import { ExtractionMethod } from '../types';
import { parseExtractionMethod } from '../types/guards';

// Load environment variables
dotenv.config();

interface Config {
  // Server
  nodeEnv: string;
  port: number;

  // Reconciliation engine defaults (passed explicitly into the engine per call)
  engine: {
    priceTolerance: number;
    extractionMethod: ExtractionMethod;
  };

  // File Upload
  upload: {
    maxFileSize: number;
    maxInvoices: number;
  };

  // PDF loading
  pdf: {
    parseTimeoutMs: number;
  };

  // Rate Limiting
  rateLimit: {
    windowMs: number;
    maxRequests: number;
  };

  // CORS
  cors: {
    origin: string | string[] | boolean;
    credentials: boolean;
  };

  // Logging
  logging: {
    level: string;
    file: string;
  };
}

const parseTolerance = (raw: string | undefined): number => {
  const value = parseFloat(raw || '0.02');
  return Number.isFinite(value) && value >= 0 ? value : 0.02;
};

export const config: Config = {
  nodeEnv: process.env.NODE_ENV || 'development',
  port: parseInt(process.env.PORT || '3000', 10),

  engine: {
    priceTolerance: parseTolerance(process.env.PRICE_TOLERANCE),
    extractionMethod: parseExtractionMethod(process.env.EXTRACTION_METHOD),
  },

  upload: {
    maxFileSize: parseInt(process.env.MAX_FILE_SIZE || '10485760', 10), // 10MB
    maxInvoices: parseInt(process.env.MAX_INVOICES || '20', 10),
  },

  pdf: {
    parseTimeoutMs: parseInt(process.env.PDF_PARSE_TIMEOUT_MS || '15000', 10),
  },

  rateLimit: {
    windowMs: parseInt(process.env.RATE_LIMIT_WINDOW_MS || '3600000', 10), // 1 hour
    maxRequests: parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || '100', 10),
  },

  cors: {
    origin: process.env.CORS_ORIGIN ?
      (process.env.CORS_ORIGIN.includes(',') ?
        process.env.CORS_ORIGIN.split(',').map(origin => origin.trim()) :
        process.env.CORS_ORIGIN) :
      (process.env.NODE_ENV === 'production' ? false : true),
    credentials: process.env.CORS_CREDENTIALS === 'true',
  },

  logging: {
    level: process.env.LOG_LEVEL || 'info',
    file: process.env.LOG_FILE || './logs/app.log',
  },
};
