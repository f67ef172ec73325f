import compression from 'compression';
import { Request, Response } from 'express';

/**
 * Compression middleware configuration
 */
export const compressionMiddleware = compression({
  // Only compress responses that are larger than 1kb
  threshold: 1024,

  // Compression level (1-9, where 9 is best compression but slowest)
  level: 6,

  filter: (req: Request, res: Response): boolean => {
    // Don't compress if the client doesn't support it
    if (!compression.filter(req, res)) {
      return false;
    }

    // Skip binary payloads
    const contentType = res.getHeader('content-type');
    if (typeof contentType === 'string' && contentType.toLowerCase().includes('application/pdf')) {
      return false;
    }

    return true;
  }
});
