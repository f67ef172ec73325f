import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { config } from './config/config';

// Import middleware
import { requestLogger } from './middleware/requestLogger';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { apiRateLimiter } from './middleware/rateLimiter';
import { compressionMiddleware } from './middleware/compression';

// Import routes
import routes from './routes';

const app = express();

// Trust proxy for rate limiting and IP detection
app.set('trust proxy', 1);

// Security middleware
app.use(helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'self'"],
      styleSrc: ["'self'", "'unsafe-inline'"],
      scriptSrc: ["'self'"]
    },
  },
  crossOriginEmbedderPolicy: false
}));

app.use(cors({
  origin: config.cors.origin,
  credentials: config.cors.credentials,
  methods: ['GET', 'POST', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'X-Request-Id']
}));

app.use(compressionMiddleware);

// Request logging middleware
app.use(requestLogger);

// Rate limiting middleware
app.use('/api', apiRateLimiter);

// Body parsing middleware
app.use(express.json({ limit: '10mb' }));

// Routes
app.use('/', routes);

// 404 handler
app.use(notFoundHandler);

// Global error handler (must be last)
app.use(errorHandler);

export default app;
