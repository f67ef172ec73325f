import winston from 'winston';
import path from 'path';
import fs from 'fs';
import { config } from '../config/config';

const SERVICE_NAME = 'offer-invoice-reconciler';
const isTest = config.nodeEnv === 'test';

// Create logs directory if it doesn't exist
const logDir = path.dirname(config.logging.file);
if (!isTest && !fs.existsSync(logDir)) {
  fs.mkdirSync(logDir, { recursive: true });
}

// JSON format for log files
const fileFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss'
  }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

// Custom format for console logging in development
const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'HH:mm:ss'
  }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, requestId, errorCode, service, environment, ...meta }) => {
    let logMessage = `${String(timestamp)} [${level}]`;

    if (requestId) {
      logMessage += ` [${String(requestId)}]`;
    }

    if (errorCode) {
      logMessage += ` [${String(errorCode)}]`;
    }

    logMessage += `: ${String(message)}`;

    // Add metadata if present
    if (Object.keys(meta).length > 0) {
      logMessage += ` ${JSON.stringify(meta)}`;
    }

    return logMessage;
  })
);

const logger = winston.createLogger({
  level: config.logging.level,
  format: fileFormat,
  defaultMeta: {
    service: SERVICE_NAME,
    environment: config.nodeEnv
  },
  transports: isTest ? [] : [
    // Separate error log file
    new winston.transports.File({
      filename: path.join(logDir, 'error.log'),
      level: 'error',
      maxsize: 5242880, // 5MB
      maxFiles: 5
    }),
    // Combined log file
    new winston.transports.File({
      filename: config.logging.file,
      maxsize: 5242880, // 5MB
      maxFiles: 5
    })
  ]
});

// Console output outside production; kept silent under test so Jest output stays readable
if (config.nodeEnv !== 'production') {
  logger.add(new winston.transports.Console({
    format: consoleFormat,
    level: 'debug',
    silent: isTest
  }));
}

export const logError = (message: string, error: Error, context?: Record<string, unknown>): void => {
  logger.error(message, {
    error: {
      name: error.name,
      message: error.message,
      stack: error.stack
    },
    ...context
  });
};

export const logValidationError = (message: string, validationErrors: unknown[], context?: Record<string, unknown>): void => {
  logger.warn(message, {
    validationErrors,
    errorCount: validationErrors.length,
    ...context
  });
};

export { logger };
