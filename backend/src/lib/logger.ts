import pino from 'pino';
import { config } from './config.js';

// Create logger instance with Lambda-friendly settings
export const logger = pino({
  level: config.logLevel,
  // Lambda already adds timestamp
  timestamp: false,
  // Structured logging for CloudWatch
  formatters: {
    level: (label) => ({ level: label }),
  },
  // Redact credentials that may appear in provider parameters
  redact: {
    paths: [
      'authorization',
      'Authorization',
      'token',
      'accessKeyId',
      'secretAccessKey',
      'sessionToken',
      'parameters.password',
      'parameters.apiKey',
    ],
    censor: '[REDACTED]',
  },
});

// Create child logger with request context
export function createRequestLogger(requestId: string) {
  return logger.child({ requestId });
}

export type Logger = typeof logger;
