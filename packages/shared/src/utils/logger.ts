import pino from 'pino';
import { env } from '../config/index.js';

// Create base logger configuration
const createLogger = (serviceName: string, options: pino.LoggerOptions = {}) => {
  return pino({
    level: env.LOG_LEVEL,
    timestamp: () => `,"time":"${new Date().toISOString()}"`,
    ...options,
    base: {
      service: serviceName,
      ...(options.base || {})
    },
  });
};

// Default logger for shared utilities
export const logger = createLogger('ogp-shared');

// Factory function for creating service-specific loggers
export const createServiceLogger = (serviceName: string, options?: pino.LoggerOptions) => {
  return createLogger(serviceName, options);
};

// Re-export pino types for convenience
export type { Logger } from 'pino';
