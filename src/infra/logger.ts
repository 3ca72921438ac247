/**
 * Pino-based structured logger for the correlation service.
 *
 * Every line written while a request is being handled carries that
 * request's operationId / transactionId / operationParentId.
 * Log level is driven by the LOG_LEVEL env var; debug is the default
 * outside production.
 */
import pino from 'pino';
import { getCorrelationInfo } from '../correlation/correlation-scope';

const isProd = (process.env.NODE_ENV ?? 'production') === 'production';
const LOG_LEVEL = process.env.LOG_LEVEL ?? (isProd ? 'info' : 'debug');

const pinoInstance = pino({
  level: LOG_LEVEL,
  redact: {
    paths: [
      'password',
      'token',
      'secret',
      'authorization',
      'req.headers.authorization',
      'req.headers.cookie',
      '*.password',
      '*.token',
      '*.secret',
    ],
    censor: '[REDACTED]',
  },
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  mixin() {
    const correlation = getCorrelationInfo();
    if (!correlation) return {};
    return {
      operationId: correlation.operationId,
      transactionId: correlation.transactionId,
      operationParentId: correlation.operationParentId,
    };
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: { service: process.env.SERVICE_NAME ?? 'http-correlation-service' },
}, process.stdout);

/**
 * Message-first wrapper: logger.info(message, meta?)
 */
export const logger = {
  error: (message: string, meta?: Record<string, unknown>) => {
    if (meta) pinoInstance.error({ ...meta }, message);
    else pinoInstance.error(message);
  },
  warn: (message: string, meta?: Record<string, unknown>) => {
    if (meta) pinoInstance.warn({ ...meta }, message);
    else pinoInstance.warn(message);
  },
  info: (message: string, meta?: Record<string, unknown>) => {
    if (meta) pinoInstance.info({ ...meta }, message);
    else pinoInstance.info(message);
  },
  debug: (message: string, meta?: Record<string, unknown>) => {
    if (meta) pinoInstance.debug({ ...meta }, message);
    else pinoInstance.debug(message);
  },
};

/** Raw pino instance, used by pino-http and child loggers. */
export default pinoInstance;
