/**
 * HTTP request logging middleware.
 *
 * Uses pino-http to emit one structured JSON line per request/response.
 * Must be mounted after the correlation middleware: the request id of each
 * line is the correlation operation id of the request.
 */
import { randomUUID } from 'crypto';
import PinoHttp from 'pino-http';
import pinoInstance from '../infra/logger';
import { getCorrelationInfo } from '../correlation/correlation-scope';

const PROBES = new Set(['/health', '/ready', '/metrics']);

export const httpLogger = PinoHttp({
  logger: pinoInstance,
  genReqId: () => getCorrelationInfo()?.operationId ?? randomUUID(),
  redact: {
    paths: ['req.headers.authorization', 'req.headers.cookie'],
    censor: '[REDACTED]',
  },
  // Suppress logging for health/ready/metrics probes to reduce noise.
  autoLogging: {
    ignore: (req) => PROBES.has(req.url ?? ''),
  },
});
