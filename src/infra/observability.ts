/**
 * Sentry error-tracking initialisation.
 *
 * Call initSentry() once at application start-up (before routes/middleware).
 * Sentry is only activated when SENTRY_DSN is set and NODE_ENV is not
 * 'development' or 'test'. Captured events carry the correlation ids of
 * the failing request as tags.
 */
import * as Sentry from '@sentry/node';
import { CorrelationInfo } from '../correlation/correlation-info';

let sentryInitialised = false;

export function initSentry(): void {
  const dsn = process.env.SENTRY_DSN;
  const environment = process.env.NODE_ENV ?? 'production';
  const serviceName = process.env.SERVICE_NAME ?? 'http-correlation-service';

  if (!dsn || environment === 'development' || environment === 'test') {
    return;
  }

  Sentry.init({
    dsn,
    environment,
    initialScope: {
      tags: { service: serviceName },
    },
    tracesSampleRate: 0.1,
  });

  process.on('unhandledRejection', (reason) => {
    Sentry.captureException(reason);
  });

  sentryInitialised = true;
}

/**
 * Forwards `error` to Sentry tagged with the request's correlation ids,
 * so an event can be matched with the log lines of the same operation.
 */
export function captureWithCorrelation(error: unknown, correlation: CorrelationInfo | undefined): void {
  if (!sentryInitialised) return;

  Sentry.withScope((scope) => {
    if (correlation) {
      scope.setTag('operation_id', correlation.operationId);
      if (correlation.transactionId) scope.setTag('transaction_id', correlation.transactionId);
      if (correlation.operationParentId) scope.setTag('operation_parent_id', correlation.operationParentId);
    }
    Sentry.captureException(error);
  });
}
