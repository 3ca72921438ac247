import { Router } from 'express';
import { getCorrelationInfo, getCurrentTraceContext } from '../correlation/correlation-scope';
import { logger } from '../infra/logger';

const router = Router();

// Diagnostics: what this service derived from the caller's correlation headers.
router.get('/', (_req, res) => {
  const correlation = getCorrelationInfo();
  if (!correlation) {
    res.status(404).json({
      success: false,
      error: { code: 'NOT_CORRELATED', message: 'No correlation available for this request' },
    });
    return;
  }

  const trace = getCurrentTraceContext();
  logger.debug('Correlation requested');

  res.json({
    success: true,
    data: {
      operationId: correlation.operationId,
      transactionId: correlation.transactionId ?? null,
      operationParentId: correlation.operationParentId ?? null,
      traceparent: trace?.toTraceParent() ?? null,
      tracestate: trace?.traceState ?? null,
      baggage: trace ? Object.fromEntries(trace.baggage) : {},
    },
  });
});

export default router;
