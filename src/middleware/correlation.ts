/**
 * HTTP correlation middleware.
 *
 * Correlates every incoming request (W3C `traceparent` or hierarchical
 * `Request-Id` + transaction header), makes the result available through
 * `getCorrelationInfo()` for the rest of the request, and writes the
 * configured correlation headers on the response.
 *
 * Requests whose correlation headers are rejected get a 400 and never reach
 * the route handlers.
 */
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { Logger } from 'pino';
import { CorrelationInfoAccessor } from '../correlation/correlation-info';
import { AsyncLocalCorrelationInfoAccessor, runInCorrelationScope } from '../correlation/correlation-scope';
import { ArgumentError } from '../correlation/errors';
import { HeaderDictionary } from '../correlation/headers';
import { HttpCorrelationTemplate } from '../correlation/http-correlation-template';
import { HttpCorrelationInfoOptions } from '../correlation/options';
import { correlationCounter } from '../infra/metrics';

export class ExpressHttpCorrelation extends HttpCorrelationTemplate<Request, Response> {
  protected getRequestHeaders(request: Request): HeaderDictionary | undefined {
    return request.headers;
  }

  protected setHttpResponseHeader(response: Response, headerName: string, headerValue: string): void {
    if (!headerName.trim()) {
      throw new ArgumentError('headerName', 'Requires a non-blank HTTP correlation response header name');
    }
    if (!headerValue.trim()) {
      throw new ArgumentError('headerValue', 'Requires a non-blank HTTP correlation response header value');
    }

    response.setHeader(headerName, headerValue);
  }
}

export interface HttpCorrelationMiddlewareOptions {
  options: HttpCorrelationInfoOptions;
  logger?: Logger;
  accessor?: CorrelationInfoAccessor;
  /** Identity the host already assigned to the request, used as hierarchical operation id. */
  traceIdentifier?: (req: Request) => string | undefined;
}

export const httpCorrelation = ({
  options,
  logger,
  accessor = new AsyncLocalCorrelationInfoAccessor(),
  traceIdentifier,
}: HttpCorrelationMiddlewareOptions): RequestHandler => {
  const correlation = new ExpressHttpCorrelation(options, accessor, logger);

  return (req: Request, res: Response, next: NextFunction): void => {
    runInCorrelationScope((scope) => {
      try {
        const result = correlation.trySettingCorrelationFromRequest(req, traceIdentifier?.(req), scope.traceScope);
        correlationCounter.inc({ format: options.format, outcome: result.isSuccess ? 'success' : 'failure' });

        if (!result.isSuccess) {
          logger?.warn({ reason: result.errorMessage }, 'Incoming request could not be correlated');
          res.status(400).json({
            success: false,
            error: {
              code: 'CORRELATION_FAILED',
              message: result.errorMessage,
            },
          });
          return;
        }

        correlation.setCorrelationHeadersInResponse(res, result);
      } catch (error) {
        next(error);
        return;
      }

      next();
    });
  };
};
