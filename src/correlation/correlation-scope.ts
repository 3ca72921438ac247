/**
 * Request-scoped correlation state propagated through AsyncLocalStorage.
 *
 * `runInCorrelationScope()` opens one scope per request; everything awaited
 * inside it (route handlers, the logger mixin) sees the same record.
 */
import { AsyncLocalStorage } from 'async_hooks';
import { CorrelationInfo, CorrelationInfoAccessor } from './correlation-info';
import { TraceContext, TraceScope } from './trace-context';

export interface CorrelationScope {
  correlationInfo?: CorrelationInfo;
  readonly traceScope: TraceScope;
}

const storage = new AsyncLocalStorage<CorrelationScope>();

export function runInCorrelationScope<T>(fn: (scope: CorrelationScope) => T): T {
  const scope: CorrelationScope = { traceScope: new TraceScope() };
  return storage.run(scope, () => fn(scope));
}

/** Correlation of the request being handled, or `undefined` outside a request. */
export function getCorrelationInfo(): CorrelationInfo | undefined {
  return storage.getStore()?.correlationInfo;
}

/** W3C trace context of the request being handled, if one was started. */
export function getCurrentTraceContext(): TraceContext | undefined {
  return storage.getStore()?.traceScope.current;
}

export class AsyncLocalCorrelationInfoAccessor implements CorrelationInfoAccessor {
  getCorrelationInfo(): CorrelationInfo | undefined {
    return getCorrelationInfo();
  }

  setCorrelationInfo(correlationInfo: CorrelationInfo): void {
    const scope = storage.getStore();
    if (!scope) {
      throw new Error('Correlation info can only be set inside runInCorrelationScope()');
    }

    scope.correlationInfo = correlationInfo;
  }
}
