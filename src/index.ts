export { ArgumentError, CorrelationConfigurationError } from './correlation/errors';
export {
  CorrelationInfo,
  CorrelationInfoAccessor,
  InMemoryCorrelationInfoAccessor,
  createCorrelationInfo,
} from './correlation/correlation-info';
export {
  HttpCorrelationFailure,
  HttpCorrelationResult,
  HttpCorrelationSuccess,
} from './correlation/correlation-result';
export {
  AsyncLocalCorrelationInfoAccessor,
  CorrelationScope,
  getCorrelationInfo,
  getCurrentTraceContext,
  runInCorrelationScope,
} from './correlation/correlation-scope';
export {
  CORRELATION_CONTEXT_HEADER,
  HeaderDictionary,
  TRACE_PARENT_HEADER,
  TRACE_STATE_HEADER,
  getHeaderValue,
} from './correlation/headers';
export { HttpCorrelationTemplate } from './correlation/http-correlation-template';
export {
  HttpCorrelationFormat,
  HttpCorrelationInfoOptions,
  HttpCorrelationInfoOptionsInput,
  IdGenerator,
  createHttpCorrelationInfoOptions,
  generateGuid,
} from './correlation/options';
export { REQUEST_ID_PATTERN, extractOperationParentId, matchesRequestIdFormat } from './correlation/request-id';
export { TraceContext, TraceScope, generateSpanId, generateTraceId } from './correlation/trace-context';
export { isW3CCompliant, parseTraceParent, TraceParent } from './correlation/trace-parent';
export { ExpressHttpCorrelation, HttpCorrelationMiddlewareOptions, httpCorrelation } from './middleware/correlation';
