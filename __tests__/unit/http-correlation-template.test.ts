/**
 * Correlation engine tests, run against a minimal template implementation
 * over plain request/response objects.
 *
 * Covers:
 *  1. Entry point   – argument checks, missing headers, unknown format
 *  2. W3C           – new parent, existing parent, malformed trace/span ids, baggage
 *  3. Hierarchical  – transaction header, operation id, parent id extraction, generators
 *  4. Response      – which headers are written for which configuration
 */
import {
  CorrelationInfo,
  InMemoryCorrelationInfoAccessor,
  createCorrelationInfo,
} from '../../src/correlation/correlation-info';
import { HttpCorrelationResult } from '../../src/correlation/correlation-result';
import { ArgumentError, CorrelationConfigurationError } from '../../src/correlation/errors';
import { HeaderDictionary } from '../../src/correlation/headers';
import { HttpCorrelationTemplate } from '../../src/correlation/http-correlation-template';
import {
  HttpCorrelationInfoOptions,
  HttpCorrelationInfoOptionsInput,
  createHttpCorrelationInfoOptions,
} from '../../src/correlation/options';
import { TraceContext, TraceScope } from '../../src/correlation/trace-context';

// ─── Helpers ──────────────────────────────────────────────────────────────────

interface FakeRequest {
  headers?: Record<string, string | string[]>;
}

interface FakeResponse {
  headers: Record<string, string>;
}

class PlainHttpCorrelation extends HttpCorrelationTemplate<FakeRequest, FakeResponse> {
  protected getRequestHeaders(request: FakeRequest): HeaderDictionary | undefined {
    return request.headers;
  }

  protected setHttpResponseHeader(response: FakeResponse, headerName: string, headerValue: string): void {
    response.headers[headerName] = headerValue;
  }
}

const TRACE_ID = '4b1c0c8d608f57db7bd0b13c88ef865e';
const PARENT_SPAN_ID = '4c6893cc6c6cad10';
const TRACE_PARENT = `00-${TRACE_ID}-${PARENT_SPAN_ID}-00`;

function setup(input: HttpCorrelationInfoOptionsInput = {}) {
  const options = createHttpCorrelationInfoOptions(input);
  const accessor = new InMemoryCorrelationInfoAccessor();
  const correlation = new PlainHttpCorrelation(options, accessor);
  return { options, accessor, correlation };
}

const hierarchical = (input: Omit<HttpCorrelationInfoOptionsInput, 'format'> = {}) =>
  setup({ ...input, format: 'Hierarchical' });

function storedInfo(accessor: InMemoryCorrelationInfoAccessor): CorrelationInfo {
  const info = accessor.getCorrelationInfo();
  if (!info) throw new Error('expected a stored correlation info');
  return info;
}

const emptyResponse = (): FakeResponse => ({ headers: {} });

// ═══════════════════════════════════════════════════════════════════════════════
// 1.  ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

describe('trySettingCorrelationFromRequest – entry point', () => {
  it('throws an ArgumentError when the request is missing', () => {
    const { correlation } = setup();
    expect(() => correlation.trySettingCorrelationFromRequest(null)).toThrow(ArgumentError);
    expect(() => correlation.trySettingCorrelationFromRequest(undefined)).toThrow(ArgumentError);
  });

  it('falls back to an empty header set when the request has no headers', () => {
    const { correlation, accessor } = setup();

    const result = correlation.trySettingCorrelationFromRequest({});

    expect(result).toEqual({ isSuccess: true });
    expect(storedInfo(accessor).operationId).toMatch(/^[0-9a-f]{16}$/);
  });

  it('throws a CorrelationConfigurationError for an unknown format', () => {
    const options: HttpCorrelationInfoOptions = createHttpCorrelationInfoOptions();
    // Simulates an untyped configuration source handing over an unsupported value.
    Reflect.set(options, 'format', 'Zipkin');
    const correlation = new PlainHttpCorrelation(options, new InMemoryCorrelationInfoAccessor());

    expect(() => correlation.trySettingCorrelationFromRequest({ headers: {} })).toThrow(CorrelationConfigurationError);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// 2.  W3C
// ═══════════════════════════════════════════════════════════════════════════════

describe('W3C correlation', () => {
  it('starts a new trace when no traceparent is present', () => {
    const { correlation, accessor } = setup();

    const result = correlation.trySettingCorrelationFromRequest({ headers: {} });

    expect(result).toEqual({ isSuccess: true });
    const info = storedInfo(accessor);
    expect(info.operationId).toMatch(/^[0-9a-f]{16}$/);
    expect(info.transactionId).toMatch(/^[0-9a-f]{32}$/);
    expect(info.operationParentId).toBeUndefined();
  });

  it('continues the upstream trace for a valid traceparent', () => {
    const { correlation, accessor } = setup();

    const result = correlation.trySettingCorrelationFromRequest({ headers: { traceparent: TRACE_PARENT } });

    expect(result).toEqual({ isSuccess: true, requestId: TRACE_PARENT });
    const info = storedInfo(accessor);
    expect(info.transactionId).toBe(TRACE_ID);
    expect(info.operationParentId).toBe(PARENT_SPAN_ID);
    expect(info.operationId).toMatch(/^[0-9a-f]{16}$/);
    expect(info.operationId).not.toBe(PARENT_SPAN_ID);
  });

  it('matches the traceparent header name case-insensitively', () => {
    const { correlation, accessor } = setup();

    correlation.trySettingCorrelationFromRequest({ headers: { TraceParent: TRACE_PARENT } });

    expect(storedInfo(accessor).transactionId).toBe(TRACE_ID);
  });

  it('starts a new trace when the traceparent uses the reserved ff version', () => {
    const { correlation, accessor } = setup();

    const result = correlation.trySettingCorrelationFromRequest({
      headers: { traceparent: `ff-${TRACE_ID}-${PARENT_SPAN_ID}-00` },
    });

    expect(result).toEqual({ isSuccess: true });
    expect(storedInfo(accessor).transactionId).not.toBe(TRACE_ID);
    expect(storedInfo(accessor).operationParentId).toBeUndefined();
  });

  it('fails without storing anything when the trace id is not hexadecimal', () => {
    const { correlation, accessor } = setup();

    const result = correlation.trySettingCorrelationFromRequest({
      headers: { traceparent: `00-${'x'.repeat(32)}-${PARENT_SPAN_ID}-00` },
    });

    expect(result.isSuccess).toBe(false);
    expect(accessor.getCorrelationInfo()).toBeUndefined();
  });

  it('keeps the upstream trace flags on the new span', () => {
    const { correlation } = setup();
    const scope = new TraceScope();

    correlation.trySettingCorrelationFromRequest(
      { headers: { traceparent: `00-${TRACE_ID}-${PARENT_SPAN_ID}-01` } },
      undefined,
      scope,
    );

    expect(scope.current?.traceFlags).toBe('01');
    expect(scope.current?.parentSpanId).toBe(PARENT_SPAN_ID);
  });

  it('activates the new span in the given trace scope with the tracestate header', () => {
    const { correlation, accessor } = setup();
    const scope = new TraceScope();

    correlation.trySettingCorrelationFromRequest({ headers: { tracestate: 'vendor=abc' } }, undefined, scope);

    const info = storedInfo(accessor);
    expect(scope.current?.spanId).toBe(info.operationId);
    expect(scope.current?.traceId).toBe(info.transactionId);
    expect(scope.current?.traceState).toBe('vendor=abc');
  });

  it('reads baggage from the Correlation-Context header', () => {
    const { correlation } = setup();
    const scope = new TraceScope();

    correlation.trySettingCorrelationFromRequest(
      { headers: { 'correlation-context': 'userId=42, region = eu-west ,invalid, a=b=c' } },
      undefined,
      scope,
    );

    expect(Object.fromEntries(scope.current?.baggage ?? [])).toEqual({ userId: '42', region: 'eu-west' });
  });

  it('inherits tags and baggage of the current trace context instead of Correlation-Context', () => {
    const { correlation } = setup();
    const scope = new TraceScope();
    scope.activate(
      TraceContext.startNew({
        tags: new Map([['component', 'worker']]),
        baggage: new Map([['tenant', 't-1']]),
      }),
    );

    correlation.trySettingCorrelationFromRequest(
      { headers: { 'Correlation-Context': 'userId=42' } },
      undefined,
      scope,
    );

    expect(Object.fromEntries(scope.current?.tags ?? [])).toEqual({ component: 'worker' });
    expect(Object.fromEntries(scope.current?.baggage ?? [])).toEqual({ tenant: 't-1' });
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// 3.  HIERARCHICAL
// ═══════════════════════════════════════════════════════════════════════════════

describe('Hierarchical correlation', () => {
  it('fails when a transaction id is sent but not allowed', () => {
    const { correlation, accessor } = hierarchical({ transaction: { allowInRequest: false } });

    const result = correlation.trySettingCorrelationFromRequest({ headers: { 'X-Transaction-ID': 'txn-1' } });

    expect(result).toEqual({
      isSuccess: false,
      errorMessage: "No correlation transaction ID request header 'X-Transaction-ID' was allowed in the request",
    });
    expect(accessor.getCorrelationInfo()).toBeUndefined();
  });

  it('uses the transaction id sent by the caller', () => {
    const { correlation, accessor } = hierarchical();

    correlation.trySettingCorrelationFromRequest({ headers: { 'x-transaction-id': 'txn-1' } });

    expect(storedInfo(accessor).transactionId).toBe('txn-1');
  });

  it('treats a blank transaction header as absent', () => {
    const { correlation, accessor } = hierarchical({
      transaction: { allowInRequest: false, generateId: () => 'generated-txn' },
    });

    const result = correlation.trySettingCorrelationFromRequest({ headers: { 'X-Transaction-ID': '   ' } });

    expect(result.isSuccess).toBe(true);
    expect(storedInfo(accessor).transactionId).toBe('generated-txn');
  });

  it('uses the trace identifier as operation id', () => {
    const { correlation, accessor } = hierarchical({ operation: { generateId: () => 'generated-op' } });

    correlation.trySettingCorrelationFromRequest({ headers: {} }, 'host-trace-1');

    expect(storedInfo(accessor).operationId).toBe('host-trace-1');
  });

  it('generates the operation id when the trace identifier is blank', () => {
    const { correlation, accessor } = hierarchical({ operation: { generateId: () => 'generated-op' } });

    correlation.trySettingCorrelationFromRequest({ headers: {} }, '  ');

    expect(storedInfo(accessor).operationId).toBe('generated-op');
  });

  it('throws when the operation id generator returns a blank value', () => {
    const { correlation } = hierarchical({ operation: { generateId: () => '' } });

    expect(() => correlation.trySettingCorrelationFromRequest({ headers: {} })).toThrow(CorrelationConfigurationError);
  });

  it('throws when the transaction id generator returns a blank value', () => {
    const { correlation } = hierarchical({ transaction: { generateId: () => ' ' } });

    expect(() => correlation.trySettingCorrelationFromRequest({ headers: {} })).toThrow(CorrelationConfigurationError);
  });

  it('leaves the transaction id absent when generation is disabled', () => {
    const { correlation, accessor } = hierarchical({ transaction: { generateWhenNotSpecified: false } });

    correlation.trySettingCorrelationFromRequest({ headers: {} });

    expect(storedInfo(accessor).transactionId).toBeUndefined();
  });

  it('extracts the last dotted segment of the upstream request id as parent id', () => {
    const { correlation, accessor } = hierarchical();

    const result = correlation.trySettingCorrelationFromRequest({ headers: { 'Request-Id': '|abc.def' } });

    expect(result).toEqual({ isSuccess: true, requestId: '|abc.def' });
    expect(storedInfo(accessor).operationParentId).toBe('def');
  });

  it('strips the leading pipe of an undotted upstream request id', () => {
    const { correlation, accessor } = hierarchical();

    correlation.trySettingCorrelationFromRequest({ headers: { 'Request-Id': '|abc123' } });

    expect(storedInfo(accessor).operationParentId).toBe('abc123');
  });

  it('ignores an upstream request id that does not match the format', () => {
    const { correlation, accessor } = hierarchical();

    const result = correlation.trySettingCorrelationFromRequest({ headers: { 'Request-Id': 'abc def' } });

    expect(result).toEqual({ isSuccess: true });
    expect(storedInfo(accessor).operationParentId).toBeUndefined();
  });

  it('treats a request id whose match times out as no match', () => {
    const { correlation, accessor } = hierarchical({ operation: { generateId: () => 'op-1' } });

    const result = correlation.trySettingCorrelationFromRequest({
      headers: { 'Request-Id': `|${'a1'.repeat(30)}$` },
    });

    expect(result).toEqual({ isSuccess: true });
    expect(storedInfo(accessor)).toEqual({ operationId: 'op-1', transactionId: expect.any(String) });
  });

  it('generates the parent id when extraction from the request is disabled', () => {
    const { correlation, accessor } = hierarchical({
      upstreamService: { extractFromRequest: false, generateId: () => 'parent-1' },
    });

    const result = correlation.trySettingCorrelationFromRequest({ headers: { 'Request-Id': '|abc.def' } });

    expect(result).toEqual({ isSuccess: true, requestId: 'parent-1' });
    expect(storedInfo(accessor).operationParentId).toBe('parent-1');
  });

  it('throws when the parent id generator returns a blank value', () => {
    const { correlation } = hierarchical({ upstreamService: { extractFromRequest: false, generateId: () => '' } });

    expect(() => correlation.trySettingCorrelationFromRequest({ headers: {} })).toThrow(CorrelationConfigurationError);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// 4.  RESPONSE HEADERS
// ═══════════════════════════════════════════════════════════════════════════════

describe('setCorrelationHeadersInResponse', () => {
  it('throws an ArgumentError when the response or result is missing', () => {
    const { correlation } = setup();

    expect(() => correlation.setCorrelationHeadersInResponse(null, HttpCorrelationResult.success())).toThrow(ArgumentError);
    expect(() => correlation.setCorrelationHeadersInResponse(emptyResponse(), undefined)).toThrow(ArgumentError);
  });

  it('echoes the inbound traceparent byte-for-byte for an existing W3C parent', () => {
    const { correlation, accessor } = setup();
    const response = emptyResponse();

    const result = correlation.trySettingCorrelationFromRequest({ headers: { traceparent: TRACE_PARENT } });
    correlation.setCorrelationHeadersInResponse(response, result);

    const info = storedInfo(accessor);
    expect(response.headers).toEqual({
      RequestId: info.operationId,
      traceparent: TRACE_PARENT,
      'X-Transaction-ID': TRACE_ID,
    });
  });

  it('writes no traceparent header for a new W3C trace', () => {
    const { correlation, accessor } = setup();
    const response = emptyResponse();

    const result = correlation.trySettingCorrelationFromRequest({ headers: {} });
    correlation.setCorrelationHeadersInResponse(response, result);

    const info = storedInfo(accessor);
    expect(response.headers).toEqual({
      RequestId: info.operationId,
      'X-Transaction-ID': info.transactionId,
    });
  });

  it('writes the upstream request id under the configured hierarchical header', () => {
    const { correlation } = hierarchical({
      operation: { headerName: 'X-Operation-ID' },
      upstreamService: { headerName: 'X-Parent-Request-Id' },
    });
    const response = emptyResponse();

    const result = correlation.trySettingCorrelationFromRequest(
      { headers: { 'X-Transaction-ID': 'txn-1', 'x-parent-request-id': '|abc.def' } },
      'op-1',
    );
    correlation.setCorrelationHeadersInResponse(response, result);

    expect(response.headers).toEqual({
      'X-Operation-ID': 'op-1',
      'X-Parent-Request-Id': '|abc.def',
      'X-Transaction-ID': 'txn-1',
    });
  });

  it('skips a blank transaction id without throwing', () => {
    const { correlation, accessor } = setup();
    accessor.setCorrelationInfo(createCorrelationInfo('op-1', '  '));
    const response = emptyResponse();

    expect(() => correlation.setCorrelationHeadersInResponse(response, HttpCorrelationResult.success())).not.toThrow();
    expect(response.headers).toEqual({ RequestId: 'op-1' });
  });

  it('skips every header when no correlation was stored', () => {
    const { correlation } = setup();
    const response = emptyResponse();

    correlation.setCorrelationHeadersInResponse(response, HttpCorrelationResult.failure('rejected'));

    expect(response.headers).toEqual({});
  });

  it('only writes the categories configured for the response', () => {
    const { correlation } = hierarchical({
      operation: { includeInResponse: false },
      transaction: { includeInResponse: false },
    });
    const response = emptyResponse();

    const result = correlation.trySettingCorrelationFromRequest({ headers: { 'Request-Id': '|abc.def' } }, 'op-1');
    correlation.setCorrelationHeadersInResponse(response, result);

    expect(response.headers).toEqual({ 'Request-Id': '|abc.def' });
  });
});
