/**
 * W3C `traceparent` handling.
 *
 * Format example:   00-4b1c0c8d608f57db7bd0b13c88ef865e-4c6893cc6c6cad10-00
 * Format structure: VV-<--------- trace id --------->-<- span id -->-FF
 */

export const TRACE_PARENT_LENGTH = 55;
const RESERVED_VERSION = 'ff';

const TRACE_ID = /^[0-9a-f]{32}$/;
const SPAN_ID = /^[0-9a-f]{16}$/;
const TRACE_FLAGS = /^[0-9a-f]{2}$/;
const ALL_ZEROS = /^0+$/;

export interface TraceParent {
  readonly version: string;
  readonly traceId: string;
  readonly parentSpanId: string;
  readonly traceFlags: string;
}

const isLowerHex = (char: string | undefined): boolean =>
  char !== undefined && ((char >= '0' && char <= '9') || (char >= 'a' && char <= 'f'));

/**
 * Gate between the "existing parent" and "new parent" W3C paths.
 * Only the length and the version field are checked here.
 */
export function isW3CCompliant(traceParent: string | null | undefined): boolean {
  if (typeof traceParent !== 'string' || traceParent.length !== TRACE_PARENT_LENGTH) {
    return false;
  }

  const version = traceParent.slice(0, 2);
  if (!isLowerHex(version[0]) || !isLowerHex(version[1])) {
    return false;
  }

  return version !== RESERVED_VERSION;
}

export const isValidTraceId = (value: string): boolean => TRACE_ID.test(value) && !ALL_ZEROS.test(value);

export const isValidSpanId = (value: string): boolean => SPAN_ID.test(value) && !ALL_ZEROS.test(value);

/**
 * Reads the fixed-width fields of a value that passed {@link isW3CCompliant}.
 * Returns `undefined` when one of the fields is not what the layout promises.
 */
export function parseTraceParent(traceParent: string): TraceParent | undefined {
  if (!isW3CCompliant(traceParent)) return undefined;
  if (traceParent[2] !== '-' || traceParent[35] !== '-' || traceParent[52] !== '-') return undefined;

  const traceId = traceParent.slice(3, 35);
  const parentSpanId = traceParent.slice(36, 52);
  const traceFlags = traceParent.slice(53, 55);

  if (!isValidTraceId(traceId) || !isValidSpanId(parentSpanId) || !TRACE_FLAGS.test(traceFlags)) {
    return undefined;
  }

  return { version: traceParent.slice(0, 2), traceId, parentSpanId, traceFlags };
}

export const formatTraceParent = (traceId: string, spanId: string, traceFlags = '00'): string =>
  `00-${traceId}-${spanId}-${traceFlags}`;
