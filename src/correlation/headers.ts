import { isNonBlank } from './correlation-info';

/**
 * Request headers as any Node HTTP stack hands them over:
 * name → single value or repeated values.
 */
export type HeaderDictionary = Readonly<Record<string, string | readonly string[] | number | undefined>>;

export const TRACE_PARENT_HEADER = 'traceparent';
export const TRACE_STATE_HEADER = 'tracestate';
export const CORRELATION_CONTEXT_HEADER = 'Correlation-Context';

const CONTEXT_KEY_MAX_LENGTH = 50;
const CONTEXT_VALUE_MAX_LENGTH = 1024;

const joinValues = (value: string | readonly string[] | number): string =>
  typeof value === 'string' ? value : typeof value === 'number' ? String(value) : value.join(',');

/**
 * First header whose name matches `headerName` case-insensitively.
 * Repeated values are joined with `,`; blank values count as absent.
 */
export function getHeaderValue(headers: HeaderDictionary, headerName: string): string | undefined {
  const wanted = headerName.toLowerCase();
  const key = Object.keys(headers).find((name) => name.toLowerCase() === wanted);
  if (key === undefined) return undefined;

  const raw = headers[key];
  if (raw === undefined) return undefined;

  const value = joinValues(raw);
  return isNonBlank(value) ? value : undefined;
}

/** All comma-separated items of a header, across repeated values, without empty items. */
export function getCommaSeparatedValues(headers: HeaderDictionary, headerName: string): string[] {
  const value = getHeaderValue(headers, headerName);
  if (value === undefined) return [];

  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Baggage from a legacy `Correlation-Context: k1=v1, k2=v2` header.
 * Items without exactly one `=` are ignored.
 */
export function parseCorrelationContext(headers: HeaderDictionary): Map<string, string> {
  const baggage = new Map<string, string>();

  for (const item of getCommaSeparatedValues(headers, CORRELATION_CONTEXT_HEADER)) {
    const parts = item.split('=');
    if (parts.length !== 2) continue;

    const [key, value] = parts;
    const name = key.slice(0, CONTEXT_KEY_MAX_LENGTH).trim();
    if (!name) continue;

    baggage.set(name, value.slice(0, CONTEXT_VALUE_MAX_LENGTH).trim());
  }

  return baggage;
}
