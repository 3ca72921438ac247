import vm from 'vm';

/** Hierarchical `Request-Id` grammar, e.g. `|abc.def.` or `|4bf92f35-1.`. */
export const REQUEST_ID_PATTERN = /^(\|)?([a-zA-Z0-9-]+(\.[a-zA-Z0-9-]+)?)+(_|\.)?$/;

export const REQUEST_ID_MATCH_TIMEOUT_MS = 1000;

const TIMEOUT_ERROR_CODE = 'ERR_SCRIPT_EXECUTION_TIMEOUT';

// The pattern backtracks exponentially on inputs like `aaaa…!`; running it
// inside a vm script is what lets V8 interrupt it after the timeout.
const matchScript = new vm.Script('pattern.test(value)');
const matchContext = vm.createContext({ pattern: REQUEST_ID_PATTERN, value: '' });

export class RegexMatchTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Regular expression match did not complete within ${timeoutMs}ms`);
    this.name = 'RegexMatchTimeoutError';
  }
}

// Errors raised inside the vm context belong to its own realm, so
// `instanceof Error` does not hold for them; match on the code instead.
const isTimeout = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === TIMEOUT_ERROR_CODE;

/**
 * Tests `value` against {@link REQUEST_ID_PATTERN}, giving up after `timeoutMs`.
 * @throws RegexMatchTimeoutError when the match runs out of time
 */
export function matchesRequestIdFormat(value: string, timeoutMs = REQUEST_ID_MATCH_TIMEOUT_MS): boolean {
  matchContext.value = value;
  try {
    return matchScript.runInContext(matchContext, { timeout: timeoutMs }) === true;
  } catch (error) {
    if (isTimeout(error)) throw new RegexMatchTimeoutError(timeoutMs);
    throw error;
  } finally {
    matchContext.value = '';
  }
}

/**
 * Parent id carried by an upstream request id:
 * the last non-blank `.` segment (`|abc.def` → `def`), or the value
 * without its leading `|` when there is no `.` (`|abc123` → `abc123`).
 */
export function extractOperationParentId(requestId: string): string | undefined {
  if (requestId.includes('.')) {
    const segments = requestId.split('.').filter((segment) => segment.trim().length > 0);
    return segments[segments.length - 1];
  }

  return requestId.startsWith('|') ? requestId.slice(1) : requestId;
}
