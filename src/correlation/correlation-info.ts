import { ArgumentError } from './errors';

/** Identifiers that tie the current request to its distributed operation. */
export interface CorrelationInfo {
  readonly operationId: string;
  readonly transactionId?: string;
  readonly operationParentId?: string;
}

/** True when the value holds at least one non-whitespace character. */
export const isNonBlank = (value: string | null | undefined): value is string =>
  typeof value === 'string' && value.trim().length > 0;

export function createCorrelationInfo(
  operationId: string,
  transactionId?: string,
  operationParentId?: string,
): CorrelationInfo {
  if (!isNonBlank(operationId)) {
    throw new ArgumentError('operationId', 'Requires a non-blank operation ID to create a correlation info model');
  }

  return Object.freeze({
    operationId,
    ...(transactionId !== undefined ? { transactionId } : {}),
    ...(operationParentId !== undefined ? { operationParentId } : {}),
  });
}

/**
 * Get/set the correlation record of the request currently being handled.
 * One accessor state per in-flight request; the record is written once.
 */
export interface CorrelationInfoAccessor {
  getCorrelationInfo(): CorrelationInfo | undefined;
  setCorrelationInfo(correlationInfo: CorrelationInfo): void;
}

/** Accessor holding a single record, for hosts that manage the request scope themselves. */
export class InMemoryCorrelationInfoAccessor implements CorrelationInfoAccessor {
  private correlationInfo: CorrelationInfo | undefined;

  getCorrelationInfo(): CorrelationInfo | undefined {
    return this.correlationInfo;
  }

  setCorrelationInfo(correlationInfo: CorrelationInfo): void {
    this.correlationInfo = correlationInfo;
  }
}
