export interface HttpCorrelationSuccess {
  readonly isSuccess: true;
  /**
   * Raw upstream request id (hierarchical) or raw `traceparent` (W3C) that
   * gets echoed back in the response. Not part of the stored correlation.
   */
  readonly requestId?: string;
}

export interface HttpCorrelationFailure {
  readonly isSuccess: false;
  readonly errorMessage: string;
}

export type HttpCorrelationResult = HttpCorrelationSuccess | HttpCorrelationFailure;

export const HttpCorrelationResult = {
  success(requestId?: string): HttpCorrelationSuccess {
    return requestId === undefined ? { isSuccess: true } : { isSuccess: true, requestId };
  },

  failure(errorMessage: string): HttpCorrelationFailure {
    return { isSuccess: false, errorMessage };
  },
};
