/**
 * Errors thrown by the correlation core.
 *
 * Extraction problems are not errors: they come back as a failed
 * HttpCorrelationResult. These two classes cover misuse of the public
 * entry points and misconfiguration, both of which must stop the request.
 */

export class ArgumentError extends Error {
  readonly code = 'INVALID_ARGUMENT';

  constructor(
    readonly argumentName: string,
    message: string,
  ) {
    super(message);
    this.name = 'ArgumentError';
  }
}

export class CorrelationConfigurationError extends Error {
  readonly code = 'CORRELATION_CONFIGURATION';

  constructor(message: string) {
    super(message);
    this.name = 'CorrelationConfigurationError';
  }
}
