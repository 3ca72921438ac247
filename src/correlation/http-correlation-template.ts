import pino, { Logger } from 'pino';
import { CorrelationInfo, CorrelationInfoAccessor, createCorrelationInfo, isNonBlank } from './correlation-info';
import { HttpCorrelationResult } from './correlation-result';
import { ArgumentError, CorrelationConfigurationError } from './errors';
import {
  HeaderDictionary,
  TRACE_PARENT_HEADER,
  TRACE_STATE_HEADER,
  getHeaderValue,
  parseCorrelationContext,
} from './headers';
import { HttpCorrelationFormat, HttpCorrelationInfoOptions, IdGenerator } from './options';
import { RegexMatchTimeoutError, extractOperationParentId, matchesRequestIdFormat } from './request-id';
import { TraceContext, TraceScope } from './trace-context';
import { isW3CCompliant, parseTraceParent } from './trace-parent';

type CorrelationPlan =
  | { readonly kind: 'hierarchical' }
  | { readonly kind: 'w3c-new-parent' }
  | { readonly kind: 'w3c-existing-parent'; readonly traceParent: string };

/**
 * Correlates incoming HTTP requests and writes the correlation back on the
 * response, for any HTTP stack that can hand over its request headers and
 * set a response header.
 *
 * Two calls per request:
 *  1. {@link trySettingCorrelationFromRequest} when the request comes in;
 *  2. {@link setCorrelationHeadersInResponse} with the returned result before
 *     the response headers are sent.
 */
export abstract class HttpCorrelationTemplate<TRequest extends object, TResponse extends object> {
  protected readonly logger: Logger;

  constructor(
    private readonly options: HttpCorrelationInfoOptions,
    private readonly correlationInfoAccessor: CorrelationInfoAccessor,
    logger?: Logger,
  ) {
    if (!options) {
      throw new ArgumentError('options', 'Requires a set of options to configure the correlation process');
    }
    if (!correlationInfoAccessor) {
      throw new ArgumentError(
        'correlationInfoAccessor',
        'Requires a correlation info accessor to set and retrieve the correlation information',
      );
    }

    this.logger = logger ?? pino({ level: 'silent' });
  }

  /**
   * Correlates `request` and stores the resulting {@link CorrelationInfo} in the accessor.
   *
   * @param traceIdentifier identity the host already gave this request; used as
   *   the operation id in the hierarchical format when non-blank
   * @param traceScope scope whose current trace context (if any) passes its tags
   *   and baggage on to the new W3C span; the new span becomes current in it
   * @throws ArgumentError when `request` is missing
   * @throws CorrelationConfigurationError on an unknown format or a blank generated id
   */
  trySettingCorrelationFromRequest(
    request: TRequest | null | undefined,
    traceIdentifier?: string | null,
    traceScope: TraceScope = new TraceScope(),
  ): HttpCorrelationResult {
    if (request === null || request === undefined) {
      throw new ArgumentError('request', 'Requires a HTTP request to determine the HTTP correlation of the application');
    }

    let headers = this.getRequestHeaders(request);
    if (!headers) {
      this.logger.warn(
        'No HTTP request headers could be determined from incoming request, please verify if the HTTP correlation template was correctly implemented',
      );
      headers = {};
    }

    const plan = this.selectPlan(headers);
    switch (plan.kind) {
      case 'hierarchical':
        return this.correlateHierarchical(headers, traceIdentifier);
      case 'w3c-new-parent':
        return this.correlateW3CForNewParent(headers, traceScope);
      case 'w3c-existing-parent':
        return this.correlateW3CForExistingParent(headers, plan.traceParent, traceScope);
      default: {
        const unreachable: never = plan;
        return unreachable;
      }
    }
  }

  private selectPlan(headers: HeaderDictionary): CorrelationPlan {
    const format: string = this.options.format;

    if (format === HttpCorrelationFormat.Hierarchical) {
      return { kind: 'hierarchical' };
    }

    if (format === HttpCorrelationFormat.W3C) {
      const traceParent = getHeaderValue(headers, TRACE_PARENT_HEADER);
      return traceParent !== undefined && isW3CCompliant(traceParent)
        ? { kind: 'w3c-existing-parent', traceParent }
        : { kind: 'w3c-new-parent' };
    }

    throw new CorrelationConfigurationError(
      `Could not determine which type of HTTP correlation system to use (Hierarchical or W3C) from format '${format}'; we recommend to use W3C instead of the deprecated Hierarchical correlation system`,
    );
  }

  protected correlateW3CForNewParent(headers: HeaderDictionary, traceScope: TraceScope): HttpCorrelationResult {
    const context = TraceContext.startNew(this.inheritTraceState(headers, traceScope.current));
    traceScope.activate(context);

    this.logger.trace({ transactionId: context.traceId }, 'Correlation transaction ID generated for incoming HTTP request');
    this.logger.trace({ operationId: context.spanId }, 'Correlation operation ID generated for incoming HTTP request');

    this.correlationInfoAccessor.setCorrelationInfo(createCorrelationInfo(context.spanId, context.traceId));
    return HttpCorrelationResult.success();
  }

  protected correlateW3CForExistingParent(
    headers: HeaderDictionary,
    traceParent: string,
    traceScope: TraceScope,
  ): HttpCorrelationResult {
    const parsed = parseTraceParent(traceParent);
    if (!parsed) {
      this.logger.error({ traceParent }, "Correlation 'traceparent' HTTP request header does not hold a valid trace and span ID");
      return HttpCorrelationResult.failure(
        "No correlation transaction ID and operation parent ID could be extracted from the 'traceparent' HTTP request header",
      );
    }

    const { traceId: transactionId, parentSpanId: operationParentId } = parsed;
    this.logger.trace({ transactionId }, "Correlation transaction ID found in 'traceparent' HTTP request header");
    this.logger.trace({ operationParentId }, "Correlation operation parent ID found in 'traceparent' HTTP request header");

    const context = TraceContext.startChild(transactionId, operationParentId, {
      ...this.inheritTraceState(headers, traceScope.current),
      traceFlags: parsed.traceFlags,
    });
    traceScope.activate(context);
    this.logger.trace({ operationId: context.spanId }, 'Correlation operation ID generated for incoming HTTP request');

    this.correlationInfoAccessor.setCorrelationInfo(
      createCorrelationInfo(context.spanId, transactionId, operationParentId),
    );
    return HttpCorrelationResult.success(traceParent);
  }

  private inheritTraceState(
    headers: HeaderDictionary,
    current: TraceContext | undefined,
  ): { traceState?: string; tags: Map<string, string>; baggage: Map<string, string> } {
    const tags = new Map(current?.tags ?? []);
    const baggage = new Map(current?.baggage ?? []);

    if (baggage.size === 0) {
      for (const [key, value] of parseCorrelationContext(headers)) {
        baggage.set(key, value);
      }
    }

    return { traceState: getHeaderValue(headers, TRACE_STATE_HEADER), tags, baggage };
  }

  private correlateHierarchical(
    headers: HeaderDictionary,
    traceIdentifier: string | null | undefined,
  ): HttpCorrelationResult {
    const { transaction, upstreamService } = this.options;

    const presentTransactionId = getHeaderValue(headers, transaction.headerName);
    if (presentTransactionId !== undefined) {
      if (!transaction.allowInRequest) {
        this.logger.error(
          { headerName: transaction.headerName },
          'No correlation request header for transaction ID was allowed in request',
        );
        return HttpCorrelationResult.failure(
          `No correlation transaction ID request header '${transaction.headerName}' was allowed in the request`,
        );
      }

      this.logger.trace(
        { headerName: transaction.headerName, transactionId: presentTransactionId },
        'Correlation request header found with transaction ID',
      );
    }

    const operationId = this.determineOperationId(traceIdentifier);
    const transactionId = this.determineTransactionId(presentTransactionId);

    let operationParentId: string | undefined;
    let requestId: string | undefined;

    if (upstreamService.extractFromRequest) {
      requestId = this.tryGetRequestId(headers, upstreamService.headerName);
      if (requestId !== undefined) {
        operationParentId = this.extractLatestOperationParentId(requestId);
        if (operationParentId === undefined) {
          return HttpCorrelationResult.failure(
            "No correlation operation parent ID could be extracted from upstream service's request header",
          );
        }
      }
    } else {
      operationParentId = this.generate(upstreamService.generateId, 'upstreamService.generateId', 'operation parent ID');
      requestId = operationParentId;
    }

    this.correlationInfoAccessor.setCorrelationInfo(
      createCorrelationInfo(operationId, transactionId, operationParentId),
    );
    return HttpCorrelationResult.success(requestId);
  }

  private determineOperationId(traceIdentifier: string | null | undefined): string {
    if (isNonBlank(traceIdentifier)) {
      this.logger.trace({ traceIdentifier }, 'Found unique trace identifier ID for operation correlation ID');
      return traceIdentifier;
    }

    this.logger.trace('No unique trace identifier ID was found in the request, generating one...');
    const operationId = this.generate(this.options.operation.generateId, 'operation.generateId', 'operation ID');
    this.logger.trace({ operationId }, 'Generated unique operation correlation ID');
    return operationId;
  }

  private determineTransactionId(presentTransactionId: string | undefined): string | undefined {
    const { transaction } = this.options;

    if (presentTransactionId !== undefined) {
      return presentTransactionId;
    }

    if (!transaction.generateWhenNotSpecified) {
      this.logger.trace(
        { headerName: transaction.headerName },
        'No transactional correlation ID found in request header and none will be generated',
      );
      return undefined;
    }

    this.logger.trace('No transactional ID was found in the request, generating one...');
    const transactionId = this.generate(transaction.generateId, 'transaction.generateId', 'transaction ID');
    this.logger.trace({ transactionId }, 'Generated transactional correlation ID');
    return transactionId;
  }

  private generate(generateId: IdGenerator, source: string, description: string): string {
    const id: unknown = generateId();
    if (typeof id !== 'string' || !isNonBlank(id)) {
      throw new CorrelationConfigurationError(
        `Correlation cannot use '${source}' to generate the ${description} because the resulting ID value is blank`,
      );
    }

    return id;
  }

  private tryGetRequestId(headers: HeaderDictionary, headerName: string): string | undefined {
    const id = getHeaderValue(headers, headerName);
    if (id !== undefined && this.matchesRequestIdFormat(id, headerName)) {
      this.logger.trace({ operationParentId: id, headerName }, 'Found operation parent ID from upstream service in request header');
      return id;
    }

    this.logger.trace({ headerName }, 'No operation parent ID found from upstream service in the request header that matches the expected format');
    return undefined;
  }

  private matchesRequestIdFormat(requestId: string, headerName: string): boolean {
    try {
      return matchesRequestIdFormat(requestId);
    } catch (error) {
      if (error instanceof RegexMatchTimeoutError) {
        this.logger.trace({ err: error, headerName }, "Upstream service's request header timed out during regular expression validation");
        return false;
      }
      throw error;
    }
  }

  private extractLatestOperationParentId(requestId: string): string | undefined {
    this.logger.trace({ requestId }, 'Extracting operation parent ID from request ID of the upstream service');
    const operationParentId = extractOperationParentId(requestId);
    this.logger.trace({ operationParentId, requestId }, 'Extracted operation parent ID from request ID of the upstream service');
    return operationParentId;
  }

  /**
   * Writes the configured correlation headers onto `response`.
   * Identifiers without a value are skipped with a warning, never an error.
   * @throws ArgumentError when `response` or `result` is missing
   */
  setCorrelationHeadersInResponse(
    response: TResponse | null | undefined,
    result: HttpCorrelationResult | null | undefined,
  ): void {
    if (response === null || response === undefined) {
      throw new ArgumentError('response', 'Requires a HTTP response to set the HTTP correlation headers');
    }
    if (result === null || result === undefined) {
      throw new ArgumentError(
        'result',
        'Requires a HTTP correlation result to determine to set the HTTP correlation headers in the HTTP response',
      );
    }

    const { operation, transaction, upstreamService } = this.options;
    const requestId = result.isSuccess ? result.requestId : undefined;
    const correlationInfo = this.correlationInfoAccessor.getCorrelationInfo();
    const operationId = correlationInfo?.operationId;
    const transactionId = correlationInfo?.transactionId;

    if (operation.includeInResponse) {
      this.logger.trace('Prepare for the operation ID to be included in the response...');
      if (isNonBlank(operationId)) {
        this.setHttpResponseHeader(response, operation.headerName, operationId);
      } else {
        this.logger.warn('No response header was added given no operation ID was found');
      }
    }

    if (upstreamService.includeInResponse) {
      this.logger.trace('Prepare for the operation parent ID to be included in the response...');
      if (isNonBlank(requestId)) {
        this.setHttpResponseHeader(response, this.upstreamServiceHeaderName(), requestId);
      } else {
        this.logger.warn('No response header was added given no operation parent ID was found');
      }
    }

    if (transaction.includeInResponse) {
      this.logger.trace('Prepare for the transactional correlation ID to be included in the response...');
      if (isNonBlank(transactionId)) {
        this.setHttpResponseHeader(response, transaction.headerName, transactionId);
      } else {
        this.logger.warn('No response header was added given no transactional correlation ID was found');
      }
    }
  }

  private upstreamServiceHeaderName(): string {
    const format: string = this.options.format;
    switch (format) {
      case HttpCorrelationFormat.Hierarchical:
        return this.options.upstreamService.headerName;
      case HttpCorrelationFormat.W3C:
        return 'traceparent';
      default:
        throw new CorrelationConfigurationError(`Unknown HTTP correlation format '${format}'`);
    }
  }

  /** Headers of the incoming request; `undefined` when the request carries none. */
  protected abstract getRequestHeaders(request: TRequest): HeaderDictionary | undefined;

  /**
   * Sets one correlation header on the outgoing response.
   * Implementations throw an ArgumentError on a blank name or value.
   */
  protected abstract setHttpResponseHeader(response: TResponse, headerName: string, headerValue: string): void;
}
