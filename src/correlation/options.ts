/**
 * Options controlling how incoming requests are correlated.
 *
 * Defaults follow the W3C trace-context recommendation; the hierarchical
 * format is kept for services whose callers still send `Request-Id` and a
 * custom transaction header.
 */
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { CorrelationConfigurationError } from './errors';

export const HttpCorrelationFormat = {
  W3C: 'W3C',
  Hierarchical: 'Hierarchical',
} as const;

export type HttpCorrelationFormat = (typeof HttpCorrelationFormat)[keyof typeof HttpCorrelationFormat];

/**
 * Produces a new identifier for one correlation category.
 * Must return a non-blank value: a blank result aborts the correlation
 * with a CorrelationConfigurationError.
 */
export type IdGenerator = () => string;

export const generateGuid: IdGenerator = () => uuidv4();

export interface OperationOptions {
  headerName: string;
  includeInResponse: boolean;
  generateId: IdGenerator;
}

export interface TransactionOptions {
  headerName: string;
  /** Whether callers may send their own transaction id. */
  allowInRequest: boolean;
  generateWhenNotSpecified: boolean;
  includeInResponse: boolean;
  generateId: IdGenerator;
}

export interface UpstreamServiceOptions {
  headerName: string;
  /** Read the parent id from the upstream request id header instead of generating one. */
  extractFromRequest: boolean;
  includeInResponse: boolean;
  generateId: IdGenerator;
}

export interface HttpCorrelationInfoOptions {
  format: HttpCorrelationFormat;
  operation: OperationOptions;
  transaction: TransactionOptions;
  upstreamService: UpstreamServiceOptions;
}

export interface HttpCorrelationInfoOptionsInput {
  format?: HttpCorrelationFormat;
  operation?: Partial<OperationOptions>;
  transaction?: Partial<TransactionOptions>;
  upstreamService?: Partial<UpstreamServiceOptions>;
}

export const DEFAULT_OPERATION_HEADER = 'RequestId';
export const DEFAULT_TRANSACTION_HEADER = 'X-Transaction-ID';
export const DEFAULT_UPSTREAM_SERVICE_HEADER = 'Request-Id';

const headerName = z
  .string()
  .trim()
  .min(1, 'header name must not be blank')
  .regex(/^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/, 'header name must be a valid HTTP token');

const idGenerator = z.custom<IdGenerator>((value) => typeof value === 'function', {
  message: 'generateId must be a function returning a string',
});

const optionsSchema = z.object({
  format: z.enum([HttpCorrelationFormat.W3C, HttpCorrelationFormat.Hierarchical]).default(HttpCorrelationFormat.W3C),
  operation: z
    .object({
      headerName: headerName.default(DEFAULT_OPERATION_HEADER),
      includeInResponse: z.boolean().default(true),
      generateId: idGenerator.default(() => generateGuid),
    })
    .default({}),
  transaction: z
    .object({
      headerName: headerName.default(DEFAULT_TRANSACTION_HEADER),
      allowInRequest: z.boolean().default(true),
      generateWhenNotSpecified: z.boolean().default(true),
      includeInResponse: z.boolean().default(true),
      generateId: idGenerator.default(() => generateGuid),
    })
    .default({}),
  upstreamService: z
    .object({
      headerName: headerName.default(DEFAULT_UPSTREAM_SERVICE_HEADER),
      extractFromRequest: z.boolean().default(true),
      includeInResponse: z.boolean().default(true),
      generateId: idGenerator.default(() => generateGuid),
    })
    .default({}),
});

/**
 * Fills in defaults and validates the result.
 * @throws CorrelationConfigurationError listing every invalid setting
 */
export function createHttpCorrelationInfoOptions(input: HttpCorrelationInfoOptionsInput = {}): HttpCorrelationInfoOptions {
  const parsed = optionsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new CorrelationConfigurationError(`Invalid HTTP correlation options: ${issues.join('; ')}`);
  }

  return parsed.data;
}
