import dotenv from 'dotenv';
import { z } from 'zod';
import {
  DEFAULT_OPERATION_HEADER,
  DEFAULT_TRANSACTION_HEADER,
  DEFAULT_UPSTREAM_SERVICE_HEADER,
  HttpCorrelationFormat,
  HttpCorrelationInfoOptions,
  createHttpCorrelationInfoOptions,
} from '../correlation/options';

dotenv.config();

const TRUE_VALUES = ['true', '1', 'yes', 'on'];
const FLAG_VALUES = [...TRUE_VALUES, 'false', '0', 'no', 'off'];

const flag = (fallback: boolean) =>
  z
    .string()
    .trim()
    .toLowerCase()
    .refine((v) => FLAG_VALUES.includes(v), { message: 'expected true/false, 1/0, yes/no or on/off' })
    .transform((v) => TRUE_VALUES.includes(v))
    .optional()
    .transform((v) => v ?? fallback);

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  // Observability; unset values fall back to the defaults in infra/*.ts
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  SERVICE_NAME: z.string().optional(),
  SERVICE_VERSION: z.string().default('1.0.0'),
  SENTRY_DSN: z.string().url().optional(),
  ALLOWED_ORIGINS: z.string().optional(),
  // HTTP correlation
  CORRELATION_FORMAT: z
    .enum([HttpCorrelationFormat.W3C, HttpCorrelationFormat.Hierarchical])
    .default(HttpCorrelationFormat.W3C),
  CORRELATION_OPERATION_HEADER: z.string().min(1).default(DEFAULT_OPERATION_HEADER),
  CORRELATION_OPERATION_INCLUDE_IN_RESPONSE: flag(true),
  CORRELATION_TRANSACTION_HEADER: z.string().min(1).default(DEFAULT_TRANSACTION_HEADER),
  CORRELATION_TRANSACTION_ALLOW_IN_REQUEST: flag(true),
  CORRELATION_TRANSACTION_GENERATE_WHEN_NOT_SPECIFIED: flag(true),
  CORRELATION_TRANSACTION_INCLUDE_IN_RESPONSE: flag(true),
  CORRELATION_UPSTREAM_HEADER: z.string().min(1).default(DEFAULT_UPSTREAM_SERVICE_HEADER),
  CORRELATION_UPSTREAM_EXTRACT_FROM_REQUEST: flag(true),
  CORRELATION_UPSTREAM_INCLUDE_IN_RESPONSE: flag(true),
});

export type Env = z.infer<typeof envSchema>;

export const parseEnv = (source: NodeJS.ProcessEnv): Env => envSchema.parse(source);

export const env = parseEnv(process.env);

export function correlationOptionsFromEnv(config: Env): HttpCorrelationInfoOptions {
  return createHttpCorrelationInfoOptions({
    format: config.CORRELATION_FORMAT,
    operation: {
      headerName: config.CORRELATION_OPERATION_HEADER,
      includeInResponse: config.CORRELATION_OPERATION_INCLUDE_IN_RESPONSE,
    },
    transaction: {
      headerName: config.CORRELATION_TRANSACTION_HEADER,
      allowInRequest: config.CORRELATION_TRANSACTION_ALLOW_IN_REQUEST,
      generateWhenNotSpecified: config.CORRELATION_TRANSACTION_GENERATE_WHEN_NOT_SPECIFIED,
      includeInResponse: config.CORRELATION_TRANSACTION_INCLUDE_IN_RESPONSE,
    },
    upstreamService: {
      headerName: config.CORRELATION_UPSTREAM_HEADER,
      extractFromRequest: config.CORRELATION_UPSTREAM_EXTRACT_FROM_REQUEST,
      includeInResponse: config.CORRELATION_UPSTREAM_INCLUDE_IN_RESPONSE,
    },
  });
}
