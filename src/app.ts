import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import correlationRoutes from './routes/correlation.routes';
import { httpCorrelation } from './middleware/correlation';
import { httpLogger } from './middleware/logger';
import { metricsMiddleware } from './middleware/metrics';
import { errorMiddleware } from './middleware/error-handler';
import { register } from './infra/metrics';
import { initSentry } from './infra/observability';
import pinoInstance from './infra/logger';
import { correlationOptionsFromEnv, env } from './config/env';
import { HttpCorrelationFormat } from './correlation/options';
import { TRACE_PARENT_HEADER } from './correlation/headers';

// Initialise Sentry before anything else so errors during startup are captured.
initSentry();

const app: Application = express();

const serviceStartTime = Date.now();
const correlationOptions = correlationOptionsFromEnv(env);

app.use(helmet());

// ─── CORS ─────────────────────────────────────────────────────────────────────
// Browsers only hand response headers to scripts when they are exposed, so the
// configured correlation headers are listed explicitly.
const exposedCorrelationHeaders = [
  correlationOptions.operation.headerName,
  correlationOptions.transaction.headerName,
  correlationOptions.format === HttpCorrelationFormat.W3C
    ? TRACE_PARENT_HEADER
    : correlationOptions.upstreamService.headerName,
];

const parseCorsOrigins = (): string[] | string => {
  const raw = env.ALLOWED_ORIGINS ?? '';
  if (!raw || raw === '*') return '*';
  return raw.split(',').map((o) => o.trim()).filter(Boolean);
};

app.use(cors({
  origin: parseCorsOrigins(),
  methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
  allowedHeaders: [
    'Content-Type',
    'Authorization',
    'tracestate',
    'Correlation-Context',
    ...exposedCorrelationHeaders,
  ],
  exposedHeaders: exposedCorrelationHeaders,
}));

// Metrics first so correlation rejections (400) are counted too.
app.use(metricsMiddleware);

// ─── Request correlation (before logging so log lines carry the ids) ─────────
// Rejected requests never reach httpLogger; the correlation logger records them.
app.use(httpCorrelation({
  options: correlationOptions,
  logger: pinoInstance.child({ component: 'http-correlation' }),
}));
app.use(httpLogger);

app.get('/health', (_req, res) => {
  const uptime = Math.floor((Date.now() - serviceStartTime) / 1000);
  res.json({
    status: 'ok',
    service: env.SERVICE_NAME ?? 'http-correlation-service',
    timestamp: new Date().toISOString(),
    uptime,
    version: env.SERVICE_VERSION,
    correlationFormat: correlationOptions.format,
  });
});

app.get('/ready', (_req, res) => {
  res.json({ status: 'ready', timestamp: new Date().toISOString() });
});

app.get('/metrics', (_req, res, next) => {
  register
    .metrics()
    .then((body) => {
      res.set('Content-Type', register.contentType);
      res.end(body);
    })
    .catch(next);
});

app.use('/api/correlation', correlationRoutes);

app.use('*', (_req, res) => {
  res.status(404).json({
    success: false,
    error: {
      code: 'NOT_FOUND',
      message: 'Endpoint not found',
    },
  });
});

app.use(errorMiddleware);

export default app;
