import app from './app';
import { logger } from './infra/logger';
import { env } from './config/env';

const PORT = env.PORT;

app.listen(PORT, () => {
  logger.info(`HTTP correlation service running on port ${PORT}`, { correlationFormat: env.CORRELATION_FORMAT });
});

export default app;
