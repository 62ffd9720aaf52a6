import 'dotenv/config';
import { createApp } from './app';
import { loadEnv } from './config/env';
import { metricsConfigFromEnv } from './config/metrics';
import { RedMetricsCollector } from './services/red-metrics.service';
import { createInstantLatencySimulator, createLatencySimulator } from './services/latency.service';
import { logger } from './utils/logger';

const env = loadEnv();
const metricsConfig = metricsConfigFromEnv(env);
const metrics = new RedMetricsCollector(metricsConfig);

const app = createApp({
  metrics,
  metricsConfig,
  latency: env.SIMULATE_LATENCY ? createLatencySimulator() : createInstantLatencySimulator(),
});

const server = app.listen(env.PORT, () => {
  logger.info(`Server is running on port ${env.PORT}`, {
    service: metricsConfig.serviceLabel,
    metricsEnabled: metricsConfig.enabled,
  });
});

const shutdown = () => {
  logger.info('Shutting down gracefully...');

  server.close(error => {
    if (error) {
      logger.error('Error during shutdown', { error: error.message });
      process.exit(1);
    }
    logger.info('Server closed');
    process.exit(0);
  });

  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 10000).unref();
};

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
