import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { MetricsConfig } from './config/metrics';
import { createMetricsMiddleware } from './middleware/metrics.middleware';
import { errorHandlerMiddleware, notFoundHandler } from './middleware/error-handler.middleware';
import { ProductsController } from './controllers/products.controller';
import { AiController } from './controllers/ai.controller';
import { createMetricsHandler, healthCheck } from './controllers/metrics.controller';
import { ProductsService } from './services/products.service';
import { PredictionsService } from './services/predictions.service';
import type { RedMetricsCollector } from './services/red-metrics.service';
import type { LatencySimulator } from './services/latency.service';
import type { RandomSource } from './types/index';
import { openApiDocument } from './docs/openapi';

export interface AppDependencies {
  metrics: RedMetricsCollector;
  metricsConfig: MetricsConfig;
  latency: LatencySimulator;
  random?: RandomSource;
}

export function createApp({ metrics, metricsConfig, latency, random }: AppDependencies) {
  const app = express();

  app.use(createMetricsMiddleware(metrics, metricsConfig));

  app.use(helmet());
  app.use(cors());
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.get('/', (req, res) => res.redirect('/openapi.json'));
  app.get('/openapi.json', (req, res) => res.json(openApiDocument));
  app.get('/health', healthCheck);
  app.get('/metrics', createMetricsHandler(metrics));

  const productsController = new ProductsController(new ProductsService(latency));
  const aiController = new AiController(new PredictionsService(latency, random));

  app.get('/api/v1/products', productsController.listProducts);
  app.post('/api/v1/products', productsController.createProduct);
  app.get('/api/v1/products/:productId', productsController.getProduct);
  app.put('/api/v1/products/:productId', productsController.updateProduct);
  app.delete('/api/v1/products/:productId', productsController.deleteProduct);
  app.post('/api/v1/products/:productId/process', productsController.processProduct);

  app.post('/api/v1/ai/predict', aiController.predict);
  app.get('/api/v1/ai/predict/:predictionId', aiController.getPrediction);

  app.use(notFoundHandler);

  app.use(errorHandlerMiddleware);

  return app;
}
