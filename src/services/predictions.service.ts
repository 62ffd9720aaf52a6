import { randomUUID } from 'crypto';
import { AppError, NotFoundError } from '../errors';
import type { Prediction, RandomSource } from '../types/index';
import type { PredictionRequest } from '../validators/ai.validator';
import { uniform, type LatencySimulator } from './latency.service';

export const SIMULATED_ERROR_CODES = [400, 401, 403, 500, 503];
export const PREDICT_ERROR_RATE = 0.5;
export const LOOKUP_ERROR_RATE = 0.3;

export class PredictionsService {
  constructor(
    private readonly latency: LatencySimulator,
    private readonly random: RandomSource = Math.random
  ) {}

  async predict(request: PredictionRequest, simulateError: boolean): Promise<Prediction> {
    const processingTime = await this.latency.wait('inference');

    if (simulateError && this.random() < PREDICT_ERROR_RATE) {
      const index = Math.min(
        Math.floor(this.random() * SIMULATED_ERROR_CODES.length),
        SIMULATED_ERROR_CODES.length - 1
      );
      const statusCode = SIMULATED_ERROR_CODES[index];
      throw new AppError(`Simulated error with status code ${statusCode}`, statusCode, 'SIMULATED_ERROR');
    }

    return {
      predictionId: randomUUID(),
      result: `Processed: ${request.text.slice(0, 50)}...`,
      confidence: uniform(this.random, 0.7, 1.0),
      processingTime,
      timestamp: new Date().toISOString(),
    };
  }

  async getPrediction(predictionId: string, simulateError: boolean): Promise<Prediction> {
    const processingTime = await this.latency.wait('lookup');

    if (simulateError && this.random() < LOOKUP_ERROR_RATE) {
      throw new NotFoundError(`Prediction ${predictionId}`);
    }

    return {
      predictionId,
      result: 'Cached prediction result',
      confidence: 0.95,
      processingTime,
      timestamp: new Date().toISOString(),
    };
  }
}
