import type { Request, Response, NextFunction } from 'express';
import type { PredictionsService } from '../services/predictions.service';
import {
  predictionIdSchema,
  predictionRequestSchema,
  simulateErrorQuerySchema,
} from '../validators/ai.validator';

export class AiController {
  constructor(private readonly service: PredictionsService) {}

  predict = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = predictionRequestSchema.parse(req.body);
      const { simulate_error } = simulateErrorQuerySchema.parse(req.query);
      const prediction = await this.service.predict(input, simulate_error);
      res.json({ data: prediction });
    } catch (error) {
      next(error);
    }
  };

  getPrediction = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const predictionId = predictionIdSchema.parse(req.params.predictionId);
      const { simulate_error } = simulateErrorQuerySchema.parse(req.query);
      const prediction = await this.service.getPrediction(predictionId, simulate_error);
      res.json({ data: prediction });
    } catch (error) {
      next(error);
    }
  };
}
