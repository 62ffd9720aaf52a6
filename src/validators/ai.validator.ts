import { z } from 'zod';

const booleanQueryParam = z
  .preprocess(
    value => (typeof value === 'string' ? value.toLowerCase() : value),
    z.enum(['true', 'false', '1', '0', 'yes', 'no', 'on', 'off'])
  )
  .transform(value => value === 'true' || value === '1' || value === 'yes' || value === 'on');

export const simulateErrorQuerySchema = z.object({
  simulate_error: booleanQueryParam.optional().transform(value => value ?? false),
});

export const predictionRequestSchema = z.object({
  text: z.string().min(1),
  modelVersion: z.string().min(1).default('v1'),
});

export const predictionIdSchema = z.string().uuid();

export type PredictionRequest = z.infer<typeof predictionRequestSchema>;
