import { z } from 'zod';

const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false'])
    .default(defaultValue ? 'true' : 'false')
    .transform(value => value === 'true');

const commaList = z
  .string()
  .transform(value =>
    value
      .split(',')
      .map(item => item.trim())
      .filter(item => item.length > 0)
  );

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(8000),
  APP_NAME: z.string().min(1).default('RED Metrics API'),
  APP_ENV: z.string().min(1).default('local'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  ENABLE_METRICS: booleanFlag(true),
  METRICS_BUCKETS: commaList.pipe(z.array(z.coerce.number())).optional(),
  METRICS_EXCLUDE_PATHS: commaList.optional(),
  COLLECT_DEFAULT_METRICS: booleanFlag(true),
  SIMULATE_LATENCY: booleanFlag(true),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return envSchema.parse(source);
}
