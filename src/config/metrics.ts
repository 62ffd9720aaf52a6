import { z } from 'zod';
import type { Env } from './env';

export const DEFAULT_BUCKETS = [
  0.001, 0.005, 0.01, 0.025, 0.05, 0.075, 0.1, 0.25, 0.5, 0.75,
  1, 2.5, 5, 7.5, 10, 15, 20, 30, 45, 60,
];

export const DEFAULT_EXCLUDED_PATHS = ['/metrics', '/health', '/openapi.json', '/favicon.ico'];

export const metricsConfigSchema = z.object({
  buckets: z
    .array(z.number().finite().positive())
    .min(1)
    .refine(buckets => buckets.every((bound, i) => i === 0 || bound > buckets[i - 1]), {
      message: 'Histogram buckets must be strictly increasing',
    })
    .default(DEFAULT_BUCKETS),
  excludePaths: z.array(z.string().startsWith('/')).default(DEFAULT_EXCLUDED_PATHS),
  serviceLabel: z.string().min(1),
  enabled: z.boolean().default(true),
  collectDefaultMetrics: z.boolean().default(true),
});

export type MetricsConfig = z.infer<typeof metricsConfigSchema>;
export type MetricsConfigInput = z.input<typeof metricsConfigSchema>;

export function createMetricsConfig(input: MetricsConfigInput): MetricsConfig {
  return metricsConfigSchema.parse(input);
}

export function formatServiceLabel(appName: string, appEnv: string): string {
  return `${appName.toLowerCase().replace(/ /g, '-')}--${appEnv.toLowerCase()}`;
}

export function metricsConfigFromEnv(env: Env): MetricsConfig {
  return createMetricsConfig({
    buckets: env.METRICS_BUCKETS,
    excludePaths: env.METRICS_EXCLUDE_PATHS,
    serviceLabel: formatServiceLabel(env.APP_NAME, env.APP_ENV),
    enabled: env.ENABLE_METRICS,
    collectDefaultMetrics: env.COLLECT_DEFAULT_METRICS,
  });
}
