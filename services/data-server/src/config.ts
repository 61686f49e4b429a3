import { z } from 'zod';

export const DataServerConfig = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(4999),
  HOST: z.string().default('127.0.0.1'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  DATASET_BARS: z.coerce.number().int().positive().default(5_000),
  TRIAL_LENGTH: z.coerce.number().int().positive().default(1_000),
  EPISODE_LENGTH: z.coerce.number().int().positive().default(200),
  TRAIN_FRACTION: z.coerce.number().gt(0).lt(1).default(0.8),
  READY_DELAY_MS: z.coerce.number().int().nonnegative().default(0),
  DATASET_START: z.string().datetime({ offset: true }).default('2024-01-01T00:00:00Z'),
  DATASET_INTERVAL: z.enum(['1m', '5m', '15m', '1h', '1d']).default('1m')
});
export type DataServerConfig = z.infer<typeof DataServerConfig>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): DataServerConfig {
  return DataServerConfig.parse(env);
}
