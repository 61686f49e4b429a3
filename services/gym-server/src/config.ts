import { z } from 'zod';

const flag = z.enum(['true', 'false', '1', '0']).default('true').transform((v) => v === 'true' || v === '1');
const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

export const LogLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const GymServerConfig = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  HOST: z.string().default('127.0.0.1'),
  DATA_SERVER_URL: z.string().url().default('http://127.0.0.1:4999/call'),
  CONNECT_TIMEOUT_MS: positiveInt(60_000),
  WAIT_FOR_DATA_MS: positiveInt(300_000),
  BACKOFF_MAX_MS: positiveInt(2_000),
  SKIP_FRAME: positiveInt(1),
  INFO_MODE: z.enum(['last', 'all']).default('last'),
  RENDER_ENABLED: flag,
  LOG_LEVEL: LogLevel.default('info'),
  TASK_ID: z.coerce.number().int().nonnegative().default(0),
  START_CASH: z.coerce.number().positive().default(10_000),
  COMMISSION: z.coerce.number().nonnegative().default(0.001),
  ORDER_SIZE: z.coerce.number().positive().default(1),
  STATE_WINDOW: positiveInt(10),
  DRAWDOWN_CALL: z.coerce.number().positive().default(10),
  TARGET_CALL: z.coerce.number().positive().default(10)
});
export type GymServerConfig = z.infer<typeof GymServerConfig>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): GymServerConfig {
  return GymServerConfig.parse(env);
}
