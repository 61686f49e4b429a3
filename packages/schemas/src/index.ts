import { z } from 'zod';

export const Ctrl = z.enum(['reset', 'stop', 'getstat', 'render', 'get_data', 'done', 'ping']);
export type Ctrl = z.infer<typeof Ctrl>;

export const RenderMode = z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]);
export type RenderMode = z.infer<typeof RenderMode>;

// ctrl stays a plain string on the wire: unknown controls must reach the state machine.
export const Message = z.object({
  ctrl: z.string().optional(),
  action: z.string().optional(),
  mode: RenderMode.optional(),
  kwargs: z.record(z.unknown()).optional()
}).passthrough();
export type Message = z.infer<typeof Message>;

export const SampleConfig = z.object({
  get_new: z.boolean().default(true),
  sample_type: z.union([z.literal(0), z.literal(1)]).default(0),
  timestamp: z.number().nullable().default(null),
  b_alpha: z.number().positive().default(1),
  b_beta: z.number().positive().default(1)
});
export type SampleConfig = z.infer<typeof SampleConfig>;

export const DEFAULT_SAMPLE_CONFIG: SampleConfig = SampleConfig.parse({});

export const ResetKwargs = z.object({
  trial_config: z.record(z.unknown()).optional(),
  episode_config: z.record(z.unknown()).optional()
}).passthrough();
export type ResetKwargs = z.infer<typeof ResetKwargs>;

export const OhlcvRow = z.object({ ts: z.string(), open: z.number(), high: z.number(), low: z.number(), close: z.number(), volume: z.number() });
export type OhlcvRow = z.infer<typeof OhlcvRow>;

export const OHLCV_COLUMNS = ['open', 'high', 'low', 'close', 'volume'] as const;

export const ColumnStats = z.object({ count: z.number().int(), mean: z.number(), std: z.number(), min: z.number(), max: z.number() });
export type ColumnStats = z.infer<typeof ColumnStats>;

export const DescribeStats = z.record(ColumnStats);
export type DescribeStats = z.infer<typeof DescribeStats>;

export const SampleMetadata = z.object({
  type: z.enum(['trial', 'train', 'test']),
  trial_num: z.number().int(),
  sample_num: z.number().int(),
  first_row: z.number().int(),
  last_row: z.number().int(),
  first_ts: z.string(),
  last_ts: z.string()
});
export type SampleMetadata = z.infer<typeof SampleMetadata>;

export const TrialWire = z.object({
  name: z.string(),
  rows: z.array(OhlcvRow).min(1),
  episode_length: z.number().int().positive(),
  train_fraction: z.number().gt(0).lt(1),
  metadata: SampleMetadata
});
export type TrialWire = z.infer<typeof TrialWire>;

export const DataReply = z.discriminatedUnion('status', [
  z.object({ status: z.literal('not_ready'), message: z.string().optional() }),
  z.object({ status: z.literal('ready'), sample: TrialWire, stat: DescribeStats })
]);
export type DataReply = z.infer<typeof DataReply>;

export const PingReply = z.object({ ctrl: z.literal('pong'), ready: z.boolean() });
export type PingReply = z.infer<typeof PingReply>;

export const StepInfo = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));
export type StepInfo = z.infer<typeof StepInfo>;

export const StepReply = z.tuple([z.unknown(), z.number(), z.boolean(), z.array(StepInfo)]);
export type StepReply = z.infer<typeof StepReply>;

export const EpisodeResult = z.object({
  episode: z.number().int().nonnegative(),
  runtime_ms: z.number().nonnegative(),
  length: z.number().int().nonnegative(),
  done: z.literal(true),
  stop_reason: z.string(),
  analyzers: z.record(z.unknown())
});
export type EpisodeResult = z.infer<typeof EpisodeResult>;

// getstat before the first completed episode answers with an empty record.
export const EpisodeStat = z.union([EpisodeResult, z.object({}).strict()]);
export type EpisodeStat = z.infer<typeof EpisodeStat>;

export const ErrorReply = z.object({ error: z.string(), message: z.string() });
export type ErrorReply = z.infer<typeof ErrorReply>;

export const RenderPayload = z.object({ mode: z.string(), title: z.string(), lines: z.array(z.string()) });
export type RenderPayload = z.infer<typeof RenderPayload>;

export const RenderReply = z.record(RenderPayload);
export type RenderReply = z.infer<typeof RenderReply>;

/** One line per zod issue, as sent back in `ErrorReply.message`. */
export function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
}
