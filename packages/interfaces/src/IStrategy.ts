import type { DescribeStats, SampleMetadata, StepInfo } from "@tradegym/schemas";

/** Last `state_window` bars as [open, high, low, close] rows. */
export type RawState = number[][];

export interface StrategyParams {
  state_window: number;
  drawdown_call: number;
  target_call: number;
  order_size: number;
  trial_stat?: DescribeStats;
  trial_metadata?: SampleMetadata;
  dataset_stat?: DescribeStats;
  episode_stat?: DescribeStats;
  metadata?: SampleMetadata;
}

export interface IStrategy {
  id: string;
  action: string;
  lastAction: string;
  brokerMessage: string;
  /** Why the episode ended, "-" while running. */
  doneReason: string;
  readonly iteration: number;
  readonly lastReward: number;
  next(iteration: number): void;
  getDone(): boolean;
  getInfo(): StepInfo;
  getRawState(): RawState;
  getState(): unknown;
  getReward(): number;
  close(): void;
}
