import type { DescribeStats, OhlcvRow, SampleConfig, SampleMetadata } from "@tradegym/schemas";

export interface IEpisodeSample {
  readonly metadata: SampleMetadata;
  describe(): DescribeStats;
  toFeed(): OhlcvRow[];
}

export interface ITrialSample extends IEpisodeSample {
  readonly name: string;
  reset(): void;
  sample(config: SampleConfig): IEpisodeSample;
}
