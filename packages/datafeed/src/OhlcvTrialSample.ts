import { TrialWire, type DescribeStats, type OhlcvRow, type SampleConfig, type SampleMetadata } from '@tradegym/schemas';
import type { IEpisodeSample, ITrialSample } from '@tradegym/interfaces';
import { describeRows } from './describe';
import type { RandomSource } from './random';
import { checkRegions, trainTestRegions, windowStart, type Region } from './sampling';

function rangeMetadata(
  rows: readonly OhlcvRow[],
  base: Pick<SampleMetadata, 'type' | 'trial_num' | 'sample_num'>,
  firstRow: number
): SampleMetadata {
  return {
    ...base,
    first_row: firstRow,
    last_row: firstRow + rows.length - 1,
    first_ts: rows[0].ts,
    last_ts: rows[rows.length - 1].ts
  };
}

export class OhlcvEpisodeSample implements IEpisodeSample {
  constructor(private readonly rows: readonly OhlcvRow[], readonly metadata: SampleMetadata) {}

  describe(): DescribeStats {
    return describeRows(this.rows);
  }

  toFeed(): OhlcvRow[] {
    return this.rows.map((r) => ({ ...r }));
  }
}

export type TrialOptions = {
  name: string;
  rows: OhlcvRow[];
  episodeLength: number;
  trainFraction: number;
  trialNum: number;
  /** Index of `rows[0]` in the parent dataset. */
  firstRow: number;
  random?: RandomSource;
};

/**
 * A slice of the dataset that yields episode windows. Rows before
 * `trainFraction` form the train region (`sample_type` 0), the rest the test region.
 */
export class OhlcvTrialSample implements ITrialSample {
  readonly name: string;
  private readonly rows: OhlcvRow[];
  private readonly episodeLength: number;
  private readonly trainFraction: number;
  private readonly trialNum: number;
  private readonly firstRow: number;
  private readonly random: RandomSource;
  private sampleNum = 0;

  constructor(options: TrialOptions) {
    if (options.rows.length === 0) throw new RangeError('trial has no rows');
    checkRegions(options.rows.length, options.trainFraction, options.episodeLength);
    this.name = options.name;
    this.rows = options.rows;
    this.episodeLength = options.episodeLength;
    this.trainFraction = options.trainFraction;
    this.trialNum = options.trialNum;
    this.firstRow = options.firstRow;
    this.random = options.random ?? Math.random;
  }

  static fromWire(input: unknown, random?: RandomSource): OhlcvTrialSample {
    const wire = TrialWire.parse(input);
    return new OhlcvTrialSample({
      name: wire.name,
      rows: wire.rows,
      episodeLength: wire.episode_length,
      trainFraction: wire.train_fraction,
      trialNum: wire.metadata.trial_num,
      firstRow: wire.metadata.first_row,
      random
    });
  }

  toWire(): TrialWire {
    return { name: this.name, rows: this.rows, episode_length: this.episodeLength, train_fraction: this.trainFraction, metadata: this.metadata };
  }

  get metadata(): SampleMetadata {
    return rangeMetadata(this.rows, { type: 'trial', trial_num: this.trialNum, sample_num: this.sampleNum }, this.firstRow);
  }

  regions(): { train: Region; test: Region } {
    return trainTestRegions(this.rows.length, this.trainFraction);
  }

  describe(): DescribeStats {
    return describeRows(this.rows);
  }

  toFeed(): OhlcvRow[] {
    return this.rows.map((r) => ({ ...r }));
  }

  reset(): void {
    this.sampleNum = 0;
  }

  sample(config: SampleConfig): OhlcvEpisodeSample {
    const { train, test } = this.regions();
    const isTest = config.sample_type === 1;
    const start = windowStart(this.rows, isTest ? test : train, this.episodeLength, config, this.random);
    const rows = this.rows.slice(start, start + this.episodeLength);
    const metadata = rangeMetadata(rows, { type: isTest ? 'test' : 'train', trial_num: this.trialNum, sample_num: this.sampleNum }, this.firstRow + start);
    this.sampleNum += 1;
    return new OhlcvEpisodeSample(rows, metadata);
  }
}
