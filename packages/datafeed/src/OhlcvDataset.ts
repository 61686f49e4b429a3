import type { DescribeStats, OhlcvRow, SampleConfig } from '@tradegym/schemas';
import { describeRows } from './describe';
import { OhlcvTrialSample } from './OhlcvTrialSample';
import type { RandomSource } from './random';
import { checkRegions, windowStart } from './sampling';

export type DatasetOptions = {
  name: string;
  rows: OhlcvRow[];
  trialLength: number;
  episodeLength: number;
  trainFraction: number;
  random?: RandomSource;
};

export class OhlcvDataset {
  private trialNum = 0;
  private readonly random: RandomSource;

  constructor(private readonly options: DatasetOptions) {
    if (options.episodeLength > options.trialLength) throw new RangeError(`episode length ${options.episodeLength} exceeds trial length ${options.trialLength}`);
    if (options.trialLength > options.rows.length) throw new RangeError(`trial length ${options.trialLength} exceeds dataset size ${options.rows.length}`);
    checkRegions(options.trialLength, options.trainFraction, options.episodeLength);
    this.random = options.random ?? Math.random;
  }

  get size(): number {
    return this.options.rows.length;
  }

  describe(): DescribeStats {
    return describeRows(this.options.rows);
  }

  /** Trials are drawn over the whole dataset; `sample_type` only applies inside a trial. */
  sampleTrial(config: SampleConfig): OhlcvTrialSample {
    const { rows, trialLength, episodeLength, trainFraction, name } = this.options;
    const start = windowStart(rows, { start: 0, end: rows.length }, trialLength, config, this.random);
    const trial = new OhlcvTrialSample({
      name: `${name}#${this.trialNum}`,
      rows: rows.slice(start, start + trialLength),
      episodeLength,
      trainFraction,
      trialNum: this.trialNum,
      firstRow: start,
      random: this.random
    });
    this.trialNum += 1;
    return trial;
  }
}
