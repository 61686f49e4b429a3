import type { OhlcvRow, SampleConfig } from '@tradegym/schemas';
import { sampleBeta, type RandomSource } from './random';

/** Half-open row range `[start, end)`. */
export type Region = { start: number; end: number };

/** Train region `[0, split)`, test region `[split, length)`. */
export function trainTestRegions(length: number, trainFraction: number): { train: Region; test: Region } {
  const split = Math.floor(length * trainFraction);
  return { train: { start: 0, end: split }, test: { start: split, end: length } };
}

/** Both regions of a `length`-row trial must hold a full episode. */
export function checkRegions(length: number, trainFraction: number, episodeLength: number): void {
  const { train, test } = trainTestRegions(length, trainFraction);
  const trainRows = train.end - train.start;
  const testRows = test.end - test.start;
  if (trainRows < episodeLength || testRows < episodeLength) {
    throw new RangeError(`episode length ${episodeLength} does not fit a ${length}-row trial split into ${trainRows} train and ${testRows} test rows`);
  }
}

/**
 * First row index of a `length`-row window inside `region`: anchored at `timestamp` when
 * given, otherwise drawn from Beta(b_alpha, b_beta) over the admissible starts.
 */
export function windowStart(
  rows: readonly OhlcvRow[],
  region: Region,
  length: number,
  config: Pick<SampleConfig, 'timestamp' | 'b_alpha' | 'b_beta'>,
  random: RandomSource
): number {
  const span = region.end - region.start;
  if (length > span) throw new RangeError(`cannot sample ${length} rows from a region of ${span}`);
  const lastStart = region.end - length;
  const { timestamp } = config;
  if (timestamp !== null) {
    let idx = -1;
    for (let i = region.start; i < region.end; i++) {
      if (Date.parse(rows[i].ts) >= timestamp) { idx = i; break; }
    }
    if (idx < 0) throw new RangeError(`no row at or after ${new Date(timestamp).toISOString()} in the sampling region`);
    return Math.min(idx, lastStart);
  }
  const choices = lastStart - region.start + 1;
  const u = sampleBeta(config.b_alpha, config.b_beta, random);
  return region.start + Math.min(Math.floor(u * choices), choices - 1);
}
