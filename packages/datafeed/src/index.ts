export { describeRows } from './describe';
export { generateOhlcv, intervalMs, type GenerateOptions, type Interval } from './generate';
export { OhlcvDataset, type DatasetOptions } from './OhlcvDataset';
export { OhlcvEpisodeSample, OhlcvTrialSample, type TrialOptions } from './OhlcvTrialSample';
export { sampleBeta, type RandomSource } from './random';
export { checkRegions, trainTestRegions, windowStart, type Region } from './sampling';
