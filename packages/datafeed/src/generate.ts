import type { OhlcvRow } from '@tradegym/schemas';
import type { RandomSource } from './random';

export type Interval = '1m' | '5m' | '15m' | '1h' | '1d';

export function intervalMs(interval: Interval): number {
  switch (interval) {
    case '1m': return 60_000;
    case '5m': return 5 * 60_000;
    case '15m': return 15 * 60_000;
    case '1h': return 60 * 60_000;
    case '1d': return 24 * 60 * 60_000;
  }
}

export type GenerateOptions = { start: string; bars: number; interval: Interval; startPrice?: number; random?: RandomSource };

/** Random-walk OHLCV series. */
export function generateOhlcv({ start, bars, interval, startPrice = 100, random = Math.random }: GenerateOptions): OhlcvRow[] {
  const startTs = new Date(start).getTime();
  if (Number.isNaN(startTs)) throw new RangeError(`invalid start date: ${start}`);
  const step = intervalMs(interval);
  const rows: OhlcvRow[] = [];
  let price = startPrice;
  for (let i = 0; i < bars; i++) {
    const drift = (random() - 0.5) * 0.5;
    const open = price;
    const close = Math.max(1, open + drift);
    const high = Math.max(open, close) + random();
    const low = Math.max(0.5, Math.min(open, close) - random());
    const volume = Math.floor(1000 + random() * 5000);
    price = close;
    rows.push({ ts: new Date(startTs + i * step).toISOString(), open, high, low, close, volume });
  }
  return rows;
}
