import { OHLCV_COLUMNS, type ColumnStats, type DescribeStats, type OhlcvRow } from '@tradegym/schemas';

function columnStats(values: number[]): ColumnStats {
  const count = values.length;
  if (count === 0) return { count: 0, mean: 0, std: 0, min: 0, max: 0 };
  const mean = values.reduce((a, v) => a + v, 0) / count;
  const variance = count > 1 ? values.reduce((a, v) => a + (v - mean) ** 2, 0) / (count - 1) : 0;
  return {
    count,
    mean,
    std: Math.sqrt(variance),
    min: values.reduce((a, v) => Math.min(a, v), Infinity),
    max: values.reduce((a, v) => Math.max(a, v), -Infinity)
  };
}

/** Per-column count, mean, sample std, min and max. */
export function describeRows(rows: readonly OhlcvRow[]): DescribeStats {
  const stats: DescribeStats = {};
  for (const column of OHLCV_COLUMNS) stats[column] = columnStats(rows.map((r) => r[column]));
  return stats;
}
