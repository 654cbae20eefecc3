import { HistogramBin } from '../types';

// Basic math helpers over nullable series

export const mean = (arr: number[]): number => {
  if (arr.length === 0) return 0;
  return arr.reduce((a, b) => a + b, 0) / arr.length;
};

const isPresent = (v: number | null | undefined): v is number =>
  typeof v === 'number' && Number.isFinite(v);

// actual - predicted, skipping pairs where either side is absent
export const residuals = (
  actual: ReadonlyArray<number | null>,
  predicted: ReadonlyArray<number | null>
): number[] => {
  const out: number[] = [];
  const n = Math.min(actual.length, predicted.length);
  for (let i = 0; i < n; i++) {
    const a = actual[i];
    const p = predicted[i];
    if (isPresent(a) && isPresent(p)) out.push(a - p);
  }
  return out;
};

export const rmse = (
  actual: ReadonlyArray<number | null>,
  predicted: ReadonlyArray<number | null>
): number | null => {
  const diffs = residuals(actual, predicted);
  if (diffs.length === 0) return null;
  return Math.sqrt(mean(diffs.map(d => d * d)));
};

/**
 * Equal-width histogram over [min, max] of the values. The max value lands in
 * the last bin. A zero-width range is widened to [v - 0.5, v + 0.5].
 */
export const histogram = (values: number[], binCount: number): HistogramBin[] => {
  if (values.length === 0 || binCount < 1) return [];

  let lo = Math.min(...values);
  let hi = Math.max(...values);
  if (lo === hi) {
    lo -= 0.5;
    hi += 0.5;
  }
  const width = (hi - lo) / binCount;

  const bins: HistogramBin[] = Array.from({ length: binCount }, (_, i) => ({
    x0: lo + i * width,
    x1: i === binCount - 1 ? hi : lo + (i + 1) * width,
    count: 0,
  }));

  for (const v of values) {
    const idx = Math.min(Math.floor((v - lo) / width), binCount - 1);
    bins[idx].count++;
  }
  return bins;
};
