import { DistributionStats, LinearTrend } from './types';

export function mean(values: number[]): number {
  if (values.length === 0) return NaN;
  return values.reduce((s, v) => s + v, 0) / values.length;
}

/** Population standard deviation (divides by n). */
export function stdDev(values: number[]): number {
  if (values.length === 0) return NaN;
  const m = mean(values);
  return Math.sqrt(values.reduce((s, v) => s + (v - m) ** 2, 0) / values.length);
}

export function describe(values: number[]): DistributionStats | null {
  if (values.length === 0) return null;
  return {
    count: values.length,
    mean: mean(values),
    std: stdDev(values),
    min: Math.min(...values),
    max: Math.max(...values),
  };
}

/**
 * Ordinary least-squares line y = intercept + slope·x with Pearson r.
 * Null for fewer than 3 points or constant x.
 */
export function linearTrend(xs: number[], ys: number[]): LinearTrend | null {
  const n = Math.min(xs.length, ys.length);
  if (n < 3) return null;

  const mx = mean(xs.slice(0, n));
  const my = mean(ys.slice(0, n));
  let sxx = 0;
  let syy = 0;
  let sxy = 0;
  for (let i = 0; i < n; i++) {
    const dx = xs[i] - mx;
    const dy = ys[i] - my;
    sxx += dx * dx;
    syy += dy * dy;
    sxy += dx * dy;
  }
  if (sxx === 0) return null;

  const slope = sxy / sxx;
  return {
    n,
    slope,
    intercept: my - slope * mx,
    r: syy === 0 ? 0 : sxy / Math.sqrt(sxx * syy),
  };
}
