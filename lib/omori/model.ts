import { OmoriParams } from './types';

/**
 * Omori-Utsu rate laws
 *
 * Modified (Utsu 1961):   n(t) = K / (c + t)^p
 * Original (Omori 1894):  n(t) = K / (c + t)          (p = 1)
 *
 * t and c in hours, n in events/hour.
 */

export function omoriRate(t: number, { K, c, p }: OmoriParams): number {
  return K / Math.pow(c + t, p);
}

/**
 * log10 n(t) = log10 K − p · log10(c + t)
 */
export function omoriLogRate(t: number, { K, c, p }: OmoriParams): number {
  return Math.log10(K) - p * Math.log10(c + t);
}

/**
 * Expected number of events in [0, t]:
 *   N(t) = K [(c + t)^(1−p) − c^(1−p)] / (1 − p)    p ≠ 1
 *   N(t) = K ln((c + t) / c)                        p = 1
 */
export function omoriCumulative(t: number, { K, c, p }: OmoriParams): number {
  if (Math.abs(p - 1) < 1e-12) {
    return K * Math.log((c + t) / c);
  }
  return (K * (Math.pow(c + t, 1 - p) - Math.pow(c, 1 - p))) / (1 - p);
}

/**
 * Inverse of omoriCumulative: the time at which N(t) reaches `count`.
 */
export function omoriCumulativeInverse(count: number, { K, c, p }: OmoriParams): number {
  if (Math.abs(p - 1) < 1e-12) {
    return c * Math.exp(count / K) - c;
  }
  return Math.pow(Math.pow(c, 1 - p) + (count * (1 - p)) / K, 1 / (1 - p)) - c;
}
