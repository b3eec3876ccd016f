import { AnalysisConfig } from './config';
import { MS_PER_HOUR } from './sequenceBuilder';
import { AftershockSequence, RateBin, RateSeries } from './types';

/**
 * Elapsed time of each aftershock after its mainshock, hours, ascending.
 */
export function elapsedHours(sequence: AftershockSequence): number[] {
  return sequence.aftershocks
    .map(ev => (ev.time - sequence.mainshock.time) / MS_PER_HOUR)
    .sort((a, b) => a - b);
}

/**
 * n+1 boundaries with equal ratio between tMin and tMax (both > 0).
 * End points are pinned so the extreme events fall inside the domain.
 */
export function logSpacedEdges(tMin: number, tMax: number, nBins: number): number[] {
  const lo = Math.log10(tMin);
  const hi = Math.log10(tMax);
  const step = (hi - lo) / nBins;
  const edges: number[] = [];
  for (let i = 0; i <= nBins; i++) {
    edges.push(Math.pow(10, lo + i * step));
  }
  edges[0] = tMin;
  edges[nBins] = tMax;
  return edges;
}

/**
 * Bins to request for a sequence of `memberCount` events: config.nBins, capped
 * at floor(memberCount / minEventsPerBin) but never below 3.
 */
export function resolveBinCount(memberCount: number, config: AnalysisConfig): number {
  if (config.minEventsPerBin <= 0) return config.nBins;
  return Math.max(3, Math.min(config.nBins, Math.floor(memberCount / config.minEventsPerBin)));
}

// index of the bin holding t; bins are [e_i, e_{i+1}) except the last, which is closed
function binIndex(edges: number[], t: number): number {
  const last = edges.length - 2;
  if (t >= edges[last]) return last;
  let lo = 0;
  let hi = last;
  while (lo < hi) {
    const mid = (lo + hi + 1) >>> 1;
    if (edges[mid] <= t) lo = mid;
    else hi = mid - 1;
  }
  return lo;
}

/**
 * Log-binned aftershock rate series
 *
 * rate_i = count_i / (e_{i+1} − e_i)   [events / hour]
 *
 * Empty bins are dropped (log 0 is undefined; a floor value would bias p).
 * A sequence whose members share a single elapsed time yields no bins.
 */
export function binSequence(sequence: AftershockSequence, nBins: number): RateSeries {
  if (!Number.isInteger(nBins) || nBins < 1) {
    throw new Error(`nBins must be a positive integer (got ${nBins})`);
  }

  const times = elapsedHours(sequence).filter(t => t > 0);
  const base: RateSeries = {
    mainshock_id: sequence.mainshock.id,
    unit: 'hours',
    edges: [],
    n_bins_requested: nBins,
    empty_bins_dropped: 0,
    bins: [],
  };

  if (times.length === 0) return base;
  const tMin = times[0];
  const tMax = times[times.length - 1];
  if (!(tMax > tMin)) return base;

  const edges = logSpacedEdges(tMin, tMax, nBins);
  const counts = new Array<number>(nBins).fill(0);
  for (const t of times) {
    counts[binIndex(edges, t)] += 1;
  }

  const bins: RateBin[] = [];
  for (let i = 0; i < nBins; i++) {
    if (counts[i] === 0) continue;
    const start = edges[i];
    const end = edges[i + 1];
    const width = end - start;
    bins.push({
      start,
      end,
      center: (start + end) / 2,
      width,
      count: counts[i],
      rate: counts[i] / width,
    });
  }

  return {
    ...base,
    edges,
    empty_bins_dropped: nBins - bins.length,
    bins,
  };
}
