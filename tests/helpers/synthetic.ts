import { EarthquakeEvent } from "@/lib/catalog/types";
import { omoriCumulative, omoriCumulativeInverse } from "@/lib/omori/model";
import { MS_PER_HOUR } from "@/lib/omori/sequenceBuilder";
import { logSpacedEdges } from "@/lib/omori/rateBinner";
import { OmoriParams, RateBin, RateSeries } from "@/lib/omori/types";

export const BASE_TIME = Date.UTC(2023, 0, 1);

export function makeEvent(fields: Partial<EarthquakeEvent> & { id: string }): EarthquakeEvent {
  return {
    time: BASE_TIME,
    latitude: 35,
    longitude: 140,
    depth_km: 10,
    magnitude: 3,
    ...fields,
  };
}

/**
 * Elapsed times (hours) of n events placed at the (i + 0.5)/n quantiles of
 * the Omori count between tStart and tEnd, each scaled by
 * 1 + jitter·sin(7.31·(i + 1)).
 */
export function omoriTimes(
  n: number,
  c: number,
  p: number,
  tStart: number,
  tEnd: number,
  jitter = 0
): number[] {
  const shape: OmoriParams = { K: 1, c, p };
  const n0 = omoriCumulative(tStart, shape);
  const n1 = omoriCumulative(tEnd, shape);
  const times: number[] = [];
  for (let i = 0; i < n; i++) {
    const u = (i + 0.5) / n;
    let t = omoriCumulativeInverse(n0 + u * (n1 - n0), shape);
    if (jitter) t *= 1 + jitter * Math.sin((i + 1) * 7.31);
    times.push(t);
  }
  return times;
}

export type SyntheticSequenceSpec = {
  id: string;
  time: number;
  latitude: number;
  longitude: number;
  magnitude: number;
  count: number;
  c: number;
  p: number;
  tStartHours?: number;
  tEndHours?: number;
  jitter?: number;
};

/**
 * Mainshock plus `count` aftershocks within ~15 km, M2.5–4.3.
 */
export function synthesizeSequence(spec: SyntheticSequenceSpec): {
  mainshock: EarthquakeEvent;
  aftershocks: EarthquakeEvent[];
} {
  const mainshock = makeEvent({
    id: spec.id,
    time: spec.time,
    latitude: spec.latitude,
    longitude: spec.longitude,
    magnitude: spec.magnitude,
  });
  const times = omoriTimes(
    spec.count,
    spec.c,
    spec.p,
    spec.tStartHours ?? 0.05,
    spec.tEndHours ?? 720,
    spec.jitter ?? 0
  );
  const aftershocks = times.map((t, i) =>
    makeEvent({
      id: `${spec.id}-a${i}`,
      time: spec.time + t * MS_PER_HOUR,
      latitude: spec.latitude + 0.1 * Math.sin(i),
      longitude: spec.longitude + 0.1 * Math.cos(i),
      magnitude: 2.5 + (i % 10) * 0.2,
    })
  );
  return { mainshock, aftershocks };
}

/**
 * Rate series sampled exactly from n(t) = K / (c + t)^p at the bin midpoints.
 */
export function exactRateSeries(params: OmoriParams, tMin = 0.1, tMax = 720, nBins = 15): RateSeries {
  const edges = logSpacedEdges(tMin, tMax, nBins);
  const bins: RateBin[] = [];
  for (let i = 0; i < nBins; i++) {
    const start = edges[i];
    const end = edges[i + 1];
    const center = (start + end) / 2;
    bins.push({
      start,
      end,
      center,
      width: end - start,
      count: 1,
      rate: params.K / Math.pow(params.c + center, params.p),
    });
  }
  return {
    mainshock_id: "exact",
    unit: "hours",
    edges,
    n_bins_requested: nBins,
    empty_bins_dropped: 0,
    bins,
  };
}
