import { DEFAULT_PARAM_BOUNDS } from "@/lib/omori/config";
import { MainshockInfo, OmoriFit, SequenceResult } from "@/lib/omori/types";

export function mainshockStub(fields: Partial<MainshockInfo> = {}): MainshockInfo {
  return {
    id: "ms1",
    time: "2023-01-01T00:00:00.000Z",
    magnitude: 6.5,
    depth_km: 10,
    latitude: 35,
    longitude: 140,
    place: "20 km SW of Sampletown",
    ...fields,
  };
}

export function fitStub(fields: Partial<OmoriFit> = {}): OmoriFit {
  return {
    model: "modified",
    params: { K: 12.345, c: 0.0567, p: 1.087 },
    fixed_p: null,
    bounds: DEFAULT_PARAM_BOUNDS,
    r_squared: 0.9512,
    rmse: 0.25,
    n_bins: 7,
    iterations: 6,
    success: true,
    failure_reason: null,
    ...fields,
  };
}

export function fittedStub(fields: Partial<SequenceResult> = {}): SequenceResult {
  return {
    mainshock: mainshockStub(),
    status: "fitted",
    aftershock_count: 42,
    duration_hours: 600.5,
    series: null,
    modified: fitStub(),
    classical: fitStub({ model: "classical", fixed_p: 1, params: { K: 10, c: 0.05, p: 1 }, r_squared: 0.9 }),
    success: true,
    ...fields,
  };
}

export function insufficientStub(count: number, fields: Partial<SequenceResult> = {}): SequenceResult {
  return {
    mainshock: mainshockStub({ id: "ms2", place: null }),
    status: "insufficient-data",
    aftershock_count: count,
    duration_hours: null,
    series: null,
    modified: null,
    classical: null,
    success: false,
    ...fields,
  };
}
