import { EarthquakeEvent } from '../catalog/types';
import { ParamBounds } from './config';

export type AftershockSequence = {
  mainshock: Readonly<EarthquakeEvent>;
  aftershocks: ReadonlyArray<Readonly<EarthquakeEvent>>;  // time ascending, unique ids
  duration_hours: number;                                 // elapsed time of the last member
};

export type RateBin = {
  start: number;       // hours after mainshock (inclusive)
  end: number;         // hours after mainshock (exclusive; last bin inclusive)
  center: number;      // arithmetic midpoint, hours
  width: number;       // hours
  count: number;       // always > 0
  rate: number;        // events / hour
};

export type RateSeries = {
  mainshock_id: string;
  unit: 'hours';
  edges: number[];              // all n+1 log-spaced boundaries, strictly increasing
  n_bins_requested: number;
  empty_bins_dropped: number;
  bins: RateBin[];
};

export type OmoriParams = {
  K: number;
  c: number;
  p: number;
};

export type OmoriModel = 'modified' | 'classical';

export type FitFailureReason =
  | 'insufficient-bins'
  | 'numerical-failure'
  | 'iteration-limit'
  | 'below-threshold';

export type OmoriFit = {
  model: OmoriModel;
  params: OmoriParams | null;   // null = unfit sentinel
  fixed_p: number | null;
  bounds: ParamBounds;
  r_squared: number | null;     // log10-rate space
  rmse: number | null;          // rate space, events/hour
  n_bins: number;
  iterations: number;
  success: boolean;
  failure_reason: FitFailureReason | null;
  message?: string;             // detail for numerical failures
};

export type MainshockInfo = {
  id: string;
  time: string;                 // ISO 8601, UTC
  magnitude: number;
  depth_km: number;
  latitude: number;
  longitude: number;
  place: string | null;
};

export type SequenceStatus = 'fitted' | 'fit-failed' | 'insufficient-data';

export type SequenceResult = {
  mainshock: MainshockInfo;
  status: SequenceStatus;
  aftershock_count: number;     // members passing the association predicate
  duration_hours: number | null;
  series: RateSeries | null;
  modified: OmoriFit | null;
  classical: OmoriFit | null;
  success: boolean;
};

export type DistributionStats = {
  count: number;
  mean: number;
  std: number;                  // population standard deviation
  min: number;
  max: number;
};

export type LinearTrend = {
  n: number;
  slope: number;
  intercept: number;
  r: number;                    // Pearson correlation
};

export type SequenceSummary = {
  total_candidates: number;
  sequences_built: number;
  insufficient_data: number;
  fit_failures: number;
  successful_fits: number;
  p: DistributionStats | null;
  r_squared: DistributionStats | null;
  modified_mean_r_squared: number | null;    // over fits that also have a classical R²
  classical_mean_r_squared: number | null;
  classical_compared: number;
  p_vs_magnitude: LinearTrend | null;
};

export type AnalysisResult = {
  results: SequenceResult[];
  summary: SequenceSummary;
};
