import { ConfigurationError } from './errors';

export type Interval = {
  lower: number;
  upper: number;
};

export type ParamBounds = {
  K: Interval;                    // productivity, events/hour at t + c = 1 h
  c: Interval;                    // hours
  p: Interval;                    // decay exponent
};

export type AnalysisConfig = {
  minMainshockMagnitude: number;  // M_min for candidates
  detectionThreshold: number;     // smallest aftershock magnitude kept
  spatialRadiusKm: number;
  temporalWindowDays: number;
  minSeparationMinutes: number;   // excludes the mainshock and duplicate reports
  minAftershocks: number;         // below this a sequence is "insufficient data"
  nBins: number;                  // requested log-spaced bins
  minEventsPerBin: number;        // caps bins at floor(n / minEventsPerBin); 0 disables
  fitSuccessThreshold: number;    // R² (log space) a fit must exceed
  paramBounds: ParamBounds;
  maxIterations: number;          // optimizer cap; hitting it is a fit failure
};

export type AnalysisConfigOverrides = Partial<Omit<AnalysisConfig, 'paramBounds'>> & {
  paramBounds?: Partial<ParamBounds>;
};

export const DEFAULT_PARAM_BOUNDS: ParamBounds = {
  K: { lower: 0.01, upper: 1e6 },
  c: { lower: 0.001, upper: 10 },
  p: { lower: 0.1, upper: 3.0 },
};

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  minMainshockMagnitude: 6.0,
  detectionThreshold: 2.0,
  spatialRadiusKm: 100,
  temporalWindowDays: 30,
  minSeparationMinutes: 1,
  minAftershocks: 10,
  nBins: 20,
  minEventsPerBin: 3,
  fitSuccessThreshold: 0.5,
  paramBounds: DEFAULT_PARAM_BOUNDS,
  maxIterations: 200,
};

/**
 * Merge overrides onto the defaults. Bounds merge per parameter.
 */
export function resolveConfig(overrides: AnalysisConfigOverrides = {}): AnalysisConfig {
  const d = DEFAULT_ANALYSIS_CONFIG;
  return {
    minMainshockMagnitude: overrides.minMainshockMagnitude ?? d.minMainshockMagnitude,
    detectionThreshold: overrides.detectionThreshold ?? d.detectionThreshold,
    spatialRadiusKm: overrides.spatialRadiusKm ?? d.spatialRadiusKm,
    temporalWindowDays: overrides.temporalWindowDays ?? d.temporalWindowDays,
    minSeparationMinutes: overrides.minSeparationMinutes ?? d.minSeparationMinutes,
    minAftershocks: overrides.minAftershocks ?? d.minAftershocks,
    nBins: overrides.nBins ?? d.nBins,
    minEventsPerBin: overrides.minEventsPerBin ?? d.minEventsPerBin,
    fitSuccessThreshold: overrides.fitSuccessThreshold ?? d.fitSuccessThreshold,
    maxIterations: overrides.maxIterations ?? d.maxIterations,
    paramBounds: {
      K: overrides.paramBounds?.K ?? d.paramBounds.K,
      c: overrides.paramBounds?.c ?? d.paramBounds.c,
      p: overrides.paramBounds?.p ?? d.paramBounds.p,
    },
  };
}

function checkInterval(name: string, interval: Interval, problems: string[]): void {
  if (!Number.isFinite(interval.lower) || !Number.isFinite(interval.upper)) {
    problems.push(`${name} bounds must be finite`);
    return;
  }
  if (interval.lower > interval.upper) {
    problems.push(`${name} lower bound ${interval.lower} exceeds upper bound ${interval.upper}`);
  }
}

/**
 * Collect every violation and throw them together.
 */
export function validateConfig(config: AnalysisConfig): AnalysisConfig {
  const problems: string[] = [];

  const finite: Array<[string, number]> = [
    ['minMainshockMagnitude', config.minMainshockMagnitude],
    ['detectionThreshold', config.detectionThreshold],
    ['fitSuccessThreshold', config.fitSuccessThreshold],
  ];
  for (const [name, value] of finite) {
    if (!Number.isFinite(value)) problems.push(`${name} must be a finite number`);
  }

  if (!(config.spatialRadiusKm > 0) || !Number.isFinite(config.spatialRadiusKm)) {
    problems.push(`spatialRadiusKm must be positive (got ${config.spatialRadiusKm})`);
  }
  if (!(config.temporalWindowDays > 0) || !Number.isFinite(config.temporalWindowDays)) {
    problems.push(`temporalWindowDays must be positive (got ${config.temporalWindowDays})`);
  }
  if (!(config.minSeparationMinutes >= 0)) {
    problems.push(`minSeparationMinutes must be >= 0 (got ${config.minSeparationMinutes})`);
  } else if (config.minSeparationMinutes >= config.temporalWindowDays * 24 * 60) {
    problems.push('minSeparationMinutes must be shorter than the temporal window');
  }

  const integers: Array<[string, number, number]> = [
    ['minAftershocks', config.minAftershocks, 1],
    ['nBins', config.nBins, 1],
    ['minEventsPerBin', config.minEventsPerBin, 0],
    ['maxIterations', config.maxIterations, 1],
  ];
  for (const [name, value, min] of integers) {
    if (!Number.isInteger(value) || value < min) {
      problems.push(`${name} must be an integer >= ${min} (got ${value})`);
    }
  }

  if (config.fitSuccessThreshold < 0 || config.fitSuccessThreshold >= 1) {
    problems.push(`fitSuccessThreshold must lie in [0, 1) (got ${config.fitSuccessThreshold})`);
  }

  const { K, c, p } = config.paramBounds;
  checkInterval('K', K, problems);
  checkInterval('c', c, problems);
  checkInterval('p', p, problems);
  if (K.lower <= 0) problems.push('K lower bound must be positive (fit runs on log10 K)');
  if (c.lower < 0) problems.push('c lower bound must be >= 0');

  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }
  return config;
}

const ENV_KEYS: Record<string, keyof Omit<AnalysisConfig, 'paramBounds'>> = {
  OMORI_MIN_MAINSHOCK_MAG: 'minMainshockMagnitude',
  OMORI_DETECTION_THRESHOLD: 'detectionThreshold',
  OMORI_RADIUS_KM: 'spatialRadiusKm',
  OMORI_WINDOW_DAYS: 'temporalWindowDays',
  OMORI_MIN_SEPARATION_MINUTES: 'minSeparationMinutes',
  OMORI_MIN_AFTERSHOCKS: 'minAftershocks',
  OMORI_N_BINS: 'nBins',
  OMORI_MIN_EVENTS_PER_BIN: 'minEventsPerBin',
  OMORI_FIT_THRESHOLD: 'fitSuccessThreshold',
  OMORI_MAX_ITERATIONS: 'maxIterations',
};

/**
 * Read OMORI_* overrides from an environment map (process.env by default).
 * Unset or blank variables keep their defaults; unparsable ones are fatal.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): AnalysisConfigOverrides {
  const overrides: AnalysisConfigOverrides = {};
  const problems: string[] = [];

  for (const [envKey, field] of Object.entries(ENV_KEYS)) {
    const raw = env[envKey];
    if (raw === undefined || raw.trim() === '') continue;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      problems.push(`${envKey}="${raw}" is not a number`);
      continue;
    }
    overrides[field] = value;
  }

  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }
  return overrides;
}
