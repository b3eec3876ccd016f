import { AnalysisConfig, Interval, ParamBounds } from './config';
import { NumericalFailureError } from './errors';
import { BoundedLeastSquaresProblem, levenbergMarquardt, SolverResult } from './levenbergMarquardt';
import { omoriLogRate, omoriRate } from './model';
import { FitFailureReason, OmoriFit, OmoriParams, RateSeries } from './types';

/** Free parameters (K, c, p) need at least this many rate points. */
export const MIN_FIT_BINS = 3;

const LN10 = Math.LN10;

export type FitOptions = {
  fixP?: number | null;
  // classical optimum to restart the free-p search from; computed when omitted
  warmStart?: OmoriParams | null;
};

function clamp(v: number, { lower, upper }: Interval): number {
  return Math.min(upper, Math.max(lower, v));
}

/**
 * Data-derived starting point: c from the earliest elapsed time, p = 1 (or
 * the fixed value), K so that the curve passes through the peak-rate bin.
 */
export function initialGuess(series: RateSeries, bounds: ParamBounds, fixP: number | null): OmoriParams {
  const first = series.bins[0];
  const peak = series.bins.reduce((best, b) => (b.rate > best.rate ? b : best), first);
  const c = clamp(first.start, bounds.c);
  const p = fixP ?? 1.0;
  const K = clamp(peak.rate * Math.pow(c + peak.center, p), bounds.K);
  return { K, c, p };
}

function unfit(
  series: RateSeries,
  config: AnalysisConfig,
  fixP: number | null,
  reason: FitFailureReason,
  iterations: number,
  message?: string
): OmoriFit {
  return {
    model: fixP === null ? 'modified' : 'classical',
    params: null,
    fixed_p: fixP,
    bounds: config.paramBounds,
    r_squared: null,
    rmse: null,
    n_bins: series.bins.length,
    iterations,
    success: false,
    failure_reason: reason,
    ...(message ? { message } : {}),
  };
}

/**
 * Least-squares problem in log10-rate space over x = [log10 K, c, p]
 * (or [log10 K, c] with p fixed).
 *
 * r_i = log10 K − p · log10(c + t_i) − log10 n_i
 * ∂r/∂log10K = 1,  ∂r/∂c = −p / ((c + t_i) ln 10),  ∂r/∂p = −log10(c + t_i)
 */
function buildProblem(series: RateSeries, bounds: ParamBounds, fixP: number | null): BoundedLeastSquaresProblem {
  const t = series.bins.map(b => b.center);
  const y = series.bins.map(b => Math.log10(b.rate));
  const free = fixP === null;

  const lower = [Math.log10(bounds.K.lower), bounds.c.lower];
  const upper = [Math.log10(bounds.K.upper), bounds.c.upper];
  if (free) {
    lower.push(bounds.p.lower);
    upper.push(bounds.p.upper);
  }

  return {
    lower,
    upper,
    evaluate(x: number[]) {
      const [logK, c] = x;
      const p = fixP ?? x[2];
      const residuals: number[] = [];
      const jacobian: number[][] = [];
      for (let i = 0; i < t.length; i++) {
        const shifted = c + t[i];
        const logShifted = Math.log10(shifted);
        residuals.push(logK - p * logShifted - y[i]);
        const row = [1, -p / (shifted * LN10)];
        if (free) row.push(-logShifted);
        jacobian.push(row);
      }
      return { residuals, jacobian };
    },
  };
}

function toVector(params: OmoriParams, free: boolean): number[] {
  const x = [Math.log10(params.K), params.c];
  if (free) x.push(params.p);
  return x;
}

/**
 * Goodness of fit: R² = 1 − SS_res / SS_tot on log10 rates (0 when SS_tot = 0),
 * RMSE on rates after transforming the fitted curve back.
 */
export function scoreFit(series: RateSeries, params: OmoriParams): { r_squared: number; rmse: number } {
  const bins = series.bins;
  const logObs = bins.map(b => Math.log10(b.rate));
  const logPred = bins.map(b => omoriLogRate(b.center, params));
  const meanLog = logObs.reduce((s, v) => s + v, 0) / logObs.length;

  let ssRes = 0;
  let ssTot = 0;
  let sqErr = 0;
  for (let i = 0; i < bins.length; i++) {
    ssRes += (logObs[i] - logPred[i]) ** 2;
    ssTot += (logObs[i] - meanLog) ** 2;
    sqErr += (bins[i].rate - omoriRate(bins[i].center, params)) ** 2;
  }

  return {
    r_squared: ssTot > 0 ? 1 - ssRes / ssTot : 0,
    rmse: Math.sqrt(sqErr / bins.length),
  };
}

function runSolver(
  series: RateSeries,
  config: AnalysisConfig,
  fixP: number | null,
  starts: OmoriParams[]
): SolverResult {
  const problem = buildProblem(series, config.paramBounds, fixP);
  let best: SolverResult | null = null;
  for (const start of starts) {
    const result = levenbergMarquardt(problem, toVector(start, fixP === null), {
      maxIterations: config.maxIterations,
    });
    if (best === null || result.cost < best.cost) best = result;
  }
  if (best === null) {
    throw new NumericalFailureError('no starting point');
  }
  return best;
}

/**
 * Fit the Omori-Utsu law to a log-binned rate series
 *
 * Modified model (fixP null): free (K, c, p). The search starts from the
 * data-derived guess and again from the classical (p = 1) optimum, keeping
 * the lower-cost solution, so the modified R² is never below the classical one.
 * Classical model (fixP = 1): (K, c) only.
 *
 * Never throws for sparse or degenerate data: failures come back as
 * success = false with a failure_reason.
 */
export function fitOmori(series: RateSeries, config: AnalysisConfig, options: FitOptions = {}): OmoriFit {
  const fixP = options.fixP ?? null;

  if (series.bins.length < MIN_FIT_BINS) {
    return unfit(series, config, fixP, 'insufficient-bins', 0);
  }

  let solution: SolverResult;
  try {
    const seed = initialGuess(series, config.paramBounds, fixP);
    const starts = [seed];
    if (fixP === null) {
      const warm = options.warmStart !== undefined
        ? options.warmStart
        : fitOmori(series, config, { fixP: 1 }).params;
      if (warm) starts.push(warm);
    }
    solution = runSolver(series, config, fixP, starts);
  } catch (error) {
    if (error instanceof NumericalFailureError) {
      return unfit(series, config, fixP, 'numerical-failure', 0, error.message);
    }
    throw error;
  }

  if (!solution.converged) {
    return unfit(series, config, fixP, 'iteration-limit', solution.iterations);
  }

  const params: OmoriParams = {
    K: Math.pow(10, solution.x[0]),
    c: solution.x[1],
    p: fixP ?? solution.x[2],
  };
  const { r_squared, rmse } = scoreFit(series, params);

  if (![params.K, params.c, params.p, r_squared, rmse].every(Number.isFinite)) {
    return unfit(series, config, fixP, 'numerical-failure', solution.iterations, 'non-finite fit output');
  }

  const success = r_squared > config.fitSuccessThreshold;
  return {
    model: fixP === null ? 'modified' : 'classical',
    params,
    fixed_p: fixP,
    bounds: config.paramBounds,
    r_squared,
    rmse,
    n_bins: series.bins.length,
    iterations: solution.iterations,
    success,
    failure_reason: success ? null : 'below-threshold',
  };
}
