/**
 * Invalid analysis configuration. Fatal at pipeline start: a run with
 * inconsistent thresholds or bounds is aborted instead of falling back to
 * defaults.
 */
export class ConfigurationError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid analysis configuration: ${problems.join('; ')}`);
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

/**
 * Raised inside the least-squares solver (non-finite residuals, singular
 * normal equations). Caught at the fitter boundary and reported as an
 * unsuccessful fit.
 */
export class NumericalFailureError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NumericalFailureError';
  }
}
