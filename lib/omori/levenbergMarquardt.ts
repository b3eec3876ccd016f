import { NumericalFailureError } from './errors';

export type Evaluation = {
  residuals: number[];
  jacobian: number[][];     // jacobian[i][j] = ∂r_i / ∂x_j
};

export type BoundedLeastSquaresProblem = {
  evaluate(x: number[]): Evaluation;
  lower: number[];
  upper: number[];
};

export type SolverOptions = {
  maxIterations: number;
  initialDamping?: number;
  gradientTolerance?: number;   // projected gradient, ∞-norm
  costTolerance?: number;       // relative cost reduction per accepted step
  stepTolerance?: number;       // relative parameter change per accepted step
};

export type StopReason =
  | 'zero-residual'
  | 'gradient'
  | 'cost'
  | 'step'
  | 'damping'
  | 'iteration-limit';

export type SolverResult = {
  x: number[];
  cost: number;             // ½ Σ r²
  iterations: number;
  converged: boolean;
  stopReason: StopReason;
};

const MAX_DAMPING = 1e16;
const MIN_DAMPING = 1e-12;
const ZERO_COST = 1e-28;

function clampVector(x: number[], lower: number[], upper: number[]): number[] {
  return x.map((v, j) => Math.min(upper[j], Math.max(lower[j], v)));
}

function halfSumSquares(r: number[]): number {
  let s = 0;
  for (const v of r) s += v * v;
  return 0.5 * s;
}

function checkEvaluation(ev: Evaluation, m: number): void {
  for (const v of ev.residuals) {
    if (!Number.isFinite(v)) throw new NumericalFailureError('non-finite residual');
  }
  for (const row of ev.jacobian) {
    if (row.length !== m) throw new NumericalFailureError('jacobian shape mismatch');
    for (const v of row) {
      if (!Number.isFinite(v)) throw new NumericalFailureError('non-finite jacobian entry');
    }
  }
}

/**
 * Solve A x = b by Gaussian elimination with partial pivoting.
 * Returns null when A is numerically singular.
 */
export function solveLinearSystem(A: number[][], b: number[]): number[] | null {
  const n = b.length;
  const M = A.map((row, i) => [...row, b[i]]);

  for (let col = 0; col < n; col++) {
    let pivot = col;
    for (let r = col + 1; r < n; r++) {
      if (Math.abs(M[r][col]) > Math.abs(M[pivot][col])) pivot = r;
    }
    const p = M[pivot][col];
    if (!Number.isFinite(p) || Math.abs(p) < 1e-300) return null;
    [M[col], M[pivot]] = [M[pivot], M[col]];

    for (let r = col + 1; r < n; r++) {
      const f = M[r][col] / M[col][col];
      for (let k = col; k <= n; k++) M[r][k] -= f * M[col][k];
    }
  }

  const x = new Array<number>(n).fill(0);
  for (let r = n - 1; r >= 0; r--) {
    let s = M[r][n];
    for (let k = r + 1; k < n; k++) s -= M[r][k] * x[k];
    x[r] = s / M[r][r];
  }
  return x.every(Number.isFinite) ? x : null;
}

/**
 * Projected Levenberg–Marquardt for box-constrained least squares
 *
 * Step:  (JᵀJ + λ·diag(JᵀJ)) δ = −Jᵀr over the free variables,
 *        x' = clamp(x + δ); variables held at a bound by the gradient get δ = 0.
 * A step is accepted only if it lowers ½‖r‖²; otherwise λ grows ×10.
 * Accepted steps shrink λ ÷10.
 *
 * Deterministic: the same problem and start always give the same result.
 * Throws NumericalFailureError when the start point evaluates to non-finite
 * values.
 */
export function levenbergMarquardt(
  problem: BoundedLeastSquaresProblem,
  x0: number[],
  options: SolverOptions
): SolverResult {
  const m = x0.length;
  const { lower, upper } = problem;
  const gtol = options.gradientTolerance ?? 1e-12;
  const ftol = options.costTolerance ?? 1e-12;
  const xtol = options.stepTolerance ?? 1e-10;

  let x = clampVector(x0, lower, upper);
  let ev = problem.evaluate(x);
  checkEvaluation(ev, m);
  let cost = halfSumSquares(ev.residuals);
  let lambda = options.initialDamping ?? 1e-3;

  for (let iter = 1; iter <= options.maxIterations; iter++) {
    const { residuals: r, jacobian: J } = ev;

    // gradient g = Jᵀr and normal matrix A = JᵀJ
    const g = new Array<number>(m).fill(0);
    const A: number[][] = Array.from({ length: m }, () => new Array<number>(m).fill(0));
    for (let i = 0; i < r.length; i++) {
      for (let a = 0; a < m; a++) {
        g[a] += J[i][a] * r[i];
        for (let b = 0; b < m; b++) A[a][b] += J[i][a] * J[i][b];
      }
    }

    // variables pinned at a bound with the gradient pointing outward stay fixed
    const free: number[] = [];
    let projected = 0;
    for (let a = 0; a < m; a++) {
      const pinned = (x[a] <= lower[a] && g[a] > 0) || (x[a] >= upper[a] && g[a] < 0);
      if (pinned) continue;
      free.push(a);
      projected = Math.max(projected, Math.abs(g[a]));
    }
    if (cost < ZERO_COST) {
      return { x, cost, iterations: iter, converged: true, stopReason: 'zero-residual' };
    }
    if (projected < gtol) {
      return { x, cost, iterations: iter, converged: true, stopReason: 'gradient' };
    }

    let trial: number[] | null = null;
    let trialEv: Evaluation | null = null;
    let trialCost = Infinity;
    while (trial === null) {
      if (lambda > MAX_DAMPING) {
        // no descent step exists inside the box: stationary point
        return { x, cost, iterations: iter, converged: true, stopReason: 'damping' };
      }
      const damped = free.map(a =>
        free.map(b => (a === b ? A[a][b] + lambda * Math.max(A[a][a], 1e-12) : A[a][b]))
      );
      const reduced = solveLinearSystem(damped, free.map(a => -g[a]));
      if (reduced === null) {
        lambda *= 10;
        continue;
      }
      const delta = new Array<number>(m).fill(0);
      free.forEach((a, k) => {
        delta[a] = reduced[k];
      });
      const candidate = clampVector(x.map((v, a) => v + delta[a]), lower, upper);
      const candidateEv = problem.evaluate(candidate);
      const candidateCost = halfSumSquares(candidateEv.residuals);
      if (Number.isFinite(candidateCost) && candidateCost < cost) {
        trial = candidate;
        trialEv = candidateEv;
        trialCost = candidateCost;
      } else {
        lambda *= 10;
      }
    }

    if (trialEv === null) {
      throw new NumericalFailureError('accepted step without evaluation');
    }
    checkEvaluation(trialEv, m);

    let relStep = 0;
    for (let a = 0; a < m; a++) {
      relStep = Math.max(relStep, Math.abs(trial[a] - x[a]) / (Math.abs(x[a]) + 1e-8));
    }
    const drop = cost - trialCost;
    const previous = cost;

    x = trial;
    ev = trialEv;
    cost = trialCost;
    lambda = Math.max(lambda / 10, MIN_DAMPING);

    if (drop <= ftol * previous) {
      return { x, cost, iterations: iter, converged: true, stopReason: 'cost' };
    }
    if (relStep < xtol) {
      return { x, cost, iterations: iter, converged: true, stopReason: 'step' };
    }
  }

  return { x, cost, iterations: options.maxIterations, converged: false, stopReason: 'iteration-limit' };
}
