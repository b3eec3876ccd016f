import { SequenceResult, SequenceSummary } from './types';

export const RULE = '='.repeat(60);

/** Literature range for the decay exponent (Utsu et al. 1995). */
export const LITERATURE_P_RANGE: [number, number] = [1.0, 1.3];

export function formatSequenceHeader(result: SequenceResult, index: number, total: number): string {
  const { magnitude, place, id } = result.mainshock;
  const label = (place ?? id).slice(0, 30);
  return `[${index + 1}/${total}] Analyzing M${magnitude.toFixed(1)} - ${label}...`;
}

export function formatFitLine(result: SequenceResult): string {
  if (result.status === 'insufficient-data') {
    return `    Skipping (only ${result.aftershock_count} aftershocks)`;
  }
  const fit = result.modified;
  if (!fit?.params || fit.r_squared === null) {
    return `    Fitting failed (${fit?.failure_reason ?? 'unknown'})`;
  }
  const { K, c, p } = fit.params;
  const line = `    K=${K.toFixed(2)}, c=${c.toFixed(3)}, p=${p.toFixed(2)}, R²=${fit.r_squared.toFixed(3)}`;
  return fit.success ? line : `${line} (below threshold)`;
}

/**
 * Summary block printed at the end of a run.
 */
export function formatSummary(summary: SequenceSummary, fitSuccessThreshold: number): string[] {
  const lines = [
    RULE,
    'ANALYSIS SUMMARY',
    RULE,
    `Total sequences analyzed: ${summary.total_candidates}`,
    `Insufficient data: ${summary.insufficient_data}`,
    `Successful fits (R² > ${fitSuccessThreshold}): ${summary.successful_fits}`,
  ];

  const { p, r_squared: r2 } = summary;
  if (!p || !r2) return lines;

  lines.push(
    '',
    `Omori's Law Parameters (n=${p.count}):`,
    `  p (decay exponent): ${p.mean.toFixed(2)} ± ${p.std.toFixed(2)}`,
    `  p range: [${p.min.toFixed(2)}, ${p.max.toFixed(2)}]`,
    `  Average R²: ${r2.mean.toFixed(3)}`
  );

  if (summary.classical_mean_r_squared !== null && summary.modified_mean_r_squared !== null) {
    lines.push(
      `  Original Omori (p=1) mean R²: ${summary.classical_mean_r_squared.toFixed(3)}` +
        ` vs modified ${summary.modified_mean_r_squared.toFixed(3)} (n=${summary.classical_compared})`
    );
  }
  if (summary.p_vs_magnitude) {
    const t = summary.p_vs_magnitude;
    lines.push(`  p vs magnitude: slope=${t.slope.toFixed(3)}, r=${t.r.toFixed(2)} (n=${t.n})`);
  }

  const [lo, hi] = LITERATURE_P_RANGE;
  lines.push(
    '',
    'Comparison to literature:',
    `  Our mean p = ${p.mean.toFixed(2)} vs. literature p ≈ ${lo.toFixed(1)}-${hi.toFixed(1)}`
  );
  return lines;
}
