import { compareEvents, EventStore } from '../catalog/eventStore';
import { EarthquakeEvent } from '../catalog/types';
import { AnalysisConfig, validateConfig } from './config';
import { fitOmori } from './fitter';
import { binSequence, resolveBinCount } from './rateBinner';
import { associateAftershocks, associationWindow, sequenceFromMembers } from './sequenceBuilder';
import { describe, linearTrend, mean } from './stats';
import { AnalysisResult, MainshockInfo, SequenceResult, SequenceSummary } from './types';

export type AnalyzeOptions = {
  // called after each mainshock, in processing order
  onResult?: (result: SequenceResult, index: number, total: number) => void;
};

export function mainshockInfo(ev: EarthquakeEvent): MainshockInfo {
  return {
    id: ev.id,
    time: new Date(ev.time).toISOString(),
    magnitude: ev.magnitude,
    depth_km: ev.depth_km,
    latitude: ev.latitude,
    longitude: ev.longitude,
    place: ev.place ?? null,
  };
}

/**
 * Build → bin → fit (modified and p = 1) for one mainshock.
 */
export function analyzeMainshock(
  mainshock: EarthquakeEvent,
  store: EventStore,
  config: AnalysisConfig
): SequenceResult {
  const { fromMs, toMs } = associationWindow(mainshock, config);
  const members = associateAftershocks(mainshock, store.between(fromMs, toMs), config);
  const sequence = sequenceFromMembers(mainshock, members, config);

  if (sequence === null) {
    return {
      mainshock: mainshockInfo(mainshock),
      status: 'insufficient-data',
      aftershock_count: members.length,
      duration_hours: null,
      series: null,
      modified: null,
      classical: null,
      success: false,
    };
  }

  const series = binSequence(sequence, resolveBinCount(members.length, config));
  const classical = fitOmori(series, config, { fixP: 1 });
  const modified = fitOmori(series, config, { warmStart: classical.params });

  return {
    mainshock: mainshockInfo(mainshock),
    status: modified.success ? 'fitted' : 'fit-failed',
    aftershock_count: members.length,
    duration_hours: sequence.duration_hours,
    series,
    modified,
    classical,
    success: modified.success,
  };
}

/**
 * Run every mainshock through the pipeline independently, in time order,
 * and summarize the successful fits. Configuration errors abort the run;
 * per-sequence failures are recorded, never thrown.
 */
export function analyzeSequences(
  mainshocks: readonly EarthquakeEvent[],
  events: readonly EarthquakeEvent[] | EventStore,
  config: AnalysisConfig,
  options: AnalyzeOptions = {}
): AnalysisResult {
  validateConfig(config);

  const store = events instanceof EventStore ? events : new EventStore(events);
  const ordered = [...mainshocks].sort(compareEvents);
  const results: SequenceResult[] = [];

  ordered.forEach((mainshock, index) => {
    const result = analyzeMainshock(mainshock, store, config);
    results.push(result);
    options.onResult?.(result, index, ordered.length);
  });

  return { results, summary: summarizeResults(results) };
}

/**
 * Select M >= minMainshockMagnitude candidates from the store and analyze them.
 */
export function analyzeCatalog(
  store: EventStore,
  config: AnalysisConfig,
  options: AnalyzeOptions = {}
): AnalysisResult {
  return analyzeSequences(store.mainshockCandidates(config.minMainshockMagnitude), store, config, options);
}

/**
 * Aggregate statistics over results with success = true.
 */
export function summarizeResults(results: readonly SequenceResult[]): SequenceSummary {
  const built = results.filter(r => r.status !== 'insufficient-data');
  const good = results.filter(r => r.success);

  const pValues: number[] = [];
  const r2Values: number[] = [];
  const magnitudes: number[] = [];
  const modifiedCompared: number[] = [];
  const classicalCompared: number[] = [];

  for (const r of good) {
    const fit = r.modified;
    if (!fit?.params || fit.r_squared === null) continue;
    pValues.push(fit.params.p);
    r2Values.push(fit.r_squared);
    magnitudes.push(r.mainshock.magnitude);
    if (r.classical && r.classical.r_squared !== null) {
      modifiedCompared.push(fit.r_squared);
      classicalCompared.push(r.classical.r_squared);
    }
  }

  return {
    total_candidates: results.length,
    sequences_built: built.length,
    insufficient_data: results.length - built.length,
    fit_failures: built.length - good.length,
    successful_fits: good.length,
    p: describe(pValues),
    r_squared: describe(r2Values),
    modified_mean_r_squared: modifiedCompared.length > 0 ? mean(modifiedCompared) : null,
    classical_mean_r_squared: classicalCompared.length > 0 ? mean(classicalCompared) : null,
    classical_compared: classicalCompared.length,
    p_vs_magnitude: linearTrend(magnitudes, pValues),
  };
}
