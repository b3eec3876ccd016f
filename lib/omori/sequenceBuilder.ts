import { EarthquakeEvent } from '../catalog/types';
import { compareEvents } from '../catalog/eventStore';
import { haversineKm, kmToLatitudeDegrees } from '../geo/distance';
import { AnalysisConfig } from './config';
import { AftershockSequence } from './types';

export const MS_PER_MINUTE = 60_000;
export const MS_PER_HOUR = 3_600_000;
export const MS_PER_DAY = 86_400_000;

export type AssociationWindow = {
  fromMs: number;   // earliest admissible origin time
  toMs: number;     // latest admissible origin time
};

/**
 * Time window [mainshock + minSeparation, mainshock + temporalWindow].
 */
export function associationWindow(mainshock: EarthquakeEvent, config: AnalysisConfig): AssociationWindow {
  return {
    fromMs: mainshock.time + config.minSeparationMinutes * MS_PER_MINUTE,
    toMs: mainshock.time + config.temporalWindowDays * MS_PER_DAY,
  };
}

/**
 * Association predicate: temporal window, surface distance, magnitude band,
 * and not the mainshock itself.
 */
export function isAftershockOf(
  ev: EarthquakeEvent,
  mainshock: EarthquakeEvent,
  config: AnalysisConfig
): boolean {
  if (ev.id === mainshock.id) return false;

  const { fromMs, toMs } = associationWindow(mainshock, config);
  if (ev.time < fromMs || ev.time > toMs) return false;

  if (ev.magnitude < config.detectionThreshold) return false;
  if (ev.magnitude >= mainshock.magnitude) return false;

  // meridian arc is a lower bound on the great-circle distance
  if (Math.abs(ev.latitude - mainshock.latitude) > kmToLatitudeDegrees(config.spatialRadiusKm)) {
    return false;
  }
  return haversineKm(mainshock.latitude, mainshock.longitude, ev.latitude, ev.longitude) <= config.spatialRadiusKm;
}

/**
 * Every candidate satisfying the predicate, deduplicated by id, time ascending.
 */
export function associateAftershocks(
  mainshock: EarthquakeEvent,
  candidates: readonly EarthquakeEvent[],
  config: AnalysisConfig
): Readonly<EarthquakeEvent>[] {
  const seen = new Set<string>();
  const members: Readonly<EarthquakeEvent>[] = [];

  for (const ev of candidates) {
    if (seen.has(ev.id)) continue;
    if (!isAftershockOf(ev, mainshock, config)) continue;
    seen.add(ev.id);
    members.push(ev);
  }

  return members.sort(compareEvents);
}

/**
 * Wrap already-associated members into a sequence, or null when there are
 * fewer than config.minAftershocks of them.
 */
export function sequenceFromMembers(
  mainshock: EarthquakeEvent,
  members: ReadonlyArray<Readonly<EarthquakeEvent>>,
  config: AnalysisConfig
): AftershockSequence | null {
  if (members.length < config.minAftershocks) return null;

  const last = members[members.length - 1];
  return Object.freeze({
    mainshock,
    aftershocks: Object.freeze([...members]),
    duration_hours: (last.time - mainshock.time) / MS_PER_HOUR,
  });
}

/**
 * Build the aftershock sequence of `mainshock` from `candidates`.
 * Returns null for insufficient data; callers must not retry.
 */
export function buildSequence(
  mainshock: EarthquakeEvent,
  candidates: readonly EarthquakeEvent[],
  config: AnalysisConfig
): AftershockSequence | null {
  return sequenceFromMembers(mainshock, associateAftershocks(mainshock, candidates, config), config);
}
