import { EarthquakeEvent } from './types';

export function compareEvents(a: EarthquakeEvent, b: EarthquakeEvent): number {
  if (a.time !== b.time) return a.time - b.time;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function assertUsable(ev: EarthquakeEvent): void {
  const numeric: Array<[string, number]> = [
    ['time', ev.time],
    ['latitude', ev.latitude],
    ['longitude', ev.longitude],
    ['depth_km', ev.depth_km],
    ['magnitude', ev.magnitude],
  ];
  for (const [field, value] of numeric) {
    if (!Number.isFinite(value)) {
      throw new Error(`Event ${ev.id}: ${field} must be a finite number (got ${value})`);
    }
  }
  if (Math.abs(ev.latitude) > 90) {
    throw new Error(`Event ${ev.id}: latitude ${ev.latitude} outside [-90, 90]`);
  }
}

/**
 * In-memory catalog of frozen events, kept in time order (ties by id).
 */
export class EventStore {
  private readonly events: ReadonlyArray<Readonly<EarthquakeEvent>>;
  private readonly byId: Map<string, Readonly<EarthquakeEvent>>;

  constructor(events: readonly EarthquakeEvent[]) {
    const byId = new Map<string, Readonly<EarthquakeEvent>>();
    for (const ev of events) {
      if (!ev.id) {
        throw new Error('Event without id cannot be stored');
      }
      if (byId.has(ev.id)) {
        throw new Error(`Duplicate event id in catalog: ${ev.id}`);
      }
      assertUsable(ev);
      byId.set(ev.id, Object.freeze({ ...ev }));
    }
    this.byId = byId;
    this.events = Object.freeze([...byId.values()].sort(compareEvents));
  }

  get size(): number {
    return this.events.length;
  }

  all(): ReadonlyArray<Readonly<EarthquakeEvent>> {
    return this.events;
  }

  get(id: string): Readonly<EarthquakeEvent> | undefined {
    return this.byId.get(id);
  }

  /**
   * Events with fromMs <= time <= toMs, time ascending.
   */
  between(fromMs: number, toMs: number): Readonly<EarthquakeEvent>[] {
    if (toMs < fromMs) return [];
    const start = this.lowerBound(fromMs);
    const out: Readonly<EarthquakeEvent>[] = [];
    for (let i = start; i < this.events.length && this.events[i].time <= toMs; i++) {
      out.push(this.events[i]);
    }
    return out;
  }

  mainshockCandidates(minMagnitude: number): Readonly<EarthquakeEvent>[] {
    return this.events.filter(ev => ev.magnitude >= minMagnitude);
  }

  // first index whose time >= t
  private lowerBound(t: number): number {
    let lo = 0;
    let hi = this.events.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.events[mid].time < t) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }
}
