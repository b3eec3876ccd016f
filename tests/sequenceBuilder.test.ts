import { describe, it, expect } from "@jest/globals";
import { DEFAULT_ANALYSIS_CONFIG, resolveConfig } from "@/lib/omori/config";
import {
  associateAftershocks,
  buildSequence,
  isAftershockOf,
  MS_PER_DAY,
  MS_PER_HOUR,
  MS_PER_MINUTE,
} from "@/lib/omori/sequenceBuilder";
import { haversineKm } from "@/lib/geo/distance";
import { EarthquakeEvent } from "@/lib/catalog/types";
import { BASE_TIME, makeEvent } from "./helpers/synthetic";

const config = DEFAULT_ANALYSIS_CONFIG;
const mainshock = makeEvent({ id: "ms", time: BASE_TIME, magnitude: 6.5 });

function after(id: string, ms: number, fields: Partial<EarthquakeEvent> = {}): EarthquakeEvent {
  return makeEvent({ id, time: BASE_TIME + ms, ...fields });
}

// eight members that clearly satisfy every condition
const filler = Array.from({ length: 8 }, (_, i) => after(`f${i}`, (i + 1) * MS_PER_HOUR, { magnitude: 3 }));

describe("isAftershockOf", () => {
  it.each([
    { label: "30 s after the mainshock", ev: after("e", 30_000), expected: false },
    { label: "exactly 1 minute after", ev: after("e", MS_PER_MINUTE), expected: true },
    { label: "exactly 30 days after", ev: after("e", 30 * MS_PER_DAY), expected: true },
    { label: "30 days + 1 ms after", ev: after("e", 30 * MS_PER_DAY + 1), expected: false },
    { label: "before the mainshock", ev: after("e", -MS_PER_HOUR), expected: false },
    { label: "98.96 km north", ev: after("e", MS_PER_HOUR, { latitude: 35.89 }), expected: true },
    { label: "100.08 km north", ev: after("e", MS_PER_HOUR, { latitude: 35.9 }), expected: false },
    { label: "M1.9", ev: after("e", MS_PER_HOUR, { magnitude: 1.9 }), expected: false },
    { label: "M2.0", ev: after("e", MS_PER_HOUR, { magnitude: 2.0 }), expected: true },
    { label: "as large as the mainshock", ev: after("e", MS_PER_HOUR, { magnitude: 6.5 }), expected: false },
    { label: "M6.4", ev: after("e", MS_PER_HOUR, { magnitude: 6.4 }), expected: true },
    { label: "deep but on the epicentre", ev: after("e", MS_PER_HOUR, { depth_km: 600 }), expected: true },
  ])("$label → $expected", ({ ev, expected }) => {
    expect(isAftershockOf(ev, mainshock, config)).toBe(expected);
  });

  it("never associates the mainshock with itself", () => {
    const echo = { ...mainshock, time: BASE_TIME + MS_PER_HOUR, magnitude: 3 };
    expect(isAftershockOf(echo, mainshock, config)).toBe(false);
  });

  it("follows a configured radius and window", () => {
    const wide = resolveConfig({ spatialRadiusKm: 150, temporalWindowDays: 60 });
    expect(isAftershockOf(after("e", 45 * MS_PER_DAY, { latitude: 36 }), mainshock, wide)).toBe(true);
    expect(isAftershockOf(after("e", 45 * MS_PER_DAY, { latitude: 36 }), mainshock, config)).toBe(false);
  });
});

describe("buildSequence", () => {
  const mixed = [
    after("late", 31 * MS_PER_DAY),
    after("far", 2 * MS_PER_HOUR, { longitude: 142 }),
    after("small", 3 * MS_PER_HOUR, { magnitude: 1.5 }),
    mainshock,
    ...filler,
    after("edge-time", MS_PER_MINUTE),
    after("edge-mag", 5.5 * MS_PER_HOUR, { magnitude: 6.4 }),
  ];

  it("returns exactly the qualifying events in time order", () => {
    const seq = buildSequence(mainshock, mixed, config);
    expect(seq).not.toBeNull();
    expect(seq?.aftershocks.map(e => e.id)).toEqual([
      "edge-time",
      "f0",
      "f1",
      "f2",
      "f3",
      "f4",
      "edge-mag",
      "f5",
      "f6",
      "f7",
    ]);
    expect(seq?.duration_hours).toBe(8);
    expect(seq?.mainshock.id).toBe("ms");
  });

  it("keeps every member inside the association bounds", () => {
    const seq = buildSequence(mainshock, mixed, config);
    for (const e of seq?.aftershocks ?? []) {
      const dt = e.time - mainshock.time;
      expect(dt).toBeGreaterThanOrEqual(MS_PER_MINUTE);
      expect(dt).toBeLessThanOrEqual(30 * MS_PER_DAY);
      expect(haversineKm(mainshock.latitude, mainshock.longitude, e.latitude, e.longitude)).toBeLessThanOrEqual(100);
      expect(e.magnitude).toBeGreaterThanOrEqual(2.0);
      expect(e.magnitude).toBeLessThan(mainshock.magnitude);
    }
  });

  it("returns null below ten members", () => {
    expect(buildSequence(mainshock, [mainshock, ...filler], config)).toBeNull();
    expect(buildSequence(mainshock, [...filler, after("ninth", 9 * MS_PER_HOUR)], config)).toBeNull();
  });

  it("honours a lower minimum", () => {
    const seq = buildSequence(mainshock, filler, resolveConfig({ minAftershocks: 8 }));
    expect(seq?.aftershocks).toHaveLength(8);
  });

  it("drops repeated ids", () => {
    const members = associateAftershocks(mainshock, [...filler, ...filler], config);
    expect(members).toHaveLength(8);
  });
});
