// lib/catalog/csv.ts
import Papa from "papaparse";
import { isValid, parseISO } from "date-fns";
import { CatalogParseResult, EarthquakeEvent } from "./types";

type CsvRow = Record<string, unknown>;

const HAS_ZONE = /(?:[zZ]|[+-]\d{2}:?\d{2})$/;

/**
 * Origin time → epoch ms. dynamicTyping already turns full ISO strings into
 * Dates; other strings without an offset are read as UTC.
 */
export function toTimestamp(value: unknown): number | null {
  if (value instanceof Date) return isValid(value) ? value.getTime() : null;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string" || value.trim() === "") return null;
  const text = value.trim();
  const d = parseISO(HAS_ZONE.test(text) ? text : `${text}Z`);
  return isValid(d) ? d.getTime() : null;
}

function toNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function toText(value: unknown): string | undefined {
  if (typeof value === "string") return value.trim() || undefined;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return undefined;
}

/** One USGS CSV row → event, or null when id/time/magnitude/epicentre is unusable. */
export function rowToEvent(row: CsvRow): EarthquakeEvent | null {
  const id = toText(row["id"]);
  const time = toTimestamp(row["time"]);
  const latitude = toNumber(row["latitude"]);
  const longitude = toNumber(row["longitude"]);
  const magnitude = toNumber(row["mag"]);
  if (!id || time === null || latitude === null || longitude === null || magnitude === null) {
    return null;
  }

  const event: EarthquakeEvent = {
    id,
    time,
    latitude,
    longitude,
    depth_km: toNumber(row["depth"]) ?? 0,
    magnitude,
  };
  const magType = toText(row["magType"]);
  const place = toText(row["place"]);
  if (magType) event.mag_type = magType;
  if (place) event.place = place;
  return event;
}

/** Parse a USGS catalog CSV export (header row: time,latitude,longitude,depth,mag,magType,...,id,...,place). */
export function parseCatalogCsv(text: string): CatalogParseResult {
  const parsed = Papa.parse<CsvRow>(text, {
    header: true,
    dynamicTyping: true,
    skipEmptyLines: true,
  });

  const events: EarthquakeEvent[] = [];
  let skipped = 0;
  for (const row of parsed.data) {
    const ev = row ? rowToEvent(row) : null;
    if (ev) events.push(ev);
    else skipped++;
  }
  return { events, skipped };
}
