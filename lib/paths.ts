import path from "path";

export const DATA_ROOT = process.env.DATA_ROOT || path.join(process.cwd(), "data");

// Raw catalog exports (USGS GeoJSON or CSV)
export const CATALOG_DIR = path.join(DATA_ROOT, "catalog");

// analysis_results.json + sequence_summary.csv
export const RESULTS_DIR = path.join(DATA_ROOT, "results");

export function catalogFileFor(name: string) {
  const s = (name || "").trim();
  return path.isAbsolute(s) ? s : path.join(CATALOG_DIR, s);
}
