import * as fs from 'fs';
import * as path from 'path';
import Papa from 'papaparse';
import { parseCatalogCsv } from '../catalog/csv';
import { CatalogParseResult } from '../catalog/types';
import { parseUsgsCatalog } from '../catalog/usgs';
import { AnalysisConfig } from '../omori/config';
import { SequenceResult, SequenceSummary } from '../omori/types';
import { RESULTS_DIR } from '../paths';

export const RESULTS_FILE = 'analysis_results.json';
export const SUMMARY_CSV_FILE = 'sequence_summary.csv';

export type StoredAnalysis = {
  generated_at: string;         // ISO
  config: AnalysisConfig;
  summary: SequenceSummary;
  results: SequenceResult[];
};

async function writeAtomic(filePath: string, content: string): Promise<string> {
  // Ensure directory exists
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });

  // Atomic write: write to temp file then rename
  const tempPath = `${filePath}.tmp`;
  await fs.promises.writeFile(tempPath, content);
  await fs.promises.rename(tempPath, filePath);

  return filePath;
}

/**
 * Load a catalog export: .json as USGS GeoJSON, .csv as USGS CSV.
 */
export async function loadCatalogFile(filePath: string): Promise<CatalogParseResult> {
  const content = await fs.promises.readFile(filePath, 'utf-8');
  const ext = path.extname(filePath).toLowerCase();

  if (ext === '.csv') return parseCatalogCsv(content);
  if (ext === '.json' || ext === '.geojson') {
    const json: unknown = JSON.parse(content);
    return parseUsgsCatalog(json);
  }
  throw new Error(`Unsupported catalog format '${ext}' (expected .json, .geojson or .csv)`);
}

/**
 * Persist results + summary to <dir>/analysis_results.json
 */
export async function saveAnalysis(
  analysis: Omit<StoredAnalysis, 'generated_at'>,
  dir: string = RESULTS_DIR
): Promise<string> {
  const payload: StoredAnalysis = {
    generated_at: new Date().toISOString(),
    ...analysis,
  };
  return writeAtomic(path.join(dir, RESULTS_FILE), JSON.stringify(payload, null, 2));
}

function isStoredAnalysis(value: unknown): value is StoredAnalysis {
  if (typeof value !== 'object' || value === null) return false;
  return 'summary' in value && 'results' in value && Array.isArray(value.results);
}

/**
 * Read a previously saved analysis; null when the file is absent.
 */
export async function loadAnalysis(dir: string = RESULTS_DIR): Promise<StoredAnalysis | null> {
  const filePath = path.join(dir, RESULTS_FILE);
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
    throw error;
  }
  const parsed: unknown = JSON.parse(content);
  if (!isStoredAnalysis(parsed)) {
    throw new Error(`${filePath} is not an analysis results file`);
  }
  return parsed;
}

export type SequenceCsvRow = {
  mainshock_id: string;
  mainshock_mag: number;
  mainshock_depth_km: number;
  mainshock_lat: number;
  mainshock_lon: number;
  mainshock_time: string;
  mainshock_place: string;
  total_aftershocks: number;
  duration_hours: number | null;
  status: string;
  K: number | null;
  c: number | null;
  p: number | null;
  r_squared: number | null;
  rmse: number | null;
  classical_r_squared: number | null;
};

export function toCsvRow(r: SequenceResult): SequenceCsvRow {
  const ms = r.mainshock;
  const params = r.modified?.params ?? null;
  return {
    mainshock_id: ms.id,
    mainshock_mag: ms.magnitude,
    mainshock_depth_km: ms.depth_km,
    mainshock_lat: ms.latitude,
    mainshock_lon: ms.longitude,
    mainshock_time: ms.time,
    mainshock_place: ms.place ?? '',
    total_aftershocks: r.aftershock_count,
    duration_hours: r.duration_hours,
    status: r.status,
    K: params?.K ?? null,
    c: params?.c ?? null,
    p: params?.p ?? null,
    r_squared: r.modified?.r_squared ?? null,
    rmse: r.modified?.rmse ?? null,
    classical_r_squared: r.classical?.r_squared ?? null,
  };
}

/**
 * One row per candidate mainshock, including insufficient-data entries.
 */
export function sequenceSummaryCsv(results: readonly SequenceResult[]): string {
  return Papa.unparse(results.map(toCsvRow));
}

export async function saveSequenceSummaryCsv(
  results: readonly SequenceResult[],
  dir: string = RESULTS_DIR
): Promise<string> {
  return writeAtomic(path.join(dir, SUMMARY_CSV_FILE), sequenceSummaryCsv(results));
}
