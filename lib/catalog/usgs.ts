import { CatalogParseResult, EarthquakeEvent } from './types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function finiteNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Map one USGS FDSN GeoJSON feature to an event.
 *
 * properties.time is epoch ms; geometry.coordinates is [lon, lat, depth_km].
 * Returns null when id, time, magnitude or epicentre is missing.
 */
export function parseUsgsFeature(feature: unknown): EarthquakeEvent | null {
  if (!isRecord(feature)) return null;
  const props = isRecord(feature.properties) ? feature.properties : null;
  const geometry = isRecord(feature.geometry) ? feature.geometry : null;
  if (!props || !geometry || !Array.isArray(geometry.coordinates)) return null;

  const id = optionalString(feature.id);
  const time = finiteNumber(props.time);
  const magnitude = finiteNumber(props.mag);
  const [lonRaw, latRaw, depthRaw] = geometry.coordinates;
  const longitude = finiteNumber(lonRaw);
  const latitude = finiteNumber(latRaw);
  if (!id || time === null || magnitude === null || longitude === null || latitude === null) {
    return null;
  }

  const event: EarthquakeEvent = {
    id,
    time,
    latitude,
    longitude,
    depth_km: finiteNumber(depthRaw) ?? 0,
    magnitude,
  };
  const magType = optionalString(props.magType);
  const place = optionalString(props.place);
  if (magType) event.mag_type = magType;
  if (place) event.place = place;
  return event;
}

/**
 * Parse a FeatureCollection (or a bare feature array) as returned by
 * https://earthquake.usgs.gov/fdsnws/event/1/query?format=geojson
 */
export function parseUsgsCatalog(json: unknown): CatalogParseResult {
  let features: unknown[];
  if (Array.isArray(json)) {
    features = json;
  } else if (isRecord(json) && Array.isArray(json.features)) {
    features = json.features;
  } else {
    throw new Error('Catalog JSON is neither a GeoJSON FeatureCollection nor a feature array');
  }

  const events: EarthquakeEvent[] = [];
  let skipped = 0;
  for (const feature of features) {
    const ev = parseUsgsFeature(feature);
    if (ev) events.push(ev);
    else skipped++;
  }
  return { events, skipped };
}
