export type EarthquakeEvent = {
  id: string;                 // catalog event id, e.g. "us7000abcd"
  time: number;               // origin time, epoch ms (UTC)
  latitude: number;           // degrees
  longitude: number;          // degrees
  depth_km: number;
  magnitude: number;
  mag_type?: string;          // e.g. "mww", "ml"
  place?: string;             // free-text region description
};

export type CatalogParseResult = {
  events: EarthquakeEvent[];
  skipped: number;            // rows/features without usable time, position or magnitude
};
