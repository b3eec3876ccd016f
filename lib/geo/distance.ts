export const EARTH_RADIUS_KM = 6371;

const DEG_TO_RAD = Math.PI / 180;

/**
 * Great-circle surface distance (haversine) in km.
 * Depth is not part of the calculation.
 */
export function haversineKm(lat1: number, lon1: number, lat2: number, lon2: number): number {
  const phi1 = lat1 * DEG_TO_RAD;
  const phi2 = lat2 * DEG_TO_RAD;
  const dPhi = (lat2 - lat1) * DEG_TO_RAD;
  const dLambda = (lon2 - lon1) * DEG_TO_RAD;

  const a = Math.sin(dPhi / 2) ** 2 + Math.cos(phi1) * Math.cos(phi2) * Math.sin(dLambda / 2) ** 2;
  // a can exceed 1 by rounding near antipodal points
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.min(1, Math.sqrt(a)));
}

/**
 * Latitude offset (degrees) that spans `km` along a meridian.
 */
export function kmToLatitudeDegrees(km: number): number {
  return (km / EARTH_RADIUS_KM) / DEG_TO_RAD;
}
