import { ValidationError } from "./errors.js";
import { isFiniteNumber, roundTo } from "./utils/guards.js";

/** Mean Earth radius in kilometres */
export const EARTH_RADIUS_KM = 6371;

export type LatLon = { lat: number; lon: number };

const toRadians = (deg: number) => (deg * Math.PI) / 180;

export function assertCoordinate(point: { lat: unknown; lon: unknown }, rowId: number | null = null): LatLon {
  const { lat, lon } = point;
  if (!isFiniteNumber(lat) || lat < -90 || lat > 90) {
    throw new ValidationError(`Latitude ${String(lat)} outside [-90, 90]`, rowId);
  }
  if (!isFiniteNumber(lon) || lon < -180 || lon > 180) {
    throw new ValidationError(`Longitude ${String(lon)} outside [-180, 180]`, rowId);
  }
  return { lat, lon };
}

/**
 * Great-circle distance by the spherical law of cosines. Identical points are
 * exactly 0 and the arccos argument is clamped to [-1, 1].
 */
export function greatCircleDistanceKm(from: LatLon, to: LatLon): number {
  if (from.lat === to.lat && from.lon === to.lon) return 0;

  const lat1 = toRadians(from.lat);
  const lat2 = toRadians(to.lat);
  const deltaLon = toRadians(to.lon - from.lon);

  const cosine = Math.sin(lat1) * Math.sin(lat2) + Math.cos(lat1) * Math.cos(lat2) * Math.cos(deltaLon);
  return EARTH_RADIUS_KM * Math.acos(Math.min(1, Math.max(-1, cosine)));
}

/** Elapsed seconds as hours, rounded to 2 decimals */
export function durationHours(elapsedSeconds: number): number {
  return roundTo(elapsedSeconds / 3600, 2);
}
