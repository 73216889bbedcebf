// src/services/providers/geocoding/distance.ts
// Great-circle distance on a spherical Earth (haversine).
import type { Coordinates, DistanceUnit } from '@/mcp/tool-contract';

/** IUGG mean Earth radius. */
export const EARTH_RADIUS_KM = 6371.0088;

const KM_TO_UNIT: Record<DistanceUnit, number> = {
  km: 1,
  mi: 1 / 1.609344,
  m: 1000,
};

function toRadians(deg: number): number {
  return (deg * Math.PI) / 180;
}

export function haversineKm(from: Coordinates, to: Coordinates): number {
  const dLat = toRadians(to.latitude - from.latitude);
  const dLon = toRadians(to.longitude - from.longitude);
  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(from.latitude)) * Math.cos(toRadians(to.latitude)) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.min(1, Math.sqrt(a)));
}

/** Distance in `unit`, rounded to 3 decimals. */
export function distanceBetween(from: Coordinates, to: Coordinates, unit: DistanceUnit): number {
  const value = haversineKm(from, to) * KM_TO_UNIT[unit];
  return Math.round(value * 1000) / 1000;
}
