import * as THREE from 'three';
import type { LatLon, Point2D } from './types';

export const EARTH_RADIUS_M = 6_371_000;

const { degToRad } = THREE.MathUtils;

/**
 * Equirectangular projection onto a local plane anchored at `origin`.
 * Good to a few centimetres over a field-sized site.
 */
export function toLocalXY(lat: number, lon: number, origin: LatLon): Point2D {
  const lat0 = degToRad(origin.lat);
  const lon0 = degToRad(origin.lon);
  return {
    x: EARTH_RADIUS_M * Math.cos(lat0) * (degToRad(lon) - lon0),
    y: EARTH_RADIUS_M * (degToRad(lat) - lat0),
  };
}

export function projectPoint(p: LatLon, origin: LatLon): Point2D {
  return toLocalXY(p.lat, p.lon, origin);
}

/**
 * Great-circle distance in metres. Trip lengths arrive as geographic input,
 * so they are measured on the sphere rather than on the local plane.
 */
export function haversineDistance(a: LatLon, b: LatLon): number {
  const lat1 = degToRad(a.lat);
  const lat2 = degToRad(b.lat);
  const dLat = lat2 - lat1;
  const dLon = degToRad(b.lon - a.lon);

  const h = Math.sin(dLat / 2) ** 2 +
    Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLon / 2) ** 2;
  return EARTH_RADIUS_M * 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}

/** Arithmetic mean of the coordinates; `null` for an empty list. */
export function centroid(points: readonly LatLon[]): LatLon | null {
  if (points.length === 0) return null;

  let lat = 0, lon = 0;
  for (const p of points) {
    lat += p.lat;
    lon += p.lon;
  }
  return { lat: lat / points.length, lon: lon / points.length };
}

/** Inverse of `toLocalXY`. */
export function toLatLon(p: Point2D, origin: LatLon): LatLon {
  const lat0 = degToRad(origin.lat);
  return {
    lat: origin.lat + THREE.MathUtils.radToDeg(p.y / EARTH_RADIUS_M),
    lon: origin.lon + THREE.MathUtils.radToDeg(p.x / (EARTH_RADIUS_M * Math.cos(lat0))),
  };
}
