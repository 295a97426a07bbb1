import Delaunator from 'delaunator';
import type { Point3D } from './types';

export interface SurfaceTIN {
  points: Point3D[];
  triangles: Uint32Array;
  cellSize: number;
  /** Triangle ids (index / 3) overlapping each bucket cell. */
  buckets: Map<string, number[]>;
}

/**
 * Delaunay TIN over the points, with a bucket index of triangle bounding
 * boxes so height lookups only test nearby triangles.
 */
export function buildTIN(points: Point3D[], cellSize: number): SurfaceTIN {
  const triangles = points.length >= 3
    ? new Delaunator(points.flatMap(p => [p.x, p.y])).triangles
    : new Uint32Array();

  const buckets = new Map<string, number[]>();
  for (let i = 0; i < triangles.length; i += 3) {
    const a = points[triangles[i]];
    const b = points[triangles[i + 1]];
    const c = points[triangles[i + 2]];

    const cx0 = Math.floor(Math.min(a.x, b.x, c.x) / cellSize);
    const cx1 = Math.floor(Math.max(a.x, b.x, c.x) / cellSize);
    const cy0 = Math.floor(Math.min(a.y, b.y, c.y) / cellSize);
    const cy1 = Math.floor(Math.max(a.y, b.y, c.y) / cellSize);

    for (let cx = cx0; cx <= cx1; cx++) {
      for (let cy = cy0; cy <= cy1; cy++) {
        const key = `${cx},${cy}`;
        const list = buckets.get(key);
        if (list) list.push(i / 3);
        else buckets.set(key, [i / 3]);
      }
    }
  }

  return { points, triangles, cellSize, buckets };
}

// Barycentric weights may dip this far below zero for points on an edge.
const EDGE_TOLERANCE = 1e-9;

/** Interpolated height at (x, y); `null` outside the triangulated hull. */
export function tinHeight(tin: SurfaceTIN, x: number, y: number): number | null {
  const key = `${Math.floor(x / tin.cellSize)},${Math.floor(y / tin.cellSize)}`;
  const candidates = tin.buckets.get(key);
  if (!candidates) return null;

  const { points, triangles } = tin;
  for (const tri of candidates) {
    const a = points[triangles[tri * 3]];
    const b = points[triangles[tri * 3 + 1]];
    const c = points[triangles[tri * 3 + 2]];

    // Each weight is the signed area opposite its vertex over the whole.
    const area = (b.x - a.x) * (c.y - a.y) - (c.x - a.x) * (b.y - a.y);
    if (area === 0) continue;

    const wa = ((b.x - x) * (c.y - y) - (c.x - x) * (b.y - y)) / area;
    const wb = ((c.x - x) * (a.y - y) - (a.x - x) * (c.y - y)) / area;
    const wc = 1 - wa - wb;
    if (wa < -EDGE_TOLERANCE || wb < -EDGE_TOLERANCE || wc < -EDGE_TOLERANCE) continue;

    return wa * a.z + wb * b.z + wc * c.z;
  }
  return null;
}
