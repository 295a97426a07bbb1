import { binIndexOf, binKey } from './binning';
import type { Face, LatLon, Lattice, LatticeView, SurfaceBin } from './types';

/**
 * Indexes the eligible bins by lattice coordinate and triangulates every unit
 * cell: {00,10,01} and {10,11,01} are emitted independently, so a cell with
 * one missing corner still yields a triangle.
 */
export function buildLattice(bins: SurfaceBin[], origin: LatLon, binSizeM: number): Lattice {
  const indexByKey = new Map<string, number>();
  let minBx = Infinity, minBy = Infinity;
  let maxBx = -Infinity, maxBy = -Infinity;

  bins.forEach((bin, i) => {
    indexByKey.set(binKey(bin.bx, bin.by), i);
    if (bin.bx < minBx) minBx = bin.bx;
    if (bin.by < minBy) minBy = bin.by;
    if (bin.bx > maxBx) maxBx = bin.bx;
    if (bin.by > maxBy) maxBy = bin.by;
  });

  const faces: Face[] = [];
  for (let bx = minBx; bx < maxBx; bx++) {
    for (let by = minBy; by < maxBy; by++) {
      const i00 = indexByKey.get(binKey(bx, by));
      const i10 = indexByKey.get(binKey(bx + 1, by));
      const i01 = indexByKey.get(binKey(bx, by + 1));
      const i11 = indexByKey.get(binKey(bx + 1, by + 1));

      if (i00 !== undefined && i10 !== undefined && i01 !== undefined) {
        faces.push([i00, i10, i01]);
      }
      if (i10 !== undefined && i11 !== undefined && i01 !== undefined) {
        faces.push([i10, i11, i01]);
      }
    }
  }

  return { bins, faces, indexByKey, origin, binSizeM, minBx, maxBx, minBy, maxBy };
}

export function binAt(lattice: Lattice, bx: number, by: number): number | undefined {
  return lattice.indexByKey.get(binKey(bx, by));
}

/**
 * Index of the bin whose position is closest to (x, y). Bin positions are
 * sample centroids and may sit anywhere in their cell, so the containing
 * cell is only the first candidate. Square rings of cells are walked
 * outward; ring k can be no closer than (k - 1) bin sizes, and the walk
 * stops once that bound passes the best distance found.
 */
export function nearestBin(lattice: Lattice, x: number, y: number): number | undefined {
  if (lattice.bins.length === 0) return undefined;

  const { bx, by } = binIndexOf(x, y, lattice.binSizeM);
  const maxRing = Math.max(
    Math.abs(bx - lattice.minBx), Math.abs(bx - lattice.maxBx),
    Math.abs(by - lattice.minBy), Math.abs(by - lattice.maxBy)
  );

  let best: number | undefined;
  let bestD2 = Infinity;
  const consider = (cx: number, cy: number) => {
    const idx = binAt(lattice, cx, cy);
    if (idx === undefined) return;
    const b = lattice.bins[idx];
    const d2 = (b.x - x) ** 2 + (b.y - y) ** 2;
    if (d2 < bestD2 || (d2 === bestD2 && best !== undefined && idx < best)) {
      bestD2 = d2;
      best = idx;
    }
  };

  consider(bx, by);
  for (let k = 1; k <= maxRing; k++) {
    const floor = (k - 1) * lattice.binSizeM;
    if (best !== undefined && floor * floor > bestD2) break;

    for (let i = -k; i <= k; i++) {
      for (const [cx, cy] of ringCells(bx, by, k, i)) consider(cx, cy);
    }
  }
  return best;
}

/** The bin whose cell contains (x, y), else the nearest bin. */
export function binAtPoint(lattice: Lattice, x: number, y: number): number | undefined {
  const { bx, by } = binIndexOf(x, y, lattice.binSizeM);
  return binAt(lattice, bx, by) ?? nearestBin(lattice, x, y);
}

function ringCells(bx: number, by: number, k: number, i: number): [number, number][] {
  // Top and bottom rows take the corners; the side columns skip them.
  const cells: [number, number][] = [[bx + i, by - k], [bx + i, by + k]];
  if (i > -k && i < k) {
    cells.push([bx - k, by + i], [bx + k, by + i]);
  }
  return cells;
}

/** Read-only handle lent to output consumers. */
export function viewOf(lattice: Lattice): LatticeView {
  return lattice;
}
