import { bankM3, type SimulationConfig } from './config';
import { direction, headingVector, inRectangle, projectOnto, segmentBounds, segmentFrame } from './geometry';
import { binAt, binAtPoint, nearestBin } from './lattice';
import { projectPoint } from './projection';
import type { Lattice, Point2D, Segment, TripRecord } from './types';

export interface FootprintHit {
  index: number;
  s: number;
  t: number;
}

export interface Footprint {
  segment: Segment;
  hits: FootprintHit[];
  degenerate: boolean;
}

/**
 * Fixed reference heading for strip mode. Strip bins step along
 * (-sin h, cos h), which runs north-south at 0.
 */
export const STRIP_REFERENCE_HEADING_DEG = 0;

const HEADING_EPSILON_M = 1e-9;

/**
 * Direction of travel on the local plane: start to end, or the recorded
 * heading when the two points coincide. `null` when neither is usable.
 */
export function travelDirection(trip: TripRecord, lattice: Lattice): Point2D | null {
  const start = projectPoint(trip.start, lattice.origin);
  const end = projectPoint(trip.end, lattice.origin);
  const u = direction(start, end, HEADING_EPSILON_M);
  if (u) return u;
  return trip.headingDeg !== undefined ? headingVector(trip.headingDeg) : null;
}

export function estimateCutLength(trip: TripRecord, config: SimulationConfig): number {
  const depth = Math.min(config.maxCutDepthM, config.fallbackCutDepthM);
  return bankM3(trip.bcy, config) / (config.equipmentWidthM * depth);
}

/**
 * Explicit cut segment when the trip carries one; otherwise a segment that
 * stops at the trip start and reaches back along the travel direction by the
 * recorded cut length or the volume-based estimate.
 */
export function cutSegment(trip: TripRecord, lattice: Lattice, config: SimulationConfig): Segment {
  if (trip.cutSegment) {
    return {
      start: projectPoint(trip.cutSegment.start, lattice.origin),
      stop: projectPoint(trip.cutSegment.stop, lattice.origin),
    };
  }

  const stop = projectPoint(trip.start, lattice.origin);
  const u = travelDirection(trip, lattice);
  if (!u) return { start: stop, stop };

  const length = trip.cutLengthM ?? estimateCutLength(trip, config);
  return {
    start: { x: stop.x - u.x * length, y: stop.y - u.y * length },
    stop,
  };
}

/**
 * Explicit fill segment when present; otherwise the dump-travel distance
 * ending at the trip end point, oriented along the travel direction.
 */
export function fillSegment(trip: TripRecord, lattice: Lattice, config: SimulationConfig): Segment {
  if (trip.fillSegment) {
    return {
      start: projectPoint(trip.fillSegment.start, lattice.origin),
      stop: projectPoint(trip.fillSegment.stop, lattice.origin),
    };
  }

  const stop = projectPoint(trip.end, lattice.origin);
  const u = travelDirection(trip, lattice);
  if (!u) return { start: stop, stop };

  return {
    start: { x: stop.x - u.x * config.dumpTravelM, y: stop.y - u.y * config.dumpTravelM },
    stop,
  };
}

/**
 * Bins whose position lies inside the `width` rectangle centred on the
 * segment's axis. A segment shorter than `epsilon` collapses to the bin
 * nearest its start.
 */
export function resolveRectangle(
  lattice: Lattice,
  segment: Segment,
  width: number,
  epsilon: number
): Footprint {
  const frame = segmentFrame(segment, epsilon);
  if (!frame) {
    const index = nearestBin(lattice, segment.start.x, segment.start.y);
    return {
      segment,
      hits: index === undefined ? [] : [{ index, s: 0, t: 0 }],
      degenerate: true,
    };
  }

  const halfWidth = width / 2;
  const box = segmentBounds(segment, halfWidth);
  const B = lattice.binSizeM;
  const bxMin = Math.max(Math.floor(box.minX / B), lattice.minBx);
  const bxMax = Math.min(Math.floor(box.maxX / B), lattice.maxBx);
  const byMin = Math.max(Math.floor(box.minY / B), lattice.minBy);
  const byMax = Math.min(Math.floor(box.maxY / B), lattice.maxBy);

  const hits: FootprintHit[] = [];
  for (let bx = bxMin; bx <= bxMax; bx++) {
    for (let by = byMin; by <= byMax; by++) {
      const index = binAt(lattice, bx, by);
      if (index === undefined) continue;

      const proj = projectOnto(frame, lattice.bins[index]);
      if (inRectangle(frame, proj, halfWidth)) {
        hits.push({ index, s: proj.s, t: proj.t });
      }
    }
  }
  return { segment, hits, degenerate: false };
}

/**
 * A row of `ceil(width / binSize)` bins through the bin containing `point`,
 * stepped from the reference heading. Each step takes the nearest bin; a
 * bin reached twice is counted once.
 */
export function resolveStrip(lattice: Lattice, point: Point2D, config: SimulationConfig): Footprint {
  const segment: Segment = { start: point, stop: point };
  const center = binAtPoint(lattice, point.x, point.y);
  if (center === undefined) return { segment, hits: [], degenerate: false };

  const heading = headingVector(STRIP_REFERENCE_HEADING_DEG);
  const across: Point2D = { x: -heading.x, y: heading.y };
  const widthBins = Math.ceil(config.equipmentWidthM / lattice.binSizeM);
  const first = -Math.floor((widthBins - 1) / 2);

  const c = lattice.bins[center];
  const seen = new Set<number>();
  const hits: FootprintHit[] = [];

  for (let w = first; w < first + widthBins; w++) {
    const t = w * lattice.binSizeM;
    const index = nearestBin(lattice, c.x + across.x * t, c.y + across.y * t);
    if (index === undefined || seen.has(index)) continue;
    seen.add(index);
    hits.push({ index, s: 0, t });
  }
  return { segment, hits, degenerate: false };
}
