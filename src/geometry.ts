import type { Point2D, Segment } from './types';

export interface SegmentFrame {
  origin: Point2D;
  /** Unit vector from start to stop. */
  along: Point2D;
  /** `along` rotated a quarter turn counter-clockwise. */
  normal: Point2D;
  length: number;
}

export interface Projection {
  /** Distance along the segment from its start. */
  s: number;
  /** Signed lateral offset, positive to the left of travel. */
  t: number;
}

/** Local frame of a segment, or `null` when it is shorter than `epsilon`. */
export function segmentFrame(seg: Segment, epsilon: number): SegmentFrame | null {
  const dx = seg.stop.x - seg.start.x;
  const dy = seg.stop.y - seg.start.y;
  const length = Math.hypot(dx, dy);
  if (length < epsilon) return null;

  const ux = dx / length;
  const uy = dy / length;
  return {
    origin: seg.start,
    along: { x: ux, y: uy },
    normal: { x: -uy, y: ux },
    length,
  };
}

export function projectOnto(frame: SegmentFrame, p: Point2D): Projection {
  const rx = p.x - frame.origin.x;
  const ry = p.y - frame.origin.y;
  return {
    s: rx * frame.along.x + ry * frame.along.y,
    t: rx * frame.normal.x + ry * frame.normal.y,
  };
}

export function inRectangle(frame: SegmentFrame, proj: Projection, halfWidth: number): boolean {
  return proj.s >= 0 && proj.s <= frame.length && Math.abs(proj.t) <= halfWidth;
}

/** Axis-aligned box around a segment widened by `pad` on every side. */
export function segmentBounds(seg: Segment, pad: number): { minX: number; minY: number; maxX: number; maxY: number } {
  return {
    minX: Math.min(seg.start.x, seg.stop.x) - pad,
    minY: Math.min(seg.start.y, seg.stop.y) - pad,
    maxX: Math.max(seg.start.x, seg.stop.x) + pad,
    maxY: Math.max(seg.start.y, seg.stop.y) + pad,
  };
}

/** Unit vector for a compass heading, degrees clockwise from north (+y). */
export function headingVector(headingDeg: number): Point2D {
  const rad = headingDeg * Math.PI / 180;
  return { x: Math.sin(rad), y: Math.cos(rad) };
}

/** Unit direction from `a` to `b`, or `null` when they coincide within `epsilon`. */
export function direction(a: Point2D, b: Point2D, epsilon: number): Point2D | null {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const length = Math.hypot(dx, dy);
  if (length < epsilon) return null;
  return { x: dx / length, y: dy / length };
}
