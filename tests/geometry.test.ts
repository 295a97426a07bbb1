import { describe, expect, it } from 'vitest';
import { direction, headingVector, inRectangle, projectOnto, segmentBounds, segmentFrame } from '../src/geometry';

describe('segmentFrame', () => {
  it('should build unit along and left-hand normal vectors', () => {
    const frame = segmentFrame({ start: { x: 1, y: 1 }, stop: { x: 4, y: 5 } }, 1e-6);
    expect(frame?.length).toBe(5);
    expect(frame?.along).toEqual({ x: 0.6, y: 0.8 });
    expect(frame?.normal).toEqual({ x: -0.8, y: 0.6 });
  });

  it('should return null below epsilon', () => {
    expect(segmentFrame({ start: { x: 1, y: 1 }, stop: { x: 1, y: 1 + 1e-8 } }, 1e-6)).toBeNull();
  });
});

describe('projectOnto', () => {
  const frame = segmentFrame({ start: { x: 0, y: 0 }, stop: { x: 10, y: 0 } }, 1e-6);

  it('should split a point into along and lateral components', () => {
    expect(frame && projectOnto(frame, { x: 3, y: 2 })).toEqual({ s: 3, t: 2 });
    expect(frame && projectOnto(frame, { x: 3, y: -2 })).toEqual({ s: 3, t: -2 });
  });

  it('should accept points inside the rectangle, edges included', () => {
    if (!frame) throw new Error('frame expected');
    expect(inRectangle(frame, { s: 0, t: 0.5 }, 0.5)).toBe(true);
    expect(inRectangle(frame, { s: 10, t: -0.5 }, 0.5)).toBe(true);
    expect(inRectangle(frame, { s: 10.01, t: 0 }, 0.5)).toBe(false);
    expect(inRectangle(frame, { s: -0.01, t: 0 }, 0.5)).toBe(false);
    expect(inRectangle(frame, { s: 5, t: 0.51 }, 0.5)).toBe(false);
  });
});

describe('segmentBounds', () => {
  it('should pad the bounding box on every side', () => {
    expect(segmentBounds({ start: { x: 4, y: 1 }, stop: { x: 2, y: 3 } }, 1)).toEqual({
      minX: 1, minY: 0, maxX: 5, maxY: 4,
    });
  });
});

describe('headingVector', () => {
  it('should point north at 0 and east at 90 degrees', () => {
    expect(headingVector(0)).toEqual({ x: 0, y: 1 });
    const east = headingVector(90);
    expect(east.x).toBeCloseTo(1, 12);
    expect(east.y).toBeCloseTo(0, 12);
  });
});

describe('direction', () => {
  it('should normalise the vector between two points', () => {
    expect(direction({ x: 0, y: 0 }, { x: 0, y: -2 }, 1e-9)).toEqual({ x: 0, y: -1 });
  });

  it('should return null for coincident points', () => {
    expect(direction({ x: 1, y: 2 }, { x: 1, y: 2 }, 1e-9)).toBeNull();
  });
});
