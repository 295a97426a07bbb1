import { describe, expect, it } from 'vitest';
import { centroid, EARTH_RADIUS_M, haversineDistance, toLatLon, toLocalXY } from '../src/projection';

describe('toLocalXY', () => {
  it('should map the origin to (0, 0)', () => {
    expect(toLocalXY(40.5, -88.2, { lat: 40.5, lon: -88.2 })).toEqual({ x: 0, y: 0 });
  });

  it('should scale latitude by the earth radius', () => {
    const p = toLocalXY(0.001, 0, { lat: 0, lon: 0 });
    expect(p.x).toBe(0);
    expect(p.y).toBeCloseTo(EARTH_RADIUS_M * 0.001 * Math.PI / 180, 9);
  });

  it('should shrink longitude by cos(lat0)', () => {
    const p = toLocalXY(60, 0.001, { lat: 60, lon: 0 });
    expect(p.x).toBeCloseTo(EARTH_RADIUS_M * 0.5 * 0.001 * Math.PI / 180, 6);
    expect(p.y).toBe(0);
  });

  it('should put points west and south of the origin at negative coordinates', () => {
    const p = toLocalXY(39.999, -88.001, { lat: 40, lon: -88 });
    expect(p.x).toBeLessThan(0);
    expect(p.y).toBeLessThan(0);
  });
});

describe('toLatLon', () => {
  it('should invert toLocalXY', () => {
    const origin = { lat: 40.1, lon: -88.3 };
    const back = toLatLon(toLocalXY(40.1002, -88.2997, origin), origin);
    expect(back.lat).toBeCloseTo(40.1002, 10);
    expect(back.lon).toBeCloseTo(-88.2997, 10);
  });
});

describe('haversineDistance', () => {
  it('should be zero for the same point', () => {
    expect(haversineDistance({ lat: 40, lon: -88 }, { lat: 40, lon: -88 })).toBe(0);
  });

  it('should give one degree of latitude as R * pi / 180', () => {
    const d = haversineDistance({ lat: 0, lon: 0 }, { lat: 1, lon: 0 });
    expect(d).toBeCloseTo(111194.9266, 3);
  });

  it('should be symmetric', () => {
    const a = { lat: 40.001, lon: -88.002 };
    const b = { lat: 40.003, lon: -88.0 };
    expect(haversineDistance(a, b)).toBeCloseTo(haversineDistance(b, a), 9);
  });
});

describe('centroid', () => {
  it('should average coordinates', () => {
    expect(centroid([{ lat: 1, lon: 10 }, { lat: 3, lon: 20 }])).toEqual({ lat: 2, lon: 15 });
  });

  it('should return null for no points', () => {
    expect(centroid([])).toBeNull();
  });
});
