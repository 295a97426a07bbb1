import { describe, expect, it } from 'vitest';
import { depthAt, parseProfile } from '../src/profile';

describe('parseProfile', () => {
  it('should parse and sort distance=depth pairs', () => {
    expect(parseProfile('2=0.3;0=0.1;1=0.2')).toEqual([
      { distance: 0, depth: 0.1 },
      { distance: 1, depth: 0.2 },
      { distance: 2, depth: 0.3 },
    ]);
  });

  it('should drop unparsable pairs', () => {
    expect(parseProfile('0=0.1;x=2;3;4=;5=0.5')).toEqual([
      { distance: 0, depth: 0.1 },
      { distance: 5, depth: 0.5 },
    ]);
  });

  it('should return undefined for blank or fully invalid text', () => {
    expect(parseProfile(undefined)).toBeUndefined();
    expect(parseProfile('  ')).toBeUndefined();
    expect(parseProfile('a=b;c')).toBeUndefined();
  });
});

describe('depthAt', () => {
  const profile = [
    { distance: 1, depth: 0.2 },
    { distance: 3, depth: 0.6 },
    { distance: 4, depth: 0.2 },
  ];

  it('should interpolate between bracketing points', () => {
    expect(depthAt(profile, 2)).toBeCloseTo(0.4, 12);
    expect(depthAt(profile, 3.5)).toBeCloseTo(0.4, 12);
  });

  it('should return exact values at measured points', () => {
    expect(depthAt(profile, 3)).toBeCloseTo(0.6, 12);
  });

  it('should hold the first depth before the profile starts', () => {
    expect(depthAt(profile, 0)).toBe(0.2);
  });

  it('should hold the last depth past the profile end', () => {
    expect(depthAt(profile, 10)).toBe(0.2);
  });

  it('should return the only depth of a single-point profile', () => {
    expect(depthAt([{ distance: 2, depth: 0.7 }], 5)).toBe(0.7);
  });

  it('should return zero for an empty profile', () => {
    expect(depthAt([], 1)).toBe(0);
  });
});
