import { describe, expect, it } from 'vitest';
import { binIndexOf, binKey, buildBins, eligibleBins } from '../src/binning';
import type { Sample } from '../src/types';
import { geo, ORIGIN } from './helpers/grid';

function sampleAt(x: number, y: number, zExist?: number, zProp?: number): Sample {
  return { ...geo(x, y), zExist, zProp };
}

describe('binIndexOf', () => {
  it('should floor planar coordinates by bin size', () => {
    expect(binIndexOf(1.3, 0.2, 0.6096)).toEqual({ bx: 2, by: 0 });
  });

  it('should floor negative coordinates away from zero', () => {
    expect(binIndexOf(-0.1, -1.0, 1)).toEqual({ bx: -1, by: -1 });
  });
});

describe('buildBins', () => {
  it('should group samples that fall in the same cell', () => {
    const bins = buildBins([
      sampleAt(0.2, 0.2, 10, 9),
      sampleAt(0.8, 0.6, 12, 9),
      sampleAt(1.5, 0.5, 11, 8),
    ], ORIGIN, 1);

    expect(bins.size).toBe(2);
    const first = bins.get(binKey(0, 0));
    expect(first?.sampleCount).toBe(2);
    expect(first?.zExistMean).toBeCloseTo(11, 12);
    expect(first?.zPropMean).toBeCloseTo(9, 12);
    expect(first?.x).toBeCloseTo(0.5, 6);
    expect(first?.y).toBeCloseTo(0.4, 6);
  });

  it('should average each elevation kind only over samples carrying it', () => {
    const bins = buildBins([
      sampleAt(0.5, 0.5, 10, undefined),
      sampleAt(0.5, 0.5, undefined, 7),
      sampleAt(0.5, 0.5, undefined, 9),
    ], ORIGIN, 1);

    const bin = bins.get(binKey(0, 0));
    expect(bin?.zExistMean).toBeCloseTo(10, 12);
    expect(bin?.zPropMean).toBeCloseTo(8, 12);
  });

  it('should leave a missing kind absent rather than zero', () => {
    const bins = buildBins([sampleAt(0.5, 0.5, 10, undefined)], ORIGIN, 1);
    expect(bins.get(binKey(0, 0))?.zPropMean).toBeUndefined();
  });

  it('should accumulate duplicate samples', () => {
    const s = sampleAt(0.5, 0.5, 10, 8);
    const bins = buildBins([s, s, s], ORIGIN, 1);
    expect(bins.get(binKey(0, 0))?.sampleCount).toBe(3);
  });
});

describe('eligibleBins', () => {
  it('should keep only bins with both means and start them at the existing surface', () => {
    const bins = buildBins([
      sampleAt(0.5, 0.5, 10, 8),
      sampleAt(1.5, 0.5, 10, undefined),
    ], ORIGIN, 1);

    const surface = eligibleBins(bins.values());
    expect(surface).toHaveLength(1);
    expect(surface[0].zCur).toBe(surface[0].zExistMean);
    expect(surface[0].zProp).toBe(surface[0].zPropMean);
  });

  it('should not mutate the binner output', () => {
    const bins = buildBins([sampleAt(0.5, 0.5, 10, 8)], ORIGIN, 1);
    const surface = eligibleBins(bins.values());
    surface[0].zCur = 0;
    expect(bins.get(binKey(0, 0))).not.toHaveProperty('zCur');
  });
});
