import { toLocalXY } from './projection';
import type { Bin, LatLon, Sample, SurfaceBin } from './types';

export function binKey(bx: number, by: number): string {
  return `${bx},${by}`;
}

export function binIndexOf(x: number, y: number, binSizeM: number): { bx: number; by: number } {
  return { bx: Math.floor(x / binSizeM), by: Math.floor(y / binSizeM) };
}

interface Accumulator {
  bx: number;
  by: number;
  count: number;
  latSum: number;
  lonSum: number;
  existSum: number;
  existCount: number;
  propSum: number;
  propCount: number;
}

/**
 * Drops every sample into the square bin its projected position falls in and
 * averages each elevation kind over only the samples that carry it.
 */
export function buildBins(samples: readonly Sample[], origin: LatLon, binSizeM: number): Map<string, Bin> {
  const acc = new Map<string, Accumulator>();

  for (const s of samples) {
    const { x, y } = toLocalXY(s.lat, s.lon, origin);
    const { bx, by } = binIndexOf(x, y, binSizeM);
    const key = binKey(bx, by);

    let a = acc.get(key);
    if (!a) {
      a = { bx, by, count: 0, latSum: 0, lonSum: 0, existSum: 0, existCount: 0, propSum: 0, propCount: 0 };
      acc.set(key, a);
    }

    a.count++;
    a.latSum += s.lat;
    a.lonSum += s.lon;
    if (s.zExist !== undefined) {
      a.existSum += s.zExist;
      a.existCount++;
    }
    if (s.zProp !== undefined) {
      a.propSum += s.zProp;
      a.propCount++;
    }
  }

  const bins = new Map<string, Bin>();
  for (const [key, a] of acc) {
    const latCenter = a.latSum / a.count;
    const lonCenter = a.lonSum / a.count;
    const { x, y } = toLocalXY(latCenter, lonCenter, origin);
    bins.set(key, {
      bx: a.bx,
      by: a.by,
      sampleCount: a.count,
      latCenter,
      lonCenter,
      x,
      y,
      zExistMean: a.existCount > 0 ? a.existSum / a.existCount : undefined,
      zPropMean: a.propCount > 0 ? a.propSum / a.propCount : undefined,
    });
  }
  return bins;
}

/**
 * Bins carrying both means, as fresh simulation bins with `zCur` at the
 * existing surface. The binner's own map is left untouched.
 */
export function eligibleBins(bins: Iterable<Bin>): SurfaceBin[] {
  const out: SurfaceBin[] = [];
  for (const bin of bins) {
    const { zExistMean, zPropMean } = bin;
    if (zExistMean === undefined || zPropMean === undefined) continue;
    out.push({ ...bin, zExistMean, zPropMean, zCur: zExistMean, zProp: zPropMean });
  }
  return out;
}
