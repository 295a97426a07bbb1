import type { Bin, LatticeView, SurveyResult } from './types';

/**
 * Remaining cut and fill against the design surface, and how many bins sit
 * above, below or within `toleranceM` of target.
 */
export function surveyLattice(lattice: LatticeView, toleranceM: number): SurveyResult {
  const cellArea = lattice.binSizeM * lattice.binSizeM;
  let cut = 0;
  let fill = 0;
  let above = 0, below = 0, onGrade = 0;
  let minZ = Infinity, maxZ = -Infinity;

  for (const bin of lattice.bins) {
    const dz = bin.zProp - bin.zCur;
    if (dz > 0) {
      fill += dz * cellArea;
    } else {
      cut += -dz * cellArea;
    }

    if (dz < -toleranceM) above++;
    else if (dz > toleranceM) below++;
    else onGrade++;

    if (bin.zCur < minZ) minZ = bin.zCur;
    if (bin.zCur > maxZ) maxZ = bin.zCur;
  }

  const binCount = lattice.bins.length;
  return {
    cut,
    fill,
    net: fill - cut,
    area: binCount * cellArea,
    binCount,
    above,
    below,
    onGrade,
    minZ: binCount > 0 ? minZ : 0,
    maxZ: binCount > 0 ? maxZ : 0,
  };
}

/** Min and max existing elevation over bins that have one; `null` if none do. */
export function elevationRange(bins: Iterable<Bin>): { min: number; max: number } | null {
  let min = Infinity, max = -Infinity;
  for (const bin of bins) {
    if (bin.zExistMean === undefined) continue;
    if (bin.zExistMean < min) min = bin.zExistMean;
    if (bin.zExistMean > max) max = bin.zExistMean;
  }
  return min <= max ? { min, max } : null;
}
