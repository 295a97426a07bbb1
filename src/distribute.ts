import { binArea, type SimulationConfig } from './config';
import type { FootprintHit } from './footprint';
import { depthAt } from './profile';
import type { ProfilePoint, SkipReason, SurfaceBin } from './types';

/** Volume (m³) a bin can still take before its target clamp. */
export type CapacityFn = (bin: SurfaceBin) => number;

/** Applies `volumeM3` to the bin and returns the volume actually placed. */
export type ApplyFn = (bin: SurfaceBin, volumeM3: number) => number;

export type WeightFn = (hit: FootprintHit) => number;

export interface Allocation {
  index: number;
  volumeM3: number;
}

export interface Distribution {
  requestedM3: number;
  capacityM3: number;
  appliedM3: number;
  allocations: Allocation[];
  skipped?: SkipReason;
}

export function cutCapacity(config: SimulationConfig): CapacityFn {
  const area = binArea(config);
  return bin => Math.max(0, Math.min(config.maxCutDepthM, bin.zCur - bin.zProp)) * area;
}

export function fillCapacity(config: SimulationConfig): CapacityFn {
  const area = binArea(config);
  return bin => Math.max(0, bin.zProp - bin.zCur) * area;
}

/** Lowers the bin, never past its target and never upward. */
export function applyCut(config: SimulationConfig): ApplyFn {
  const area = binArea(config);
  return (bin, volumeM3) => {
    if (volumeM3 <= 0 || bin.zCur <= bin.zProp) return 0;
    const next = Math.max(bin.zCur - volumeM3 / area, bin.zProp);
    const placed = (bin.zCur - next) * area;
    bin.zCur = next;
    return placed;
  };
}

/** Raises the bin, never past its target and never downward. */
export function applyFill(config: SimulationConfig): ApplyFn {
  const area = binArea(config);
  return (bin, volumeM3) => {
    if (volumeM3 <= 0 || bin.zCur >= bin.zProp) return 0;
    const next = Math.min(bin.zCur + volumeM3 / area, bin.zProp);
    const placed = (next - bin.zCur) * area;
    bin.zCur = next;
    return placed;
  };
}

/**
 * Weight from a measured cross-section: the profile depth at the bin's
 * distance along the segment over the reference depth, floored.
 */
export function profileWeight(profile: readonly ProfilePoint[], config: SimulationConfig): WeightFn {
  return hit => Math.max(
    config.profileMinWeight,
    depthAt(profile, hit.s) / config.profileReferenceDepthM
  );
}

/**
 * Splits `min(volume, total capacity)` across the hits in proportion to
 * each bin's (optionally weighted) capacity. Unweighted shares never exceed
 * a bin's capacity, so one pass suffices. Zero capacity is a no-op.
 */
export function distributeProportional(
  bins: SurfaceBin[],
  hits: readonly FootprintHit[],
  volumeM3: number,
  capacity: CapacityFn,
  apply: ApplyFn,
  weight?: WeightFn
): Distribution {
  const result: Distribution = { requestedM3: volumeM3, capacityM3: 0, appliedM3: 0, allocations: [] };
  if (hits.length === 0) return { ...result, skipped: 'no-bins' };
  if (!(volumeM3 > 0)) return { ...result, skipped: 'no-volume' };

  const caps = hits.map(hit => {
    const c = capacity(bins[hit.index]);
    return weight ? c * weight(hit) : c;
  });
  const total = caps.reduce((sum, c) => sum + c, 0);
  result.capacityM3 = total;
  if (total <= 0) return { ...result, skipped: 'no-capacity' };

  const remaining = Math.min(volumeM3, total);
  hits.forEach((hit, k) => {
    if (caps[k] <= 0) return;
    const take = remaining * (caps[k] / total);
    if (take <= 0) return;
    result.allocations.push({ index: hit.index, volumeM3: take });
    result.appliedM3 += apply(bins[hit.index], take);
  });
  return result;
}

/**
 * Equal share per hit regardless of capacity; the apply clamp drops
 * whatever a bin cannot take.
 */
export function distributeUniform(
  bins: SurfaceBin[],
  hits: readonly FootprintHit[],
  volumeM3: number,
  apply: ApplyFn
): Distribution {
  const result: Distribution = { requestedM3: volumeM3, capacityM3: 0, appliedM3: 0, allocations: [] };
  if (hits.length === 0) return { ...result, skipped: 'no-bins' };
  if (!(volumeM3 > 0)) return { ...result, skipped: 'no-volume' };

  const share = volumeM3 / hits.length;
  for (const hit of hits) {
    result.allocations.push({ index: hit.index, volumeM3: share });
    result.appliedM3 += apply(bins[hit.index], share);
  }
  return result;
}
