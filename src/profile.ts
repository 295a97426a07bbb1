import type { ProfilePoint } from './types';

/**
 * Parses `distance=depth;distance=depth;...`. Unparsable pairs are dropped
 * and the rest sorted by distance; nothing usable gives `undefined`.
 */
export function parseProfile(text: string | undefined): ProfilePoint[] | undefined {
  if (text === undefined || text.trim() === '') return undefined;

  const points: ProfilePoint[] = [];
  for (const pair of text.split(';')) {
    const eq = pair.indexOf('=');
    if (eq < 0) continue;
    const distance = parseNumber(pair.slice(0, eq));
    const depth = parseNumber(pair.slice(eq + 1));
    if (distance === undefined || depth === undefined) continue;
    points.push({ distance, depth });
  }

  return points.length > 0 ? sortProfile(points) : undefined;
}

export function sortProfile(points: readonly ProfilePoint[]): ProfilePoint[] {
  return [...points].sort((a, b) => a.distance - b.distance);
}

/**
 * Linear interpolation along a profile sorted by distance. Outside the
 * measured range the nearest end value is held.
 */
export function depthAt(profile: readonly ProfilePoint[], distance: number): number {
  if (profile.length === 0) return 0;

  const first = profile[0];
  const last = profile[profile.length - 1];
  if (distance <= first.distance) return first.depth;
  if (distance >= last.distance) return last.depth;

  for (let i = 0; i < profile.length - 1; i++) {
    const a = profile[i];
    const b = profile[i + 1];
    if (distance > b.distance) continue;

    const span = b.distance - a.distance;
    if (span <= 0) return b.depth;
    const t = (distance - a.distance) / span;
    return a.depth + t * (b.depth - a.depth);
  }
  return last.depth;
}

function parseNumber(text: string): number | undefined {
  const trimmed = text.trim();
  if (trimmed === '') return undefined;
  const v = Number(trimmed);
  return Number.isFinite(v) ? v : undefined;
}
