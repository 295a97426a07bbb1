import { z } from 'zod';
import { silent, type LogFn } from './log';
import { sortProfile } from './profile';
import type { Sample, TripRecord } from './types';

const finite = z.number().finite();

export const LatLonSchema = z.object({
  lat: finite.min(-90).max(90),
  lon: finite.min(-180).max(180),
});

export const SampleSchema = LatLonSchema.extend({
  zExist: finite.optional(),
  zProp: finite.optional(),
}).refine(s => s.zExist !== undefined || s.zProp !== undefined, {
  message: 'sample carries no elevation',
});

const GeoSegmentSchema = z.object({
  start: LatLonSchema,
  stop: LatLonSchema,
});

// An empty profile is treated as absent.
const ProfileSchema = z
  .array(z.object({ distance: finite, depth: finite }))
  .transform(points => (points.length > 0 ? sortProfile(points) : undefined));

export const TripRecordSchema = z.object({
  tripIndex: z.number().int(),
  bcy: finite.nonnegative(),
  start: LatLonSchema,
  end: LatLonSchema,
  cutSegment: GeoSegmentSchema.optional(),
  fillSegment: GeoSegmentSchema.optional(),
  cutLengthM: finite.nonnegative().optional(),
  headingDeg: finite.optional(),
  cutProfile: ProfileSchema.optional(),
  fillProfile: ProfileSchema.optional(),
});

export interface Ingested<T> {
  records: T[];
  dropped: number;
}

/** Keeps the records that validate; the rest are counted and logged. */
export function ingestSamples(input: readonly unknown[], logFn: LogFn = silent): Ingested<Sample> {
  const records: Sample[] = [];
  let dropped = 0;
  input.forEach((raw, i) => {
    const parsed = SampleSchema.safeParse(raw);
    if (parsed.success) {
      records.push(parsed.data);
    } else {
      dropped++;
      logFn(`dropped sample ${i}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
  });
  return { records, dropped };
}

/** Validated trips, stably sorted by trip index. */
export function ingestTrips(input: readonly unknown[], logFn: LogFn = silent): Ingested<TripRecord> {
  const records: TripRecord[] = [];
  let dropped = 0;
  input.forEach((raw, i) => {
    const parsed = TripRecordSchema.safeParse(raw);
    if (parsed.success) {
      records.push(parsed.data);
    } else {
      dropped++;
      logFn(`dropped trip ${i}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
  });
  records.sort((a, b) => a.tripIndex - b.tripIndex);
  return { records, dropped };
}
