import { LoadError } from './errors';
import { parseProfile } from './profile';
import type { GeoSegment, LatLon, Sample, TripRecord } from './types';

/**
 * Survey samples. Columns are found by a case-insensitive substring match
 * on the header (`Latitude`, `Longitude`, `Existing`, `Proposed`). Rows
 * without a usable position or any elevation are skipped.
 */
export function parseSamplesCSV(text: string): Sample[] {
  const lines = splitLines(text);
  if (lines.length === 0) throw new LoadError('Samples CSV is empty');

  const header = splitRow(lines[0]);
  const find = (name: string) =>
    header.findIndex(h => h.toLowerCase().includes(name.toLowerCase()));

  const iLat = find('Latitude');
  const iLon = find('Longitude');
  const iExist = find('Existing');
  const iProp = find('Proposed');
  if (iLat < 0 || iLon < 0) {
    throw new LoadError('Samples CSV needs Latitude and Longitude columns');
  }

  const samples: Sample[] = [];
  for (let i = 1; i < lines.length; i++) {
    const parts = splitRow(lines[i]);
    const lat = field(parts, iLat);
    const lon = field(parts, iLon);
    if (lat === undefined || lon === undefined) continue;

    const zExist = field(parts, iExist);
    const zProp = field(parts, iProp);
    if (zExist === undefined && zProp === undefined) continue;

    samples.push({ lat, lon, zExist, zProp });
  }
  return samples;
}

const REQUIRED_TRIP_COLUMNS = ['trip_index', 'start_lat', 'start_lon', 'end_lat', 'end_lon', 'BCY'] as const;

/**
 * Haul trips. Columns are matched by exact, case-insensitive name; the
 * blade geometry and profile columns are optional. Rows whose required
 * fields do not parse are skipped. Output is sorted by trip index.
 */
export function parseTripsCSV(text: string): TripRecord[] {
  const lines = splitLines(text);
  if (lines.length === 0) throw new LoadError('Trips CSV is empty');

  const header = splitRow(lines[0]).map(h => h.toLowerCase());
  const col = (name: string) => header.indexOf(name.toLowerCase());

  const missing = REQUIRED_TRIP_COLUMNS.filter(name => col(name) < 0);
  if (missing.length > 0) {
    throw new LoadError(`Trips CSV is missing columns: ${missing.join(', ')}`);
  }

  const trips: TripRecord[] = [];
  for (let i = 1; i < lines.length; i++) {
    const parts = splitRow(lines[i]);

    const tripIndex = field(parts, col('trip_index'));
    const start = latLon(parts, col('start_lat'), col('start_lon'));
    const end = latLon(parts, col('end_lat'), col('end_lon'));
    const bcy = field(parts, col('BCY'));
    if (tripIndex === undefined || !Number.isInteger(tripIndex)) continue;
    if (!start || !end || bcy === undefined) continue;

    trips.push({
      tripIndex,
      bcy,
      start,
      end,
      cutSegment: geoSegment(parts, col('cut_start_lat'), col('cut_start_lon'), col('cut_stop_lat'), col('cut_stop_lon')),
      fillSegment: geoSegment(parts, col('fill_start_lat'), col('fill_start_lon'), col('fill_stop_lat'), col('fill_stop_lon')),
      cutLengthM: field(parts, col('cut_length_m')),
      headingDeg: field(parts, col('heading_deg')),
      cutProfile: parseProfile(raw(parts, col('cut_profile'))),
      fillProfile: parseProfile(raw(parts, col('fill_profile'))),
    });
  }

  trips.sort((a, b) => a.tripIndex - b.tripIndex);
  return trips;
}

function splitLines(text: string): string[] {
  return text.split(/\r?\n/).filter(line => line.trim() !== '');
}

function splitRow(line: string): string[] {
  return line.split(',').map(p => p.trim());
}

function raw(parts: string[], idx: number): string | undefined {
  return idx >= 0 && idx < parts.length ? parts[idx] : undefined;
}

function field(parts: string[], idx: number): number | undefined {
  const text = raw(parts, idx);
  if (text === undefined || text === '') return undefined;
  const v = Number(text);
  return Number.isFinite(v) ? v : undefined;
}

function latLon(parts: string[], iLat: number, iLon: number): LatLon | undefined {
  const lat = field(parts, iLat);
  const lon = field(parts, iLon);
  return lat === undefined || lon === undefined ? undefined : { lat, lon };
}

function geoSegment(parts: string[], iStartLat: number, iStartLon: number, iStopLat: number, iStopLon: number): GeoSegment | undefined {
  const start = latLon(parts, iStartLat, iStartLon);
  const stop = latLon(parts, iStopLat, iStopLon);
  return start && stop ? { start, stop } : undefined;
}
