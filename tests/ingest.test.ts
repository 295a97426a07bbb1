import { describe, expect, it, vi } from 'vitest';
import { ingestSamples, ingestTrips } from '../src/ingest';

describe('ingestSamples', () => {
  it('should keep valid samples and log the rest', () => {
    const logFn = vi.fn();
    const { records, dropped } = ingestSamples([
      { lat: 40, lon: -105, zExist: 1 },
      { lat: 100, lon: 0, zExist: 1 },
      { lat: 40, lon: -105 },
      'junk',
    ], logFn);

    expect(records).toEqual([{ lat: 40, lon: -105, zExist: 1 }]);
    expect(dropped).toBe(3);
    expect(logFn).toHaveBeenCalledTimes(3);
    expect(logFn).toHaveBeenCalledWith('dropped sample 2: sample carries no elevation');
  });
});

describe('ingestTrips', () => {
  const base = { bcy: 1, start: { lat: 40, lon: -105 }, end: { lat: 40, lon: -105 } };

  it('should sort by trip index, keeping ties in input order', () => {
    const { records } = ingestTrips([
      { ...base, tripIndex: 3 },
      { ...base, tripIndex: 1, bcy: 2 },
      { ...base, tripIndex: 1, bcy: 5 },
    ]);
    expect(records.map(t => [t.tripIndex, t.bcy])).toEqual([[1, 2], [1, 5], [3, 1]]);
  });

  it('should sort profiles by distance', () => {
    const { records } = ingestTrips([{
      ...base,
      tripIndex: 1,
      cutProfile: [{ distance: 2, depth: 1 }, { distance: 0, depth: 3 }],
    }]);
    expect(records[0].cutProfile).toEqual([{ distance: 0, depth: 3 }, { distance: 2, depth: 1 }]);
  });

  it('should drop trips with negative volume or a fractional index', () => {
    const { records, dropped } = ingestTrips([
      { ...base, tripIndex: 1, bcy: -1 },
      { ...base, tripIndex: 1.5 },
      { ...base, tripIndex: 4 },
    ]);
    expect(records.map(t => t.tripIndex)).toEqual([4]);
    expect(dropped).toBe(2);
  });

  it('should keep a trip with an empty profile and treat the profile as absent', () => {
    const { records, dropped } = ingestTrips([{ ...base, tripIndex: 2, cutProfile: [], fillProfile: [] }]);
    expect(dropped).toBe(0);
    expect(records[0].cutProfile).toBeUndefined();
    expect(records[0].fillProfile).toBeUndefined();
  });
});
