import { bankM3, binArea, netFactor, resolveConfig, type SimulationConfig } from './config';
import {
  applyCut,
  applyFill,
  cutCapacity,
  distributeProportional,
  distributeUniform,
  fillCapacity,
  profileWeight,
  type ApplyFn,
  type CapacityFn,
  type Distribution,
} from './distribute';
import { buildBins, eligibleBins } from './binning';
import { surveyLattice } from './earthworks';
import { LoadError } from './errors';
import { cutSegment, fillSegment, resolveRectangle, resolveStrip, type Footprint } from './footprint';
import { ingestSamples, ingestTrips } from './ingest';
import { buildLattice, viewOf } from './lattice';
import { createLog, type LogFn } from './log';
import { centroid, haversineDistance, projectPoint } from './projection';
import { buildTIN, tinHeight, type SurfaceTIN } from './tin';
import type {
  EvolutionMode,
  HalfOutcome,
  HaulMetrics,
  Lattice,
  LatticeView,
  Operation,
  ProfilePoint,
  RunSummary,
  TripOutcome,
  TripRecord,
} from './types';

/** Receives the surface after each emitted step. Must not mutate it. */
export interface SurfaceObserver {
  onInitial?(view: LatticeView): void;
  onTrip?(view: LatticeView, trip: TripRecord, outcome: TripOutcome): void;
}

export interface SimulationOptions {
  config?: Partial<SimulationConfig>;
  mode?: EvolutionMode;
  /** Stop after this many trips; 0 or absent applies them all. */
  maxTrips?: number;
  /** Emit every Nth applied trip to the observer; the last is always emitted. */
  everyN?: number;
  observer?: SurfaceObserver;
  log?: LogFn;
}

export interface TripContext {
  lattice: Lattice;
  config: SimulationConfig;
  mode: EvolutionMode;
  ground?: SurfaceTIN;
  log?: LogFn;
}

/**
 * Applies one trip to the lattice in place: cut at bank volume, then fill
 * at compacted volume. Each half stands alone; a half that finds no bins or
 * no capacity is skipped without affecting the other.
 */
export function applyTrip(ctx: TripContext, trip: TripRecord): TripOutcome {
  const { config, lattice, mode } = ctx;
  const bank = bankM3(trip.bcy, config);
  const compacted = bank * netFactor(config);

  const cut = applyHalf(ctx, trip, 'cut', bank);
  const fill = applyHalf(ctx, trip, 'fill', compacted);

  return {
    tripIndex: trip.tripIndex,
    mode,
    bankM3: bank,
    compactedM3: compacted,
    cut,
    fill,
    haul: haulMetrics(trip, lattice, ctx.ground),
  };
}

function applyHalf(ctx: TripContext, trip: TripRecord, op: Operation, volumeM3: number): HalfOutcome {
  const { config, lattice } = ctx;
  const capacity: CapacityFn = op === 'cut' ? cutCapacity(config) : fillCapacity(config);
  const apply: ApplyFn = op === 'cut' ? applyCut(config) : applyFill(config);

  let footprint: Footprint;
  let dist: Distribution;
  let profiled = false;

  if (ctx.mode === 'strip') {
    const at = projectPoint(op === 'cut' ? trip.start : trip.end, lattice.origin);
    footprint = resolveStrip(lattice, at, config);
    dist = distributeUniform(lattice.bins, footprint.hits, volumeM3, apply);
  } else {
    const segment = op === 'cut' ? cutSegment(trip, lattice, config) : fillSegment(trip, lattice, config);
    footprint = resolveRectangle(lattice, segment, config.equipmentWidthM, config.degenerateEpsilonM);
    const profile: ProfilePoint[] | undefined = op === 'cut' ? trip.cutProfile : trip.fillProfile;
    profiled = profile !== undefined && !footprint.degenerate;
    dist = distributeProportional(
      lattice.bins,
      footprint.hits,
      volumeM3,
      capacity,
      apply,
      profiled && profile ? profileWeight(profile, config) : undefined
    );
  }

  if (dist.skipped) {
    ctx.log?.(`trip ${trip.tripIndex}: ${op} skipped (${dist.skipped})`);
  }

  return {
    binCount: footprint.hits.length,
    requestedM3: volumeM3,
    appliedM3: dist.appliedM3,
    profiled,
    ...(dist.skipped ? { skipped: dist.skipped } : {}),
  };
}

function haulMetrics(trip: TripRecord, lattice: Lattice, ground: SurfaceTIN | undefined): HaulMetrics {
  const distanceM = haversineDistance(trip.start, trip.end);
  if (!ground) return { distanceM, liftM: null };

  const a = projectPoint(trip.start, lattice.origin);
  const b = projectPoint(trip.end, lattice.origin);
  const za = tinHeight(ground, a.x, a.y);
  const zb = tinHeight(ground, b.x, b.y);
  return { distanceM, liftM: za === null || zb === null ? null : zb - za };
}

/**
 * Owns the lattice for one run and replays trips strictly in trip-index
 * order; every trip sees the surface left by all earlier ones.
 */
export class Simulation {
  readonly lattice: Lattice;
  readonly trips: readonly TripRecord[];
  readonly config: SimulationConfig;
  readonly mode: EvolutionMode;
  readonly ground: SurfaceTIN;
  readonly outcomes: TripOutcome[] = [];

  private readonly limit: number;
  private readonly everyN: number;
  private readonly observer?: SurfaceObserver;
  private readonly log: LogFn;
  private next = 0;
  private started = false;

  constructor(lattice: Lattice, trips: readonly TripRecord[], options: SimulationOptions = {}) {
    this.lattice = lattice;
    this.trips = trips;
    this.config = resolveConfig(options.config);
    this.mode = options.mode ?? 'blade';
    this.limit = options.maxTrips && options.maxTrips > 0 ? Math.min(options.maxTrips, trips.length) : trips.length;
    this.everyN = Math.max(1, Math.floor(options.everyN ?? 1));
    this.observer = options.observer;
    this.log = options.log ?? createLog('evolve');
    this.ground = buildTIN(
      lattice.bins.map(b => ({ x: b.x, y: b.y, z: b.zExistMean })),
      lattice.binSizeM * 8
    );
  }

  get done(): boolean {
    return this.next >= this.limit;
  }

  get view(): LatticeView {
    return viewOf(this.lattice);
  }

  /** Applies the next trip; `undefined` once the run is over. */
  step(): TripOutcome | undefined {
    this.emitInitial();
    if (this.done) return undefined;

    const trip = this.trips[this.next++];
    const outcome = applyTrip(
      { lattice: this.lattice, config: this.config, mode: this.mode, ground: this.ground, log: this.log },
      trip
    );
    this.outcomes.push(outcome);

    if (this.next % this.everyN === 0 || this.done) {
      this.observer?.onTrip?.(this.view, trip, outcome);
    }
    return outcome;
  }

  run(): RunSummary {
    this.emitInitial();
    while (!this.done) this.step();
    return this.summary();
  }

  summary(): RunSummary {
    let requestedCutM3 = 0, appliedCutM3 = 0;
    let requestedFillM3 = 0, appliedFillM3 = 0;
    for (const o of this.outcomes) {
      requestedCutM3 += o.cut.requestedM3;
      appliedCutM3 += o.cut.appliedM3;
      requestedFillM3 += o.fill.requestedM3;
      appliedFillM3 += o.fill.appliedM3;
    }
    return {
      outcomes: [...this.outcomes],
      requestedCutM3,
      appliedCutM3,
      requestedFillM3,
      appliedFillM3,
      survey: surveyLattice(this.lattice, this.config.gradeToleranceM),
    };
  }

  private emitInitial(): void {
    if (this.started) return;
    this.started = true;
    this.observer?.onInitial?.(this.view);
  }
}

/**
 * Validates the inputs, anchors the projection at the sample centroid, bins
 * the samples and builds the lattice. Fails with `LoadError` when there is
 * nothing to simulate.
 */
export function createSimulation(
  samples: readonly unknown[],
  trips: readonly unknown[],
  options: SimulationOptions = {}
): Simulation {
  const config = resolveConfig(options.config);
  const logFn = options.log ?? createLog('load');

  const ingestedSamples = ingestSamples(samples, logFn);
  const origin = centroid(ingestedSamples.records);
  if (!origin) throw new LoadError('No usable samples');

  const bins = buildBins(ingestedSamples.records, origin, config.binSizeM);
  const surface = eligibleBins(bins.values());
  if (surface.length === 0) {
    throw new LoadError('No bins carry both existing and proposed elevations');
  }

  const ingestedTrips = ingestTrips(trips, logFn);
  if (ingestedTrips.records.length === 0) throw new LoadError('No usable trips');

  const lattice = buildLattice(surface, origin, config.binSizeM);
  logFn(
    `${ingestedSamples.records.length} samples -> ${bins.size} bins, ` +
    `${surface.length} in lattice (${lattice.faces.length} faces), ` +
    `${ingestedTrips.records.length} trips, bin area ${binArea(config).toFixed(4)} m²`
  );

  return new Simulation(lattice, ingestedTrips.records, { ...options, config });
}
