export interface Point2D {
  x: number;
  y: number;
}

export interface Point3D {
  x: number;
  y: number;
  z: number;
}

export interface LatLon {
  lat: number;
  lon: number;
}

export interface Sample extends LatLon {
  zExist?: number;
  zProp?: number;
}

export interface Bin {
  bx: number;
  by: number;
  sampleCount: number;
  latCenter: number;
  lonCenter: number;
  x: number;
  y: number;
  zExistMean?: number;
  zPropMean?: number;
}

/** A bin that carries both elevation kinds and takes part in the run. */
export interface SurfaceBin extends Bin {
  zExistMean: number;
  zPropMean: number;
  zCur: number;
  readonly zProp: number;
}

export type Face = readonly [number, number, number];

export interface Lattice {
  bins: SurfaceBin[];
  faces: Face[];
  indexByKey: Map<string, number>;
  origin: LatLon;
  binSizeM: number;
  minBx: number;
  maxBx: number;
  minBy: number;
  maxBy: number;
}

export type ReadonlySurfaceBin = Readonly<SurfaceBin>;

export interface LatticeView {
  readonly bins: readonly ReadonlySurfaceBin[];
  readonly faces: readonly Face[];
  readonly origin: Readonly<LatLon>;
  readonly binSizeM: number;
  readonly minBx: number;
  readonly maxBx: number;
  readonly minBy: number;
  readonly maxBy: number;
}

export interface ProfilePoint {
  distance: number;
  depth: number;
}

export interface GeoSegment {
  start: LatLon;
  stop: LatLon;
}

export interface Segment {
  start: Point2D;
  stop: Point2D;
}

export interface TripRecord {
  tripIndex: number;
  bcy: number;
  start: LatLon;
  end: LatLon;
  cutSegment?: GeoSegment;
  fillSegment?: GeoSegment;
  cutLengthM?: number;
  headingDeg?: number;
  cutProfile?: ProfilePoint[];
  fillProfile?: ProfilePoint[];
}

export type EvolutionMode = 'strip' | 'blade';

export type Operation = 'cut' | 'fill';

export type SkipReason = 'no-bins' | 'no-capacity' | 'no-volume';

export interface HalfOutcome {
  binCount: number;
  requestedM3: number;
  appliedM3: number;
  profiled: boolean;
  skipped?: SkipReason;
}

export interface HaulMetrics {
  distanceM: number;
  liftM: number | null;
}

export interface TripOutcome {
  tripIndex: number;
  mode: EvolutionMode;
  bankM3: number;
  compactedM3: number;
  cut: HalfOutcome;
  fill: HalfOutcome;
  haul: HaulMetrics;
}

export interface SurveyResult {
  cut: number;
  fill: number;
  net: number;
  area: number;
  binCount: number;
  above: number;
  below: number;
  onGrade: number;
  minZ: number;
  maxZ: number;
}

export interface RunSummary {
  outcomes: TripOutcome[];
  requestedCutM3: number;
  appliedCutM3: number;
  requestedFillM3: number;
  appliedFillM3: number;
  survey: SurveyResult;
}
