export * from './types';
export * from './config';
export * from './errors';
export * from './log';
export * from './projection';
export * from './binning';
export * from './lattice';
export * from './profile';
export * from './geometry';
export * from './footprint';
export * from './distribute';
export * from './tin';
export * from './earthworks';
export * from './mesh';
export * from './ingest';
export * from './csv';
export * from './evolution';
