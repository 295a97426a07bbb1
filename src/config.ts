import { z } from 'zod';
import { ConfigError } from './errors';

const positive = z.number().finite().positive();
const nonNegative = z.number().finite().nonnegative();

export const SimulationConfigSchema = z.object({
  /** Bin edge length (m); 2 ft. */
  binSizeM: positive,
  /** Blade width (m); 15 ft. */
  equipmentWidthM: positive,
  /** Hard cap on the depth a single pass may remove from one bin (m). */
  maxCutDepthM: positive,
  swell: positive,
  shrink: positive,
  /** Length of the fallback fill segment ending at the trip end point (m). */
  dumpTravelM: positive,
  yd3PerM3: positive,
  fallbackCutDepthM: positive,
  profileReferenceDepthM: positive,
  profileMinWeight: nonNegative,
  degenerateEpsilonM: nonNegative,
  gradeToleranceM: nonNegative,
});

export type SimulationConfig = z.infer<typeof SimulationConfigSchema>;

export const DEFAULT_CONFIG: SimulationConfig = {
  binSizeM: 0.6096,
  equipmentWidthM: 4.572,
  maxCutDepthM: 0.06096,
  swell: 1.3,
  shrink: 0.64,
  dumpTravelM: 5.0,
  yd3PerM3: 1.30795061931439,
  fallbackCutDepthM: 0.06096,
  profileReferenceDepthM: 0.1,
  profileMinWeight: 0.1,
  degenerateEpsilonM: 1e-6,
  gradeToleranceM: 0.1 * 0.3048,
};

export function resolveConfig(overrides: Partial<SimulationConfig> = {}): SimulationConfig {
  const result = SimulationConfigSchema.safeParse({ ...DEFAULT_CONFIG, ...overrides });
  if (!result.success) {
    throw new ConfigError(
      'Invalid simulation config',
      result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}

export function binArea(config: SimulationConfig): number {
  return config.binSizeM * config.binSizeM;
}

/** Bank to loose to compacted. */
export function netFactor(config: SimulationConfig): number {
  return config.swell * config.shrink;
}

export function bankM3(bcy: number, config: SimulationConfig): number {
  return bcy / config.yd3PerM3;
}
