/**
 * Physical constants for a simulation run. Injected at construction so the
 * defaults below can be varied per run or per test.
 */
export type SimConfig = {
  /** Sphere radius in meters. */
  sphereRadius: number;
  /** Sphere density in kg/m³; mass is derived from it. */
  sphereDensity: number;
  /** Initial height of the sphere's center in meters (water surface is 0). */
  sphereStartHeight: number;
  /** Water density in kg/m³. */
  waterDensity: number;
  /** Magnitude of gravitational acceleration in m/s². */
  gravity: number;
};

export const DEFAULT_SIM_CONFIG: Readonly<SimConfig> = {
  sphereRadius: 1.0,
  sphereDensity: 250.0,
  sphereStartHeight: 1.0,
  waterDensity: 1000.0,
  gravity: 9.81,
};

const POSITIVE_FIELDS = ['sphereRadius', 'sphereDensity', 'waterDensity', 'gravity'] as const;

/**
 * Merge a partial config over the defaults and validate it.
 * Throws if a field would break the sphere/water invariants.
 */
export function resolveSimConfig(partial: Partial<SimConfig> = {}): SimConfig {
  const config: SimConfig = { ...DEFAULT_SIM_CONFIG, ...partial };

  for (const key of POSITIVE_FIELDS) {
    const v = config[key];
    if (!Number.isFinite(v) || v <= 0) {
      throw new Error(`Invalid simulation config: ${key} must be a positive finite number (got ${v})`);
    }
  }
  if (!Number.isFinite(config.sphereStartHeight)) {
    throw new Error(
      `Invalid simulation config: sphereStartHeight must be a finite number (got ${config.sphereStartHeight})`
    );
  }

  return config;
}
