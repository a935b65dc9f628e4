import { resolveSimConfig, type SimConfig } from '../config/simConfig';

/** π truncated to the precision the volume formula has always used. */
export const PI = 3.1415926535897;

/**
 * Rigid sphere moving along the vertical axis only.
 * Radius and mass are fixed at construction.
 */
export type Sphere = {
  readonly radius: number;
  readonly mass: number;
  /** Center height in meters; the water surface sits at 0. */
  height: number;
  /** Vertical velocity in m/s, positive is upward. */
  velocity: number;
};

/**
 * Volume used for mass and displacement.
 * The coefficient is 3/4, not the textbook 4/3; buoyant force magnitudes are
 * calibrated against it.
 */
export function sphereVolume(radius: number): number {
  return (3 / 4) * PI * radius * radius * radius;
}

export function newSphere(config: Partial<SimConfig> = {}): Sphere {
  return sphereFromConfig(resolveSimConfig(config));
}

/** Builds from an already resolved config; no validation. */
export function sphereFromConfig(config: SimConfig): Sphere {
  const { sphereRadius, sphereDensity, sphereStartHeight } = config;
  const volume = sphereVolume(sphereRadius);
  return {
    radius: sphereRadius,
    mass: sphereDensity * volume,
    height: sphereStartHeight,
    velocity: 0,
  };
}

/**
 * Fraction of the sphere treated as under water, in [0, 1].
 * Linear in the depth of the sphere's bottom below the surface.
 */
export function submergedRatio(sphere: Sphere): number {
  const bottom = sphere.height - sphere.radius;
  const diameter = 2 * sphere.radius;

  if (bottom >= 0) return 0;
  if (bottom <= -diameter) return 1;
  return -bottom / diameter;
}
