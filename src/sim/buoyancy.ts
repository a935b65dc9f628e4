import { sphereVolume, type Sphere } from './sphere';
import type { Water } from './water';

/**
 * Upward force in newtons for the given submersion ratio.
 * Displaced volume is approximated as full volume × ratio rather than the
 * exact spherical cap.
 */
export function buoyancyForce(sphere: Sphere, water: Water, gravity: number, ratio: number): number {
  const volume = sphereVolume(sphere.radius);
  return volume * ratio * water.density * gravity;
}
