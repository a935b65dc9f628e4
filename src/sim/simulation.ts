import { resolveSimConfig, type SimConfig } from '../config/simConfig';
import { buoyancyForce } from './buoyancy';
import { sphereFromConfig, submergedRatio, type Sphere } from './sphere';
import { waterFromConfig, type Water } from './water';

export type SimulationState = {
  sphere: Sphere;
  water: Water;
  readonly gravity: number;
};

/** Receives the sphere height after every tick. */
export type DiagnosticSink = (height: number) => void;

/** Plain copy of a state, detached from the live one. */
export type SimulationSnapshot = {
  readonly sphere: Readonly<Sphere>;
  readonly water: Readonly<Water>;
  readonly gravity: number;
};

export function newSim(config: Partial<SimConfig> = {}): SimulationState {
  const resolved = resolveSimConfig(config);
  return {
    sphere: sphereFromConfig(resolved),
    water: waterFromConfig(resolved),
    gravity: resolved.gravity,
  };
}

/**
 * Advance the simulation by one tick, mutating `state` in place.
 *
 * Velocity is updated before position (semi-implicit Euler). Buoyancy only
 * applies while some part of the sphere is below the surface; gravity always
 * applies.
 *
 * Throws before any mutation if `elapsedSecs` is negative or not finite.
 */
export function update(state: SimulationState, elapsedSecs: number, log?: DiagnosticSink): void {
  if (!Number.isFinite(elapsedSecs) || elapsedSecs < 0) {
    throw new Error(`elapsedSecs must be a non-negative finite number (got ${elapsedSecs})`);
  }

  const { sphere, water, gravity } = state;

  const ratio = submergedRatio(sphere);
  if (ratio > 0) {
    const force = buoyancyForce(sphere, water, gravity, ratio);
    const accel = force / sphere.mass;
    sphere.velocity += accel * elapsedSecs;
  }

  sphere.velocity -= gravity * elapsedSecs;
  sphere.height += sphere.velocity * elapsedSecs;

  log?.(sphere.height);
}

export function snapshotSim(state: SimulationState): SimulationSnapshot {
  return {
    sphere: { ...state.sphere },
    water: { ...state.water },
    gravity: state.gravity,
  };
}

/** Write a snapshot's height and velocity back into `state`. */
export function restoreSim(state: SimulationState, snapshot: SimulationSnapshot): void {
  state.sphere.height = snapshot.sphere.height;
  state.sphere.velocity = snapshot.sphere.velocity;
}
