import { describe, it, expect, vi } from 'vitest';
import * as simConfig from '../src/config/simConfig';
import { newSim } from '../src/sim/simulation';

vi.mock('../src/config/simConfig', async importOriginal => {
  const actual = await importOriginal<typeof simConfig>();
  return { ...actual, resolveSimConfig: vi.fn(actual.resolveSimConfig) };
});

describe('newSim config resolution', () => {
  it('merges and validates the config once per simulation', () => {
    const resolve = vi.mocked(simConfig.resolveSimConfig);
    resolve.mockClear();

    const sim = newSim({ sphereRadius: 2, waterDensity: 1025 });

    expect(resolve).toHaveBeenCalledTimes(1);
    expect(resolve).toHaveBeenCalledWith({ sphereRadius: 2, waterDensity: 1025 });
    expect(sim.sphere.radius).toBe(2);
    expect(sim.water.density).toBe(1025);
  });
});
