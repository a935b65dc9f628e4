import { resolveSimConfig, type SimConfig } from '../config/simConfig';

export type Water = {
  readonly density: number;
};

export function newWater(config: Partial<SimConfig> = {}): Water {
  return waterFromConfig(resolveSimConfig(config));
}

export function waterFromConfig(config: SimConfig): Water {
  return { density: config.waterDensity };
}
