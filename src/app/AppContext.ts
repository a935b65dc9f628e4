import type { SimulationState } from '../sim/simulation';
import type { HeightTrace } from '../sim/heightTrace';

export interface RenderPort<TState> {
  render(state: TState): void;
}

/**
 * Everything a host tick touches. Ports are plain functions so tests can
 * substitute capture stubs for console and scene.
 */
export type AppContext = {
  nowMs: () => number;
  log: (line: string) => void;
  render: RenderPort<SimulationState>['render'];

  state: SimulationState;
  trace: HeightTrace;
  /** Simulated seconds elapsed since the state was created. */
  simTimeSec: number;
  timeScale: number;
};
