import type { SimConfig } from '../config/simConfig';
import { APP_CONFIG } from '../config/appConfig';
import { newSim } from '../sim/simulation';
import { HeightTrace } from '../sim/heightTrace';
import { createSphereScene, syncSphereVisual, type SphereScene } from '../render/sphereVisual';
import type { AppContext } from './AppContext';
import { appTick } from './appTick';
import { createFixedStepClock, type FixedStepAdvance, type FixedStepClock } from './fixedStepClock';

export type AppOptions = {
  sim?: Partial<SimConfig>;
  log: (line: string) => void;
  nowMs: () => number;
  timeScale?: number;
};

export type App = {
  ctx: AppContext;
  clock: FixedStepClock;
  view: SphereScene;
  tick(nowSec: number): FixedStepAdvance;
};

/** Wire a fresh simulation, its scene view and the fixed-step clock together. */
export function createApp(options: AppOptions): App {
  const state = newSim(options.sim);
  const view = createSphereScene(state.sphere);
  const clock = createFixedStepClock({ fixedDtSec: APP_CONFIG.FIXED_DT, maxFrameDtSec: APP_CONFIG.MAX_FRAME_DT });

  const ctx: AppContext = {
    nowMs: options.nowMs,
    log: options.log,
    render: s => syncSphereVisual(view.sphereMesh, s.sphere),
    state,
    trace: new HeightTrace(APP_CONFIG.TRACE_CAPACITY),
    simTimeSec: 0,
    timeScale: options.timeScale ?? 1,
  };

  return {
    ctx,
    clock,
    view,
    tick: nowSec => appTick(ctx, clock, nowSec),
  };
}
