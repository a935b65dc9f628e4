import type { AppContext } from './AppContext';
import type { FixedStepAdvance, FixedStepClock } from './fixedStepClock';
import { update } from '../sim/simulation';
import type { TraceSummary } from '../sim/heightTrace';

export function formatTickLine(simTimeSec: number, height: number): string {
  return `t=${simTimeSec.toFixed(3)} height=${height.toFixed(4)}`;
}

export function formatSummaryLine(summary: TraceSummary): string {
  const { samples, minHeight, maxHeight, settledHeight, finalVelocity } = summary;
  return (
    `samples=${samples} min=${minHeight.toFixed(4)} max=${maxHeight.toFixed(4)} ` +
    `settled=${settledHeight.toFixed(4)} velocity=${finalVelocity.toFixed(4)}`
  );
}

/**
 * Per-frame host tick: runs as many fixed sim steps as the clock hands out,
 * records and logs each resulting height, then renders once.
 */
export function appTick(ctx: AppContext, clock: FixedStepClock, nowSec: number): FixedStepAdvance {
  const adv = clock.advance(nowSec, ctx.timeScale);

  for (let i = 0; i < adv.stepCount; i++) {
    const t = ctx.simTimeSec + adv.stepDtSec;
    update(ctx.state, adv.stepDtSec, height => {
      ctx.trace.push({ t, height, velocity: ctx.state.sphere.velocity });
      ctx.log(formatTickLine(t, height));
    });
    ctx.simTimeSec = t;
  }

  ctx.render(ctx.state);
  return adv;
}
