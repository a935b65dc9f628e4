export type FixedStepClockConfig = {
  fixedDtSec: number;
  maxFrameDtSec?: number;
};

export type FixedStepAdvance = {
  dtSec: number;
  stepCount: number;
  stepDtSec: number;
  alpha: number; // leftover fraction in [0..1)
};

export type FixedStepClock = {
  advance(nowSec: number, timeScale?: number): FixedStepAdvance;
  reset(nowSec: number): void;
};

// Upper bound on steps per frame so a huge timeScale cannot stall the host.
export const MAX_STEPS_PER_FRAME = 10_000;

/**
 * Converts variable-rate wall-clock frames into a fixed-step schedule.
 * The first call only records the timestamp.
 */
export function createFixedStepClock(config: FixedStepClockConfig): FixedStepClock {
  const { fixedDtSec } = config;
  const maxFrameDtSec = config.maxFrameDtSec ?? 0.05;
  if (!(fixedDtSec > 0) || !Number.isFinite(fixedDtSec)) {
    throw new Error(`fixedDtSec must be a positive finite number (got ${fixedDtSec})`);
  }

  let lastNowSec = NaN;
  let accSec = 0;

  const idle = (dtSec: number): FixedStepAdvance => ({ dtSec, stepCount: 0, stepDtSec: fixedDtSec, alpha: 0 });

  return {
    advance(nowSec, timeScale = 1) {
      if (!Number.isFinite(lastNowSec)) {
        lastNowSec = nowSec;
        return idle(0);
      }

      const dtSec = Math.max(0, Math.min(maxFrameDtSec, nowSec - lastNowSec));
      lastNowSec = nowSec;
      accSec += dtSec * Math.max(0, timeScale);

      let stepCount = 0;
      while (accSec >= fixedDtSec && stepCount < MAX_STEPS_PER_FRAME) {
        accSec -= fixedDtSec;
        stepCount++;
      }
      // Backlog past the cap is dropped, not carried into later frames.
      if (stepCount === MAX_STEPS_PER_FRAME && accSec >= fixedDtSec) accSec = 0;

      return { dtSec, stepCount, stepDtSec: fixedDtSec, alpha: accSec / fixedDtSec };
    },

    reset(nowSec) {
      lastNowSec = nowSec;
      accSec = 0;
    },
  };
}
