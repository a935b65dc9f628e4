import { describe, it, expect } from 'vitest';
import { MAX_STEPS_PER_FRAME, createFixedStepClock } from '../src/app/fixedStepClock';

describe('createFixedStepClock', () => {
  it('primes on the first frame without stepping', () => {
    const clock = createFixedStepClock({ fixedDtSec: 0.25, maxFrameDtSec: 1 });
    expect(clock.advance(3)).toEqual({ dtSec: 0, stepCount: 0, stepDtSec: 0.25, alpha: 0 });
  });

  it('carries leftover time between frames', () => {
    const clock = createFixedStepClock({ fixedDtSec: 0.25, maxFrameDtSec: 1 });
    clock.advance(0);

    const a = clock.advance(0.75);
    expect(a.stepCount).toBe(3);
    expect(a.alpha).toBe(0);

    const b = clock.advance(0.875);
    expect(b.stepCount).toBe(0);
    expect(b.alpha).toBe(0.5);

    const c = clock.advance(1);
    expect(c.stepCount).toBe(1);
    expect(c.alpha).toBe(0);
  });

  it('clamps long frames and ignores time going backwards', () => {
    const clock = createFixedStepClock({ fixedDtSec: 0.25, maxFrameDtSec: 0.5 });
    clock.advance(0);
    const long = clock.advance(10);
    expect(long.dtSec).toBe(0.5);
    expect(long.stepCount).toBe(2);

    const back = clock.advance(5);
    expect(back.dtSec).toBe(0);
    expect(back.stepCount).toBe(0);
  });

  it('defaults the frame clamp to 50ms', () => {
    const clock = createFixedStepClock({ fixedDtSec: 0.0125 });
    clock.advance(0);
    expect(clock.advance(1).dtSec).toBe(0.05);
  });

  it('applies the time scale', () => {
    const clock = createFixedStepClock({ fixedDtSec: 0.25, maxFrameDtSec: 1 });
    clock.advance(0);
    expect(clock.advance(0.5, 2).stepCount).toBe(4);
    expect(clock.advance(1, 0).stepCount).toBe(0);
  });

  it('reset drops accumulated time', () => {
    const clock = createFixedStepClock({ fixedDtSec: 0.25, maxFrameDtSec: 1 });
    clock.advance(0);
    clock.advance(0.125);
    clock.reset(1);
    const adv = clock.advance(1.125);
    expect(adv.stepCount).toBe(0);
    expect(adv.alpha).toBe(0.5);
  });

  it('drops the backlog when a frame hits the step cap', () => {
    const clock = createFixedStepClock({ fixedDtSec: 0.25, maxFrameDtSec: 1 });
    clock.advance(0);

    const capped = clock.advance(1, 5000);
    expect(capped.stepCount).toBe(MAX_STEPS_PER_FRAME);
    expect(capped.alpha).toBe(0);

    const after = clock.advance(1.125);
    expect(after.stepCount).toBe(0);
    expect(after.alpha).toBe(0.5);
  });

  it('rejects a non-positive step', () => {
    expect(() => createFixedStepClock({ fixedDtSec: 0 })).toThrow(/fixedDtSec/);
  });
});
