import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { startRunLoop } from '../src/app/runLoop';

describe('startRunLoop', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('calls step with the current time in seconds until disposed', () => {
    const step = vi.fn();
    const loop = startRunLoop({ step, intervalMs: 10, nowMs: () => 2500 });

    vi.advanceTimersByTime(35);
    expect(step).toHaveBeenCalledTimes(3);
    expect(step).toHaveBeenLastCalledWith(2.5);

    loop.dispose();
    vi.advanceTimersByTime(100);
    expect(step).toHaveBeenCalledTimes(3);
  });
});
