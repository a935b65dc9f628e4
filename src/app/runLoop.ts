export type RunLoopStep = (nowSec: number) => void;

export type RunLoopDeps = {
  step: RunLoopStep;
  intervalMs: number;
  nowMs: () => number;
};

/** Drives `step` from a timer until disposed. */
export function startRunLoop(deps: RunLoopDeps): { dispose(): void } {
  const { step, intervalMs, nowMs } = deps;

  const timer = setInterval(() => step(nowMs() / 1000), intervalMs);

  return {
    dispose() {
      clearInterval(timer);
    },
  };
}
