// Headless host: runs the default floating sphere for a few simulated seconds,
// prints the height after every tick and a summary of the run at the end.

import { APP_CONFIG } from './config/appConfig';
import { createApp } from './app/createApp';
import { formatSummaryLine } from './app/appTick';
import { startRunLoop } from './app/runLoop';

const app = createApp({
  log: line => console.log(line),
  nowMs: () => performance.now(),
});

function finish() {
  loop.dispose();
  const summary = app.ctx.trace.summary(APP_CONFIG.SETTLE_SAMPLES);
  if (summary) console.log(formatSummaryLine(summary));
}

const loop = startRunLoop({
  intervalMs: APP_CONFIG.RUN_LOOP_INTERVAL_MS,
  nowMs: app.ctx.nowMs,
  step: nowSec => {
    try {
      app.tick(nowSec);
    } catch (err) {
      console.error('[sim] tick failed', err);
      process.exitCode = 1;
      loop.dispose();
      return;
    }
    if (app.ctx.simTimeSec >= APP_CONFIG.DEMO_SECONDS) {
      finish();
    }
  },
});
