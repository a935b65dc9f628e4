export const APP_CONFIG = {
  // Simulation fixed timestep.
  FIXED_DT: 1 / 60,
  // Longest wall-clock gap fed into the clock per frame.
  MAX_FRAME_DT: 0.05,

  // Host loop timer.
  RUN_LOOP_INTERVAL_MS: 1000 / 60,

  // Simulated seconds the demo entry point runs for.
  DEMO_SECONDS: 5,

  // Height trace: ten seconds of fixed steps, last second averaged for the settled height.
  TRACE_CAPACITY: 600,
  SETTLE_SAMPLES: 60,

  // Scene defaults.
  WATER_PLANE_SIZE: 20,
  SPHERE_SEGMENTS: 24,
} as const;
