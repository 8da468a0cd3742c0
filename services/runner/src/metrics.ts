import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export const registry = new Registry();
collectDefaultMetrics({ register: registry });

export const framesTotal = new Counter({
  name: 'frames_total',
  help: 'Total number of frames driven by the loop',
  labelNames: ['phase'],
  registers: [registry],
});

export const frameDurationSeconds = new Histogram({
  name: 'frame_duration_seconds',
  help: 'Work time of a frame before pacing, in seconds',
  buckets: [0.0005, 0.001, 0.002, 0.004, 0.008, 0.016, 0.033, 0.066, 0.1],
  registers: [registry],
});

export const frameOverrunsTotal = new Counter({
  name: 'frame_overruns_total',
  help: 'Frames whose work exceeded the target frame interval',
  registers: [registry],
});

export const sessionsEndedTotal = new Counter({
  name: 'sessions_ended_total',
  help: 'Sessions that ended in a collision',
  labelNames: ['cause'],
  registers: [registry],
});

export const sessionScore = new Histogram({
  name: 'session_score',
  help: 'Final truncated score of each ended session',
  buckets: [0, 1, 2, 5, 10, 20, 50, 100, 200],
  registers: [registry],
});

export function recordFrame(phase: string, workMs: number, intervalMs: number): void {
  framesTotal.labels(phase).inc();
  frameDurationSeconds.observe(workMs / 1000);
  if (workMs > intervalMs) {
    frameOverrunsTotal.inc();
  }
}

export function recordSessionEnd(cause: string, score: number): void {
  sessionsEndedTotal.labels(cause).inc();
  sessionScore.observe(score);
}
