// ═══════════════════════════════════════════════════════════════════════════════
// SERVO CORE - Motion Interpolator
// Pure position-over-time math; no I/O, no clocks
// ═══════════════════════════════════════════════════════════════════════════════

import { getEasing } from './easing';

/** Progress window in which the overshoot bump is applied. */
export const OVERSHOOT_WINDOW = { start: 0.3, end: 0.8 } as const;

export interface TrajectoryPoint {
  timeMs: number;
  position: number;
}

/**
 * Position at normalized time `t` between `start` and `end`. The endpoints
 * are exact; overshoot adds a half-sine bump of `overshootFactor × (end − start)`
 * inside the 30%–80% window on top of any easing.
 */
export function position(
  t: number,
  start: number,
  end: number,
  easing = 'linear',
  overshootFactor = 0,
): number {
  if (!(t > 0)) return start;
  if (t >= 1) return end;

  const travel = end - start;
  let value = start + travel * getEasing(easing)(t);

  if (overshootFactor > 0 && t > OVERSHOOT_WINDOW.start && t < OVERSHOOT_WINDOW.end) {
    const span = OVERSHOOT_WINDOW.end - OVERSHOOT_WINDOW.start;
    value += travel * overshootFactor * Math.sin(((t - OVERSHOOT_WINDOW.start) * Math.PI) / span);
  }

  return value;
}

export function clampToRange(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Sampled positions of one move at `rateHz`, always ending on `end`. */
export function sampleTrajectory(
  start: number,
  end: number,
  durationMs: number,
  easing = 'linear',
  rateHz = 60,
  overshootFactor = 0,
): TrajectoryPoint[] {
  if (durationMs <= 0) {
    return [{ timeMs: 0, position: end }];
  }

  const stepMs = 1000 / rateHz;
  const points: TrajectoryPoint[] = [];
  for (let timeMs = 0; timeMs < durationMs; timeMs += stepMs) {
    points.push({ timeMs, position: position(timeMs / durationMs, start, end, easing, overshootFactor) });
  }
  points.push({ timeMs: durationMs, position: end });

  return points;
}
