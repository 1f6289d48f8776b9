import { describe, it, expect } from 'vitest';
import { EASING_NAMES, getEasing, resolveEasingName, isEasingName } from '../plugins/robotics/motion/easing';
import { position, sampleTrajectory, clampToRange } from '../plugins/robotics/motion/MotionInterpolator';

describe('easing curves', () => {
  it('exposes the full curve set', () => {
    expect(EASING_NAMES).toHaveLength(34);
    expect(EASING_NAMES).toContain('mechanical');
    expect(EASING_NAMES).toContain('bounce_in_out');
  });

  it.each(EASING_NAMES)('%s maps 0 to 0 and 1 to 1', (name) => {
    const ease = getEasing(name);
    expect(ease(0)).toBe(0);
    expect(ease(1)).toBe(1);
  });

  it('clamps input outside [0, 1]', () => {
    const ease = getEasing('ease_in');
    expect(ease(-0.5)).toBe(0);
    expect(ease(Number.NaN)).toBe(0);
    expect(ease(1.7)).toBe(1);
  });

  it('computes the mechanical smoothstep', () => {
    const ease = getEasing('mechanical');
    expect(ease(0.5)).toBe(0.5);
    expect(ease(0.25)).toBe(0.15625);
  });

  it('computes quadratic values', () => {
    expect(getEasing('ease_in')(0.5)).toBe(0.25);
    expect(getEasing('ease_out')(0.5)).toBe(0.75);
    expect(getEasing('ease_in_out')(0.25)).toBe(0.125);
  });

  it('falls back to linear for unknown names', () => {
    expect(getEasing('wobble')(0.4)).toBe(0.4);
  });

  it('resolves aliases', () => {
    expect(resolveEasingName('cubic')).toBe('cubic_in');
    expect(resolveEasingName('bounce')).toBe('bounce_out');
    expect(resolveEasingName('linear')).toBe('linear');
    expect(resolveEasingName('wobble')).toBeUndefined();
    expect(isEasingName('cubic')).toBe(false);
  });
});

describe('position interpolation', () => {
  it('returns exact endpoints', () => {
    expect(position(0, 1000, 2000, 'elastic_out', 0.2)).toBe(1000);
    expect(position(1, 1000, 2000, 'elastic_out', 0.2)).toBe(2000);
    expect(position(-1, 1000, 2000)).toBe(1000);
    expect(position(2, 1000, 2000)).toBe(2000);
  });

  it('interpolates linearly by default', () => {
    expect(position(0.5, 1000, 2000)).toBe(1500);
    expect(position(0.25, 2000, 1000)).toBe(1750);
  });

  it('adds the overshoot bump only inside the window', () => {
    expect(position(0.2, 1000, 2000, 'linear', 0.1)).toBe(1200);
    expect(position(0.9, 1000, 2000, 'linear', 0.1)).toBe(1900);
    // Peak of the half-sine sits at the window centre
    expect(position(0.55, 1000, 2000, 'linear', 0.1)).toBeCloseTo(1650, 9);
  });

  it('samples a trajectory that ends on the target', () => {
    const points = sampleTrajectory(1000, 2000, 100, 'linear', 50);
    expect(points).toEqual([
      { timeMs: 0, position: 1000 },
      { timeMs: 20, position: 1200 },
      { timeMs: 40, position: 1400 },
      { timeMs: 60, position: 1600 },
      { timeMs: 80, position: 1800 },
      { timeMs: 100, position: 2000 },
    ]);
  });

  it('treats a zero duration as a jump', () => {
    expect(sampleTrajectory(1000, 1500, 0)).toEqual([{ timeMs: 0, position: 1500 }]);
  });

  it('clamps to a range', () => {
    expect(clampToRange(2300, 800, 2200)).toBe(2200);
    expect(clampToRange(500, 800, 2200)).toBe(800);
    expect(clampToRange(1500, 800, 2200)).toBe(1500);
  });
});
