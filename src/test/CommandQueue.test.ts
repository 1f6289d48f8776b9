import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Harness, createHarness } from './helpers';

describe('CommandQueue', () => {
  let h: Harness;

  beforeEach(async () => {
    vi.useFakeTimers();
    h = await createHarness();
    await h.engine.start();
    h.queue.start();
  });

  afterEach(() => {
    h.queue.dispose();
    h.engine.dispose();
    vi.useRealTimers();
  });

  describe('single commands', () => {
    it('accepts a clamped move and drives it to the clamped target', async () => {
      const result = h.queue.submitCommand({ channel: 0, value: 2300, durationMs: 2000 });

      expect(result).toMatchObject({ accepted: true, adjusted: true, value: 2200 });
      if (!result.accepted) return;
      expect(h.queue.status(result.id)).toBe('pending');

      await vi.advanceTimersByTimeAsync(100);
      expect(h.queue.status(result.id)).toBe('running');

      await vi.advanceTimersByTimeAsync(2200);
      expect(h.queue.status(result.id)).toBe('completed');
      const moves = h.driver.movesFor(0);
      expect(moves[moves.length - 1]).toBe(2200);
    });

    it('rejects a move that is too fast and never touches the driver', async () => {
      const result = h.queue.submitCommand({ channel: 1, value: 2500, durationMs: 100 });

      expect(result).toMatchObject({
        accepted: false,
        reason: 'velocity limit exceeded',
        detail: 'Velocity 3000.0/s exceeds limit 500/s on channel 1',
      });
      expect(h.queue.status(result.id)).toBe('rejected');

      await vi.advanceTimersByTimeAsync(300);
      expect(h.driver.movesFor(1)).toEqual([]);
    });

    it('rejects unknown channels', () => {
      expect(h.queue.submitCommand({ channel: 9, value: 1500 })).toMatchObject({
        accepted: false,
        reason: 'unknown channel',
        detail: 'Channel 9 is not configured',
      });
    });

    it('dispatches by effective time rather than submission order', async () => {
      const running: string[] = [];
      h.bus.on<{ id: string; status: string }>('queue:status', (e) => {
        if (e.payload.status === 'running') running.push(e.payload.id);
      });

      const ids = [300, 0, 150].map((delayMs, index) => {
        const result = h.queue.submitCommand({ channel: index + 1, value: 1600, delayMs });
        if (!result.accepted) throw new Error(`command ${index} rejected`);
        return result.id;
      });

      await vi.advanceTimersByTimeAsync(400);

      expect(running).toEqual([ids[1], ids[2], ids[0]]);
    });

    it('applies speed commands to the channel configuration', async () => {
      const result = h.queue.submitCommand({ channel: 1, kind: 'speed', value: 80 });
      expect(result.accepted).toBe(true);

      await vi.advanceTimersByTimeAsync(100);

      expect(h.queue.status(result.id)).toBe('completed');
      expect(h.registry.get(1)?.defaultSpeed).toBe(80);
    });
  });

  describe('cancellation', () => {
    it('cancels a pending command before it reaches the driver', async () => {
      const result = h.queue.submitCommand({ channel: 3, value: 1600, delayMs: 500 });

      expect(h.queue.cancel(result.id)).toBe(true);
      expect(h.queue.cancel(result.id)).toBe(false);

      await vi.advanceTimersByTimeAsync(700);
      expect(h.queue.status(result.id)).toBe('cancelled');
      expect(h.driver.movesFor(3)).toEqual([]);
    });

    it('stops a running command', async () => {
      const result = h.queue.submitCommand({ channel: 3, value: 1900 });
      await vi.advanceTimersByTimeAsync(100);
      expect(h.queue.status(result.id)).toBe('running');

      expect(h.queue.cancel(result.id)).toBe(true);

      expect(h.queue.status(result.id)).toBe('cancelled');
      expect(h.engine.getRunStatus(result.id)).toMatchObject({ state: 'stopped', reason: 'Stopped by request' });
    });

    it('reports unknown ids', () => {
      expect(h.queue.cancel('cmd_missing')).toBe(false);
      expect(h.queue.status('cmd_missing')).toBe('not_found');
    });
  });

  describe('sequences', () => {
    it('runs a validated sequence to completion', async () => {
      const result = h.queue.submitSequence({
        name: 'tilt',
        commands: [
          { channel: 1, value: 1700, durationMs: 500 },
          { channel: 1, value: 1400, durationMs: 1000, delayMs: 600 },
        ],
      });
      expect(result).toMatchObject({ accepted: true, adjusted: false });

      await vi.advanceTimersByTimeAsync(1800);

      expect(h.queue.get(result.id)).toMatchObject({ kind: 'sequence', name: 'tilt', status: 'completed' });
      const moves = h.driver.movesFor(1);
      expect(moves[moves.length - 1]).toBe(1400);
      expect(Math.max(...moves)).toBe(1700);
    });

    it('checks velocity from the previous target on each channel', () => {
      const result = h.queue.submitSequence({
        commands: [
          { channel: 1, value: 1300, durationMs: 500, delayMs: 600 },
          { channel: 1, value: 1700, durationMs: 500 },
        ],
      });

      expect(result).toMatchObject({
        accepted: false,
        reason: 'velocity limit exceeded',
        detail: 'Velocity 800.0/s exceeds limit 500/s on channel 1',
      });
    });

    it('rejects malformed sequences', () => {
      expect(h.queue.submitSequence({ commands: [] })).toMatchObject({
        accepted: false,
        reason: 'invalid value',
        detail: 'Sequence has no commands',
      });
      expect(h.queue.submitSequence({ commands: [{ channel: 9, value: 1500 }, { channel: 1, value: 1500 }] })).toMatchObject({
        accepted: false,
        reason: 'unknown channel',
        detail: 'Unknown channel(s): 9',
      });
      expect(h.queue.submitSequence({ commands: [{ channel: 1, kind: 'emergency_stop', value: 0 }] })).toMatchObject({
        accepted: false,
        detail: 'emergency_stop cannot be sequenced',
      });
      expect(h.queue.submitSequence({ priority: 11, commands: [{ channel: 1, value: 1500 }] })).toMatchObject({
        accepted: false,
        detail: 'Priority must be an integer 1-10',
      });
      expect(h.validator.isEmergencyStopped()).toBe(false);
    });

    it('holds a second sequence until the first finishes', async () => {
      const first = h.queue.submitSequence({ name: 'first', commands: [{ channel: 1, value: 1600, durationMs: 400 }] });
      const second = h.queue.submitSequence({ name: 'second', commands: [{ channel: 2, value: 1600, durationMs: 400 }] });

      await vi.advanceTimersByTimeAsync(100);
      expect(h.queue.status(first.id)).toBe('running');
      expect(h.queue.status(second.id)).toBe('pending');

      await vi.advanceTimersByTimeAsync(1200);
      expect(h.queue.status(first.id)).toBe('completed');
      expect(h.queue.status(second.id)).toBe('completed');
    });

    it('reports a preempted sequence apart from failures', async () => {
      const result = h.queue.submitSequence({ name: 'sweep', commands: [{ channel: 0, value: 1800, durationMs: 1000 }] });
      await vi.advanceTimersByTimeAsync(100);

      expect(h.engine.execute('alert').started).toBe(true);

      expect(h.queue.get(result.id)).toMatchObject({ status: 'preempted', reason: 'Preempted by alert' });
      expect(h.queue.getStats()).toMatchObject({ preempted: 1, failed: 0 });
    });
  });

  describe('emergency stop', () => {
    it('latches through an emergency_stop command and fails pending work', async () => {
      const pending = h.queue.submitCommand({ channel: 2, value: 1600, delayMs: 1000 });
      const stop = h.queue.submitCommand({ channel: 0, kind: 'emergency_stop', value: 0 });

      expect(stop).toMatchObject({ accepted: true, adjusted: false });
      expect(h.validator.isEmergencyStopped()).toBe(true);
      expect(h.queue.get(pending.id)).toMatchObject({
        status: 'failed',
        reason: 'Emergency stop: emergency_stop command',
      });

      expect(h.queue.submitCommand({ channel: 1, value: 1500 })).toMatchObject({
        accepted: false,
        reason: 'emergency stop active',
      });

      await vi.advanceTimersByTimeAsync(1200);
      expect(h.driver.movesFor(2)).toEqual([]);
    });
  });

  it('counts items by status', async () => {
    h.queue.submitCommand({ channel: 1, value: 1600 });
    h.queue.submitCommand({ channel: 9, value: 1600 });
    const cancelled = h.queue.submitCommand({ channel: 2, value: 1600, delayMs: 500 });
    h.queue.cancel(cancelled.id);

    expect(h.queue.getStats()).toEqual({
      pending: 1,
      running: 0,
      completed: 0,
      failed: 0,
      preempted: 0,
      cancelled: 1,
      rejected: 1,
      total: 3,
      dispatching: true,
    });
    expect(h.queue.list({ status: 'rejected' })).toHaveLength(1);
  });
});
