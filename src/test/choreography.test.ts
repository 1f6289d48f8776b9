import { describe, it, expect } from 'vitest';
import { buildTimeline } from '../plugins/robotics/choreography/timeline';
import { createStep, Choreography } from '../plugins/robotics/choreography/ChoreographyTypes';
import { ChoreographyLibrary, checkChoreography, parseChoreography } from '../plugins/robotics/choreography/ChoreographyLibrary';

function wave(overrides: Partial<Choreography> = {}): Choreography {
  return {
    name: 'wave',
    description: 'Test wave',
    personality: 'friendly',
    steps: [createStep({ channel: 1, end: 1700, durationMs: 400 })],
    priority: 4,
    allowsInterruption: true,
    emotionalIntensity: 1,
    emergencyStopTimeMs: 500,
    audioCues: [],
    ...overrides,
  };
}

describe('buildTimeline', () => {
  it('places unsynchronized steps at their delay', () => {
    const timeline = buildTimeline([
      createStep({ channel: 0, end: 1600, durationMs: 500, delayMs: 300 }),
      createStep({ channel: 1, end: 1600, durationMs: 200, holdMs: 400 }),
    ]);

    expect(timeline.entries.map(e => [e.step.channel, e.startMs, e.endMs, e.holdEndMs])).toEqual([
      [1, 0, 200, 600],
      [0, 300, 800, 800],
    ]);
    expect(timeline.durationMs).toBe(800);
  });

  it('aligns a sync group on its latest end and applies offsets', () => {
    const greet = ChoreographyLibrary.withBuiltIns().get('greet');
    if (!greet) throw new Error('greet missing');

    const timeline = buildTimeline(greet.steps);
    const ret = timeline.entries.filter(e => e.step.syncGroup === 'return');

    expect(ret.map(e => ({ channel: e.step.channel, startMs: e.startMs, durationMs: e.durationMs }))).toEqual([
      { channel: 0, startMs: 1800, durationMs: 800 },
      { channel: 1, startMs: 2100, durationMs: 500 },
    ]);
    expect(ret.every(e => e.endMs === 2600)).toBe(true);

    const turn = timeline.entries.filter(e => e.step.syncGroup === 'turn');
    expect(turn.map(e => [e.step.channel, e.startMs, e.endMs])).toEqual([
      [0, 0, 600],
      [1, 200, 600],
    ]);
    expect(timeline.durationMs).toBe(2600);
  });

  it('aligns a sync group on paced durations', () => {
    const timeline = buildTimeline([
      createStep({ channel: 1, end: 1700, durationMs: 600, syncGroup: 'g', personalityModifier: 0.5 }),
      createStep({ channel: 2, end: 1700, durationMs: 600, syncGroup: 'g' }),
    ]);

    expect(timeline.entries.map(e => [e.step.channel, e.startMs, e.durationMs, e.endMs])).toEqual([
      [1, 0, 1200, 1200],
      [2, 600, 600, 1200],
    ]);
  });

  it('applies the run-level modifier to every step', () => {
    const timeline = buildTimeline([
      createStep({ channel: 0, end: 1600, durationMs: 400, delayMs: 100 }),
      createStep({ channel: 1, end: 1600, durationMs: 400, personalityModifier: 2 }),
    ], 2);

    expect(timeline.entries.map(e => [e.step.channel, e.startMs, e.endMs])).toEqual([
      [1, 0, 100],
      [0, 100, 300],
    ]);
    expect(timeline.durationMs).toBe(300);
  });

  it('never gives a step a negative duration', () => {
    const timeline = buildTimeline([
      createStep({ channel: 0, end: 1600, durationMs: 100, syncGroup: 'g', syncOffsetMs: 300 }),
    ]);
    expect(timeline.entries[0]).toMatchObject({ startMs: 100, durationMs: 0, endMs: 100 });
  });
});

describe('ChoreographyLibrary', () => {
  it('loads the built-in set', () => {
    const library = ChoreographyLibrary.withBuiltIns();
    expect(library.has('greet')).toBe(true);
    expect(library.has('idle')).toBe(true);
    expect(library.has('alert')).toBe(true);
    expect(library.list('calm')).toEqual(['idle']);
  });

  it('describes a choreography', () => {
    const info = ChoreographyLibrary.withBuiltIns().info('greet');
    expect(info).toMatchObject({
      name: 'greet',
      priority: 8,
      allowsInterruption: false,
      durationMs: 2800,
      stepCount: 8,
      channels: [0, 1, 8, 12],
      audioCues: 2,
    });
  });

  it('hands out copies', () => {
    const library = new ChoreographyLibrary([wave()]);
    const copy = library.get('wave');
    if (!copy) throw new Error('wave missing');
    copy.steps[0].end = 2000;
    expect(library.get('wave')?.steps[0].end).toBe(1700);
  });

  it('rejects invalid entries', () => {
    expect(checkChoreography(wave({ priority: 11 }))).toEqual(['wave: priority must be an integer 1-10']);
    expect(checkChoreography(wave({ steps: [] }))).toEqual(['wave: at least one step is required']);
    expect(() => new ChoreographyLibrary([wave({ steps: [createStep({ channel: 1, end: 1700, durationMs: 400, easing: 'wobble' })] })]))
      .toThrow('Invalid choreography wave: wave step 0: unknown easing wobble');
  });

  it('parses JSON data with defaults', () => {
    const parsed = parseChoreography({
      name: 'nod',
      steps: [{ channel: 1, end: 1400, durationMs: 300, easing: 'sine' }],
    });
    expect(parsed).toMatchObject({ name: 'nod', priority: 5, allowsInterruption: true, personality: 'neutral' });
    expect(parsed.steps[0]).toMatchObject({ easing: 'sine', delayMs: 0, holdMs: 0, personalityModifier: 1 });

    expect(() => parseChoreography({ name: 'broken', steps: [{ channel: 1 }] })).toThrow(
      'Invalid choreography broken: broken step 0: channel, end and durationMs are required; broken: at least one step is required',
    );
    expect(() => parseChoreography(42)).toThrow('Choreography must be an object with a name');
  });
});
