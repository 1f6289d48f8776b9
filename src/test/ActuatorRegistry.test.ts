import { describe, it, expect, beforeEach } from 'vitest';
import { EventBus } from '../core/event-bus/EventBus';
import { ActuatorRegistry, checkConfig } from '../plugins/robotics/ActuatorRegistry';
import { createDefaultConfigs } from '../plugins/robotics/profiles/defaults';
import { makeConfig, quietLogger, testConfigs } from './helpers';

describe('checkConfig', () => {
  it('accepts a well-formed entry', () => {
    expect(checkConfig(makeConfig(4))).toEqual([]);
  });

  it('rejects inverted safe limits', () => {
    const config = makeConfig(4);
    config.limits.safeMin = 1900;
    config.limits.safeMax = 1300;
    expect(checkConfig(config)).toEqual(['Channel 4: safe_min (1900) must not exceed safe_max (1300)']);
  });

  it('rejects a safe range touching the absolute range', () => {
    const config = makeConfig(4);
    config.limits.safeMax = 2000;
    expect(checkConfig(config)).toEqual(['Channel 4: safe_max (2000) must be below max_position (2000)']);
  });

  it('rejects an out-of-range channel and a blank name', () => {
    const errors = checkConfig(makeConfig(30, { name: ' ' }));
    expect(errors).toContain('Channel 30: channel must be an integer in [0, 24)');
    expect(errors).toContain('Channel 30: name is required');
  });
});

describe('ActuatorRegistry', () => {
  let bus: EventBus;
  let registry: ActuatorRegistry;

  beforeEach(() => {
    bus = new EventBus();
    registry = new ActuatorRegistry(testConfigs(), 'production', bus, quietLogger(bus));
  });

  it('lists channels in order', () => {
    expect(registry.channels()).toEqual([0, 1, 2, 3]);
    expect(registry.size()).toBe(4);
    expect(registry.get(0)?.name).toBe('Dome Rotation');
    expect(registry.get(9)).toBeUndefined();
  });

  it('hands out copies', () => {
    const copy = registry.get(1);
    if (!copy) throw new Error('channel 1 missing');
    copy.limits.safeMax = 1999;
    expect(registry.get(1)?.limits.safeMax).toBe(1800);
  });

  it('refuses to build from an invalid profile', () => {
    const bad = makeConfig(0);
    bad.limits.safeMin = 900;
    expect(() => new ActuatorRegistry([bad], 'production', bus, quietLogger(bus))).toThrow(
      'Invalid actuator configuration: Channel 0: min_position (992) must be below safe_min (900)',
    );
  });

  it('merges a patch into an existing channel', () => {
    const result = registry.upsert(1, { name: 'Head Nod', limits: { safeMax: 1700 } });
    expect(result.ok).toBe(true);
    expect(registry.get(1)?.name).toBe('Head Nod');
    expect(registry.get(1)?.limits.safeMax).toBe(1700);
    expect(registry.get(1)?.limits.safeMin).toBe(1200);
  });

  it('leaves the channel untouched when a patch is invalid', () => {
    const result = registry.upsert(1, { limits: { safeMin: 1900 } });
    expect(result.ok).toBe(false);
    expect(registry.get(1)?.limits.safeMin).toBe(1200);
  });

  it('needs a name to create a channel', () => {
    expect(registry.upsert(7, { enabled: true })).toEqual({
      ok: false,
      errors: ['Channel 7: name is required for a new channel'],
    });
    expect(registry.upsert(7, { name: 'Utility Arm' }).ok).toBe(true);
    expect(registry.channels()).toEqual([0, 1, 2, 3, 7]);
  });

  it('disables channels missing from a replacement profile', () => {
    expect(registry.replace([makeConfig(0)]).ok).toBe(true);
    expect(registry.get(0)?.name).toBe('Servo 0');
    expect(registry.get(2)?.enabled).toBe(false);
  });

  it('rejects duplicate channels in a replacement', () => {
    expect(registry.replace([makeConfig(1), makeConfig(1)])).toEqual({
      ok: false,
      errors: ['Duplicate channel: 1'],
    });
  });

  it('switches the velocity ceilings with the tier', () => {
    const changes: string[] = [];
    bus.on<{ previous: string; tier: string }>('registry:tier_changed', (e) => {
      changes.push(`${e.payload.previous}->${e.payload.tier}`);
    });

    expect(registry.ceilings(0)).toEqual({ maxVelocity: 500, maxAcceleration: 1000 });
    registry.applySafetyTier('development');

    expect(registry.tier()).toBe('development');
    expect(registry.ceilings(0)).toEqual({ maxVelocity: 1000, maxAcceleration: 2000 });
    expect(registry.get(3)?.safetyTier).toBe('development');
    expect(registry.ceilings(12)).toBeUndefined();
    expect(changes).toEqual(['production->development']);
  });

  it('builds a valid default profile', () => {
    const defaults = createDefaultConfigs();
    expect(defaults.flatMap(checkConfig)).toEqual([]);
    expect(defaults[0].limits).toMatchObject({ minPosition: 600, maxPosition: 2400, safeMin: 800, safeMax: 2200 });
  });
});
