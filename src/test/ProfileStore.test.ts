import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { EventBus } from '../core/event-bus/EventBus';
import { ProfileStore, isValidProfileName } from '../plugins/robotics/profiles/ProfileStore';
import { fromDocument, toDocument, validateDocument } from '../plugins/robotics/profiles/ProfileDocument';
import { makeConfig, quietLogger, testConfigs } from './helpers';

describe('profile documents', () => {
  it('writes snake_case entries keyed by channel', () => {
    const doc = toDocument([makeConfig(2), makeConfig(0)], 'bench', 'custom', new Date('2025-03-01T12:00:00.000Z'));

    expect(doc.metadata).toEqual({
      name: 'bench',
      created: '2025-03-01T12:00:00.000Z',
      version: '2.0',
      profile: 'custom',
      total_servos: 2,
    });
    expect(Object.keys(doc.servos)).toEqual(['0', '2']);
    expect(doc.servos['2'].limits).toEqual({
      min_position: 992,
      max_position: 2000,
      safe_min: 1200,
      safe_max: 1800,
      max_speed: 100,
      max_acceleration: 50,
      emergency_stop_speed: 255,
    });
    expect(doc.servos['2'].safety_level).toBe('production');
  });

  it('reads back what it writes', () => {
    const configs = testConfigs();
    const parsed = fromDocument(toDocument(configs, 'bench'));
    expect(parsed.errors).toEqual([]);
    expect(parsed.configs).toEqual(configs);
    expect(parsed.name).toBe('bench');
  });

  it('fills defaults for missing fields', () => {
    const parsed = fromDocument({ metadata: { version: '2.0' }, servos: { '5': { name: 'Arm' } } });
    expect(parsed.errors).toEqual([]);
    expect(parsed.configs[0]).toMatchObject({
      channel: 5,
      name: 'Arm',
      servoType: 'utility',
      homePosition: 1500,
      enabled: true,
      safetyTier: 'production',
    });
  });

  it('collects readable errors', () => {
    expect(validateDocument('nope')).toEqual(['Profile document must be a JSON object']);
    expect(validateDocument({ servos: {} })).toEqual(['Missing metadata section']);
    expect(validateDocument({ metadata: {}, servos: {} })).toEqual(['Missing version in metadata']);
    expect(validateDocument({ metadata: { version: '2.0' } })).toEqual(['Missing servos section']);

    expect(validateDocument({
      metadata: { version: '2.0' },
      servos: {
        abc: { name: 'x' },
        '1': { name: '', limits: { min_position: 1500, max_position: 1000 } },
        '2': { name: 'Panel', servo_type: 'hovercraft', home_position: 'left' },
      },
    })).toEqual([
      'Channel 1: Missing name',
      'Channel 1: Invalid position limits',
      'Channel 1: Safe limits exceed position limits',
      'Channel 1: Home position outside limits',
      'Channel 2: Invalid home_position',
      'Channel 2: Unknown servo_type hovercraft',
      'Invalid channel identifier: abc',
    ]);
  });
});

describe('ProfileStore', () => {
  let directory: string;
  let store: ProfileStore;

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'servo-profiles-'));
    const bus = new EventBus();
    store = new ProfileStore(directory, quietLogger(bus));
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('saves and loads a profile', async () => {
    const configs = testConfigs();
    const saved = await store.save('bench', configs, 'test_rig');
    expect(saved).toEqual({ success: true, name: 'bench', path: path.join(directory, 'bench.json') });

    const loaded = await store.load('bench');
    expect(loaded.found).toBe(true);
    expect(loaded.errors).toEqual([]);
    expect(loaded.configs).toEqual(configs);
    expect(loaded.profile).toBe('test_rig');
  });

  it('lists saved profiles', async () => {
    await store.save('beta', [makeConfig(1)]);
    await store.save('alpha', testConfigs(), 'bench');

    const summaries = await store.list();
    expect(summaries.map(s => [s.name, s.profile, s.totalServos])).toEqual([
      ['alpha', 'bench', 4],
      ['beta', 'custom', 1],
    ]);
  });

  it('reports a missing profile', async () => {
    const loaded = await store.load('absent');
    expect(loaded.found).toBe(false);
    expect(loaded.configs).toEqual([]);
    expect(loaded.errors[0].startsWith('Profile not found: absent')).toBe(true);
  });

  it('reports malformed JSON', async () => {
    await fs.writeFile(path.join(directory, 'broken.json'), '{ not json', 'utf-8');
    expect(await store.load('broken')).toEqual({
      found: true,
      configs: [],
      errors: ['Profile broken is not valid JSON'],
    });
  });

  it('refuses names that could escape the directory', async () => {
    expect(isValidProfileName('../etc')).toBe(false);
    expect(isValidProfileName('dome_v2')).toBe(true);
    expect(await store.save('../etc', [])).toEqual({ success: false, name: '../etc', error: 'Invalid profile name: ../etc' });
    expect(await store.load('a/b')).toEqual({ found: false, configs: [], errors: ['Invalid profile name: a/b'] });
  });

  it('returns nothing for a directory that does not exist', async () => {
    const missing = new ProfileStore(path.join(directory, 'nested'), quietLogger(new EventBus()));
    expect(await missing.list()).toEqual([]);
  });
});
