// ═══════════════════════════════════════════════════════════════════════════════
// SERVO CORE - Protocol Messages
// Reading untyped client JSON into queue and registry inputs
// Field names are accepted in snake_case or camelCase
// ═══════════════════════════════════════════════════════════════════════════════

import { CommandInput, SequenceInput } from '../plugins/robotics/CommandQueue';
import {
  ActuatorPatch,
  CommandKind,
  SafetyTier,
  ServoLimits,
  ServoRange,
  ServoType,
  SAFETY_TIERS,
  SERVO_RANGES,
  SERVO_TYPES,
} from '../plugins/robotics/ServoTypes';

export type Fields = Record<string, unknown>;

/** Outbound message before the timestamp is stamped on. */
export interface Reply {
  type: string;
  [key: string]: unknown;
}

export function isFields(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function errorReply(message: string): Reply {
  return { type: 'error', message };
}

// ─────────────────────────────────────────────────────────────────────────────
// Field Access
// ─────────────────────────────────────────────────────────────────────────────

function camel(name: string): string {
  return name.replace(/_([a-z])/g, (_, letter: string) => letter.toUpperCase());
}

export function pick(fields: Fields, name: string): unknown {
  return fields[name] !== undefined ? fields[name] : fields[camel(name)];
}

export function numberField(fields: Fields, name: string): number | undefined {
  const value = pick(fields, name);
  return typeof value === 'number' ? value : undefined;
}

export function stringField(fields: Fields, name: string): string | undefined {
  const value = pick(fields, name);
  return typeof value === 'string' ? value : undefined;
}

export function booleanField(fields: Fields, name: string): boolean | undefined {
  const value = pick(fields, name);
  return typeof value === 'boolean' ? value : undefined;
}

export function numberListField(fields: Fields, name: string): number[] | undefined {
  const value = pick(fields, name);
  if (!Array.isArray(value)) return undefined;
  const numbers = value.filter((item): item is number => typeof item === 'number');
  return numbers.length === value.length ? numbers : undefined;
}

function oneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return values.some(candidate => candidate === value);
}

export function isSafetyTier(value: unknown): value is SafetyTier {
  return oneOf(SAFETY_TIERS, value);
}

const COMMAND_KINDS: readonly CommandKind[] = ['position', 'speed', 'acceleration', 'emergency_stop'];

// ─────────────────────────────────────────────────────────────────────────────
// Commands & Sequences
// ─────────────────────────────────────────────────────────────────────────────

/**
 * `{channel, position, duration, delay?, easing?}`; speed and acceleration
 * commands carry `value` instead of `position`. Durations are milliseconds.
 */
export function parseCommandInput(fields: Fields): CommandInput | undefined {
  const channel = numberField(fields, 'channel');
  const rawKind = pick(fields, 'kind') ?? pick(fields, 'command_type');
  const kind: CommandKind = oneOf(COMMAND_KINDS, rawKind) ? rawKind : 'position';
  const value = kind === 'emergency_stop'
    ? 0
    : numberField(fields, 'position') ?? numberField(fields, 'value');

  if (channel === undefined || value === undefined) return undefined;

  return {
    channel,
    kind,
    value,
    durationMs: numberField(fields, 'duration') ?? numberField(fields, 'duration_ms'),
    delayMs: numberField(fields, 'delay') ?? numberField(fields, 'delay_ms'),
    easing: stringField(fields, 'easing'),
  };
}

export function parseSequenceInput(value: unknown): SequenceInput | string {
  if (!isFields(value)) return 'Missing sequence';

  const rawCommands = pick(value, 'commands');
  if (!Array.isArray(rawCommands) || rawCommands.length === 0) {
    return 'Sequence needs a non-empty commands list';
  }

  const entries: unknown[] = rawCommands;
  const commands: CommandInput[] = [];
  for (const [index, raw] of entries.entries()) {
    const command = isFields(raw) ? parseCommandInput(raw) : undefined;
    if (!command) return `Command ${index}: missing channel or position`;
    commands.push(command);
  }

  return {
    name: stringField(value, 'name'),
    commands,
    loop: booleanField(value, 'loop'),
    loopCount: numberField(value, 'loop_count'),
    priority: numberField(value, 'priority'),
    allowsInterruption: booleanField(value, 'allows_interruption'),
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Patches
// ─────────────────────────────────────────────────────────────────────────────

const LIMIT_KEYS: ReadonlyArray<[string, keyof ServoLimits]> = [
  ['min_position', 'minPosition'],
  ['max_position', 'maxPosition'],
  ['safe_min', 'safeMin'],
  ['safe_max', 'safeMax'],
  ['max_speed', 'maxSpeed'],
  ['max_acceleration', 'maxAcceleration'],
  ['emergency_stop_speed', 'emergencyStopSpeed'],
];

/** Read a partial actuator config. Unknown or mistyped fields are reported. */
export function parseActuatorPatch(fields: Fields): { patch: ActuatorPatch; errors: string[] } {
  const patch: ActuatorPatch = {};
  const errors: string[] = [];

  const name = pick(fields, 'name');
  if (name !== undefined) {
    if (typeof name === 'string') patch.name = name;
    else errors.push('name must be a string');
  }

  const servoType = pick(fields, 'servo_type');
  if (servoType !== undefined) {
    if (oneOf<ServoType>(SERVO_TYPES, servoType)) patch.servoType = servoType;
    else errors.push(`Unknown servo_type ${String(servoType)}`);
  }

  const servoRange = pick(fields, 'servo_range');
  if (servoRange !== undefined) {
    if (oneOf<ServoRange>(SERVO_RANGES, servoRange)) patch.servoRange = servoRange;
    else errors.push(`Unknown servo_range ${String(servoRange)}`);
  }

  for (const [key, target] of [
    ['home_position', 'homePosition'],
    ['default_speed', 'defaultSpeed'],
    ['default_acceleration', 'defaultAcceleration'],
  ] as const) {
    const value = pick(fields, key);
    if (value === undefined) continue;
    if (typeof value === 'number') patch[target] = value;
    else errors.push(`${key} must be a number`);
  }

  for (const key of ['enabled', 'inverted'] as const) {
    const value = pick(fields, key);
    if (value === undefined) continue;
    if (typeof value === 'boolean') patch[key] = value;
    else errors.push(`${key} must be a boolean`);
  }

  const limits = pick(fields, 'limits');
  if (limits !== undefined) {
    if (!isFields(limits)) {
      errors.push('limits must be an object');
    } else {
      const limitPatch: Partial<ServoLimits> = {};
      for (const [key, target] of LIMIT_KEYS) {
        const value = pick(limits, key);
        if (value === undefined) continue;
        if (typeof value === 'number') limitPatch[target] = value;
        else errors.push(`limits.${key} must be a number`);
      }
      patch.limits = limitPatch;
    }
  }

  return { patch, errors };
}
