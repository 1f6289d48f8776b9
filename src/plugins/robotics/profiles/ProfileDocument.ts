// ═══════════════════════════════════════════════════════════════════════════════
// SERVO CORE - Profile Document
// Persisted JSON shape of a servo profile and its validation
// ═══════════════════════════════════════════════════════════════════════════════

import {
  ActuatorConfig,
  ServoLimits,
  DEFAULT_LIMITS,
  MAX_CHANNELS,
  SERVO_TYPES,
  SERVO_RANGES,
  SAFETY_TIERS,
  ServoType,
  ServoRange,
  SafetyTier,
} from '../ServoTypes';

export const PROFILE_VERSION = '2.0';

// ─────────────────────────────────────────────────────────────────────────────
// Document Types (snake_case on disk)
// ─────────────────────────────────────────────────────────────────────────────

export interface LimitsDocument {
  min_position: number;
  max_position: number;
  safe_min: number;
  safe_max: number;
  max_speed: number;
  max_acceleration: number;
  emergency_stop_speed: number;
}

export interface ServoDocument {
  channel: number;
  name: string;
  servo_type: ServoType;
  servo_range: ServoRange;
  limits: LimitsDocument;
  home_position: number;
  default_speed: number;
  default_acceleration: number;
  enabled: boolean;
  inverted: boolean;
  safety_level: SafetyTier;
}

export interface ProfileMetadataDocument {
  name: string;
  created: string;
  version: string;
  profile: string;
  total_servos: number;
}

export interface ProfileDocument {
  metadata: ProfileMetadataDocument;
  servos: Record<string, ServoDocument>;
}

export interface ParsedProfile {
  name?: string;
  profile?: string;
  created?: string;
  configs: ActuatorConfig[];
  errors: string[];
}

const DEFAULT_HOME = 1500;
const DEFAULT_SPEED = 50;
const DEFAULT_ACCELERATION = 20;

const LIMIT_FIELDS: ReadonlyArray<[keyof LimitsDocument, keyof ServoLimits]> = [
  ['min_position', 'minPosition'],
  ['max_position', 'maxPosition'],
  ['safe_min', 'safeMin'],
  ['safe_max', 'safeMax'],
  ['max_speed', 'maxSpeed'],
  ['max_acceleration', 'maxAcceleration'],
  ['emergency_stop_speed', 'emergencyStopSpeed'],
];

// ─────────────────────────────────────────────────────────────────────────────
// Serialization
// ─────────────────────────────────────────────────────────────────────────────

export function toServoDocument(config: ActuatorConfig): ServoDocument {
  const { limits } = config;
  return {
    channel: config.channel,
    name: config.name,
    servo_type: config.servoType,
    servo_range: config.servoRange,
    limits: {
      min_position: limits.minPosition,
      max_position: limits.maxPosition,
      safe_min: limits.safeMin,
      safe_max: limits.safeMax,
      max_speed: limits.maxSpeed,
      max_acceleration: limits.maxAcceleration,
      emergency_stop_speed: limits.emergencyStopSpeed,
    },
    home_position: config.homePosition,
    default_speed: config.defaultSpeed,
    default_acceleration: config.defaultAcceleration,
    enabled: config.enabled,
    inverted: config.inverted,
    safety_level: config.safetyTier,
  };
}

export function toDocument(
  configs: ActuatorConfig[],
  name: string,
  profile = 'custom',
  created: Date = new Date(),
): ProfileDocument {
  const servos: Record<string, ServoDocument> = {};
  for (const config of [...configs].sort((a, b) => a.channel - b.channel)) {
    servos[String(config.channel)] = toServoDocument(config);
  }

  return {
    metadata: {
      name,
      created: created.toISOString(),
      version: PROFILE_VERSION,
      profile,
      total_servos: configs.length,
    },
    servos,
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Parsing & Validation
// ─────────────────────────────────────────────────────────────────────────────

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return values.some(v => v === value);
}

function readNumber(
  source: Record<string, unknown>,
  key: string,
  fallback: number,
  errors: string[],
  prefix: string,
): number {
  const value = source[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    errors.push(`${prefix}: Invalid ${key}`);
    return fallback;
  }
  return value;
}

function readBoolean(source: Record<string, unknown>, key: string, fallback: boolean, errors: string[], prefix: string): boolean {
  const value = source[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') {
    errors.push(`${prefix}: Invalid ${key}`);
    return fallback;
  }
  return value;
}

function readEnum<T extends string>(
  source: Record<string, unknown>,
  key: string,
  values: readonly T[],
  fallback: T,
  errors: string[],
  prefix: string,
): T {
  const value = source[key];
  if (value === undefined) return fallback;
  if (!isOneOf(values, value)) {
    errors.push(`${prefix}: Unknown ${key} ${String(value)}`);
    return fallback;
  }
  return value;
}

function parseChannelKey(key: string): number | undefined {
  if (!/^\d+$/.test(key)) return undefined;
  const channel = parseInt(key, 10);
  return channel < MAX_CHANNELS ? channel : undefined;
}

function parseServo(channel: number, entry: Record<string, unknown>, errors: string[]): ActuatorConfig {
  const prefix = `Channel ${channel}`;

  const name = entry.name;
  if (typeof name !== 'string' || name.trim() === '') {
    errors.push(`${prefix}: Missing name`);
  }

  const limitsSource = isRecord(entry.limits) ? entry.limits : {};
  if (entry.limits !== undefined && !isRecord(entry.limits)) {
    errors.push(`${prefix}: Invalid limits`);
  }

  const limits: ServoLimits = { ...DEFAULT_LIMITS };
  for (const [docKey, key] of LIMIT_FIELDS) {
    limits[key] = readNumber(limitsSource, docKey, DEFAULT_LIMITS[key], errors, prefix);
  }

  const homePosition = readNumber(entry, 'home_position', DEFAULT_HOME, errors, prefix);

  if (limits.minPosition >= limits.maxPosition) {
    errors.push(`${prefix}: Invalid position limits`);
  }
  if (
    limits.safeMin < limits.minPosition ||
    limits.safeMax > limits.maxPosition ||
    limits.safeMin > limits.safeMax
  ) {
    errors.push(`${prefix}: Safe limits exceed position limits`);
  }
  if (homePosition < limits.minPosition || homePosition > limits.maxPosition) {
    errors.push(`${prefix}: Home position outside limits`);
  }

  return {
    channel,
    name: typeof name === 'string' ? name : '',
    servoType: readEnum(entry, 'servo_type', SERVO_TYPES, 'utility', errors, prefix),
    servoRange: readEnum(entry, 'servo_range', SERVO_RANGES, 'limited', errors, prefix),
    limits,
    homePosition,
    defaultSpeed: readNumber(entry, 'default_speed', DEFAULT_SPEED, errors, prefix),
    defaultAcceleration: readNumber(entry, 'default_acceleration', DEFAULT_ACCELERATION, errors, prefix),
    enabled: readBoolean(entry, 'enabled', true, errors, prefix),
    inverted: readBoolean(entry, 'inverted', false, errors, prefix),
    safetyTier: readEnum(entry, 'safety_level', SAFETY_TIERS, 'production', errors, prefix),
  };
}

/**
 * Parse a profile document. Problems are collected as human-readable strings;
 * `configs` holds every entry that could be read, so callers decide whether a
 * partial profile is usable.
 */
export function fromDocument(doc: unknown): ParsedProfile {
  const errors: string[] = [];
  const configs: ActuatorConfig[] = [];

  if (!isRecord(doc)) {
    return { configs, errors: ['Profile document must be a JSON object'] };
  }

  const metadata = isRecord(doc.metadata) ? doc.metadata : undefined;
  if (!metadata) {
    errors.push('Missing metadata section');
  } else if (metadata.version === undefined) {
    errors.push('Missing version in metadata');
  }

  if (!isRecord(doc.servos)) {
    errors.push('Missing servos section');
    return { configs, errors };
  }

  const seen = new Set<number>();
  for (const [key, entry] of Object.entries(doc.servos)) {
    const channel = parseChannelKey(key);
    if (channel === undefined) {
      errors.push(`Invalid channel identifier: ${key}`);
      continue;
    }
    if (seen.has(channel)) {
      errors.push(`Duplicate channel: ${channel}`);
      continue;
    }
    seen.add(channel);

    if (!isRecord(entry)) {
      errors.push(`Channel ${channel}: Invalid servo entry`);
      continue;
    }
    configs.push(parseServo(channel, entry, errors));
  }

  configs.sort((a, b) => a.channel - b.channel);

  return {
    name: typeof metadata?.name === 'string' ? metadata.name : undefined,
    profile: typeof metadata?.profile === 'string' ? metadata.profile : undefined,
    created: typeof metadata?.created === 'string' ? metadata.created : undefined,
    configs,
    errors,
  };
}

export function validateDocument(doc: unknown): string[] {
  return fromDocument(doc).errors;
}
