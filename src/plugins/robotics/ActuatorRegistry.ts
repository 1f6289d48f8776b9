// ═══════════════════════════════════════════════════════════════════════════════
// SERVO CORE - Actuator Registry
// Per-channel static configuration and the active safety tier
// ═══════════════════════════════════════════════════════════════════════════════

import { EventBus } from '../../core/event-bus/EventBus';
import { Logger } from '../../core/logging/Logger';
import {
  ActuatorConfig,
  ActuatorPatch,
  MotionCeilings,
  SafetyTier,
  ServoLimits,
  DEFAULT_LIMITS,
  MAX_CHANNELS,
  TIER_CEILINGS,
  cloneConfig,
} from './ServoTypes';

export type RegistryResult =
  | { ok: true; config: ActuatorConfig }
  | { ok: false; errors: string[] };

export function isValidChannel(channel: number): boolean {
  return Number.isInteger(channel) && channel >= 0 && channel < MAX_CHANNELS;
}

/**
 * Invariant checks for one entry: `min < safeMin <= safeMax < max` and the
 * home position inside the absolute range.
 */
export function checkConfig(config: ActuatorConfig): string[] {
  const errors: string[] = [];
  const { limits } = config;
  const prefix = `Channel ${config.channel}`;

  if (!isValidChannel(config.channel)) {
    errors.push(`${prefix}: channel must be an integer in [0, ${MAX_CHANNELS})`);
  }
  if (typeof config.name !== 'string' || config.name.trim() === '') {
    errors.push(`${prefix}: name is required`);
  }

  const numeric: Array<[string, number]> = [
    ['min_position', limits.minPosition],
    ['max_position', limits.maxPosition],
    ['safe_min', limits.safeMin],
    ['safe_max', limits.safeMax],
    ['max_speed', limits.maxSpeed],
    ['max_acceleration', limits.maxAcceleration],
    ['emergency_stop_speed', limits.emergencyStopSpeed],
    ['home_position', config.homePosition],
    ['default_speed', config.defaultSpeed],
    ['default_acceleration', config.defaultAcceleration],
  ];
  for (const [field, value] of numeric) {
    if (!Number.isFinite(value)) errors.push(`${prefix}: ${field} must be a finite number`);
  }

  if (!(limits.minPosition < limits.safeMin)) {
    errors.push(`${prefix}: min_position (${limits.minPosition}) must be below safe_min (${limits.safeMin})`);
  }
  if (!(limits.safeMin <= limits.safeMax)) {
    errors.push(`${prefix}: safe_min (${limits.safeMin}) must not exceed safe_max (${limits.safeMax})`);
  }
  if (!(limits.safeMax < limits.maxPosition)) {
    errors.push(`${prefix}: safe_max (${limits.safeMax}) must be below max_position (${limits.maxPosition})`);
  }
  if (config.homePosition < limits.minPosition || config.homePosition > limits.maxPosition) {
    errors.push(`${prefix}: home_position (${config.homePosition}) outside [${limits.minPosition}, ${limits.maxPosition}]`);
  }
  if (limits.maxSpeed < 0 || limits.maxAcceleration < 0) {
    errors.push(`${prefix}: speed and acceleration limits must not be negative`);
  }

  return errors;
}

export class ActuatorRegistry {
  private configs: Map<number, ActuatorConfig> = new Map();
  private currentTier: SafetyTier;

  constructor(
    configs: ActuatorConfig[],
    tier: SafetyTier,
    private readonly bus: EventBus,
    private readonly logger: Logger,
  ) {
    this.currentTier = tier;
    const result = this.replace(configs);
    if (!result.ok) {
      throw new Error(`Invalid actuator configuration: ${result.errors.join('; ')}`);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Lookup
  // ─────────────────────────────────────────────────────────────────────────

  get(channel: number): ActuatorConfig | undefined {
    const config = this.configs.get(channel);
    return config ? cloneConfig(config) : undefined;
  }

  has(channel: number): boolean {
    return this.configs.has(channel);
  }

  all(): ActuatorConfig[] {
    return Array.from(this.configs.values())
      .sort((a, b) => a.channel - b.channel)
      .map(cloneConfig);
  }

  channels(): number[] {
    return Array.from(this.configs.keys()).sort((a, b) => a - b);
  }

  size(): number {
    return this.configs.size;
  }

  tier(): SafetyTier {
    return this.currentTier;
  }

  ceilings(channel: number): MotionCeilings | undefined {
    if (!this.configs.has(channel)) return undefined;
    return { ...TIER_CEILINGS[this.currentTier] };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Reconfiguration
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Merge a patch into a channel. An unknown channel is created from the
   * defaults and must at least be given a name. Nothing changes on error.
   */
  upsert(channel: number, patch: ActuatorPatch): RegistryResult {
    if (!isValidChannel(channel)) {
      return { ok: false, errors: [`Channel ${channel}: channel must be an integer in [0, ${MAX_CHANNELS})`] };
    }

    const existing = this.configs.get(channel);
    if (!existing && patch.name === undefined) {
      return { ok: false, errors: [`Channel ${channel}: name is required for a new channel`] };
    }

    const base: ActuatorConfig = existing ?? {
      channel,
      name: '',
      servoType: 'utility',
      servoRange: 'limited',
      limits: { ...DEFAULT_LIMITS },
      homePosition: 1500,
      defaultSpeed: 50,
      defaultAcceleration: 20,
      enabled: true,
      inverted: false,
      safetyTier: this.currentTier,
    };

    const { limits: limitsPatch, ...fields } = patch;
    const limits: ServoLimits = { ...base.limits, ...limitsPatch };
    const candidate: ActuatorConfig = { ...base, ...fields, channel, limits };

    const errors = checkConfig(candidate);
    if (errors.length > 0) {
      this.logger.warn(`Rejected update for channel ${channel}: ${errors[0]}`, { errors });
      return { ok: false, errors };
    }

    this.configs.set(channel, candidate);
    this.logger.info(`${existing ? 'Updated' : 'Added'} channel ${channel} (${candidate.name})`);
    this.bus.emit('registry:updated', { channel, config: cloneConfig(candidate) }, { source: 'registry' });

    return { ok: true, config: cloneConfig(candidate) };
  }

  /** Load a whole profile. Every entry is checked before any is applied. */
  replace(configs: ActuatorConfig[]): { ok: true } | { ok: false; errors: string[] } {
    const errors: string[] = [];
    const seen = new Set<number>();

    for (const config of configs) {
      if (seen.has(config.channel)) {
        errors.push(`Duplicate channel: ${config.channel}`);
      }
      seen.add(config.channel);
      errors.push(...checkConfig(config));
    }

    if (errors.length > 0) return { ok: false, errors };

    // Channels absent from the new profile are disabled, never removed
    for (const [channel, config] of this.configs) {
      if (!seen.has(channel)) {
        this.configs.set(channel, { ...config, enabled: false });
      }
    }
    for (const config of configs) {
      this.configs.set(config.channel, cloneConfig(config));
    }

    this.bus.emit('registry:updated', { channels: Array.from(seen).sort((a, b) => a - b) }, { source: 'registry' });
    return { ok: true };
  }

  /**
   * Switch the velocity/acceleration policy for every channel. Position
   * limits are untouched.
   */
  applySafetyTier(tier: SafetyTier): void {
    const previous = this.currentTier;
    this.currentTier = tier;

    for (const [channel, config] of this.configs) {
      this.configs.set(channel, { ...config, safetyTier: tier });
    }

    const ceilings = TIER_CEILINGS[tier];
    this.logger.info(
      `Safety tier ${previous} -> ${tier} (velocity ${ceilings.maxVelocity}/s, acceleration ${ceilings.maxAcceleration}/s²)`,
    );
    this.bus.emit('registry:tier_changed', { previous, tier, ceilings: { ...ceilings } }, { source: 'registry' });
  }
}
