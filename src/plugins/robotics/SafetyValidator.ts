// ═══════════════════════════════════════════════════════════════════════════════
// SERVO CORE - Safety Validator
// Command admission, post-write limit monitoring and the emergency stop
// States: NORMAL -> EMERGENCY_STOPPED -> (explicit reset) -> NORMAL
// ═══════════════════════════════════════════════════════════════════════════════

import { EventBus } from '../../core/event-bus/EventBus';
import { Logger } from '../../core/logging/Logger';
import { generateId } from '../../core/ids';
import { ActuatorRegistry } from './ActuatorRegistry';
import {
  ActuatorConfig,
  SafetyState,
  SafetyViolation,
  SafetyZone,
  ServoCommand,
  ViolationSeverity,
  ViolationType,
  SYSTEM_CHANNEL,
  TIER_CEILINGS,
} from './ServoTypes';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type RejectionReason =
  | 'unknown channel'
  | 'channel disabled'
  | 'emergency stop active'
  | 'invalid value'
  | 'velocity limit exceeded'
  | 'speed limit exceeded'
  | 'acceleration limit exceeded'
  | 'safety zone violation';

export type ValidationResult =
  | { accepted: true; command: ServoCommand; adjusted: boolean; requestedValue: number }
  | { accepted: false; command: ServoCommand; reason: RejectionReason; detail: string };

export interface ValidateOptions {
  /** Start position for the velocity check instead of the last observed one. */
  fromPosition?: number;
}

export interface SafetyValidatorOptions {
  violationRetentionMs?: number;
  instantMoveWindowMs?: number;
  escalateZoneViolations?: boolean;
}

export interface ResetResult {
  success: boolean;
  message: string;
}

export interface PositionRange {
  min: number;
  max: number;
}

export interface SafetyStatus {
  state: SafetyState;
  emergencyStopActive: boolean;
  emergencyStopReason?: string;
  tier: string;
  velocityLimit: number;
  accelerationLimit: number;
  totalViolations: number;
  recentViolations: number;
  unresolvedCritical: number;
  safetyZones: SafetyZone[];
  monitoredChannels: number;
}

const RECENT_WINDOW_MS = 300000;

interface PositionSample {
  position: number;
  timestamp: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Safety Validator Implementation
// ─────────────────────────────────────────────────────────────────────────────

export class SafetyValidator {
  private readonly options: Required<SafetyValidatorOptions>;

  // Emergency stop; cheap to read from anywhere, written only here
  private estopActive = false;
  private estopReason?: string;

  private violations: SafetyViolation[] = [];
  private zones: Map<string, SafetyZone> = new Map();
  private lastKnown: Map<number, PositionSample> = new Map();

  constructor(
    private readonly registry: ActuatorRegistry,
    private readonly bus: EventBus,
    private readonly logger: Logger,
    options: SafetyValidatorOptions = {},
  ) {
    this.options = {
      violationRetentionMs: 3600000,
      instantMoveWindowMs: 100,
      escalateZoneViolations: true,
      ...options,
    };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Admission
  // ─────────────────────────────────────────────────────────────────────────

  validate(command: ServoCommand, options: ValidateOptions = {}): ValidationResult {
    if (command.kind === 'emergency_stop') {
      return { accepted: true, command: { ...command }, adjusted: false, requestedValue: command.value };
    }

    const config = this.registry.get(command.channel);
    if (!config) {
      this.record('unknown_channel', 'warning', command.channel, `Unknown channel ${command.channel}`, 'command_rejected');
      return this.reject(command, 'unknown channel', `Channel ${command.channel} is not configured`);
    }
    if (!config.enabled) {
      this.record('servo_disabled', 'warning', command.channel, `Channel ${command.channel} (${config.name}) is disabled`, 'command_rejected');
      return this.reject(command, 'channel disabled', `Channel ${command.channel} (${config.name}) is disabled`);
    }

    if (this.estopActive) {
      return this.reject(command, 'emergency stop active', `Emergency stop active: ${this.estopReason ?? 'unknown reason'}`);
    }

    if (!Number.isFinite(command.value) || !(command.durationMs >= 0) || !(command.delayMs >= 0)) {
      return this.reject(command, 'invalid value', 'Value must be finite; duration and delay must be non-negative');
    }

    if (command.kind === 'position') {
      return this.validatePosition(command, config, options);
    }
    if (command.kind === 'speed') {
      return this.validateRate(command, config.limits.maxSpeed, 'speed_limit_exceeded', 'speed limit exceeded');
    }
    return this.validateRate(command, config.limits.maxAcceleration, 'acceleration_limit_exceeded', 'acceleration limit exceeded');
  }

  private validatePosition(command: ServoCommand, config: ActuatorConfig, options: ValidateOptions): ValidationResult {
    const { channel } = command;
    const { safeMin, safeMax } = config.limits;

    const target = clamp(command.value, safeMin, safeMax);
    const adjusted = target !== command.value;
    if (adjusted) {
      this.record(
        'position_constrained',
        'warning',
        channel,
        `Position ${command.value} constrained to ${target}`,
        'position_adjusted',
      );
    }

    const from = options.fromPosition ?? this.lastKnown.get(channel)?.position;
    if (from !== undefined) {
      // A zero-length move is measured over a nominal window
      const windowMs = command.durationMs > 0 ? command.durationMs : this.options.instantMoveWindowMs;
      const velocity = Math.abs(target - from) / (windowMs / 1000);
      const ceiling = TIER_CEILINGS[this.registry.tier()].maxVelocity;

      if (velocity > ceiling) {
        const detail = `Velocity ${velocity.toFixed(1)}/s exceeds limit ${ceiling}/s on channel ${channel}`;
        this.record('velocity_limit_exceeded', 'warning', channel, detail, 'command_rejected');
        return this.reject(command, 'velocity limit exceeded', detail);
      }
    }

    for (const zone of this.zones.values()) {
      if (!zone.channels.includes(channel)) continue;
      if (target < zone.min || target > zone.max) {
        const detail = `Position ${target} violates safety zone '${zone.name}' [${zone.min}, ${zone.max}] on channel ${channel}`;
        const escalate = this.options.escalateZoneViolations;
        this.record(
          'safety_zone_violation',
          'critical',
          channel,
          detail,
          escalate ? 'emergency_stop_triggered' : 'command_rejected',
        );
        if (escalate) {
          this.triggerEmergencyStop(`Safety zone '${zone.name}' violated on channel ${channel}`);
        }
        return this.reject(command, 'safety zone violation', detail);
      }
    }

    return { accepted: true, command: { ...command, value: target }, adjusted, requestedValue: command.value };
  }

  private validateRate(
    command: ServoCommand,
    limit: number,
    type: ViolationType,
    reason: RejectionReason,
  ): ValidationResult {
    if (command.value < 0) {
      return this.reject(command, 'invalid value', `${command.kind} must not be negative`);
    }
    if (command.value > limit) {
      const detail = `${command.kind} ${command.value} exceeds limit ${limit} on channel ${command.channel}`;
      this.record(type, 'warning', command.channel, detail, 'command_rejected');
      return this.reject(command, reason, detail);
    }
    return { accepted: true, command: { ...command }, adjusted: false, requestedValue: command.value };
  }

  private reject(command: ServoCommand, reason: RejectionReason, detail: string): ValidationResult {
    this.logger.debug(`Rejected ${command.kind} command ${command.id}: ${detail}`);
    return { accepted: false, command: { ...command }, reason, detail };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Monitoring
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Check an observed position against the absolute limits. A breach trips
   * the emergency stop. Returns false when the position is not acceptable.
   */
  monitor(channel: number, observedPosition: number): boolean {
    const config = this.registry.get(channel);
    if (!config) return false;

    this.lastKnown.set(channel, { position: observedPosition, timestamp: Date.now() });

    const { minPosition, maxPosition } = config.limits;
    if (!(observedPosition >= minPosition && observedPosition <= maxPosition)) {
      this.record(
        'position_limit_exceeded',
        'critical',
        channel,
        `Observed position ${observedPosition} outside absolute limits [${minPosition}, ${maxPosition}]`,
        'emergency_stop_triggered',
      );
      this.triggerEmergencyStop(`Channel ${channel} observed at ${observedPosition}, outside [${minPosition}, ${maxPosition}]`);
      return false;
    }

    return true;
  }

  lastKnownPosition(channel: number): number | undefined {
    return this.lastKnown.get(channel)?.position;
  }

  /**
   * Range the engine may write for a channel: the absolute range, narrowed to
   * the safe range under the production tier.
   */
  outputRange(channel: number): PositionRange | undefined {
    const config = this.registry.get(channel);
    if (!config) return undefined;

    const { limits } = config;
    if (this.registry.tier() === 'production') {
      return { min: limits.safeMin, max: limits.safeMax };
    }
    return { min: limits.minPosition, max: limits.maxPosition };
  }

  /** Project a target into the safe range and every zone covering the channel. */
  constrainPosition(channel: number, position: number): number | undefined {
    const config = this.registry.get(channel);
    if (!config) return undefined;

    let target = clamp(position, config.limits.safeMin, config.limits.safeMax);
    for (const zone of this.zones.values()) {
      if (zone.channels.includes(channel)) {
        target = clamp(target, zone.min, zone.max);
      }
    }
    return target;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Emergency Stop
  // ─────────────────────────────────────────────────────────────────────────

  triggerEmergencyStop(reason = 'manual'): void {
    if (this.estopActive) return;

    this.estopActive = true;
    this.estopReason = reason;

    this.record('emergency_stop', 'warning', SYSTEM_CHANNEL, `Emergency stop: ${reason}`, 'all_servos_stopped');
    this.logger.error(`EMERGENCY STOP: ${reason}`);
    this.bus.emit('safety:estop', { reason, timestamp: Date.now() }, { source: 'safety', priority: 'critical' });
  }

  /** Manual recovery. Refused while any critical violation is unresolved. */
  resetEmergencyStop(): ResetResult {
    if (!this.estopActive) {
      return { success: true, message: 'Emergency stop not active' };
    }

    const unresolved = this.unresolvedCritical();
    if (unresolved.length > 0) {
      const message = `Cannot reset emergency stop: ${unresolved.length} unresolved critical violation(s)`;
      this.logger.warn(message);
      return { success: false, message };
    }

    this.estopActive = false;
    this.estopReason = undefined;
    this.logger.info('Emergency stop reset');
    this.bus.emit('safety:estop_reset', { timestamp: Date.now() }, { source: 'safety', priority: 'high' });

    return { success: true, message: 'Emergency stop reset' };
  }

  isEmergencyStopped(): boolean {
    return this.estopActive;
  }

  getState(): SafetyState {
    return this.estopActive ? 'emergency_stopped' : 'normal';
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Safety Zones
  // ─────────────────────────────────────────────────────────────────────────

  addSafetyZone(name: string, channels: number[], min: number, max: number): { ok: true } | { ok: false; error: string } {
    if (name.trim() === '') {
      return { ok: false, error: 'Zone name is required' };
    }
    if (!Number.isFinite(min) || !Number.isFinite(max) || min > max) {
      return { ok: false, error: `Invalid zone range [${min}, ${max}]` };
    }
    const unknown = channels.filter(channel => !this.registry.has(channel));
    if (channels.length === 0 || unknown.length > 0) {
      return { ok: false, error: channels.length === 0 ? 'Zone needs at least one channel' : `Unknown channel(s): ${unknown.join(', ')}` };
    }

    const zone: SafetyZone = { name, channels: [...new Set(channels)].sort((a, b) => a - b), min, max };
    this.zones.set(name, zone);
    this.logger.info(`Added safety zone ${name}: channels [${zone.channels.join(', ')}] within [${min}, ${max}]`);
    this.bus.emit('safety:zone_added', { ...zone }, { source: 'safety' });

    return { ok: true };
  }

  removeSafetyZone(name: string): boolean {
    const removed = this.zones.delete(name);
    if (removed) {
      this.logger.info(`Removed safety zone ${name}`);
      this.bus.emit('safety:zone_removed', { name }, { source: 'safety' });
    }
    return removed;
  }

  listSafetyZones(): SafetyZone[] {
    return Array.from(this.zones.values()).map(zone => ({ ...zone, channels: [...zone.channels] }));
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Violation Log
  // ─────────────────────────────────────────────────────────────────────────

  private record(
    type: ViolationType,
    severity: ViolationSeverity,
    channel: number,
    description: string,
    actionTaken: string,
  ): SafetyViolation {
    const violation: SafetyViolation = {
      id: generateId('violation'),
      timestamp: Date.now(),
      channel,
      type,
      severity,
      description,
      actionTaken,
      resolved: false,
    };

    this.violations.push(violation);
    this.pruneViolations(violation.timestamp);

    this.logger.log(severity === 'critical' ? 'error' : 'warn', `Safety violation (${type}): ${description}`);
    this.bus.emit('safety:violation', { ...violation }, {
      source: 'safety',
      priority: severity === 'critical' ? 'critical' : 'normal',
    });

    return violation;
  }

  /** Drop entries past retention. Unresolved critical entries are kept. */
  pruneViolations(now = Date.now()): number {
    const cutoff = now - this.options.violationRetentionMs;
    const before = this.violations.length;
    this.violations = this.violations.filter(v =>
      v.timestamp >= cutoff || (v.severity === 'critical' && !v.resolved),
    );
    return before - this.violations.length;
  }

  resolveViolation(id: string): boolean {
    const violation = this.violations.find(v => v.id === id);
    if (!violation || violation.resolved) return false;

    violation.resolved = true;
    this.logger.info(`Resolved violation ${id} (${violation.type})`);
    this.bus.emit('safety:violation_resolved', { id }, { source: 'safety' });
    return true;
  }

  resolveAll(): number {
    let count = 0;
    for (const violation of this.violations) {
      if (!violation.resolved) {
        violation.resolved = true;
        count++;
      }
    }
    if (count > 0) {
      this.logger.info(`Resolved ${count} violation(s)`);
      this.bus.emit('safety:violation_resolved', { count }, { source: 'safety' });
    }
    return count;
  }

  getViolations(filter: { since?: number; unresolvedOnly?: boolean; limit?: number } = {}): SafetyViolation[] {
    const { since, unresolvedOnly, limit } = filter;
    let list = this.violations;
    if (since !== undefined) list = list.filter(v => v.timestamp >= since);
    if (unresolvedOnly) list = list.filter(v => !v.resolved);
    if (limit) list = list.slice(-limit);
    return list.map(v => ({ ...v }));
  }

  private unresolvedCritical(): SafetyViolation[] {
    return this.violations.filter(v => v.severity === 'critical' && !v.resolved);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Status
  // ─────────────────────────────────────────────────────────────────────────

  getStatus(): SafetyStatus {
    const tier = this.registry.tier();
    const recentCutoff = Date.now() - RECENT_WINDOW_MS;

    return {
      state: this.getState(),
      emergencyStopActive: this.estopActive,
      emergencyStopReason: this.estopReason,
      tier,
      velocityLimit: TIER_CEILINGS[tier].maxVelocity,
      accelerationLimit: TIER_CEILINGS[tier].maxAcceleration,
      totalViolations: this.violations.length,
      recentViolations: this.violations.filter(v => v.timestamp >= recentCutoff).length,
      unresolvedCritical: this.unresolvedCritical().length,
      safetyZones: this.listSafetyZones(),
      monitoredChannels: this.lastKnown.size,
    };
  }
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
