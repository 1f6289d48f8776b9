// ═══════════════════════════════════════════════════════════════════════════════
// SERVO CORE - Servo Types
// Actuator configuration, commands, sequences and safety records
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────
// Classification
// ─────────────────────────────────────────────────────────────────────────────

export const SERVO_TYPES = [
  'primary',          // Dome rotation, head tilt
  'utility',          // Arms, periscope
  'panel',            // Door panels
  'display',          // Logic displays, radar eye
  'special',          // Holoprojectors
  'lighting',
  'audio',
  'drive',
  'expansion',
] as const;

export type ServoType = typeof SERVO_TYPES[number];

export const SERVO_RANGES = [
  'full',             // Sweeps the whole travel
  'limited',          // Restricted arc
  'binary',           // Open / closed
  'continuous',       // Continuous rotation
] as const;

export type ServoRange = typeof SERVO_RANGES[number];

export const SAFETY_TIERS = [
  'development',
  'testing',
  'production',
  'demonstration',
  'emergency',
] as const;

export type SafetyTier = typeof SAFETY_TIERS[number];

export interface MotionCeilings {
  maxVelocity: number;          // units/sec
  maxAcceleration: number;      // units/sec²
}

export const TIER_CEILINGS: Record<SafetyTier, MotionCeilings> = {
  development: { maxVelocity: 1000, maxAcceleration: 2000 },
  testing: { maxVelocity: 750, maxAcceleration: 1500 },
  production: { maxVelocity: 500, maxAcceleration: 1000 },
  demonstration: { maxVelocity: 300, maxAcceleration: 500 },
  emergency: { maxVelocity: 100, maxAcceleration: 200 },
};

export const MAX_CHANNELS = 24;

/** Channel id used for system-wide records and commands. */
export const SYSTEM_CHANNEL = -1;

// ─────────────────────────────────────────────────────────────────────────────
// Actuator Configuration
// ─────────────────────────────────────────────────────────────────────────────

/** Positions are pulse widths in microseconds. */
export interface ServoLimits {
  minPosition: number;
  maxPosition: number;
  safeMin: number;
  safeMax: number;
  maxSpeed: number;
  maxAcceleration: number;
  emergencyStopSpeed: number;
}

export interface ActuatorConfig {
  channel: number;
  name: string;
  servoType: ServoType;
  servoRange: ServoRange;
  limits: ServoLimits;
  homePosition: number;
  defaultSpeed: number;
  defaultAcceleration: number;
  enabled: boolean;
  inverted: boolean;
  safetyTier: SafetyTier;
}

export type ActuatorPatch = Partial<Omit<ActuatorConfig, 'channel' | 'limits'>> & {
  limits?: Partial<ServoLimits>;
};

export const DEFAULT_LIMITS: ServoLimits = {
  minPosition: 992,
  maxPosition: 2000,
  safeMin: 1200,
  safeMax: 1800,
  maxSpeed: 100,
  maxAcceleration: 50,
  emergencyStopSpeed: 255,
};

export function cloneConfig(config: ActuatorConfig): ActuatorConfig {
  return { ...config, limits: { ...config.limits } };
}

// ─────────────────────────────────────────────────────────────────────────────
// Commands & Sequences
// ─────────────────────────────────────────────────────────────────────────────

export type CommandKind = 'position' | 'speed' | 'acceleration' | 'emergency_stop';

export interface ServoCommand {
  id: string;
  channel: number;
  kind: CommandKind;
  value: number;
  durationMs: number;
  delayMs: number;
  easing?: string;
  createdAt: number;
}

export interface ServoSequence {
  id: string;
  name: string;
  commands: ServoCommand[];
  loop: boolean;
  loopCount: number;            // -1 = forever
  priority: number;             // 1-10
  allowsInterruption: boolean;
  createdAt: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Safety Records
// ─────────────────────────────────────────────────────────────────────────────

export type ViolationSeverity = 'warning' | 'critical';

export type ViolationType =
  | 'position_constrained'
  | 'velocity_limit_exceeded'
  | 'speed_limit_exceeded'
  | 'acceleration_limit_exceeded'
  | 'safety_zone_violation'
  | 'position_limit_exceeded'
  | 'unknown_channel'
  | 'servo_disabled'
  | 'emergency_stop';

export interface SafetyViolation {
  id: string;
  timestamp: number;
  channel: number;
  type: ViolationType;
  severity: ViolationSeverity;
  description: string;
  actionTaken: string;
  resolved: boolean;
}

export interface SafetyZone {
  name: string;
  channels: number[];
  min: number;
  max: number;
}

export type SafetyState = 'normal' | 'emergency_stopped';
