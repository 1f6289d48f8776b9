// ═══════════════════════════════════════════════════════════════════════════════
// SERVO CORE - System Configuration
// ═══════════════════════════════════════════════════════════════════════════════

import { LogLevel, isLogLevel } from '../core/logging/Logger';
import { SafetyTier, SAFETY_TIERS } from '../plugins/robotics/ServoTypes';

export interface ServoSystemConfig {
  logLevel: LogLevel;

  // Choreography engine
  motion: {
    tickRateHz: number;
  };

  // Command/sequence queue
  queue: {
    dispatchRateHz: number;
    maxActiveSequences: number;
    historyLimit: number;
  };

  // Safety validator
  safety: {
    tier: SafetyTier;
    violationRetentionMs: number;
    instantMoveWindowMs: number;
    escalateZoneViolations: boolean;
  };

  // Control protocol server
  server: {
    host: string;
    port: number;
    broadcastIntervalMs: number;
    pingIntervalMs: number;
    pongTimeoutMs: number;
  };

  // Persisted profiles
  profiles: {
    directory: string;
    active: string;
  };
}

export type ServoSystemConfigOverrides = {
  [K in keyof ServoSystemConfig]?: ServoSystemConfig[K] extends object
    ? Partial<ServoSystemConfig[K]>
    : ServoSystemConfig[K];
};

export const defaultConfig: ServoSystemConfig = {
  logLevel: 'info',

  motion: {
    tickRateHz: 60,
  },

  queue: {
    dispatchRateHz: 20,
    maxActiveSequences: 1,
    historyLimit: 100,
  },

  safety: {
    tier: 'production',
    violationRetentionMs: 3600000,  // 1 hour
    instantMoveWindowMs: 100,       // Velocity window for 0 ms moves
    escalateZoneViolations: true,
  },

  server: {
    host: '0.0.0.0',
    port: 8767,
    broadcastIntervalMs: 100,       // 10 Hz
    pingIntervalMs: 30000,
    pongTimeoutMs: 10000,
  },

  profiles: {
    directory: './profiles',
    active: 'default',
  },
};

function isSafetyTier(value: unknown): value is SafetyTier {
  return SAFETY_TIERS.some(tier => tier === value);
}

function parsePort(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const port = parseInt(value, 10);
  return Number.isInteger(port) && port >= 0 && port < 65536 ? port : fallback;
}

/**
 * Defaults, then environment, then explicit overrides. Unknown or malformed
 * environment values keep the default.
 */
export function resolveConfig(
  overrides: ServoSystemConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): ServoSystemConfig {
  const fromEnv: ServoSystemConfig = {
    logLevel: isLogLevel(env.SERVO_LOG_LEVEL) ? env.SERVO_LOG_LEVEL : defaultConfig.logLevel,
    motion: { ...defaultConfig.motion },
    queue: { ...defaultConfig.queue },
    safety: {
      ...defaultConfig.safety,
      tier: isSafetyTier(env.SERVO_SAFETY_TIER) ? env.SERVO_SAFETY_TIER : defaultConfig.safety.tier,
    },
    server: {
      ...defaultConfig.server,
      host: env.SERVO_HOST || defaultConfig.server.host,
      port: parsePort(env.SERVO_PORT, defaultConfig.server.port),
    },
    profiles: {
      directory: env.SERVO_PROFILE_DIR || defaultConfig.profiles.directory,
      active: env.SERVO_PROFILE || defaultConfig.profiles.active,
    },
  };

  return {
    logLevel: overrides.logLevel ?? fromEnv.logLevel,
    motion: { ...fromEnv.motion, ...overrides.motion },
    queue: { ...fromEnv.queue, ...overrides.queue },
    safety: { ...fromEnv.safety, ...overrides.safety },
    server: { ...fromEnv.server, ...overrides.server },
    profiles: { ...fromEnv.profiles, ...overrides.profiles },
  };
}
