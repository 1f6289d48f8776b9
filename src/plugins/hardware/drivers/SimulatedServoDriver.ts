// ═══════════════════════════════════════════════════════════════════════════════
// SERVO CORE - Simulated Servo Driver
// In-memory position bookkeeping; writes succeed while connected
// ═══════════════════════════════════════════════════════════════════════════════

import { ActuatorDriver, ActuatorStatus } from '../_base/ActuatorDriver';

export interface SimulatedServoDriverOptions {
  initialPositions?: Record<number, number>;
  defaultPosition?: number;
}

interface SimulatedChannel {
  position: number;
  moveEndsAt: number;
}

export class SimulatedServoDriver implements ActuatorDriver {
  readonly name = 'simulated';

  private connected = false;
  private stopped = false;
  private channels: Map<number, SimulatedChannel> = new Map();
  private readonly defaultPosition: number;

  // Fault injection
  private observedOverrides: Map<number, number> = new Map();
  private failingChannels: Set<number> = new Set();

  private moveCount = 0;

  constructor(options: SimulatedServoDriverOptions = {}) {
    this.defaultPosition = options.defaultPosition ?? 1500;
    for (const [channel, position] of Object.entries(options.initialPositions ?? {})) {
      this.channels.set(Number(channel), { position, moveEndsAt: 0 });
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Connection
  // ─────────────────────────────────────────────────────────────────────────

  async connect(): Promise<boolean> {
    this.connected = true;
    this.stopped = false;
    return true;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
  }

  isConnected(): boolean {
    return this.connected;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Motion
  // ─────────────────────────────────────────────────────────────────────────

  async moveTo(channel: number, position: number, durationMs: number): Promise<boolean> {
    if (!this.connected || this.failingChannels.has(channel)) return false;

    this.stopped = false;
    this.moveCount++;
    this.channels.set(channel, {
      position,
      moveEndsAt: Date.now() + Math.max(0, durationMs),
    });
    return true;
  }

  async getStatus(channel: number): Promise<ActuatorStatus> {
    const state = this.channels.get(channel);
    const override = this.observedOverrides.get(channel);

    return {
      channel,
      position: override ?? state?.position ?? this.defaultPosition,
      moving: !this.stopped && state !== undefined && Date.now() < state.moveEndsAt,
      connected: this.connected,
    };
  }

  async emergencyStopAll(): Promise<boolean> {
    this.stopped = true;
    for (const state of this.channels.values()) {
      state.moveEndsAt = 0;
    }
    return true;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Simulation Controls
  // ─────────────────────────────────────────────────────────────────────────

  /** Report `position` for a channel regardless of what was commanded. */
  overrideObservedPosition(channel: number, position: number | undefined): void {
    if (position === undefined) {
      this.observedOverrides.delete(channel);
    } else {
      this.observedOverrides.set(channel, position);
    }
  }

  setWriteFailure(channel: number, failing: boolean): void {
    if (failing) {
      this.failingChannels.add(channel);
    } else {
      this.failingChannels.delete(channel);
    }
  }

  isEmergencyStopped(): boolean {
    return this.stopped;
  }

  getMoveCount(): number {
    return this.moveCount;
  }
}
