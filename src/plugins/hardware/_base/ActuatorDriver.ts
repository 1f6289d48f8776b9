// ═══════════════════════════════════════════════════════════════════════════════
// SERVO CORE - Actuator Driver
// Boundary to the physical or simulated servo backend
// ═══════════════════════════════════════════════════════════════════════════════

export interface ActuatorStatus {
  channel: number;
  position: number;
  moving: boolean;
  connected: boolean;
}

/**
 * The four motion operations plus connection lifecycle. Implementations must
 * answer quickly: a write that cannot complete fast should fail fast.
 */
export interface ActuatorDriver {
  readonly name: string;

  connect(): Promise<boolean>;
  disconnect(): Promise<void>;
  isConnected(): boolean;

  moveTo(channel: number, position: number, durationMs: number): Promise<boolean>;
  getStatus(channel: number): Promise<ActuatorStatus>;
  emergencyStopAll(): Promise<boolean>;
}
