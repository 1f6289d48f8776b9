// ═══════════════════════════════════════════════════════════════════════════════
// SERVO CORE - Hardware
// Driver boundary and the simulated backend
// ═══════════════════════════════════════════════════════════════════════════════

export type { ActuatorDriver, ActuatorStatus } from './_base/ActuatorDriver';

export { SimulatedServoDriver } from './drivers/SimulatedServoDriver';
export type { SimulatedServoDriverOptions } from './drivers/SimulatedServoDriver';
