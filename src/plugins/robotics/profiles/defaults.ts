// ═══════════════════════════════════════════════════════════════════════════════
// SERVO CORE - Default Profile
// Compiled-in 16 channel dome-and-body layout
// ═══════════════════════════════════════════════════════════════════════════════

import defaultProfile from './data/default-profile.json';
import { ActuatorConfig, cloneConfig } from '../ServoTypes';
import { fromDocument } from './ProfileDocument';

export const DEFAULT_PROFILE_NAME = 'default';

let cached: ActuatorConfig[] | undefined;

/** Fresh copies of the default channel configuration. */
export function createDefaultConfigs(): ActuatorConfig[] {
  if (!cached) {
    const parsed = fromDocument(defaultProfile);
    if (parsed.errors.length > 0) {
      throw new Error(`Default profile is invalid: ${parsed.errors.join('; ')}`);
    }
    cached = parsed.configs;
  }
  return cached.map(cloneConfig);
}
