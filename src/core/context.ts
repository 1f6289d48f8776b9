// ═══════════════════════════════════════════════════════════════════════════════
// SERVO CORE - Context
// Handles built once by the composition root and passed down explicitly
// ═══════════════════════════════════════════════════════════════════════════════

import type { EventBus } from './event-bus/EventBus';
import type { Logger } from './logging/Logger';
import type { ServoSystemConfig } from '../config/system';
import type { ActuatorDriver } from '../plugins/hardware/_base/ActuatorDriver';
import type { ActuatorRegistry } from '../plugins/robotics/ActuatorRegistry';
import type { SafetyValidator } from '../plugins/robotics/SafetyValidator';
import type { CommandQueue } from '../plugins/robotics/CommandQueue';
import type { ChoreographyEngine } from '../plugins/robotics/choreography/ChoreographyEngine';
import type { ChoreographyLibrary } from '../plugins/robotics/choreography/ChoreographyLibrary';
import type { ProfileStore } from '../plugins/robotics/profiles/ProfileStore';

export interface ServoContext {
  config: ServoSystemConfig;
  bus: EventBus;
  logger: Logger;
  driver: ActuatorDriver;
  registry: ActuatorRegistry;
  validator: SafetyValidator;
  library: ChoreographyLibrary;
  engine: ChoreographyEngine;
  queue: CommandQueue;
  profiles: ProfileStore;
}
