// ═══════════════════════════════════════════════════════════════════════════════
//
//  SERVO CORE
//  Safety-validated servo motion for a dome-and-body astromech
//  Registry, safety validator, eased choreography and a JSON control protocol
//
// ═══════════════════════════════════════════════════════════════════════════════

// Core
export { EventBus, matchPattern } from './core/event-bus/EventBus';
export type {
  Event,
  EventHandler,
  EventPriority,
  EmitOptions,
  EventBusOptions,
  FailedDelivery,
  Subscription,
} from './core/event-bus/EventBus';
export { Logger, isLogLevel } from './core/logging/Logger';
export type { LogLevel, LogRecord } from './core/logging/Logger';
export { generateId } from './core/ids';
export type { ServoContext } from './core/context';

// Config
export { defaultConfig, resolveConfig } from './config/system';
export type { ServoSystemConfig, ServoSystemConfigOverrides } from './config/system';

// Hardware
export * from './plugins/hardware';

// Robotics
export * from './plugins/robotics';

// Control protocol
export { ControlProtocol } from './api/ControlProtocol';
export type { ClientConnection, ClientInfo, ClientSession } from './api/ControlProtocol';
export { ControlServer } from './api/ControlServer';
export type { ControlServerOptions } from './api/ControlServer';
export { startServer } from './api/server';

// System
export { ServoSystem, createServoSystem } from './ServoSystem';
export type { ServoSystemOptions } from './ServoSystem';

import { ServoSystem } from './ServoSystem';
export default ServoSystem;
