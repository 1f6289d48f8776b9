// ═══════════════════════════════════════════════════════════════════════════════
// SERVO CORE - Servo System
// Composition root: builds the context once and owns the component lifecycle
// ═══════════════════════════════════════════════════════════════════════════════

import { EventBus, Event } from './core/event-bus/EventBus';
import { Logger } from './core/logging/Logger';
import { ServoContext } from './core/context';
import { ServoSystemConfig, ServoSystemConfigOverrides, resolveConfig } from './config/system';
import { ActuatorDriver } from './plugins/hardware/_base/ActuatorDriver';
import { SimulatedServoDriver } from './plugins/hardware/drivers/SimulatedServoDriver';
import { ActuatorRegistry, checkConfig } from './plugins/robotics/ActuatorRegistry';
import { SafetyValidator } from './plugins/robotics/SafetyValidator';
import { CommandQueue } from './plugins/robotics/CommandQueue';
import { ActuatorConfig } from './plugins/robotics/ServoTypes';
import { ChoreographyEngine, EngineHooks, RunStatus } from './plugins/robotics/choreography/ChoreographyEngine';
import { ChoreographyLibrary } from './plugins/robotics/choreography/ChoreographyLibrary';
import { ProfileStore } from './plugins/robotics/profiles/ProfileStore';
import { createDefaultConfigs } from './plugins/robotics/profiles/defaults';
import { ControlProtocol } from './api/ControlProtocol';
import { ControlServer } from './api/ControlServer';

export interface ServoSystemOptions {
  config?: ServoSystemConfigOverrides;
  env?: NodeJS.ProcessEnv;
  driver?: ActuatorDriver;
  library?: ChoreographyLibrary;
  hooks?: EngineHooks;
}

const HOME_DURATION_MS = 1500;
const FINISHED_RUN_EVENTS = new Set(['motion:run_completed', 'motion:run_stopped', 'motion:run_failed']);

// ─────────────────────────────────────────────────────────────────────────────
// Servo System Class
// ─────────────────────────────────────────────────────────────────────────────

export class ServoSystem {
  readonly config: ServoSystemConfig;
  readonly bus: EventBus;
  readonly logger: Logger;

  private context?: ServoContext;
  private protocol?: ControlProtocol;
  private server?: ControlServer;
  private startTime = 0;

  constructor(private readonly options: ServoSystemOptions = {}) {
    this.config = resolveConfig(options.config, options.env);
    this.bus = new EventBus();
    this.logger = new Logger('system', this.bus, this.config.logLevel);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────

  async initialize(): Promise<ServoContext> {
    if (this.context) return this.context;

    const { config, bus, logger } = this;
    logger.info('Servo system initializing...');

    const profiles = new ProfileStore(config.profiles.directory, logger.child('profiles'));
    const configs = await this.loadConfigs(profiles);

    const registry = new ActuatorRegistry(configs, config.safety.tier, bus, logger.child('registry'));
    registry.applySafetyTier(config.safety.tier);

    const driver = this.options.driver ?? new SimulatedServoDriver();
    if (!(await driver.connect())) {
      throw new Error(`Actuator driver ${driver.name} failed to connect`);
    }

    const validator = new SafetyValidator(registry, bus, logger.child('safety'), {
      violationRetentionMs: config.safety.violationRetentionMs,
      instantMoveWindowMs: config.safety.instantMoveWindowMs,
      escalateZoneViolations: config.safety.escalateZoneViolations,
    });

    const library = this.options.library ?? ChoreographyLibrary.withBuiltIns();
    const engine = new ChoreographyEngine(registry, validator, driver, library, bus, logger.child('motion'), {
      tickRateHz: config.motion.tickRateHz,
      hooks: this.options.hooks,
    });
    const queue = new CommandQueue(registry, validator, engine, bus, logger.child('queue'), config.queue);

    await engine.start();
    queue.start();

    this.context = { config, bus, logger, driver, registry, validator, library, engine, queue, profiles };
    this.startTime = Date.now();

    logger.info(`Servo system ready: ${registry.size()} channels, tier ${registry.tier()}, driver ${driver.name}`);
    bus.emit('system:initialized', { channels: registry.size(), tier: registry.tier() }, { source: 'system' });

    return this.context;
  }

  /** Active profile if it loads cleanly, otherwise the compiled-in defaults. */
  private async loadConfigs(profiles: ProfileStore): Promise<ActuatorConfig[]> {
    const name = this.config.profiles.active;
    const loaded = await profiles.load(name);

    if (!loaded.found) {
      this.logger.info(`No saved profile ${name}; using defaults`);
      return createDefaultConfigs();
    }

    const errors = [...loaded.errors, ...loaded.configs.flatMap(checkConfig)];
    if (errors.length > 0 || loaded.configs.length === 0) {
      this.logger.warn(`Profile ${name} rejected; using defaults`, { errors });
      return createDefaultConfigs();
    }

    this.logger.info(`Loaded profile ${name} (${loaded.configs.length} servos)`);
    return loaded.configs;
  }

  async startServer(): Promise<ControlServer> {
    const context = this.getContext();
    if (this.server) return this.server;

    this.protocol = new ControlProtocol(context);
    this.server = new ControlServer(this.protocol, this.config.server, this.logger.child('server'));
    await this.server.start();

    return this.server;
  }

  /**
   * Stop accepting work, home every enabled channel unless the emergency
   * stop is latched, then release the driver.
   */
  async shutdown(): Promise<void> {
    const context = this.context;
    if (!context) return;

    this.logger.info('Servo system shutting down...');

    if (this.server) {
      await this.server.stop();
      this.server = undefined;
    }
    this.protocol?.dispose();
    this.protocol = undefined;

    context.queue.dispose();

    if (!context.validator.isEmergencyStopped()) {
      const homing = context.engine.homeAll(HOME_DURATION_MS);
      if (homing.started) {
        await this.waitForRun(homing.runId, HOME_DURATION_MS + 1000);
      } else {
        this.logger.warn(`Could not home servos: ${homing.reason}`);
      }
    }

    context.engine.dispose();
    await context.driver.disconnect();

    this.context = undefined;
    this.logger.info('Servo system stopped');
  }

  private waitForRun(runId: string, timeoutMs: number): Promise<void> {
    return new Promise((resolve) => {
      const unsubscribe = this.bus.on<RunStatus>('motion:*', (event: Event<RunStatus>) => {
        if (FINISHED_RUN_EVENTS.has(event.type) && event.payload.runId === runId) finish();
      });
      const timer = setTimeout(finish, timeoutMs);

      function finish(): void {
        clearTimeout(timer);
        unsubscribe();
        resolve();
      }
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Accessors
  // ─────────────────────────────────────────────────────────────────────────

  getContext(): ServoContext {
    if (!this.context) {
      throw new Error('Servo system is not initialized');
    }
    return this.context;
  }

  isInitialized(): boolean {
    return this.context !== undefined;
  }

  getStatus(): {
    initialized: boolean;
    uptime: number;
    serverPort?: number;
    emergencyStopped: boolean;
  } {
    return {
      initialized: this.context !== undefined,
      uptime: this.context ? Date.now() - this.startTime : 0,
      serverPort: this.server?.getPort(),
      emergencyStopped: this.context?.validator.isEmergencyStopped() ?? false,
    };
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Quick Start
// ─────────────────────────────────────────────────────────────────────────────

export async function createServoSystem(
  options: ServoSystemOptions & { server?: boolean } = {},
): Promise<ServoSystem> {
  const system = new ServoSystem(options);
  await system.initialize();

  if (options.server) {
    await system.startServer();
  }

  return system;
}
