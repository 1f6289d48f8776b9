import { EventBus } from '../core/event-bus/EventBus';
import { Logger } from '../core/logging/Logger';
import { SimulatedServoDriver } from '../plugins/hardware/drivers/SimulatedServoDriver';
import { ActuatorRegistry } from '../plugins/robotics/ActuatorRegistry';
import { SafetyValidator, SafetyValidatorOptions } from '../plugins/robotics/SafetyValidator';
import { CommandQueue } from '../plugins/robotics/CommandQueue';
import { ActuatorConfig, SafetyTier, ServoCommand, DEFAULT_LIMITS } from '../plugins/robotics/ServoTypes';
import { ChoreographyEngine, EngineHooks } from '../plugins/robotics/choreography/ChoreographyEngine';
import { ChoreographyLibrary } from '../plugins/robotics/choreography/ChoreographyLibrary';
import { Choreography } from '../plugins/robotics/choreography/ChoreographyTypes';

export interface RecordedMove {
  channel: number;
  position: number;
  durationMs: number;
  at: number;
}

/** Simulated driver that also keeps every write it was asked to make. */
export class RecordingDriver extends SimulatedServoDriver {
  readonly moves: RecordedMove[] = [];
  emergencyStops = 0;

  async moveTo(channel: number, position: number, durationMs: number): Promise<boolean> {
    this.moves.push({ channel, position, durationMs, at: Date.now() });
    return super.moveTo(channel, position, durationMs);
  }

  async emergencyStopAll(): Promise<boolean> {
    this.emergencyStops++;
    return super.emergencyStopAll();
  }

  movesFor(channel: number): number[] {
    return this.moves.filter(m => m.channel === channel).map(m => m.position);
  }
}

export function makeConfig(channel: number, overrides: Partial<ActuatorConfig> = {}): ActuatorConfig {
  return {
    channel,
    name: `Servo ${channel}`,
    servoType: 'utility',
    servoRange: 'limited',
    limits: { ...DEFAULT_LIMITS },
    homePosition: 1500,
    defaultSpeed: 50,
    defaultAcceleration: 20,
    enabled: true,
    inverted: false,
    safetyTier: 'production',
    ...overrides,
  };
}

/** Channel 0 with the wide dome limits, channels 1-3 on the defaults. */
export function testConfigs(): ActuatorConfig[] {
  return [
    makeConfig(0, {
      name: 'Dome Rotation',
      servoType: 'primary',
      servoRange: 'full',
      limits: { ...DEFAULT_LIMITS, minPosition: 600, maxPosition: 2400, safeMin: 800, safeMax: 2200 },
    }),
    makeConfig(1, { name: 'Head Tilt' }),
    makeConfig(2, { name: 'Periscope' }),
    makeConfig(3, { name: 'Radar Eye' }),
  ];
}

export function makeCommand(overrides: Partial<ServoCommand> = {}): ServoCommand {
  return {
    id: 'cmd_test',
    channel: 0,
    kind: 'position',
    value: 1500,
    durationMs: 1000,
    delayMs: 0,
    createdAt: Date.now(),
    ...overrides,
  };
}

export function quietLogger(bus: EventBus, scope = 'test'): Logger {
  return new Logger(scope, bus, 'error');
}

export interface Harness {
  bus: EventBus;
  logger: Logger;
  registry: ActuatorRegistry;
  validator: SafetyValidator;
  driver: RecordingDriver;
  library: ChoreographyLibrary;
  engine: ChoreographyEngine;
  queue: CommandQueue;
}

export interface HarnessOptions {
  configs?: ActuatorConfig[];
  tier?: SafetyTier;
  choreographies?: Choreography[];
  validator?: SafetyValidatorOptions;
  hooks?: EngineHooks;
  tickRateHz?: number;
}

/** Everything wired together on a fresh bus; the driver is connected, nothing is started. */
export async function createHarness(options: HarnessOptions = {}): Promise<Harness> {
  const bus = new EventBus();
  const logger = quietLogger(bus);
  const registry = new ActuatorRegistry(options.configs ?? testConfigs(), options.tier ?? 'production', bus, logger);
  const validator = new SafetyValidator(registry, bus, logger, options.validator);
  const driver = new RecordingDriver();
  await driver.connect();

  const library = options.choreographies
    ? new ChoreographyLibrary(options.choreographies)
    : ChoreographyLibrary.withBuiltIns();
  const engine = new ChoreographyEngine(registry, validator, driver, library, bus, logger, {
    tickRateHz: options.tickRateHz ?? 50,
    hooks: options.hooks,
  });
  const queue = new CommandQueue(registry, validator, engine, bus, logger);

  return { bus, logger, registry, validator, driver, library, engine, queue };
}
