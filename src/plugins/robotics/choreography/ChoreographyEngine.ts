// ═══════════════════════════════════════════════════════════════════════════════
// SERVO CORE - Choreography Engine
// Fixed-rate tick loop driving timelines of eased per-channel steps
// Handles: priority preemption, sync groups, per-channel ownership, looping
// ═══════════════════════════════════════════════════════════════════════════════

import { EventBus } from '../../../core/event-bus/EventBus';
import { Logger } from '../../../core/logging/Logger';
import { generateId } from '../../../core/ids';
import { ActuatorDriver } from '../../hardware/_base/ActuatorDriver';
import { ActuatorRegistry } from '../ActuatorRegistry';
import { SafetyValidator } from '../SafetyValidator';
import { ServoCommand, ServoSequence } from '../ServoTypes';
import { clampToRange, position } from '../motion/MotionInterpolator';
import { AudioCue, ChoreographyStep, createStep } from './ChoreographyTypes';
import { ChoreographyLibrary } from './ChoreographyLibrary';
import { Timeline, TimelineEntry, buildTimeline } from './timeline';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type RunKind = 'choreography' | 'sequence' | 'command';

export type RunState = 'running' | 'completed' | 'stopped' | 'failed';

export type ExecuteResult =
  | { started: true; runId: string }
  | { started: false; reason: string; retryable: boolean };

export interface RunStatus {
  runId: string;
  name: string;
  kind: RunKind;
  state: RunState;
  priority: number;
  progress: number;             // percent
  iteration: number;
  startedAt: number;
  finishedAt?: number;
  reason?: string;
  preemptedBy?: string;         // Name of the run that took the slot
}

export interface EngineStatus {
  running: boolean;
  tickRateHz: number;
  ticks: number;
  foreground?: string;
  activeRuns: RunStatus[];
  positions: Record<number, number>;
  history: number;
}

export interface EngineHooks {
  /** Fire-and-forget request for a synchronized sound. */
  audioCue?: (cue: string, offsetMs: number) => void;
  /** Map an externally named behavior onto a choreography name. */
  resolveBehavior?: (name: string) => string | undefined;
}

export interface ExecuteOptions {
  loopCount?: number;           // -1 = forever
}

export interface ChoreographyEngineOptions {
  tickRateHz?: number;
  historyLimit?: number;
  hooks?: EngineHooks;
}

type StepPhase = 'pending' | 'moving' | 'holding' | 'done' | 'superseded' | 'skipped';

interface RunStep {
  entry: TimelineEntry;
  phase: StepPhase;
  startPosition: number;
  target: number;
  lastWritten?: number;
}

interface Run {
  id: string;
  name: string;
  kind: RunKind;
  priority: number;
  allowsInterruption: boolean;
  timeline: Timeline;
  steps: RunStep[];
  nextStep: number;
  audioCues: AudioCue[];
  nextCue: number;
  totalDurationMs: number;
  overshootScale: number;
  loopsRemaining: number;       // -1 = forever
  iteration: number;
  startedAt: number;
  iterationStartedAt: number;
  pendingWrites: number;
  state: RunState;
  finishedAt?: number;
  reason?: string;
  preemptedBy?: string;
}

interface RunDefinition {
  id: string;
  name: string;
  kind: RunKind;
  steps: ChoreographyStep[];
  priority: number;
  allowsInterruption: boolean;
  audioCues: AudioCue[];
  totalDurationMs?: number;
  personalityModifier: number;
  overshootScale: number;
  loopCount: number;
}

interface ChannelOwner {
  run: Run;
  step: RunStep;
}

// ─────────────────────────────────────────────────────────────────────────────
// Choreography Engine Implementation
// ─────────────────────────────────────────────────────────────────────────────

export class ChoreographyEngine {
  private readonly tickRateHz: number;
  private readonly historyLimit: number;
  private readonly hooks: EngineHooks;

  private runs: Map<string, Run> = new Map();
  private owners: Map<number, ChannelOwner> = new Map();
  private positions: Map<number, number> = new Map();
  private pendingWrites: Set<number> = new Set();
  private history: RunStatus[] = [];

  private tickTimer?: ReturnType<typeof setInterval>;
  private ticks = 0;
  private unsubscribers: Array<() => void> = [];

  constructor(
    private readonly registry: ActuatorRegistry,
    private readonly validator: SafetyValidator,
    private readonly driver: ActuatorDriver,
    private readonly library: ChoreographyLibrary,
    private readonly bus: EventBus,
    private readonly logger: Logger,
    options: ChoreographyEngineOptions = {},
  ) {
    this.tickRateHz = options.tickRateHz ?? 60;
    this.historyLimit = options.historyLimit ?? 100;
    this.hooks = options.hooks ?? {};

    for (const config of registry.all()) {
      this.positions.set(config.channel, config.homePosition);
    }

    this.unsubscribers.push(
      bus.on<{ reason: string }>('safety:estop', (event) => this.haltAll(`Emergency stop: ${event.payload.reason}`)),
    );
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────

  /** Seed positions from the driver, then begin ticking. */
  async start(): Promise<void> {
    if (this.tickTimer) return;

    for (const channel of this.registry.channels()) {
      try {
        const status = await this.driver.getStatus(channel);
        this.positions.set(channel, status.position);
        this.validator.monitor(channel, status.position);
      } catch (error) {
        this.logger.warn(`Could not read channel ${channel}: ${errorMessage(error)}`);
      }
    }

    this.tickTimer = setInterval(() => this.tick(), 1000 / this.tickRateHz);
    this.logger.info(`Choreography engine started at ${this.tickRateHz} Hz`);
  }

  stop(): void {
    if (this.tickTimer) {
      clearInterval(this.tickTimer);
      this.tickTimer = undefined;
      this.logger.info('Choreography engine stopped');
    }
  }

  dispose(): void {
    this.stop();
    for (const unsubscribe of this.unsubscribers) unsubscribe();
    this.unsubscribers = [];
  }

  isRunning(): boolean {
    return this.tickTimer !== undefined;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Starting Runs
  // ─────────────────────────────────────────────────────────────────────────

  execute(
    sequenceName: string,
    personalityModifier = 1.0,
    intensityOverride?: number,
    options: ExecuteOptions = {},
  ): ExecuteResult {
    let choreography = this.library.get(sequenceName);
    if (!choreography && this.hooks.resolveBehavior) {
      const resolved = this.hooks.resolveBehavior(sequenceName);
      choreography = resolved === undefined ? undefined : this.library.get(resolved);
    }
    if (!choreography) {
      return { started: false, reason: `Unknown choreography: ${sequenceName}`, retryable: false };
    }
    if (!(personalityModifier > 0)) {
      return { started: false, reason: 'personalityModifier must be greater than 0', retryable: false };
    }

    return this.startRun({
      id: generateId('run'),
      name: choreography.name,
      kind: 'choreography',
      steps: choreography.steps,
      priority: choreography.priority,
      allowsInterruption: choreography.allowsInterruption,
      audioCues: choreography.audioCues,
      totalDurationMs: choreography.totalDurationMs,
      personalityModifier,
      overshootScale: intensityOverride ?? choreography.emotionalIntensity,
      loopCount: options.loopCount ?? 1,
    });
  }

  /** Run a queued sequence's position commands as one timeline. */
  startSequence(sequence: ServoSequence): ExecuteResult {
    const steps = sequence.commands
      .filter(command => command.kind === 'position')
      .map(commandToStep);

    if (steps.length === 0) {
      return { started: false, reason: `Sequence ${sequence.name} has no position commands`, retryable: false };
    }

    return this.startRun({
      id: sequence.id,
      name: sequence.name,
      kind: 'sequence',
      steps,
      priority: sequence.priority,
      allowsInterruption: sequence.allowsInterruption,
      audioCues: [],
      personalityModifier: 1,
      overshootScale: 1,
      loopCount: sequence.loop ? sequence.loopCount : 1,
    });
  }

  /** One-off move; claims its channel without taking part in priority arbitration. */
  startCommand(command: ServoCommand): ExecuteResult {
    if (command.kind !== 'position') {
      return { started: false, reason: `Cannot run ${command.kind} command as motion`, retryable: false };
    }

    return this.startRun({
      id: command.id,
      name: `move_${command.channel}`,
      kind: 'command',
      steps: [commandToStep(command)],
      priority: 0,
      allowsInterruption: true,
      audioCues: [],
      personalityModifier: 1,
      overshootScale: 1,
      loopCount: 1,
    });
  }

  /** Move every enabled channel to its home position together. */
  homeAll(durationMs = 1000): ExecuteResult {
    const steps = this.registry.all()
      .filter(config => config.enabled)
      .map(config => createStep({ channel: config.channel, end: config.homePosition, durationMs, easing: 'ease_in_out' }));

    return this.startRun({
      id: generateId('home'),
      name: 'home_all',
      kind: 'command',
      steps,
      priority: 0,
      allowsInterruption: true,
      audioCues: [],
      personalityModifier: 1,
      overshootScale: 1,
      loopCount: 1,
    });
  }

  private startRun(definition: RunDefinition): ExecuteResult {
    if (this.validator.isEmergencyStopped()) {
      return { started: false, reason: 'Emergency stop active', retryable: false };
    }

    const unknown = definition.steps.filter(step => !this.registry.has(step.channel)).map(step => step.channel);
    if (unknown.length > 0) {
      return {
        started: false,
        reason: `Unknown channel(s) in ${definition.name}: ${[...new Set(unknown)].join(', ')}`,
        retryable: false,
      };
    }

    if (definition.kind !== 'command') {
      const current = this.foreground();
      if (current) {
        if (!current.allowsInterruption && definition.priority <= current.priority) {
          const reason = `"${current.name}" (priority ${current.priority}) is running and does not allow interruption`;
          this.logger.info(`Rejected ${definition.name}: ${reason}`);
          return { started: false, reason, retryable: true };
        }
        current.preemptedBy = definition.name;
        this.finishRun(current, 'stopped', `Preempted by ${definition.name}`);
      }
    }

    const timeline = buildTimeline(definition.steps, definition.personalityModifier);
    const now = Date.now();
    const run: Run = {
      id: definition.id,
      name: definition.name,
      kind: definition.kind,
      priority: definition.priority,
      allowsInterruption: definition.allowsInterruption,
      timeline,
      steps: timeline.entries.map(entry => ({ entry, phase: 'pending', startPosition: 0, target: entry.step.end })),
      nextStep: 0,
      audioCues: [...definition.audioCues].sort((a, b) => a.atMs - b.atMs),
      nextCue: 0,
      totalDurationMs: Math.max(timeline.durationMs, (definition.totalDurationMs ?? 0) / definition.personalityModifier),
      overshootScale: definition.overshootScale,
      loopsRemaining: definition.loopCount === -1 ? -1 : Math.max(1, Math.floor(definition.loopCount)),
      iteration: 1,
      startedAt: now,
      iterationStartedAt: now,
      pendingWrites: 0,
      state: 'running',
    };

    this.runs.set(run.id, run);
    this.logger.info(`Started ${run.kind} ${run.name} (${run.id}, ${run.totalDurationMs}ms)`);
    this.bus.emit('motion:run_started', this.toStatus(run, now), { source: 'motion' });

    return { started: true, runId: run.id };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Stopping Runs
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Remove a run from the active set. Actuators stay wherever they are;
   * commanding a safe position afterwards is up to the caller.
   */
  stopRun(runId: string): boolean {
    const run = this.runs.get(runId);
    if (!run || run.state !== 'running') return false;

    this.finishRun(run, 'stopped', 'Stopped by request');
    return true;
  }

  /** Stop every run and tell the driver to halt all channels. */
  haltAll(reason: string): void {
    for (const run of Array.from(this.runs.values())) {
      this.finishRun(run, 'stopped', reason);
    }
    void this.stopDriver(reason);
  }

  private async stopDriver(reason: string): Promise<void> {
    try {
      const ok = await this.driver.emergencyStopAll();
      if (!ok) this.logger.error(`Driver refused emergency stop (${reason})`);
    } catch (error) {
      this.logger.error(`Driver emergency stop failed: ${errorMessage(error)}`);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Tick Loop
  // ─────────────────────────────────────────────────────────────────────────

  private tick(now = Date.now()): void {
    this.ticks++;

    if (this.validator.isEmergencyStopped()) {
      if (this.runs.size > 0) this.haltAll('Emergency stop active');
      return;
    }

    for (const run of Array.from(this.runs.values())) {
      if (run.state !== 'running') continue;
      try {
        this.advance(run, now);
      } catch (error) {
        this.finishRun(run, 'failed', `Tick error: ${errorMessage(error)}`);
      }
    }
  }

  private advance(run: Run, now: number): void {
    const elapsed = now - run.iterationStartedAt;

    while (run.nextCue < run.audioCues.length && run.audioCues[run.nextCue].atMs <= elapsed) {
      this.fireAudioCue(run, run.audioCues[run.nextCue]);
      run.nextCue++;
    }

    while (run.nextStep < run.steps.length && run.steps[run.nextStep].entry.startMs <= elapsed) {
      this.activate(run, run.steps[run.nextStep]);
      run.nextStep++;
    }

    for (const step of run.steps) {
      if (step.phase === 'moving') {
        this.drive(run, step, elapsed);
      } else if (step.phase === 'holding' && elapsed >= step.entry.holdEndMs) {
        this.release(step);
        step.phase = 'done';
      }
      if (run.state !== 'running') return;
    }

    const settled = run.nextStep >= run.steps.length && run.steps.every(s => isSettled(s.phase));
    if (settled && run.pendingWrites === 0 && elapsed >= run.totalDurationMs) {
      this.completeIteration(run, now);
    }
  }

  private activate(run: Run, step: RunStep): void {
    const channel = step.entry.step.channel;
    const config = this.registry.get(channel);
    if (!config || !config.enabled) {
      step.phase = 'skipped';
      this.logger.debug(`Skipping step on unavailable channel ${channel} in ${run.name}`);
      return;
    }

    const owner = this.owners.get(channel);
    if (owner && owner.step !== step) {
      owner.step.phase = 'superseded';
    }
    this.owners.set(channel, { run, step });

    step.startPosition = this.positions.get(channel) ?? config.homePosition;
    step.target = this.validator.constrainPosition(channel, step.entry.step.end) ?? step.entry.step.end;
    step.lastWritten = undefined;
    step.phase = 'moving';
  }

  private drive(run: Run, step: RunStep, elapsed: number): void {
    const { entry } = step;
    const channel = entry.step.channel;
    if (this.pendingWrites.has(channel)) return;

    const stepElapsed = elapsed - entry.startMs;
    const progress = entry.durationMs > 0 ? Math.min(1, stepElapsed / entry.durationMs) : 1;

    const raw = position(
      progress,
      step.startPosition,
      step.target,
      entry.step.easing,
      entry.step.overshootFactor * run.overshootScale,
    );

    const range = this.validator.outputRange(channel);
    if (!range) {
      this.finishRun(run, 'failed', `Channel ${channel} is no longer configured`);
      return;
    }
    const output = Math.round(clampToRange(raw, range.min, range.max));

    if (!this.validator.monitor(channel, output)) {
      this.finishRun(run, 'failed', `Position ${output} refused on channel ${channel}`);
      return;
    }

    if (step.lastWritten !== output) {
      this.positions.set(channel, output);
      step.lastWritten = output;
      void this.write(run, channel, output);
    }

    if (progress >= 1) {
      if (entry.holdEndMs > entry.endMs) {
        step.phase = 'holding';
      } else {
        this.release(step);
        step.phase = 'done';
      }
    }
  }

  private async write(run: Run, channel: number, output: number): Promise<void> {
    this.pendingWrites.add(channel);
    run.pendingWrites++;

    try {
      const ok = await this.driver.moveTo(channel, output, 1000 / this.tickRateHz);
      if (!ok) {
        this.finishRun(run, 'failed', `Driver write failed on channel ${channel}`);
        return;
      }
      const status = await this.driver.getStatus(channel);
      this.validator.monitor(channel, status.position);
    } catch (error) {
      this.finishRun(run, 'failed', `Driver error on channel ${channel}: ${errorMessage(error)}`);
    } finally {
      this.pendingWrites.delete(channel);
      run.pendingWrites--;
    }
  }

  private release(step: RunStep): void {
    const channel = step.entry.step.channel;
    if (this.owners.get(channel)?.step === step) {
      this.owners.delete(channel);
    }
  }

  private completeIteration(run: Run, now: number): void {
    const again = run.loopsRemaining === -1 || run.loopsRemaining > 1;
    if (!again) {
      this.finishRun(run, 'completed');
      return;
    }

    if (run.loopsRemaining > 1) run.loopsRemaining--;
    run.iteration++;
    run.iterationStartedAt = now;
    run.nextStep = 0;
    run.nextCue = 0;
    for (const step of run.steps) {
      step.phase = 'pending';
      step.lastWritten = undefined;
    }

    this.logger.debug(`Looping ${run.name} (iteration ${run.iteration})`);
    this.bus.emit('motion:run_looped', this.toStatus(run, now), { source: 'motion' });
  }

  private finishRun(run: Run, state: Exclude<RunState, 'running'>, reason?: string): void {
    if (run.state !== 'running') return;

    const now = Date.now();
    run.state = state;
    run.reason = reason;
    run.finishedAt = now;

    for (const [channel, owner] of Array.from(this.owners)) {
      if (owner.run === run) this.owners.delete(channel);
    }
    this.runs.delete(run.id);

    const status = this.toStatus(run, now);
    this.history.push(status);
    if (this.history.length > this.historyLimit) {
      this.history = this.history.slice(-Math.floor(this.historyLimit / 2));
    }

    if (state === 'failed') {
      this.logger.error(`${run.kind} ${run.name} failed: ${reason ?? 'unknown error'}`);
    } else {
      this.logger.info(`${run.kind} ${run.name} ${state}${reason ? `: ${reason}` : ''}`);
    }
    this.bus.emit(`motion:run_${state}`, status, { source: 'motion' });
  }

  private fireAudioCue(run: Run, cue: AudioCue): void {
    this.bus.emit('motion:audio_cue', { runId: run.id, name: run.name, cue: cue.cue, atMs: cue.atMs }, { source: 'motion' });
    if (!this.hooks.audioCue) return;

    try {
      this.hooks.audioCue(cue.cue, cue.atMs);
    } catch (error) {
      this.logger.warn(`Audio cue ${cue.cue} failed: ${errorMessage(error)}`);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Status
  // ─────────────────────────────────────────────────────────────────────────

  private foreground(): Run | undefined {
    return Array.from(this.runs.values()).find(run => run.kind !== 'command' && run.state === 'running');
  }

  private toStatus(run: Run, now: number): RunStatus {
    const elapsed = (run.finishedAt ?? now) - run.iterationStartedAt;
    const progress = run.state === 'completed'
      ? 100
      : run.totalDurationMs > 0
        ? Math.min(100, (elapsed / run.totalDurationMs) * 100)
        : 0;

    return {
      runId: run.id,
      name: run.name,
      kind: run.kind,
      state: run.state,
      priority: run.priority,
      progress: Math.round(progress * 10) / 10,
      iteration: run.iteration,
      startedAt: run.startedAt,
      finishedAt: run.finishedAt,
      reason: run.reason,
      preemptedBy: run.preemptedBy,
    };
  }

  getRunStatus(runId: string): RunStatus | undefined {
    const run = this.runs.get(runId);
    if (run) return this.toStatus(run, Date.now());
    const finished = this.history.filter(status => status.runId === runId);
    return finished.length > 0 ? { ...finished[finished.length - 1] } : undefined;
  }

  getHistory(limit = this.historyLimit): RunStatus[] {
    return this.history.slice(-limit).map(status => ({ ...status }));
  }

  getPosition(channel: number): number | undefined {
    return this.positions.get(channel);
  }

  getStatus(): EngineStatus {
    const now = Date.now();
    return {
      running: this.isRunning(),
      tickRateHz: this.tickRateHz,
      ticks: this.ticks,
      foreground: this.foreground()?.name,
      activeRuns: Array.from(this.runs.values()).map(run => this.toStatus(run, now)),
      positions: Object.fromEntries(this.positions),
      history: this.history.length,
    };
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function commandToStep(command: ServoCommand): ChoreographyStep {
  return createStep({
    channel: command.channel,
    end: command.value,
    durationMs: command.durationMs,
    delayMs: command.delayMs,
    easing: command.easing ?? 'linear',
  });
}

function isSettled(phase: StepPhase): boolean {
  return phase === 'done' || phase === 'superseded' || phase === 'skipped';
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
