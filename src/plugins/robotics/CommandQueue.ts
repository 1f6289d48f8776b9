// ═══════════════════════════════════════════════════════════════════════════════
// SERVO CORE - Command Queue
// Serialized admission and dispatch of single commands and composed sequences
// ═══════════════════════════════════════════════════════════════════════════════

import { EventBus } from '../../core/event-bus/EventBus';
import { Logger } from '../../core/logging/Logger';
import { generateId } from '../../core/ids';
import { ActuatorRegistry } from './ActuatorRegistry';
import { SafetyValidator, ValidationResult } from './SafetyValidator';
import { ChoreographyEngine, RunStatus } from './choreography/ChoreographyEngine';
import { CommandKind, ServoCommand, ServoSequence } from './ServoTypes';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type QueueItemStatus = 'pending' | 'running' | 'completed' | 'failed' | 'preempted' | 'cancelled' | 'rejected';

export type QueueStatusResult = QueueItemStatus | 'not_found';

export interface CommandInput {
  channel: number;
  kind?: CommandKind;
  value: number;
  durationMs?: number;
  delayMs?: number;
  easing?: string;
}

export interface SequenceInput {
  name?: string;
  commands: CommandInput[];
  loop?: boolean;
  loopCount?: number;
  priority?: number;
  allowsInterruption?: boolean;
}

export type SubmitResult =
  | { accepted: true; id: string; adjusted: boolean; value?: number }
  | { accepted: false; id: string; reason: string; detail?: string };

export interface QueueItemInfo {
  id: string;
  kind: 'command' | 'sequence';
  name?: string;
  status: QueueItemStatus;
  reason?: string;
  submittedAt: number;
  updatedAt: number;
}

export interface QueueStats {
  pending: number;
  running: number;
  completed: number;
  failed: number;
  preempted: number;
  cancelled: number;
  rejected: number;
  total: number;
  dispatching: boolean;
}

export interface CommandQueueOptions {
  dispatchRateHz?: number;
  maxActiveSequences?: number;
  historyLimit?: number;
}

interface QueueItem {
  id: string;
  kind: 'command' | 'sequence';
  status: QueueItemStatus;
  command?: ServoCommand;
  sequence?: ServoSequence;
  notBefore: number;
  submittedAt: number;
  updatedAt: number;
  reason?: string;
}

const DEFAULT_DURATION_MS = 1000;

// ─────────────────────────────────────────────────────────────────────────────
// Command Queue Implementation
// ─────────────────────────────────────────────────────────────────────────────

export class CommandQueue {
  private readonly options: Required<CommandQueueOptions>;

  // Insertion order doubles as dispatch order
  private items: Map<string, QueueItem> = new Map();
  private dispatchTimer?: ReturnType<typeof setInterval>;
  private unsubscribers: Array<() => void> = [];

  constructor(
    private readonly registry: ActuatorRegistry,
    private readonly validator: SafetyValidator,
    private readonly engine: ChoreographyEngine,
    private readonly bus: EventBus,
    private readonly logger: Logger,
    options: CommandQueueOptions = {},
  ) {
    this.options = {
      dispatchRateHz: 20,
      maxActiveSequences: 1,
      historyLimit: 100,
      ...options,
    };

    this.unsubscribers.push(
      bus.on<RunStatus>('motion:run_completed', (event) => this.onRunFinished(event.payload)),
      bus.on<RunStatus>('motion:run_stopped', (event) => this.onRunFinished(event.payload)),
      bus.on<RunStatus>('motion:run_failed', (event) => this.onRunFinished(event.payload)),
      bus.on<{ reason: string }>('safety:estop', (event) => this.failPending(`Emergency stop: ${event.payload.reason}`)),
    );
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────

  start(): void {
    if (this.dispatchTimer) return;
    this.dispatchTimer = setInterval(() => this.dispatch(), 1000 / this.options.dispatchRateHz);
    this.logger.info(`Command queue dispatching at ${this.options.dispatchRateHz} Hz`);
  }

  stop(): void {
    if (!this.dispatchTimer) return;
    clearInterval(this.dispatchTimer);
    this.dispatchTimer = undefined;
    this.logger.info('Command queue stopped');
  }

  dispose(): void {
    this.stop();
    for (const unsubscribe of this.unsubscribers) unsubscribe();
    this.unsubscribers = [];
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Submission
  // ─────────────────────────────────────────────────────────────────────────

  submitCommand(input: CommandInput): SubmitResult {
    const command = buildCommand(input);

    if (command.kind === 'emergency_stop') {
      this.validator.triggerEmergencyStop('emergency_stop command');
      this.track({ id: command.id, kind: 'command', status: 'completed', command, notBefore: command.createdAt });
      return { accepted: true, id: command.id, adjusted: false };
    }

    const result = this.validator.validate(command);
    if (!result.accepted) {
      return this.rejectItem(command.id, 'command', result.reason, result.detail);
    }

    this.track({
      id: command.id,
      kind: 'command',
      status: 'pending',
      command: result.command,
      notBefore: command.createdAt + command.delayMs,
    });
    this.bus.emit('queue:submitted', { id: command.id, kind: 'command', channel: command.channel }, { source: 'queue' });

    return { accepted: true, id: command.id, adjusted: result.adjusted, value: result.command.value };
  }

  /**
   * Admit a sequence. Unknown channels reject it outright; every command is
   * then validated in effective time order, each from the previous target on
   * its channel.
   */
  submitSequence(input: SequenceInput): SubmitResult {
    const id = generateId('seq');
    const createdAt = Date.now();

    if (!Array.isArray(input.commands) || input.commands.length === 0) {
      return this.rejectItem(id, 'sequence', 'invalid value', 'Sequence has no commands');
    }

    const unknown = [...new Set(input.commands.map(c => c.channel).filter(channel => !this.registry.has(channel)))];
    if (unknown.length > 0) {
      return this.rejectItem(id, 'sequence', 'unknown channel', `Unknown channel(s): ${unknown.join(', ')}`);
    }

    if (input.commands.some(c => c.kind === 'emergency_stop')) {
      return this.rejectItem(id, 'sequence', 'invalid value', 'emergency_stop cannot be sequenced');
    }

    const draft: ServoSequence = {
      id,
      name: input.name ?? id,
      commands: input.commands.map(buildCommand),
      loop: input.loop ?? false,
      loopCount: input.loopCount ?? 1,
      priority: input.priority ?? 5,
      allowsInterruption: input.allowsInterruption ?? true,
      createdAt,
    };

    if (!Number.isInteger(draft.priority) || draft.priority < 1 || draft.priority > 10) {
      return this.rejectItem(id, 'sequence', 'invalid value', 'Priority must be an integer 1-10');
    }

    const validated = this.validateSequence(draft);
    if (!validated.ok) {
      return this.rejectItem(id, 'sequence', validated.reason, validated.detail);
    }

    this.track({ id, kind: 'sequence', status: 'pending', sequence: validated.sequence, notBefore: createdAt });
    this.bus.emit('queue:submitted', { id, kind: 'sequence', name: draft.name }, { source: 'queue' });

    return { accepted: true, id, adjusted: validated.adjusted };
  }

  private validateSequence(
    sequence: ServoSequence,
  ): { ok: true; sequence: ServoSequence; adjusted: boolean } | { ok: false; reason: string; detail: string } {
    const ordered = [...sequence.commands].sort((a, b) => a.delayMs - b.delayMs);
    const targets = new Map<number, number>();
    const commands: ServoCommand[] = [];
    let adjusted = false;

    for (const command of ordered) {
      const result: ValidationResult = this.validator.validate(command, { fromPosition: targets.get(command.channel) });
      if (!result.accepted) {
        return { ok: false, reason: result.reason, detail: result.detail };
      }
      if (result.command.kind === 'position') {
        targets.set(command.channel, result.command.value);
      }
      adjusted = adjusted || result.adjusted;
      commands.push(result.command);
    }

    return { ok: true, sequence: { ...sequence, commands }, adjusted };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Cancellation & Status
  // ─────────────────────────────────────────────────────────────────────────

  /** Best effort. Terminal items are left as they are. */
  cancel(id: string): boolean {
    const item = this.items.get(id);
    if (!item) return false;

    if (item.status === 'pending') {
      this.setStatus(item, 'cancelled', 'Cancelled by request');
      return true;
    }
    if (item.status === 'running') {
      // Mark first so the run_stopped notification is not read as a failure
      this.setStatus(item, 'cancelled', 'Cancelled by request');
      this.engine.stopRun(id);
      return true;
    }
    return false;
  }

  status(id: string): QueueStatusResult {
    return this.items.get(id)?.status ?? 'not_found';
  }

  get(id: string): QueueItemInfo | undefined {
    const item = this.items.get(id);
    return item ? toInfo(item) : undefined;
  }

  list(filter: { status?: QueueItemStatus } = {}): QueueItemInfo[] {
    return Array.from(this.items.values())
      .filter(item => filter.status === undefined || item.status === filter.status)
      .map(toInfo);
  }

  getStats(): QueueStats {
    const stats: QueueStats = {
      pending: 0,
      running: 0,
      completed: 0,
      failed: 0,
      preempted: 0,
      cancelled: 0,
      rejected: 0,
      total: this.items.size,
      dispatching: this.dispatchTimer !== undefined,
    };
    for (const item of this.items.values()) {
      stats[item.status]++;
    }
    return stats;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Dispatch
  // ─────────────────────────────────────────────────────────────────────────

  private dispatch(now = Date.now()): void {
    if (this.validator.isEmergencyStopped()) return;

    for (const item of Array.from(this.items.values())) {
      if (item.status !== 'pending') continue;

      if (item.command) {
        if (now >= item.notBefore) this.dispatchCommand(item, item.command);
      } else if (item.sequence) {
        if (this.activeSequences() < this.options.maxActiveSequences) {
          this.dispatchSequence(item, item.sequence);
        }
      }
    }
  }

  private dispatchCommand(item: QueueItem, command: ServoCommand): void {
    if (command.kind === 'speed' || command.kind === 'acceleration') {
      this.applyRate(item, command);
      return;
    }

    const result = this.engine.startCommand({ ...command, delayMs: 0 });
    if (result.started) {
      this.setStatus(item, 'running');
    } else {
      this.setStatus(item, 'failed', result.reason);
    }
  }

  private dispatchSequence(item: QueueItem, sequence: ServoSequence): void {
    const revalidated = this.validateSequence(sequence);
    if (!revalidated.ok) {
      this.setStatus(item, 'failed', `${revalidated.reason}: ${revalidated.detail}`);
      return;
    }

    const moves = revalidated.sequence.commands.filter(c => c.kind === 'position');
    for (const command of revalidated.sequence.commands) {
      if (command.kind === 'speed' || command.kind === 'acceleration') {
        this.updateRate(command);
      }
    }
    if (moves.length === 0) {
      this.setStatus(item, 'completed');
      return;
    }

    const result = this.engine.startSequence(revalidated.sequence);
    if (result.started) {
      this.setStatus(item, 'running');
    } else if (result.retryable) {
      this.logger.debug(`Sequence ${sequence.name} deferred: ${result.reason}`);
    } else {
      this.setStatus(item, 'failed', result.reason);
    }
  }

  private applyRate(item: QueueItem, command: ServoCommand): void {
    const outcome = this.updateRate(command);
    if (outcome.ok) {
      this.setStatus(item, 'completed');
    } else {
      this.setStatus(item, 'failed', outcome.errors.join('; '));
    }
  }

  private updateRate(command: ServoCommand): { ok: true } | { ok: false; errors: string[] } {
    const patch = command.kind === 'speed'
      ? { defaultSpeed: command.value }
      : { defaultAcceleration: command.value };
    const result = this.registry.upsert(command.channel, patch);
    return result.ok ? { ok: true } : { ok: false, errors: result.errors };
  }

  private activeSequences(): number {
    let count = 0;
    for (const item of this.items.values()) {
      if (item.kind === 'sequence' && item.status === 'running') count++;
    }
    return count;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Bookkeeping
  // ─────────────────────────────────────────────────────────────────────────

  private onRunFinished(run: RunStatus): void {
    const item = this.items.get(run.runId);
    if (!item || item.status !== 'running') return;

    if (run.state === 'completed') {
      this.setStatus(item, 'completed');
    } else if (run.preemptedBy !== undefined) {
      this.setStatus(item, 'preempted', run.reason ?? `Preempted by ${run.preemptedBy}`);
    } else {
      this.setStatus(item, 'failed', run.reason ?? `Run ${run.state}`);
    }
  }

  private failPending(reason: string): void {
    for (const item of this.items.values()) {
      if (item.status === 'pending') this.setStatus(item, 'failed', reason);
    }
  }

  private rejectItem(id: string, kind: QueueItem['kind'], reason: string, detail?: string): SubmitResult {
    const now = Date.now();
    this.track({ id, kind, status: 'rejected', notBefore: now, reason: detail ? `${reason}: ${detail}` : reason });
    this.logger.info(`Rejected ${kind} ${id}: ${detail ?? reason}`);
    this.bus.emit('queue:rejected', { id, kind, reason, detail }, { source: 'queue' });
    return { accepted: false, id, reason, detail };
  }

  private track(entry: Omit<QueueItem, 'submittedAt' | 'updatedAt'>): void {
    const now = Date.now();
    this.items.set(entry.id, { ...entry, submittedAt: now, updatedAt: now });
    this.trimHistory();
  }

  private setStatus(item: QueueItem, status: QueueItemStatus, reason?: string): void {
    item.status = status;
    item.reason = reason;
    item.updatedAt = Date.now();

    if (status === 'failed') {
      this.logger.warn(`${item.kind} ${item.id} failed: ${reason ?? 'unknown reason'}`);
    }
    this.bus.emit('queue:status', { id: item.id, status, reason }, { source: 'queue' });
    this.trimHistory();
  }

  private trimHistory(): void {
    const terminal = Array.from(this.items.values()).filter(item => isTerminal(item.status));
    if (terminal.length <= this.options.historyLimit) return;

    const excess = terminal.length - Math.floor(this.options.historyLimit / 2);
    for (const item of terminal.slice(0, excess)) {
      this.items.delete(item.id);
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function buildCommand(input: CommandInput): ServoCommand {
  return {
    id: generateId('cmd'),
    channel: input.channel,
    kind: input.kind ?? 'position',
    value: input.value,
    durationMs: input.durationMs ?? DEFAULT_DURATION_MS,
    delayMs: input.delayMs ?? 0,
    easing: input.easing,
    createdAt: Date.now(),
  };
}

function isTerminal(status: QueueItemStatus): boolean {
  return status !== 'pending' && status !== 'running';
}

function toInfo(item: QueueItem): QueueItemInfo {
  return {
    id: item.id,
    kind: item.kind,
    name: item.sequence?.name,
    status: item.status,
    reason: item.reason,
    submittedAt: item.submittedAt,
    updatedAt: item.updatedAt,
  };
}
