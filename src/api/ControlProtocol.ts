// ═══════════════════════════════════════════════════════════════════════════════
// SERVO CORE - Control Protocol
// JSON request/response sessions over any message transport
// Every client funnels into the one command queue; safety events fan out to all
// ═══════════════════════════════════════════════════════════════════════════════

import { ServoContext } from '../core/context';
import { SafetyViolation } from '../plugins/robotics/ServoTypes';
import { toServoDocument } from '../plugins/robotics/profiles/ProfileDocument';
import {
  Fields,
  Reply,
  booleanField,
  errorReply,
  isFields,
  isSafetyTier,
  numberField,
  numberListField,
  parseActuatorPatch,
  parseCommandInput,
  parseSequenceInput,
  pick,
  stringField,
} from './messages';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface ClientConnection {
  readonly id: string;
  send(data: string): void;
}

export interface ClientSession {
  client: ClientConnection;
  remoteAddress?: string;
  connectedAt: number;
  lastActivity: number;
  messageCount: number;
}

export interface ClientInfo {
  id: string;
  remoteAddress?: string;
  connectedAt: number;
  lastActivity: number;
  messageCount: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Control Protocol Implementation
// ─────────────────────────────────────────────────────────────────────────────

export class ControlProtocol {
  private sessions: Map<string, ClientSession> = new Map();
  private unsubscribers: Array<() => void> = [];

  constructor(private readonly context: ServoContext) {
    const { bus } = context;

    this.unsubscribers.push(
      bus.on<{ reason: string; timestamp: number }>('safety:estop', (event) => {
        this.broadcast({ type: 'emergency_stop_activated', reason: event.payload.reason });
      }),
      bus.on('safety:estop_reset', () => {
        this.broadcast({ type: 'emergency_stop_reset' });
      }),
      bus.on<SafetyViolation>('safety:violation', (event) => {
        if (event.payload.severity === 'critical') {
          this.broadcast({ type: 'safety_violation', violation: event.payload });
        }
      }),
    );
  }

  dispose(): void {
    for (const unsubscribe of this.unsubscribers) unsubscribe();
    this.unsubscribers = [];
    this.sessions.clear();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Sessions
  // ─────────────────────────────────────────────────────────────────────────

  connect(client: ClientConnection, remoteAddress?: string): void {
    const now = Date.now();
    this.sessions.set(client.id, { client, remoteAddress, connectedAt: now, lastActivity: now, messageCount: 0 });

    this.context.logger.info(`Client connected: ${client.id}${remoteAddress ? ` (${remoteAddress})` : ''}`);
    this.context.bus.emit('server:client_connected', { clientId: client.id, remoteAddress }, { source: 'server' });

    this.send(client, { type: 'initial_status', ...this.buildStatus() });
  }

  disconnect(clientId: string): void {
    if (!this.sessions.delete(clientId)) return;

    this.context.logger.info(`Client disconnected: ${clientId}`);
    this.context.bus.emit('server:client_disconnected', { clientId }, { source: 'server' });
  }

  getClients(): ClientInfo[] {
    return Array.from(this.sessions.values()).map(session => ({
      id: session.client.id,
      remoteAddress: session.remoteAddress,
      connectedAt: session.connectedAt,
      lastActivity: session.lastActivity,
      messageCount: session.messageCount,
    }));
  }

  clientCount(): number {
    return this.sessions.size;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Messaging
  // ─────────────────────────────────────────────────────────────────────────

  /** Answer one inbound message. Never throws; failures become error replies. */
  async handleMessage(client: ClientConnection, raw: string): Promise<void> {
    const session = this.sessions.get(client.id);
    if (session) {
      session.messageCount++;
      session.lastActivity = Date.now();
    }

    let message: unknown;
    try {
      message = JSON.parse(raw);
    } catch {
      this.send(client, errorReply('Invalid JSON format'));
      return;
    }

    if (!isFields(message) || typeof message.type !== 'string') {
      this.send(client, errorReply('Message must be a JSON object with a string type'));
      return;
    }

    let reply: Reply;
    try {
      reply = await this.route(client, message.type, message);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.context.logger.error(`Error handling ${message.type}: ${detail}`);
      reply = errorReply(`Error processing ${message.type}: ${detail}`);
    }

    this.send(client, reply);
  }

  broadcast(message: Reply): void {
    for (const session of this.sessions.values()) {
      this.send(session.client, message);
    }
  }

  private send(client: ClientConnection, message: Reply): void {
    try {
      client.send(JSON.stringify({ ...message, timestamp: Date.now() / 1000 }));
    } catch (error) {
      this.context.logger.warn(`Send to ${client.id} failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private async route(client: ClientConnection, type: string, message: Fields): Promise<Reply> {
    switch (type) {
      case 'servo_command':
        return this.handleServoCommand(message);
      case 'sequence_command':
        return this.handleSequenceCommand(message);
      case 'sequence_control':
        return this.handleSequenceControl(message);
      case 'choreography_command':
        return this.handleChoreographyCommand(message);
      case 'emergency_stop':
        return this.handleEmergencyStop(client);
      case 'emergency_reset':
        return { type: 'emergency_reset_response', ...this.context.validator.resetEmergencyStop() };
      case 'resolve_violation':
        return this.handleResolveViolation(message);
      case 'safety_zone_command':
        return this.handleSafetyZoneCommand(message);
      case 'config_command':
        return this.handleConfigCommand(message);
      case 'get_status':
        return { type: 'status_update', ...this.buildStatus() };
      default:
        return errorReply(`Unknown message type: ${type}`);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Motion Handlers
  // ─────────────────────────────────────────────────────────────────────────

  private handleServoCommand(message: Fields): Reply {
    const nested = pick(message, 'command');
    const input = parseCommandInput(isFields(nested) ? nested : message);
    if (!input) return errorReply('Missing channel or position');

    const result = this.context.queue.submitCommand(input);
    if (!result.accepted) {
      return {
        type: 'command_response',
        success: false,
        command_id: result.id,
        error: result.detail ? `${result.reason}: ${result.detail}` : result.reason,
      };
    }

    return {
      type: 'command_response',
      success: true,
      command_id: result.id,
      position: result.value,
      adjusted: result.adjusted,
    };
  }

  private handleSequenceCommand(message: Fields): Reply {
    const input = parseSequenceInput(pick(message, 'sequence'));
    if (typeof input === 'string') return errorReply(input);

    const result = this.context.queue.submitSequence(input);
    if (!result.accepted) {
      return {
        type: 'sequence_response',
        success: false,
        sequence_id: result.id,
        error: result.detail ? `${result.reason}: ${result.detail}` : result.reason,
      };
    }
    return { type: 'sequence_response', success: true, sequence_id: result.id };
  }

  private handleSequenceControl(message: Fields): Reply {
    const action = stringField(message, 'action');
    const sequenceId = stringField(message, 'sequence_id');
    if (!sequenceId) return errorReply('Missing sequence_id');

    const { queue } = this.context;
    if (action === 'cancel') {
      const cancelled = queue.cancel(sequenceId);
      return { type: 'sequence_status', sequence_id: sequenceId, success: cancelled, status: queue.status(sequenceId) };
    }
    if (action === 'status') {
      const info = queue.get(sequenceId);
      return {
        type: 'sequence_status',
        sequence_id: sequenceId,
        success: info !== undefined,
        status: info?.status ?? 'not_found',
        reason: info?.reason,
      };
    }
    return errorReply(`Unknown sequence action: ${String(action)}`);
  }

  private handleChoreographyCommand(message: Fields): Reply {
    const { engine, library } = this.context;
    const action = stringField(message, 'action');

    if (action === 'execute') {
      const name = stringField(message, 'name');
      if (!name) return errorReply('Missing choreography name');

      const result = engine.execute(
        name,
        numberField(message, 'personality_modifier') ?? 1.0,
        numberField(message, 'intensity'),
        { loopCount: numberField(message, 'loop_count') },
      );
      return result.started
        ? { type: 'choreography_response', action, success: true, run_id: result.runId }
        : { type: 'choreography_response', action, success: false, error: result.reason };
    }

    if (action === 'stop') {
      const runId = stringField(message, 'run_id');
      if (!runId) return errorReply('Missing run_id');
      return { type: 'choreography_response', action, success: engine.stopRun(runId), run_id: runId };
    }

    if (action === 'status') {
      const runId = stringField(message, 'run_id');
      if (!runId) return errorReply('Missing run_id');
      const status = engine.getRunStatus(runId);
      return { type: 'choreography_response', action, success: status !== undefined, run: status };
    }

    if (action === 'list') {
      return {
        type: 'choreography_response',
        action,
        success: true,
        choreographies: library.list(stringField(message, 'personality')),
      };
    }

    if (action === 'info') {
      const name = stringField(message, 'name');
      const info = name === undefined ? undefined : library.info(name);
      return info
        ? { type: 'choreography_response', action, success: true, info }
        : { type: 'choreography_response', action, success: false, error: `Unknown choreography: ${String(name)}` };
    }

    return errorReply(`Unknown choreography action: ${String(action)}`);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Safety Handlers
  // ─────────────────────────────────────────────────────────────────────────

  private handleEmergencyStop(client: ClientConnection): Reply {
    this.context.validator.triggerEmergencyStop(`Requested by client ${client.id}`);
    return { type: 'emergency_response', success: true, active: this.context.validator.isEmergencyStopped() };
  }

  private handleResolveViolation(message: Fields): Reply {
    const { validator } = this.context;

    if (booleanField(message, 'all') === true) {
      return { type: 'violation_response', success: true, resolved: validator.resolveAll() };
    }

    const violationId = stringField(message, 'violation_id');
    if (!violationId) return errorReply('Missing violation_id or all');

    const resolved = validator.resolveViolation(violationId);
    return { type: 'violation_response', success: resolved, resolved: resolved ? 1 : 0, violation_id: violationId };
  }

  private handleSafetyZoneCommand(message: Fields): Reply {
    const { validator } = this.context;
    const action = stringField(message, 'action');

    if (action === 'list') {
      return { type: 'safety_zone_response', action, success: true, zones: validator.listSafetyZones() };
    }

    const name = stringField(message, 'name');
    if (!name) return errorReply('Missing zone name');

    if (action === 'add') {
      const channels = numberListField(message, 'channels');
      const min = numberField(message, 'min');
      const max = numberField(message, 'max');
      if (!channels || min === undefined || max === undefined) {
        return errorReply('Zone needs channels, min and max');
      }
      const result = validator.addSafetyZone(name, channels, min, max);
      return result.ok
        ? { type: 'safety_zone_response', action, success: true, name }
        : { type: 'safety_zone_response', action, success: false, name, error: result.error };
    }

    if (action === 'remove') {
      return { type: 'safety_zone_response', action, success: validator.removeSafetyZone(name), name };
    }

    return errorReply(`Unknown safety zone action: ${String(action)}`);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Configuration Handlers
  // ─────────────────────────────────────────────────────────────────────────

  private async handleConfigCommand(message: Fields): Promise<Reply> {
    const { registry, profiles, config } = this.context;
    const action = stringField(message, 'action');

    switch (action) {
      case 'get': {
        const channel = numberField(message, 'channel');
        if (channel === undefined) {
          return {
            type: 'config_response',
            action,
            success: true,
            safety_tier: registry.tier(),
            servos: registry.all().map(toServoDocument),
          };
        }
        const servo = registry.get(channel);
        return servo
          ? { type: 'config_response', action, success: true, config: toServoDocument(servo) }
          : { type: 'config_response', action, success: false, error: `Unknown channel ${channel}` };
      }

      case 'set': {
        const channel = numberField(message, 'channel');
        if (channel === undefined) return errorReply('Missing channel');
        const source = pick(message, 'config');
        const { patch, errors } = parseActuatorPatch(isFields(source) ? source : message);
        if (errors.length > 0) {
          return { type: 'config_response', action, success: false, errors };
        }
        const result = registry.upsert(channel, patch);
        return result.ok
          ? { type: 'config_response', action, success: true, config: toServoDocument(result.config) }
          : { type: 'config_response', action, success: false, errors: result.errors };
      }

      case 'save': {
        const name = stringField(message, 'name') ?? config.profiles.active;
        const result = await profiles.save(name, registry.all(), stringField(message, 'profile'));
        return result.success
          ? { type: 'config_response', action, success: true, name, path: result.path }
          : { type: 'config_response', action, success: false, name, error: result.error };
      }

      case 'load': {
        const name = stringField(message, 'name');
        if (!name) return errorReply('Missing profile name');
        const loaded = await profiles.load(name);
        if (loaded.errors.length > 0 || loaded.configs.length === 0) {
          const errors = loaded.errors.length > 0 ? loaded.errors : [`Profile ${name} has no servos`];
          return { type: 'config_response', action, success: false, name, errors };
        }
        const applied = registry.replace(loaded.configs);
        return applied.ok
          ? { type: 'config_response', action, success: true, name, total_servos: loaded.configs.length }
          : { type: 'config_response', action, success: false, name, errors: applied.errors };
      }

      case 'list':
        return { type: 'config_response', action, success: true, profiles: await profiles.list() };

      case 'set_tier': {
        const tier = pick(message, 'tier');
        if (!isSafetyTier(tier)) return errorReply(`Unknown safety tier: ${String(tier)}`);
        registry.applySafetyTier(tier);
        return { type: 'config_response', action, success: true, safety_tier: tier };
      }

      default:
        return errorReply(`Unknown config action: ${String(action)}`);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Status
  // ─────────────────────────────────────────────────────────────────────────

  buildStatus(): Record<string, unknown> {
    const { registry, validator, engine, queue, driver } = this.context;

    return {
      driver: { name: driver.name, connected: driver.isConnected() },
      safety: validator.getStatus(),
      motion: engine.getStatus(),
      queue: queue.getStats(),
      servos: registry.all().map(config => ({
        channel: config.channel,
        name: config.name,
        enabled: config.enabled,
        position: engine.getPosition(config.channel) ?? config.homePosition,
      })),
      clients: this.sessions.size,
    };
  }
}
