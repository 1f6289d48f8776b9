// ═══════════════════════════════════════════════════════════════════════════════
// SERVO CORE - Event Bus
// In-process notifications between registry, safety, motion, queue and server
// ═══════════════════════════════════════════════════════════════════════════════

import { generateId } from '../ids';

export type EventPriority = 'critical' | 'high' | 'normal' | 'low';

// Lower rank is delivered first; equal ranks keep emit order
const PRIORITY_RANK: Record<EventPriority, number> = {
  critical: 0,
  high: 1,
  normal: 2,
  low: 3,
};

export interface Event<T = unknown> {
  id: string;
  type: string;
  payload: T;
  source: string;
  priority: EventPriority;
  timestamp: number;
}

export type EventHandler<T = unknown> = (event: Event<T>) => Promise<void> | void;

export interface Subscription {
  id: string;
  pattern: string;
  handler: EventHandler;
  once: boolean;
}

export interface EmitOptions {
  source?: string;
  priority?: EventPriority;
}

export interface FailedDelivery {
  event: Event;
  subscriptionId: string;
  error: Error;
  timestamp: number;
}

export interface EventBusOptions {
  maxHistory?: number;
  maxFailures?: number;
}

export class EventBus {
  private subscriptions: Map<string, Subscription[]> = new Map();
  private pending: Event[] = [];
  private draining = false;
  private history: Event[] = [];
  private failures: FailedDelivery[] = [];
  private readonly maxHistory: number;
  private readonly maxFailures: number;

  constructor(options: EventBusOptions = {}) {
    this.maxHistory = options.maxHistory ?? 1000;
    this.maxFailures = options.maxFailures ?? 100;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Publishing
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Queue an event and deliver everything pending. Handlers run synchronously;
   * an emit from inside a handler is delivered after the current event.
   */
  emit<T>(type: string, payload: T, options: EmitOptions = {}): string {
    const event: Event<T> = {
      id: generateId('evt'),
      type,
      payload,
      source: options.source ?? 'system',
      priority: options.priority ?? 'normal',
      timestamp: Date.now(),
    };

    this.enqueue(event);
    this.recordHistory(event);
    this.drain();

    return event.id;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Subscribing
  // ─────────────────────────────────────────────────────────────────────────────

  on<T>(pattern: string, handler: EventHandler<T>): () => void {
    return this.subscribe(pattern, handler as EventHandler, false);
  }

  once<T>(pattern: string, handler: EventHandler<T>): () => void {
    return this.subscribe(pattern, handler as EventHandler, true);
  }

  off(pattern: string, handler?: EventHandler): void {
    const subs = this.subscriptions.get(pattern);
    if (!subs) return;

    if (handler) {
      const idx = subs.findIndex(s => s.handler === handler);
      if (idx > -1) subs.splice(idx, 1);
      if (subs.length === 0) this.subscriptions.delete(pattern);
    } else {
      this.subscriptions.delete(pattern);
    }
  }

  private subscribe(pattern: string, handler: EventHandler, once: boolean): () => void {
    const subscription: Subscription = {
      id: generateId('sub'),
      pattern,
      handler,
      once,
    };

    const subs = this.subscriptions.get(pattern) ?? [];
    subs.push(subscription);
    this.subscriptions.set(pattern, subs);

    return () => this.off(pattern, handler);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Processing
  // ─────────────────────────────────────────────────────────────────────────────

  private enqueue(event: Event): void {
    const rank = PRIORITY_RANK[event.priority];
    const at = this.pending.findIndex(queued => PRIORITY_RANK[queued.priority] > rank);
    if (at === -1) {
      this.pending.push(event);
    } else {
      this.pending.splice(at, 0, event);
    }
  }

  private drain(): void {
    if (this.draining) return;
    this.draining = true;

    try {
      let event = this.pending.shift();
      while (event) {
        this.dispatch(event);
        event = this.pending.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  private dispatch(event: Event): void {
    for (const sub of this.getMatchingHandlers(event.type)) {
      if (sub.once) {
        this.off(sub.pattern, sub.handler);
      }

      try {
        const result = sub.handler(event);
        if (result instanceof Promise) {
          result.catch((error: unknown) => this.recordFailure(event, sub, error));
        }
      } catch (error) {
        this.recordFailure(event, sub, error);
      }
    }
  }

  private getMatchingHandlers(eventType: string): Subscription[] {
    const handlers: Subscription[] = [];

    for (const [pattern, subs] of this.subscriptions) {
      if (matchPattern(eventType, pattern)) {
        handlers.push(...subs);
      }
    }

    return handlers;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // History & Failures
  // ─────────────────────────────────────────────────────────────────────────────

  private recordHistory(event: Event): void {
    this.history.push(event);
    if (this.history.length > this.maxHistory) {
      this.history = this.history.slice(-Math.floor(this.maxHistory / 2));
    }
  }

  private recordFailure(event: Event, sub: Subscription, error: unknown): void {
    const failure: FailedDelivery = {
      event,
      subscriptionId: sub.id,
      error: error instanceof Error ? error : new Error(String(error)),
      timestamp: Date.now(),
    };

    this.failures.push(failure);
    if (this.failures.length > this.maxFailures) {
      this.failures = this.failures.slice(-Math.floor(this.maxFailures / 2));
    }

    console.error(`[EventBus] ERROR: handler for '${event.type}' failed: ${failure.error.message}`);
  }

  getHistory(filter: { type?: string; since?: number; limit?: number } = {}): Event[] {
    const { type, since, limit } = filter;
    let events = [...this.history];
    if (type) events = events.filter(e => matchPattern(e.type, type));
    if (since !== undefined) events = events.filter(e => e.timestamp >= since);
    if (limit) events = events.slice(-limit);
    return events;
  }

  getFailures(): FailedDelivery[] {
    return [...this.failures];
  }

  getStats(): { subscriptions: number; queueSize: number; failures: number; historySize: number } {
    return {
      subscriptions: Array.from(this.subscriptions.values()).reduce((acc, subs) => acc + subs.length, 0),
      queueSize: this.pending.length,
      failures: this.failures.length,
      historySize: this.history.length,
    };
  }
}

export function matchPattern(eventType: string, pattern: string): boolean {
  if (pattern === '*') return true;
  if (pattern === eventType) return true;
  if (pattern.endsWith(':*')) {
    return eventType.startsWith(pattern.slice(0, -1));
  }
  if (pattern.startsWith('*:')) {
    return eventType.endsWith(pattern.slice(1));
  }
  return false;
}
