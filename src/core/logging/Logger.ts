// ═══════════════════════════════════════════════════════════════════════════════
// SERVO CORE - Logger
// Scoped log records on the event bus, mirrored to the console above a level
// ═══════════════════════════════════════════════════════════════════════════════

import { EventBus } from '../event-bus/EventBus';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogRecord {
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
  timestamp: number;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

export class Logger {
  private readonly label: string;

  constructor(
    private readonly scope: string,
    private readonly bus: EventBus,
    private readonly minLevel: LogLevel = 'info',
  ) {
    this.label = scope.charAt(0).toUpperCase() + scope.slice(1);
  }

  child(scope: string): Logger {
    return new Logger(scope, this.bus, this.minLevel);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    const record: LogRecord = { level, message, data, timestamp: Date.now() };
    this.bus.emit(`${this.scope}:log`, record, { source: this.scope });

    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;

    const line = `[${this.label}] ${level.toUpperCase()}: ${message}`;
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}
