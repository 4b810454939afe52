/**
 * Lightweight logger utility with no imports of its own, so config and
 * adapters can pull it in without creating cycles.
 * Provides level-based logging with optional namespace prefixes.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

interface LoggerOptions {
  namespace?: string;
  level?: LogLevel;
}

/** Fields of a structured auth event. Never put passwords, hashes or tokens here. */
export interface LogEvent {
  category: string;
  action: string;
  outcome?: string;
  message?: string;
  [field: string]: string | number | boolean | null | undefined;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function resolveLevel(): LogLevel {
  const env = (process.env.AUTH_LOG_LEVEL || '').toLowerCase();
  if (isLogLevel(env)) return env;
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

// Child loggers without an explicit level follow the shared one.
let sharedLevel: LogLevel = resolveLevel();

export class AuthLogger {
  readonly namespace?: string;
  private level?: LogLevel;

  constructor(opts: LoggerOptions = {}) {
    this.namespace = opts.namespace;
    this.level = opts.level;
  }

  setLevel(level: LogLevel) { this.level = level; }
  getLevel(): LogLevel { return this.level ?? sharedLevel; }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.getLevel()];
  }

  private fmt(args: unknown[]): unknown[] {
    const prefix = this.namespace ? `[auth][${this.namespace}]` : '[auth]';
    return [prefix, ...args];
  }

  debug(...args: unknown[]) { if (this.shouldLog('debug')) console.debug(...this.fmt(args)); }
  info(...args: unknown[])  { if (this.shouldLog('info'))  console.info(...this.fmt(args)); }
  warn(...args: unknown[])  { if (this.shouldLog('warn'))  console.warn(...this.fmt(args)); }
  error(...args: unknown[]) { if (this.shouldLog('error')) console.error(...this.fmt(args)); }

  /** One JSON line per event, routed by outcome: failures warn, everything else is info. */
  event(evt: LogEvent) {
    const failed = evt.outcome !== undefined && evt.outcome !== 'success';
    const line = JSON.stringify({ ts: new Date().toISOString(), ...evt });
    if (failed) this.warn(line);
    else this.info(line);
  }
}

// Default shared logger instance
export const logger = new AuthLogger({ namespace: 'core' });

// Factory for feature-specific loggers
export function createLogger(namespace: string, level?: LogLevel) {
  return new AuthLogger({ namespace, level });
}

/** Set the level for every logger that has no explicit level of its own. */
export function reconfigureLogger(level?: LogLevel) {
  sharedLevel = level ?? resolveLevel();
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
