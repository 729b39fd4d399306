/**
 * DebugLogger - Centralized logging for Puffdown
 *
 * - Log levels (DEBUG, INFO, WARN, ERROR)
 * - Timestamp formatting
 * - Environment-based filtering (PUFFDOWN_LOG_LEVEL), overridable at runtime
 * - Module/context tagging
 *
 * Everything goes to stderr so stdout stays clean for CLI output.
 */

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'NONE';

const LOG_LEVELS: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
  NONE: 4,
};

let levelOverride: LogLevel | null = null;

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Override the threshold for every logger in the process.
 * Pass null to go back to PUFFDOWN_LOG_LEVEL.
 */
export function setLogLevel(level: LogLevel | string | null): void {
  if (level === null) {
    levelOverride = null;
    return;
  }
  const normalized = level.toUpperCase();
  levelOverride = isLogLevel(normalized) ? normalized : 'ERROR';
}

function resolveLevel(): number {
  if (levelOverride) {
    return LOG_LEVELS[levelOverride];
  }
  const env = (process.env.PUFFDOWN_LOG_LEVEL || 'ERROR').toUpperCase();
  return isLogLevel(env) ? LOG_LEVELS[env] : LOG_LEVELS.ERROR;
}

export class DebugLogger {
  private context: string;

  constructor(context = 'puffdown') {
    this.context = context;
  }

  private _shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= resolveLevel();
  }

  private _formatMessage(level: LogLevel, ...args: unknown[]): unknown[] {
    const timestamp = new Date().toISOString();
    const prefix = `[${timestamp}] [${this.context}] [${level}]`;
    return [prefix, ...args];
  }

  debug(...args: unknown[]): void {
    if (!this._shouldLog('DEBUG')) {
      return;
    }
    console.error(...this._formatMessage('DEBUG', ...args));
  }

  info(...args: unknown[]): void {
    if (!this._shouldLog('INFO')) {
      return;
    }
    console.error(...this._formatMessage('INFO', ...args));
  }

  warn(...args: unknown[]): void {
    if (!this._shouldLog('WARN')) {
      return;
    }
    console.warn(...this._formatMessage('WARN', ...args));
  }

  error(...args: unknown[]): void {
    if (!this._shouldLog('ERROR')) {
      return;
    }
    console.error(...this._formatMessage('ERROR', ...args));
  }
}

const logger = new DebugLogger('puffdown');

export default logger;
