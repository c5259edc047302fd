/**
 * @fileoverview Console logger with a debug toggle and per-component scopes
 * @description debug, info and warn are silent unless debugging is switched
 * on; errors always print. `scoped(name)` returns a logger that prefixes every
 * message with `[name]`.
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogSink = (level: LogLevel, args: unknown[]) => void;

let debugOutputEnabled: boolean = false;

const consoleSink: LogSink = (level, args) => {
  // eslint-disable-next-line no-console
  const write = level === 'debug' ? console.log : console[level];
  write(...args);
};

let sink: LogSink = consoleSink;

function emit(level: LogLevel, args: unknown[]): void {
  if (level !== 'error' && !debugOutputEnabled) return;
  sink(level, args);
}

function debug(...args: unknown[]): void {
  emit('debug', args);
}

function info(...args: unknown[]): void {
  emit('info', args);
}

function warn(...args: unknown[]): void {
  emit('warn', args);
}

/**
 * Always printed, whatever the debug setting
 */
function error(...args: unknown[]): void {
  emit('error', args);
}

function setDebug(enable: boolean): void {
  debugOutputEnabled = enable;
}

function isDebugEnabled(): boolean {
  return debugOutputEnabled;
}

/**
 * Route output somewhere other than the console; null restores the console
 */
function setSink(next: LogSink | null): void {
  sink = next ?? consoleSink;
}

interface ScopedLogger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

function scoped(scope: string): ScopedLogger {
  const prefix = `[${scope}]`;
  return {
    debug: (...args) => emit('debug', [prefix, ...args]),
    info: (...args) => emit('info', [prefix, ...args]),
    warn: (...args) => emit('warn', [prefix, ...args]),
    error: (...args) => emit('error', [prefix, ...args])
  };
}

interface Logger extends ScopedLogger {
  setDebug(enable: boolean): void;
  isDebugEnabled(): boolean;
  setSink(next: LogSink | null): void;
  scoped(scope: string): ScopedLogger;
}

const logger: Logger = {
  debug,
  info,
  warn,
  error,
  setDebug,
  isDebugEnabled,
  setSink,
  scoped
};

export {
  debug,
  info,
  warn,
  error,
  setDebug,
  isDebugEnabled,
  setSink,
  scoped,
  logger,
  type Logger,
  type ScopedLogger,
  type LogLevel,
  type LogSink
};

export default logger;
