export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  scope: string;
  message: string;
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const MAX_ENTRIES = 200;
const buffer: LogEntry[] = [];
const listeners: Array<(entry: LogEntry) => void> = [];
let threshold: LogLevel = 'warn';
let echo = true;

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

/** Toggle writing entries to stderr; history and listeners are unaffected */
export function setLogEcho(enabled: boolean): void {
  echo = enabled;
}

function formatDetail(detail: unknown): string {
  if (typeof detail === 'string') return detail;
  if (detail instanceof Error) return detail.message;
  return JSON.stringify(detail);
}

function push(level: LogLevel, scope: string, message: string, details: unknown[]): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

  const text = [message, ...details.map(formatDetail)].join(' ');
  const entry: LogEntry = { timestamp: Date.now(), level, scope, message: text };
  buffer.push(entry);
  if (buffer.length > MAX_ENTRIES) buffer.shift();

  if (echo) {
    console.error(`[${scope}] ${level}: ${text}`);
  }
  for (const cb of listeners) cb(entry);
}

export function createLogger(scope: string): Logger {
  return {
    debug: (message, ...details) => push('debug', scope, message, details),
    info: (message, ...details) => push('info', scope, message, details),
    warn: (message, ...details) => push('warn', scope, message, details),
    error: (message, ...details) => push('error', scope, message, details),
  };
}

export function getLogHistory(): LogEntry[] {
  return [...buffer];
}

export function clearLogs(): void {
  buffer.length = 0;
}

export function onLog(callback: (entry: LogEntry) => void): () => void {
  listeners.push(callback);
  return () => {
    const idx = listeners.indexOf(callback);
    if (idx >= 0) listeners.splice(idx, 1);
  };
}
