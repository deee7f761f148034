/**
 * Build log - in-memory ring buffer for walk/resolve/render diagnostics
 *
 * Appends to the buffer AND writes to console.error, so a build run from a
 * terminal shows every diagnostic while tests and the pipeline can query
 * what was reported.
 */

export type LogLevel = 'info' | 'warn' | 'error';

export type LogComponent =
  | 'walk' | 'timestamps' | 'links'
  | 'render' | 'views' | 'config' | 'build';

export interface LogEntry {
  ts: number;
  component: LogComponent;
  message: string;
  level: LogLevel;
}

const MAX_ENTRIES = 500;
const buffer: LogEntry[] = [];

/**
 * Log a message to the ring buffer and stderr.
 */
export function buildLog(component: LogComponent, message: string, level: LogLevel = 'info'): void {
  const entry: LogEntry = {
    ts: Date.now(),
    component,
    message,
    level,
  };

  buffer.push(entry);
  if (buffer.length > MAX_ENTRIES) {
    buffer.shift();
  }

  const prefix = level === 'error' ? '[wikigarden] ERROR' : level === 'warn' ? '[wikigarden] WARN' : '[wikigarden]';
  console.error(`${prefix} [${component}] ${message}`);
}

/**
 * Query the log buffer with optional filters.
 */
export function getBuildLog(options: {
  component?: LogComponent;
  level?: LogLevel;
  limit?: number;
} = {}): LogEntry[] {
  const { component, level, limit = MAX_ENTRIES } = options;

  let entries = buffer;

  if (component) {
    entries = entries.filter(e => e.component === component);
  }

  if (level) {
    entries = entries.filter(e => e.level === level);
  }

  // Most recent entries (tail of buffer)
  if (entries.length > limit) {
    entries = entries.slice(-limit);
  }

  return [...entries];
}

/** Empty the buffer (between builds, and in tests) */
export function clearBuildLog(): void {
  buffer.length = 0;
}
