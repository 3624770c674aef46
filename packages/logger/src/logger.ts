export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogEntry {
  level: LogLevel;
  category: string;
  timestamp: Date;
  msg: string;
  context?: Record<string, unknown>;
}

export interface Sink {
  write(entry: LogEntry): void;
  flush(): void;
}

export interface Logger {
  trace(msg: string): void;
  trace(fields: Record<string, unknown>, msg: string): void;
  debug(msg: string): void;
  debug(fields: Record<string, unknown>, msg: string): void;
  info(msg: string): void;
  info(fields: Record<string, unknown>, msg: string): void;
  warn(msg: string): void;
  warn(fields: Record<string, unknown>, msg: string): void;
  error(msg: string): void;
  error(fields: Record<string, unknown>, msg: string): void;
  isLevelEnabled(level: LogLevel): boolean;
  /**
   * Same category, with `bindings` added to every entry. Fields passed to a
   * call win over bindings of the same name.
   */
  child(bindings: Record<string, unknown>): Logger;
}

export interface LoggerConfig {
  level?: LogLevel | undefined;
  sinks?: readonly Sink[] | undefined;
}

interface LoggerState {
  threshold: number;
  sinks: readonly Sink[];
}

let state: LoggerState = { threshold: LOG_LEVELS.indexOf('info'), sinks: [] };

const roots = new Map<string, Logger>();

/**
 * Turn a context value into something every sink can print or stringify.
 * Errors keep name, message and stack; bigints and dates become strings;
 * `undefined` fields and functions are left out; a reference back to an
 * enclosing object becomes `'[Circular]'`.
 */
function toLogValue(value: unknown, ancestors: readonly object[]): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value === null || typeof value !== 'object') {
    return value;
  }
  if (ancestors.includes(value)) {
    return '[Circular]';
  }
  if (value instanceof Error) {
    return { message: value.message, name: value.name, stack: value.stack };
  }
  if (value instanceof Date) {
    return value.toISOString();
  }

  const path = [...ancestors, value];
  if (Array.isArray(value)) {
    return value.map((item: unknown) => toLogValue(item, path));
  }
  return toLogFields(Object.entries(value), path);
}

function toLogFields(entries: [string, unknown][], ancestors: readonly object[]): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  for (const [key, raw] of entries) {
    if (raw === undefined || typeof raw === 'function') continue;
    fields[key] = toLogValue(raw, ancestors);
  }
  return fields;
}

class CategoryLogger implements Logger {
  constructor(
    private readonly category: string,
    private readonly bindings: Readonly<Record<string, unknown>>
  ) {}

  trace(first: string | Record<string, unknown>, msg?: string): void {
    this.write('trace', first, msg);
  }

  debug(first: string | Record<string, unknown>, msg?: string): void {
    this.write('debug', first, msg);
  }

  info(first: string | Record<string, unknown>, msg?: string): void {
    this.write('info', first, msg);
  }

  warn(first: string | Record<string, unknown>, msg?: string): void {
    this.write('warn', first, msg);
  }

  error(first: string | Record<string, unknown>, msg?: string): void {
    this.write('error', first, msg);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= state.threshold;
  }

  child(bindings: Record<string, unknown>): Logger {
    return new CategoryLogger(this.category, { ...this.bindings, ...bindings });
  }

  private write(level: LogLevel, first: string | Record<string, unknown>, msg: string | undefined): void {
    // `state` is read per call: module-level loggers outlive initLogger()
    if (state.sinks.length === 0 || !this.isLevelEnabled(level)) return;

    const fields = typeof first === 'string' ? {} : first;
    const context = toLogFields(Object.entries({ ...this.bindings, ...fields }), []);
    const entry: LogEntry = {
      category: this.category,
      level,
      msg: typeof first === 'string' ? first : (msg ?? ''),
      timestamp: new Date(),
      ...(Object.keys(context).length > 0 && { context }),
    };

    for (const sink of state.sinks) {
      sink.write(entry);
    }
  }
}

/**
 * Replace the level and sinks for every logger, including ones obtained
 * earlier. Category loggers handed out before the call stay usable.
 */
export function initLogger(config: LoggerConfig): void {
  state = {
    sinks: config.sinks ?? [],
    threshold: LOG_LEVELS.indexOf(config.level ?? 'info'),
  };
  roots.clear();
}

export function getLogger(category: string): Logger {
  let logger = roots.get(category);
  if (!logger) {
    logger = new CategoryLogger(category, {});
    roots.set(category, logger);
  }
  return logger;
}

export function flushLoggers(): void {
  state.sinks.forEach((sink) => sink.flush());
}
