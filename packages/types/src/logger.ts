/**
 * Structured logging.
 *
 * Each entry is one JSON object. The CLI sends entries to stderr so that
 * stdout carries command output only.
 *
 * @packageDocumentation
 */

// ─── Levels ─────────────────────────────────────────────────────────────────────

/** Ordered from most to least verbose; `SILENT` emits nothing. */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

const NAMES = ['DEBUG', 'INFO', 'WARN', 'ERROR', 'SILENT'] as const;

/**
 * Level for a name such as `debug` or `WARN`, as read from `TESSERA_LOG`.
 * Unknown and empty names give `undefined`.
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  const wanted = name?.trim().toUpperCase();
  if (!wanted) return undefined;
  const index = NAMES.findIndex((n) => n === wanted);
  return index === -1 ? undefined : index;
}

// ─── Entries ────────────────────────────────────────────────────────────────────

export interface LogEntry {
  level: string;
  message: string;
  /** ISO 8601. */
  timestamp: string;
  /** Dotted path of the logger that wrote the entry, e.g. `cli.router`. */
  component?: string;
  [field: string]: unknown;
}

export type LogOutput = (entry: LogEntry) => void;

const stderrLines: LogOutput = (entry) => {
  process.stderr.write(`${JSON.stringify(entry)}\n`);
};

export interface LoggerOptions {
  /** Threshold; entries below it are dropped. Defaults to `INFO`. */
  level?: LogLevel;
  component?: string;
  /** Where entries go. Defaults to JSON lines on stderr. */
  output?: LogOutput;
}

// ─── Logger ─────────────────────────────────────────────────────────────────────

/**
 * Leveled JSON logger. Extra fields are merged into the entry after the
 * standard ones.
 *
 * ```ts
 * const log = new Logger({ level: LogLevel.DEBUG, component: 'cli' });
 * log.child('router').debug('node call', { operation: 'vetoRound' });
 * ```
 */
export class Logger {
  private readonly threshold: LogLevel;
  private readonly component: string | undefined;
  private readonly output: LogOutput;

  constructor({ level = LogLevel.INFO, component, output = stderrLines }: LoggerOptions = {}) {
    this.threshold = level;
    this.component = component;
    this.output = output;
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.write(LogLevel.DEBUG, message, fields);
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.write(LogLevel.INFO, message, fields);
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.write(LogLevel.WARN, message, fields);
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.write(LogLevel.ERROR, message, fields);
  }

  /** Same threshold and output, component extended to `parent.name`. */
  child(name: string): Logger {
    return new Logger({
      level: this.threshold,
      component: this.component === undefined ? name : `${this.component}.${name}`,
      output: this.output,
    });
  }

  private write(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
    if (this.threshold === LogLevel.SILENT || level < this.threshold) return;
    this.output({
      level: NAMES[level],
      message,
      timestamp: new Date().toISOString(),
      ...(this.component === undefined ? {} : { component: this.component }),
      ...fields,
    });
  }
}
