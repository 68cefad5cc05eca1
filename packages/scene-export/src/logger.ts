// ---------------------------------------------------------------------------
// Structured logging: one JSON line per entry
// ---------------------------------------------------------------------------

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
}

export interface LoggerOptions {
  /** Receives each serialized line without the trailing newline. */
  sink?: (line: string) => void;
  /** Entries below this level are dropped. Defaults to `info`. */
  minLevel?: LogLevel;
  clock?: () => Date;
}

function stdoutSink(line: string): void {
  process.stdout.write(line + '\n');
}

/**
 * Create a logger whose entries carry `scope`. Each entry is written as
 * `{ ts, level, scope, msg, ...fields }`; fields cannot override the first four.
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? stdoutSink;
  const minRank = LEVEL_RANK[options.minLevel ?? 'info'];
  const clock = options.clock ?? (() => new Date());

  const emit = (level: LogLevel, msg: string, fields: LogFields = {}): void => {
    if (LEVEL_RANK[level] < minRank) return;
    const head = { ts: clock().toISOString(), level, scope, msg };
    sink(JSON.stringify({ ...head, ...fields, ...head }));
  };

  return {
    debug: (msg, fields) => emit('debug', msg, fields),
    info: (msg, fields) => emit('info', msg, fields),
    warn: (msg, fields) => emit('warn', msg, fields),
    error: (msg, fields) => emit('error', msg, fields),
  };
}

const noop = (): void => {};

export const silentLogger: Logger = { debug: noop, info: noop, warn: noop, error: noop };
