/**
 * Structured JSON logger.
 *
 * Writes newline-delimited JSON to stderr: stdout belongs to the MCP stdio
 * transport and must carry protocol messages only.
 *
 * Format:
 *   { "level": "info", "ts": "2026-01-05T09:00:00.000Z",
 *     "service": "mssql-index-usage", "msg": "...", ...extra }
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogRecord {
  level: LogLevel;
  ts: string;
  service: 'mssql-index-usage';
  msg: string;
  err?: { message: string; name: string; stack?: string };
  [key: string]: unknown;
}

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

let minLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

type Writer = (line: string) => void;
const stderrWriter: Writer = (line) => {
  process.stderr.write(line + '\n');
};
let writer: Writer = stderrWriter;

/** Test-only: replace the output writer. Returns a restore function. */
export function _setWriter(w: Writer): () => void {
  writer = w;
  return () => {
    writer = stderrWriter;
  };
}

function emit(level: LogLevel, msg: string, extra: Record<string, unknown>): void {
  if (LEVELS[level] < LEVELS[minLevel]) return;

  const record: LogRecord = {
    level,
    ts: new Date().toISOString(),
    service: 'mssql-index-usage',
    msg,
    ...extra,
  };

  writer(JSON.stringify(record));
}

function serializeError(err: unknown): { message: string; name: string; stack?: string } {
  if (err instanceof Error) {
    return { message: err.message, name: err.name, stack: err.stack };
  }
  return { message: String(err), name: 'UnknownError' };
}

export const logger = {
  debug(msg: string, extra: Record<string, unknown> = {}): void {
    emit('debug', msg, extra);
  },

  info(msg: string, extra: Record<string, unknown> = {}): void {
    emit('info', msg, extra);
  },

  warn(msg: string, extra: Record<string, unknown> = {}): void {
    emit('warn', msg, extra);
  },

  error(msg: string, err?: unknown, extra: Record<string, unknown> = {}): void {
    const errFields = err !== undefined ? { err: serializeError(err) } : {};
    emit('error', msg, { ...errFields, ...extra });
  },
};
