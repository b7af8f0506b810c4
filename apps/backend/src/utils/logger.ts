type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function getMinLevel(): LogLevel {
  const raw = String(process.env.LOG_LEVEL || '').toLowerCase();
  if (raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error') return raw;
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

function shouldLog(level: LogLevel): boolean {
  return levelOrder[level] >= levelOrder[getMinLevel()];
}

function serializeValue(value: unknown): unknown {
  if (!(value instanceof Error)) return value;
  const code = 'code' in value && typeof value.code === 'string' ? value.code : undefined;
  return { name: value.name, message: value.message, ...(code ? { code } : {}) };
}

function safeJsonStringify(value: Record<string, unknown>): string {
  try {
    return JSON.stringify(value, (_key, v: unknown) => serializeValue(v));
  } catch {
    return JSON.stringify({ ts: value.ts, level: value.level, event: value.event, error: 'LOG_SERIALIZATION_FAILED' });
  }
}

export type LogMeta = Record<string, unknown>;

export function log(level: LogLevel, event: string, meta: LogMeta = {}): void {
  if (!shouldLog(level)) return;

  const line = safeJsonStringify({ ts: new Date().toISOString(), level, event, ...meta }) + '\n';

  // stdout/stderr directly so console overrides don't swallow logs.
  if (level === 'error') {
    process.stderr.write(line);
  } else {
    process.stdout.write(line);
  }
}

export type Logger = {
  debug: (event: string, meta?: LogMeta) => void;
  info: (event: string, meta?: LogMeta) => void;
  warn: (event: string, meta?: LogMeta) => void;
  error: (event: string, meta?: LogMeta) => void;
  /** Returns a logger that stamps `bindings` (e.g. the request id) on every entry. */
  child: (bindings: LogMeta) => Logger;
};

function createLogger(bindings: LogMeta): Logger {
  const write = (level: LogLevel) => (event: string, meta?: LogMeta) => log(level, event, { ...bindings, ...meta });
  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
    child: (more) => createLogger({ ...bindings, ...more }),
  };
}

export const logger: Logger = createLogger({});
