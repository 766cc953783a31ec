export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

type LogMeta = Record<string, unknown> | undefined;

const runId = `cli:${process.pid}`;

let threshold: LogLevel = 'warn';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

function isEnabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

function safeStringify(value: unknown): string | undefined {
  try {
    return JSON.stringify(value);
  } catch (_err) {
    return undefined;
  }
}

const sinks: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

function emit(level: LogLevel, message: string, meta?: LogMeta, tag?: string | null) {
  if (!isEnabled(level)) return;

  const payload = {
    level,
    message,
    tag: tag ?? null,
    runId,
    meta: meta ?? undefined,
    timestamp: new Date().toISOString(),
  };

  const line = safeStringify(payload) ?? message;
  sinks[level](line);
}

export function getLogger(defaultTag?: string | null) {
  return {
    debug: (message: string, meta?: LogMeta) => emit('debug', message, meta, defaultTag ?? null),
    info: (message: string, meta?: LogMeta) => emit('info', message, meta, defaultTag ?? null),
    warn: (message: string, meta?: LogMeta) => emit('warn', message, meta, defaultTag ?? null),
    error: (message: string, meta?: LogMeta) => emit('error', message, meta, defaultTag ?? null),
  };
}

export type Logger = ReturnType<typeof getLogger>;

export const logger = getLogger();
