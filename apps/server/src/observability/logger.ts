import { createWriteStream, type WriteStream } from 'node:fs';
import { context as otelContext, trace } from '@opentelemetry/api';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  playerId?: string | null;
  round?: number | null;
  eventIndex?: number | null;
  context?: Record<string, unknown>;
  error?: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function parseLevel(raw: string | undefined): LogLevel {
  const value = (raw ?? 'info').toLowerCase();
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error' ? value : 'info';
}

const LEVEL_THRESHOLD = LEVEL_ORDER[parseLevel(process.env.LOG_LEVEL)];

let fileSink: WriteStream | null | undefined;

// Opened on first write. Without LOG_FILE, lines go to stdout and stderr only.
function resolveFileSink(): WriteStream | null {
  if (fileSink !== undefined) {
    return fileSink;
  }
  const path = process.env.LOG_FILE?.trim();
  if (!path) {
    fileSink = null;
    return fileSink;
  }
  const stream = createWriteStream(path, { flags: 'a' });
  stream.on('error', (error) => {
    process.stderr.write(`log file ${path} unavailable: ${error.message}\n`);
    fileSink = null;
  });
  fileSink = stream;
  return fileSink;
}

function serializeError(error: unknown) {
  if (!error) return undefined;
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }
  if (typeof error === 'object') {
    return error;
  }
  return { message: String(error) };
}

function mergeContexts(base: LogContext | undefined, override: LogContext | undefined) {
  if (!base) return override ?? {};
  if (!override) return base;
  const merged: LogContext = { ...base, ...override };
  merged.context = { ...(base.context ?? {}), ...(override.context ?? {}) };
  return merged;
}

export class StructuredLogger {
  constructor(private readonly defaults: LogContext = {}) {}

  child(extra: LogContext = {}) {
    return new StructuredLogger(mergeContexts(this.defaults, extra));
  }

  debug(message: string, meta?: LogContext) {
    this.emit('debug', message, meta);
  }

  info(message: string, meta?: LogContext) {
    this.emit('info', message, meta);
  }

  warn(message: string, meta?: LogContext) {
    this.emit('warn', message, meta);
  }

  error(message: string, meta?: LogContext) {
    this.emit('error', message, meta);
  }

  private emit(level: LogLevel, message: string, meta?: LogContext) {
    if (LEVEL_ORDER[level] < LEVEL_THRESHOLD) {
      return;
    }

    const payload = mergeContexts(this.defaults, meta);

    const span = trace.getSpan(otelContext.active());
    const spanContext = span?.spanContext();

    const logEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      playerId: payload.playerId ?? null,
      round: payload.round ?? null,
      eventIndex: payload.eventIndex ?? null,
      context: payload.context ?? {},
      traceId: spanContext?.traceId ?? null,
      spanId: spanContext?.spanId ?? null,
      error: serializeError(payload.error),
    };

    const line = `${JSON.stringify(logEntry)}\n`;
    if (level === 'error' || level === 'warn') {
      process.stderr.write(line);
    } else {
      process.stdout.write(line);
    }
    resolveFileSink()?.write(line);
  }
}

export const logger = new StructuredLogger();
