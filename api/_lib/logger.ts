// api/_lib/logger.ts
import type { Request, Response, NextFunction } from 'express';
import { env } from './env';

export type Level = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const LEVELS: Record<Level, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

function normalizeLevel(input?: string): Level {
  const v = (input || '').toLowerCase();
  return isLevel(v) ? v : 'info';
}

function isLevel(v: string): v is Level {
  return v in LEVELS;
}

function pickConsole(level: Level): (...args: unknown[]) => void {
  switch (level) {
    case 'trace': return console.debug ?? console.log;
    case 'debug': return console.debug ?? console.log;
    case 'info':  return console.info  ?? console.log;
    case 'warn':  return console.warn  ?? console.log;
    case 'error': return console.error ?? console.log;
    case 'fatal': return console.error ?? console.log;
    default:      return console.log;
  }
}

function isErrorLike(x: unknown): x is Error {
  return x instanceof Error;
}

const DEFAULT_REDACTIONS = ['authorization', 'password', 'pass', 'token', 'api_key', 'apikey', 'secret', 'set-cookie'];

function redact(obj: unknown, extraKeys: readonly string[] = []): unknown {
  const keys = new Set([...DEFAULT_REDACTIONS, ...extraKeys].map(k => k.toLowerCase()));
  const seen = new WeakSet<object>();

  function _walk(value: unknown): unknown {
    if (value == null) return value;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
    if (typeof value === 'function') return undefined;
    if (isErrorLike(value)) {
      return {
        name: value.name,
        message: value.message,
        stack: value.stack,
      };
    }
    if (value instanceof Date) return value.toISOString();
    if (typeof value !== 'object') return String(value);
    if (seen.has(value)) return '[Circular]';
    seen.add(value);

    if (Array.isArray(value)) return value.map(_walk);

    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = keys.has(k.toLowerCase()) ? '[REDACTED]' : _walk(v);
    }
    return out;
  }

  return _walk(obj);
}

function safeStringify(obj: unknown, limit = 8 * 1024): string {
  try {
    const s = JSON.stringify(obj);
    if (s.length <= limit) return s;
    return s.slice(0, limit) + '…';
  } catch {
    try {
      return JSON.stringify(String(obj));
    } catch {
      return '"[Unserializable]"';
    }
  }
}

export interface Logger {
  trace(message: string, data?: unknown): void;
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  fatal(message: string, data?: unknown): void;
  child(bindings: Record<string, unknown>): Logger;
}

export type LogWriter = (level: Level, line: string) => void;

export interface LoggerOptions {
  level: Level;
  service: string;
  /** Human-readable lines instead of JSON. */
  pretty: boolean;
  silent: boolean;
  redactKeys: readonly string[];
  write: LogWriter;
}

const consoleWriter: LogWriter = (level, line) => pickConsole(level)(line);

export function loggerOptionsFromEnv(): LoggerOptions {
  return {
    level: normalizeLevel(env.LOG_LEVEL),
    service: env.SERVICE_NAME,
    pretty: env.NODE_ENV !== 'production' || env.PRETTY_LOGS,
    silent: env.LOG_SILENT,
    redactKeys: [],
    write: consoleWriter,
  };
}

function formatBindings(bindings: Record<string, unknown>): string {
  const pairs = Object.entries(bindings).map(([k, v]) => `${k}=${String(v)}`);
  return pairs.length ? ` [${pairs.join(', ')}]` : '';
}

class StructuredLogger implements Logger {
  constructor(
    private readonly options: LoggerOptions,
    private readonly bindings: Readonly<Record<string, unknown>> = {},
  ) {}

  trace(msg: string, data?: unknown) { this.emit('trace', msg, data); }
  debug(msg: string, data?: unknown) { this.emit('debug', msg, data); }
  info (msg: string, data?: unknown) { this.emit('info',  msg, data); }
  warn (msg: string, data?: unknown) { this.emit('warn',  msg, data); }
  error(msg: string, data?: unknown) { this.emit('error', msg, data); }
  fatal(msg: string, data?: unknown) { this.emit('fatal', msg, data); }

  child(bindings: Record<string, unknown>): Logger {
    return new StructuredLogger(this.options, { ...this.bindings, ...bindings });
  }

  private emit(level: Level, message: string, data?: unknown): void {
    const { silent, pretty, write, redactKeys } = this.options;
    if (silent || LEVELS[level] < LEVELS[this.options.level]) return;

    const payload = data === undefined ? undefined : redact(data, redactKeys);
    const timestamp = new Date().toISOString();

    if (pretty) {
      const tail = payload === undefined ? '' : ' ' + safeStringify(payload);
      write(level, `[${timestamp}] ${level.toUpperCase()}${formatBindings(this.bindings)}: ${message}${tail}`);
      return;
    }

    // Error payloads nest under "error"; plain objects spread into the line
    const fields = isErrorLike(data)
      ? { error: payload }
      : typeof payload === 'object' && payload !== null && !Array.isArray(payload)
        ? payload
        : payload === undefined ? {} : { data: payload };
    write(level, safeStringify({
      timestamp,
      level,
      service: this.options.service,
      message,
      ...this.bindings,
      ...fields,
    }));
  }
}

export function createLogger(overrides: Partial<LoggerOptions> = {}): Logger {
  return new StructuredLogger({ ...loggerOptionsFromEnv(), ...overrides });
}

// Base logger instance
export const logger: Logger = createLogger();

// Module-scoped child helper
export function withModule(moduleName: string, extra: Record<string, unknown> = {}): Logger {
  return logger.child({ module: moduleName, ...extra });
}

export function generateRequestId(prefix: string = 'req'): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 12);
  return `${prefix}_${timestamp}_${random}`;
}

// Priority: res.locals.requestId > x-request-id header > x-trace-id > generate new
export function getRequestId(req: Request, res?: Response): string {
  const fromLocals = res?.locals.requestId;
  if (typeof fromLocals === 'string') return fromLocals;
  const header = req.headers['x-request-id'] ?? req.headers['x-trace-id'];
  if (typeof header === 'string' && header.length > 0) return header;
  return generateRequestId('req');
}

// Create logger with request context (requestId + optional extra)
export function withRequest(req: Request, res?: Response, extra: Record<string, unknown> = {}): Logger {
  return logger.child({
    requestId: getRequestId(req, res),
    method: req.method,
    url: req.originalUrl || req.url,
    ...extra,
  });
}

// Request ID middleware factory
export function requestIdMiddleware() {
  return (req: Request, res: Response, next: NextFunction) => {
    const requestId = getRequestId(req, res);
    res.locals.requestId = requestId;
    res.setHeader('X-Request-Id', requestId);
    next();
  };
}

// Time a synchronous pipeline stage; logs duration at debug level
export function timeStage<T>(log: Logger, stageName: string, stage: () => T, extra?: (result: T) => Record<string, unknown>): T {
  const startTime = Date.now();
  try {
    const result = stage();
    log.debug(`Completed ${stageName}`, { duration_ms: Date.now() - startTime, ...(extra ? extra(result) : {}) });
    return result;
  } catch (error) {
    log.warn(`Failed ${stageName}`, { duration_ms: Date.now() - startTime, error });
    throw error;
  }
}
