// api/_lib/middleware/errorHandler.ts
import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { logger, getRequestId } from '../logger';
import { env } from '../env';

// Custom Error Classes
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode: number = 500, code: string = 'ERR_UNKNOWN', isOperational: boolean = true) {
    super(message);
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }
}

export interface ValidationDetail {
  field: string;
  message: string;
  code?: string;
  recordIndex?: number;
}

export class AppValidationError extends AppError {
  public readonly details: ValidationDetail[];

  constructor(message: string = 'Validation failed', details: ValidationDetail[] = [], code: string = 'ERR_VALIDATION') {
    super(message, 400, code);
    this.details = details;
  }
}

/** A transcript record lacks sender, channel or message. */
export class MissingFieldError extends AppValidationError {
  public readonly recordIndex: number;
  public readonly field: string;

  constructor(recordIndex: number, field: string) {
    super(
      `Record ${recordIndex} is missing required field "${field}"`,
      [{ field, message: 'Required string field is missing', recordIndex }],
      'ERR_MISSING_FIELD',
    );
    this.recordIndex = recordIndex;
    this.field = field;
  }
}

/** A transcript record has a timestamp that cannot be parsed; the whole batch is rejected. */
export class MalformedTimestampError extends AppValidationError {
  public readonly recordIndex: number;
  public readonly rawValue: string;

  constructor(recordIndex: number, rawValue: unknown) {
    const shown = String(rawValue);
    super(
      `Record ${recordIndex} has an unparseable timestamp: ${JSON.stringify(shown)}`,
      [{ field: 'timestamp', message: 'Unparseable timestamp', recordIndex }],
      'ERR_MALFORMED_TIMESTAMP',
    );
    this.recordIndex = recordIndex;
    this.rawValue = shown;
  }
}

export function formatZodError(error: ZodError): { message: string; details: ValidationDetail[] } {
  const details = error.issues.map(issue => ({
    field: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
  }));
  return { message: 'Validation failed', details };
}

export function serializeError(e: unknown) {
  if (e instanceof Error) {
    return {
      name: e.name || 'Error',
      message: e.message,
      code: e instanceof AppError ? e.code : undefined,
      stack: e.stack ? e.stack.split('\n').slice(0, 5) : undefined,
    };
  }
  return { name: 'UnknownError', message: e === undefined ? 'Unknown' : String(e) };
}

interface ErrorPayload {
  success: false;
  requestId: string;
  timestamp: string;
  error: string;
  code: string;
  details?: ValidationDetail[];
  stack?: string[];
}

// Express error middleware: maps AppError/ZodError onto the JSON envelope
export function handleError(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const requestId = getRequestId(req, res);

  // If response already started, just log and end safely
  if (res.headersSent) {
    logger.error('Error after headers sent', { url: req.originalUrl, method: req.method, err: serializeError(err) });
    res.end();
    return;
  }

  const base = { success: false as const, requestId, timestamp: new Date().toISOString() };

  let statusCode = 500;
  let payload: ErrorPayload = { ...base, error: 'Internal Server Error', code: 'ERR_INTERNAL' };

  if (err instanceof AppError) {
    statusCode = err.statusCode;
    payload = { ...base, error: err.message, code: err.code };
    if (err instanceof AppValidationError && err.details.length > 0) {
      payload.details = err.details;
    }
  } else if (err instanceof ZodError) {
    statusCode = 400;
    const formatted = formatZodError(err);
    payload = { ...base, error: formatted.message, code: 'ERR_VALIDATION', details: formatted.details };
  } else if (err instanceof SyntaxError && 'body' in err) {
    // express.json() parse failures
    statusCode = 400;
    payload = { ...base, error: 'Invalid JSON', code: 'ERR_INVALID_JSON' };
  }

  // Include stack only in dev
  if (env.NODE_ENV !== 'production' && statusCode >= 500 && err instanceof Error && err.stack) {
    payload.stack = err.stack.split('\n').slice(0, 20);
  }

  const logContext = {
    requestId,
    method: req.method,
    url: req.originalUrl,
    status: statusCode,
    code: payload.code,
    error: serializeError(err),
  };

  if (statusCode >= 500) logger.error('Server error occurred', logContext);
  else logger.warn('Client error occurred', logContext);

  res.setHeader('X-Request-Id', requestId);
  res.status(statusCode).json(payload);
}
