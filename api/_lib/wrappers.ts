// api/_lib/wrappers.ts
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { z } from 'zod';
import { withRequest } from './logger';
import { methodNotAllowed } from './http';
import { AppValidationError, formatZodError } from './middleware/errorHandler';

export type Handler = (req: Request, res: Response) => Promise<void> | void;

// Forwards sync throws and rejected promises to the express error middleware
export function withErrorHandling(handler: Handler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve()
      .then(() => handler(req, res))
      .catch(next);
  };
}

export function withMethods(allowedMethods: string[], handler: Handler): Handler {
  return (req, res) => {
    if (!allowedMethods.includes(req.method)) {
      return methodNotAllowed(res, allowedMethods, req);
    }
    return handler(req, res);
  };
}

export function withValidation<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, handler: (req: Request, res: Response, data: T) => Promise<void> | void): Handler {
  return (req, res) => {
    const result = schema.safeParse(req.body ?? {});
    if (!result.success) {
      const { message, details } = formatZodError(result.error);
      throw new AppValidationError(message, details);
    }
    return handler(req, res, result.data);
  };
}

// Request logging middleware: one line on start, one on finish
export function withLogging(): RequestHandler {
  return (req, res, next) => {
    const start = Date.now();
    const log = withRequest(req, res);
    log.debug(`${req.method} ${req.originalUrl} - Started`);
    res.on('finish', () => {
      log.info(`${req.method} ${req.originalUrl} - ${res.statusCode} ${Date.now() - start}ms`);
    });
    next();
  };
}
