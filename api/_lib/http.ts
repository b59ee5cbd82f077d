// api/_lib/http.ts
import type { Request, Response } from 'express';
import { getRequestId } from './logger';

export const API_VERSION = 'v1';

export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: string;
  requestId?: string;
  timestamp: string;
  version: string;
}

export function json<T>(res: Response, data: T, status = 200, req?: Request): void {
  const requestId = req ? getRequestId(req, res) : undefined;

  const response: ApiResponse<T> = {
    success: status < 400,
    data: status < 400 ? data : undefined,
    error: status >= 400 ? (typeof data === 'string' ? data : 'An error occurred') : undefined,
    requestId,
    timestamp: new Date().toISOString(),
    version: API_VERSION,
  };

  if (requestId) {
    res.setHeader('X-Request-Id', requestId);
  }

  res.status(status).json(response);
}

export function success<T>(res: Response, data: T, status = 200, req?: Request): void {
  json(res, data, status, req);
}

export function methodNotAllowed(res: Response, allowed: string[] = [], req?: Request): void {
  res.setHeader('Allow', allowed.join(', '));
  json(res, `Method not allowed. Allowed methods: ${allowed.join(', ')}`, 405, req);
}

export function notFound(res: Response, message = 'Not found', req?: Request): void {
  json(res, message, 404, req);
}
