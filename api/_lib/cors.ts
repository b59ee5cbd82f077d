// api/_lib/cors.ts
import type { CorsOptions } from 'cors';
import { env } from './env';

export function corsOptions(origins: string = env.CORS_ORIGINS): CorsOptions {
  const allowedOrigins = origins.split(',').map(o => o.trim()).filter(Boolean);

  return {
    origin: allowedOrigins.includes('*') ? true : allowedOrigins,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'X-Request-Id'],
    exposedHeaders: ['X-Request-Id'],
    maxAge: 86400,
  };
}
