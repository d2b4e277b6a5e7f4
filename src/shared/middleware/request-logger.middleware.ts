/**
 * =============================================================================
 * REQUEST LOGGER MIDDLEWARE
 * =============================================================================
 *
 * One access-log line per finished request, correlated by X-Request-ID.
 *
 * PRIVACY:
 * - Bodies and authorization headers are never logged
 * - Credential-like query values are masked
 * - Customer coordinates from matching queries are coarsened to ~1 km
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import { logger } from '../services/logger.service';

const MASKED_QUERY_KEYS = ['token', 'key', 'secret', 'password'];
const COORDINATE_QUERY_KEYS = ['latitude', 'longitude'];
const COORDINATE_LOG_DECIMALS = 2;

export interface AccessLogEntry {
  requestId: string | undefined;
  method: string;
  path: string;
  status: number;
  durationMs: number;
  caller: string;
  query?: Record<string, unknown>;
}

export type AccessLogLevel = 'info' | 'warn' | 'error';

/**
 * Query values safe to log
 */
export function maskQueryParams(query: Record<string, unknown>): Record<string, unknown> {
  const masked: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(query)) {
    const lower = key.toLowerCase();
    if (MASKED_QUERY_KEYS.some(k => lower.includes(k))) {
      masked[key] = '[MASKED]';
    } else if (COORDINATE_QUERY_KEYS.includes(lower) && typeof value === 'string' && value.trim() !== '') {
      const n = Number(value);
      masked[key] = Number.isFinite(n) ? n.toFixed(COORDINATE_LOG_DECIMALS) : value;
    } else {
      masked[key] = value;
    }
  }

  return masked;
}

export function accessLogLevel(status: number): AccessLogLevel {
  if (status >= 500) return 'error';
  if (status >= 400) return 'warn';
  return 'info';
}

export function buildAccessLogEntry(req: Request, status: number, durationMs: number): AccessLogEntry {
  const query = req.query ?? {};
  const requestId = req.headers['x-request-id'];
  return {
    requestId: typeof requestId === 'string' ? requestId : undefined,
    method: req.method,
    path: req.path,
    status,
    durationMs,
    caller: req.caller ? `${req.caller.role}:${req.caller.id}` : 'anonymous',
    ...(Object.keys(query).length > 0 && { query: maskQueryParams(query) })
  };
}

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();

  res.on('finish', () => {
    const entry = buildAccessLogEntry(req, res.statusCode, Date.now() - startTime);
    logger[accessLogLevel(entry.status)](`${entry.method} ${entry.path} ${entry.status}`, entry);
  });

  next();
}
