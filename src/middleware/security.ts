// =============================================================================
// PATHGUARD — Request Hygiene & Error Handling
//
// Headers, CORS and rate limits come from helmet, cors and
// express-rate-limit in app.ts. This module covers the rest:
//   - Request IDs for tracing
//   - Null-byte stripping in JSON bodies
//   - Mapping thrown errors to JSON responses (no stack traces in production)
// =============================================================================

import { Request, Response, NextFunction, ErrorRequestHandler, RequestHandler } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { PathguardError, ValidationError } from '../types/errors';

// ── Request ID ─────────────────────────────────────────────────────────

/**
 * Assign a unique request ID for tracing.
 */
export function requestId(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const id = req.get('X-Request-ID') || `pg-${uuidv4()}`;
    res.set('X-Request-ID', id);
    req.requestId = id;
    next();
  };
}

// ── Input Sanitization ─────────────────────────────────────────────────

/**
 * Strip null bytes from every string in the JSON body.
 */
export function requestSanitization(): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    req.body = sanitizeValue(req.body);
    next();
  };
}

export function sanitizeValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(/\0/g, '');
  }
  if (Array.isArray(value)) {
    return value.map(sanitizeValue);
  }
  if (typeof value === 'object' && value !== null) {
    // fromEntries defines own properties, so a "__proto__" key stays a key
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [key, sanitizeValue(entry)])
    );
  }
  return value;
}

// ── Not Found ──────────────────────────────────────────────────────────

export function notFound(): RequestHandler {
  return (_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  };
}

// ── Error Handler ──────────────────────────────────────────────────────

function isMalformedJson(err: unknown): boolean {
  return (
    err instanceof SyntaxError &&
    'type' in err &&
    err.type === 'entity.parse.failed'
  );
}

/**
 * Global error handler. Typed errors answer with their own status and code;
 * anything else is a 500 that never leaks stack traces in production.
 */
export function errorHandler(): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const failure = isMalformedJson(err) ? new ValidationError('Malformed JSON body') : err;

    if (failure instanceof PathguardError) {
      if (failure.status >= 500) {
        console.error(`[Server] ${failure.code}: ${failure.message}`);
      }
      res.status(failure.status).json({ error: failure.message, code: failure.code });
      return;
    }

    const isProd = process.env.NODE_ENV === 'production';
    const error = failure instanceof Error ? failure : new Error(String(failure));
    console.error(`[Server] Unhandled error (${req.requestId ?? 'no request id'}): ${error.message}`, isProd ? '' : error.stack);

    res.status(500).json({
      error: isProd ? 'Internal server error' : error.message,
      code: 'INTERNAL_ERROR',
    });
  };
}
