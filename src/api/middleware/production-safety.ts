/**
 * Production Safety Middleware
 * Rate limiting, timeouts, CORS, logging
 */

import rateLimit from 'express-rate-limit';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { v4 as uuidv4 } from 'uuid';

/**
 * Rate limiter for analysis uploads (parsing large CSVs is the expensive path)
 */
export function createAnalyzeRateLimiter(max: number, windowMs: number): RequestHandler {
  return rateLimit({
    windowMs,
    limit: max,
    standardHeaders: true, // Return rate limit info in the `RateLimit-*` headers
    legacyHeaders: false, // Disable the `X-RateLimit-*` headers
    message: {
      error_type: 'rate_limit_exceeded',
      reason: 'Too many analysis requests from this IP. Please try again later.',
      details: {
        limit: max,
        window_minutes: Math.round(windowMs / 60000)
      }
    }
  });
}

/**
 * Request timeout middleware
 */
export function requestTimeout(timeoutMs: number = 15000) {
  return (_req: Request, res: Response, next: NextFunction) => {
    const timeout = setTimeout(() => {
      if (!res.headersSent) {
        res.status(504).json({
          error_type: 'request_timeout',
          reason: `Request exceeded ${timeoutMs}ms timeout`,
          details: { timeout_ms: timeoutMs }
        });
      }
    }, timeoutMs);

    // Clear timeout when response finishes or the client goes away
    res.on('finish', () => clearTimeout(timeout));
    res.on('close', () => clearTimeout(timeout));

    next();
  };
}

/**
 * CORS configuration
 * - Local development origins always allowed
 * - Extra origins from CORS_ALLOWED_ORIGINS
 */
export function configureCORS(extraOrigins: string[] = []) {
  const origins = [
    'http://localhost:3000',
    'http://localhost:5173',
    'http://localhost:8080',
    'http://127.0.0.1:5500',
    ...extraOrigins
  ];

  return (req: Request, res: Response, next: NextFunction) => {
    const origin = req.headers.origin;

    // Allow requests with no origin (curl, file:// pages)
    if (!origin || origin === 'null') {
      res.header('Access-Control-Allow-Origin', '*');
    } else if (origins.includes(origin)) {
      res.header('Access-Control-Allow-Origin', origin);
      res.header('Vary', 'Origin');
    }

    res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type, X-Request-ID');
    res.header('Access-Control-Max-Age', '86400'); // 24 hours

    // Handle preflight
    if (req.method === 'OPTIONS') {
      res.sendStatus(204);
      return;
    }

    next();
  };
}

/**
 * Request id for the current response, set by requestLogger
 */
export function getRequestId(res: Response): string {
  const id: unknown = res.locals.requestId;
  return typeof id === 'string' ? id : 'unknown';
}

/**
 * Structured request logger
 * - Logs all requests with timing
 * - Assigns a request id (echoed in X-Request-ID)
 */
export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();
  const requestId = uuidv4();

  res.locals.requestId = requestId;
  res.setHeader('X-Request-ID', requestId);

  console.log(JSON.stringify({
    type: 'request',
    request_id: requestId,
    timestamp: new Date().toISOString(),
    method: req.method,
    path: req.path,
    content_type: req.get('content-type'),
    content_length: req.get('content-length'),
    ip: req.ip || req.socket.remoteAddress
  }));

  res.on('finish', () => {
    console.log(JSON.stringify({
      type: 'response',
      request_id: requestId,
      timestamp: new Date().toISOString(),
      method: req.method,
      path: req.path,
      status: res.statusCode,
      duration_ms: Date.now() - start
    }));
  });

  next();
}

const MAX_LOGGED_TEXT = 500;

/**
 * Shorten error text for the log. Parser errors can echo whole uploaded
 * rows back in their message.
 */
export function truncateForLog(text: string, maxLength: number = MAX_LOGGED_TEXT): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength)}... [${text.length - maxLength} more chars]`;
}

/**
 * Structured error line on stderr
 */
export function logError(error: unknown, context?: { context: string; request_id?: string }) {
  const errorData = {
    type: 'error',
    timestamp: new Date().toISOString(),
    error: error instanceof Error ? {
      name: error.name,
      message: truncateForLog(error.message),
      stack: process.env.NODE_ENV === 'development' ? error.stack : undefined
    } : truncateForLog(String(error)),
    context
  };

  console.error(JSON.stringify(errorData));
}
