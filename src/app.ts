import express, { Express, Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { AnalysisLogger } from './analysis/analysis-logger';
import { ServerConfig } from './config/server';
import { buildErrorResponse, getStatusCode } from './api/analyze-errors';
import {
  configureCORS,
  createAnalyzeRateLimiter,
  getRequestId,
  logError,
  requestLogger,
  requestTimeout
} from './api/middleware/production-safety';
import { createRoutes } from './api/routes';
import { createMetricsRouter, metrics, metricsMiddleware } from './observability/metrics';

export interface AppOptions {
  serverConfig: ServerConfig;
  logger?: AnalysisLogger;
  /** Disable per-IP rate limiting (tests, trusted batch jobs) */
  disableRateLimit?: boolean;
}

/**
 * body-parser failures carry a `type` string
 */
function bodyErrorType(err: unknown): string | null {
  if (typeof err === 'object' && err !== null && 'type' in err && typeof err.type === 'string') {
    return err.type;
  }
  return null;
}

/**
 * Build the Express app without binding a port
 */
export function createApp(options: AppOptions): Express {
  const { serverConfig } = options;
  const logger = options.logger ?? new AnalysisLogger();
  const app = express();

  // Metrics middleware (must be first to capture all requests)
  app.use(metricsMiddleware());
  app.use(requestLogger);
  app.use(requestTimeout(serverConfig.requestTimeoutMs));
  app.use(configureCORS(serverConfig.corsAllowedOrigins));

  // Telemetry arrives as CSV text or JSON rows; form uploads are parsed on the analyze routes
  app.use(express.text({
    type: ['text/csv', 'text/plain', 'application/csv'],
    limit: serverConfig.maxUploadBytes
  }));
  app.use(express.json({ limit: serverConfig.maxUploadBytes }));

  if (!options.disableRateLimit) {
    app.use('/analyze', createAnalyzeRateLimiter(serverConfig.rateLimitMax, serverConfig.rateLimitWindowMs));
  }

  app.use('/', createMetricsRouter());
  app.use('/', createRoutes(logger, serverConfig));

  // Body parsing and unexpected errors
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const requestId = getRequestId(res);
    const type = err instanceof multer.MulterError ? err.code : bodyErrorType(err);
    const error = type === 'entity.too.large' || type === 'LIMIT_FILE_SIZE'
      ? buildErrorResponse(requestId, 'payload_too_large', `Request body exceeds ${serverConfig.maxUploadBytes} bytes`)
      : type === 'entity.parse.failed'
        ? buildErrorResponse(requestId, 'invalid_request', 'Request body is not valid JSON')
        : err instanceof multer.MulterError
          ? buildErrorResponse(requestId, 'invalid_request', `Upload rejected: ${err.message}`, {
            suggestion: 'Send the telemetry CSV as a single form part named "file"',
            details: { field: err.field ?? null }
          })
          : buildErrorResponse(requestId, 'internal_error', 'Unexpected server error');

    if (error.error_type === 'internal_error') {
      logError(err, { context: 'unhandled_request_error', request_id: requestId });
    }
    metrics.incrementError(error.error_type);
    res.status(getStatusCode(error.error_type, error.error_code)).json(error);
  });

  return app;
}
