/**
 * Structured Error Types for the Analyze Endpoints
 *
 * All analyze failures map to one of these error types:
 * - routing_error: Request validation failures (missing/unsupported body)
 * - schema_error: Telemetry lacks required column(s)
 * - config_error: Segment count or thresholds out of range
 * - internal_error: Unexpected server error
 *
 * An empty result (fewer than 2 usable laps) is not an error.
 */

import { ConfigError, SchemaError } from '../analysis/errors';

export type AnalyzeErrorType =
  | 'routing_error'
  | 'schema_error'
  | 'config_error'
  | 'internal_error';

export interface AnalyzeStructuredError {
  request_id: string;
  error_type: AnalyzeErrorType;
  error_code: string;
  reason: string;
  suggestion?: string;
  details?: Record<string, unknown>;
}

/**
 * In-memory counters for failure tracking
 */
class AnalyzeCounters {
  private failures: Record<AnalyzeErrorType, number> = {
    routing_error: 0,
    schema_error: 0,
    config_error: 0,
    internal_error: 0,
  };

  private totalRequests = 0;
  private successCount = 0;
  private emptyResultCount = 0;

  increment(type: AnalyzeErrorType): void {
    this.failures[type]++;
  }

  incrementTotal(): void {
    this.totalRequests++;
  }

  incrementSuccess(): void {
    this.successCount++;
  }

  incrementEmptyResult(): void {
    this.emptyResultCount++;
  }

  getStats(): {
    failures_by_type: Record<AnalyzeErrorType, number>;
    total_requests: number;
    success_count: number;
    empty_result_count: number;
    success_rate: number;
  } {
    const successRate = this.totalRequests > 0
      ? this.successCount / this.totalRequests
      : 0;

    return {
      failures_by_type: { ...this.failures },
      total_requests: this.totalRequests,
      success_count: this.successCount,
      empty_result_count: this.emptyResultCount,
      success_rate: Math.round(successRate * 1000) / 1000,
    };
  }

  reset(): void {
    this.failures = {
      routing_error: 0,
      schema_error: 0,
      config_error: 0,
      internal_error: 0,
    };
    this.totalRequests = 0;
    this.successCount = 0;
    this.emptyResultCount = 0;
  }
}

export const analyzeCounters = new AnalyzeCounters();

/**
 * Map error codes to structured error types
 */
export function classifyError(errorCode: string): AnalyzeErrorType {
  const routingErrors = [
    'missing_body',
    'unsupported_content_type',
    'invalid_rows',
    'payload_too_large',
    'invalid_request',
  ];

  if (routingErrors.includes(errorCode)) {
    return 'routing_error';
  }
  if (errorCode === 'missing_columns') {
    return 'schema_error';
  }
  if (errorCode === 'invalid_config') {
    return 'config_error';
  }

  return 'internal_error';
}

/**
 * Build a structured error response
 */
export function buildErrorResponse(
  requestId: string,
  errorCode: string,
  reason: string,
  options?: {
    suggestion?: string;
    details?: Record<string, unknown>;
  }
): AnalyzeStructuredError {
  const errorType = classifyError(errorCode);
  analyzeCounters.increment(errorType);

  return {
    request_id: requestId,
    error_type: errorType,
    error_code: errorCode,
    reason,
    suggestion: options?.suggestion,
    details: options?.details,
  };
}

/**
 * Translate a thrown pipeline error into a structured response
 */
export function fromAnalysisError(requestId: string, err: unknown): AnalyzeStructuredError {
  if (err instanceof SchemaError) {
    return buildErrorResponse(requestId, 'missing_columns', err.message, {
      suggestion: 'Telemetry needs columns: timestamp, lap, speed, throttle, brake, steering, track_position',
      details: { missing_fields: err.missingFields },
    });
  }
  if (err instanceof ConfigError) {
    return buildErrorResponse(requestId, 'invalid_config', err.message, {
      details: { field: err.field, reason: err.reason },
    });
  }
  return buildErrorResponse(
    requestId,
    'internal_error',
    err instanceof Error ? err.message : String(err)
  );
}

/**
 * Get HTTP status code for error type
 */
export function getStatusCode(errorType: AnalyzeErrorType, errorCode?: string): number {
  if (errorCode === 'payload_too_large') {
    return 413;
  }
  switch (errorType) {
    case 'routing_error':
      return 400;
    case 'schema_error':
      return 422; // Unprocessable Entity - well-formed body, wrong columns
    case 'config_error':
      return 400;
    case 'internal_error':
      return 500;
    default:
      return 500;
  }
}
