/**
 * ANALYZE ERROR TESTS
 *
 * Classification, status codes and structured error bodies
 */

import { beforeEach, describe, it, expect } from 'vitest';
import { ConfigError, SchemaError } from '../../src/analysis/errors';
import {
  analyzeCounters,
  buildErrorResponse,
  classifyError,
  fromAnalysisError,
  getStatusCode
} from '../../src/api/analyze-errors';

describe('Analyze Errors', () => {
  beforeEach(() => {
    analyzeCounters.reset();
  });

  describe('classifyError', () => {
    it('should classify request problems as routing errors', () => {
      for (const code of ['missing_body', 'unsupported_content_type', 'invalid_rows', 'payload_too_large', 'invalid_request']) {
        expect(classifyError(code)).toBe('routing_error');
      }
    });

    it('should classify pipeline errors', () => {
      expect(classifyError('missing_columns')).toBe('schema_error');
      expect(classifyError('invalid_config')).toBe('config_error');
      expect(classifyError('something_else')).toBe('internal_error');
    });
  });

  describe('getStatusCode', () => {
    it('should map error types to HTTP status', () => {
      expect(getStatusCode('routing_error')).toBe(400);
      expect(getStatusCode('config_error')).toBe(400);
      expect(getStatusCode('schema_error')).toBe(422);
      expect(getStatusCode('internal_error')).toBe(500);
    });

    it('should return 413 for oversized bodies', () => {
      expect(getStatusCode('routing_error', 'payload_too_large')).toBe(413);
    });
  });

  describe('fromAnalysisError', () => {
    it('should carry the missing columns of a SchemaError', () => {
      const error = fromAnalysisError('req-1', new SchemaError(['brake', 'track_position']));

      expect(error.request_id).toBe('req-1');
      expect(error.error_type).toBe('schema_error');
      expect(error.error_code).toBe('missing_columns');
      expect(error.reason).toBe('Missing required columns: brake, track_position');
      expect(error.details).toEqual({ missing_fields: ['brake', 'track_position'] });
    });

    it('should carry the field of a ConfigError', () => {
      const error = fromAnalysisError('req-2', new ConfigError('segments', 'must be a positive integer, got 0'));

      expect(error.error_type).toBe('config_error');
      expect(error.reason).toBe('Invalid segments: must be a positive integer, got 0');
      expect(error.details).toEqual({ field: 'segments', reason: 'must be a positive integer, got 0' });
    });

    it('should treat anything else as internal', () => {
      expect(fromAnalysisError('req-3', new Error('boom')).error_type).toBe('internal_error');
      expect(fromAnalysisError('req-4', 'plain failure').reason).toBe('plain failure');
    });
  });

  describe('Counters', () => {
    it('should count failures by type', () => {
      buildErrorResponse('a', 'missing_body', 'empty');
      buildErrorResponse('b', 'missing_columns', 'no brake');
      buildErrorResponse('c', 'missing_body', 'empty');

      const stats = analyzeCounters.getStats();
      expect(stats.failures_by_type).toEqual({
        routing_error: 2,
        schema_error: 1,
        config_error: 0,
        internal_error: 0
      });
    });

    it('should compute the success rate', () => {
      analyzeCounters.incrementTotal();
      analyzeCounters.incrementTotal();
      analyzeCounters.incrementTotal();
      analyzeCounters.incrementSuccess();
      analyzeCounters.incrementEmptyResult();

      const stats = analyzeCounters.getStats();
      expect(stats.total_requests).toBe(3);
      expect(stats.success_count).toBe(1);
      expect(stats.empty_result_count).toBe(1);
      expect(stats.success_rate).toBe(0.333);
    });
  });
});
