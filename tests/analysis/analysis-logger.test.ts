/**
 * ANALYSIS LOGGER TESTS
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { AnalysisLogger } from '../../src/analysis/analysis-logger';
import { analyzeSamples } from '../../src/analysis/analyzer';
import { config, TWO_LAP_SESSION } from '../fixtures/telemetry';

describe('AnalysisLogger', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should log a ranked result with its top segment', () => {
    const logger = new AnalysisLogger();
    logger.logResult('req-1', analyzeSamples(TWO_LAP_SESSION, config({ nSegments: 2 })), 12);

    const [entry] = logger.getRecentLogs();
    expect(entry.request_id).toBe('req-1');
    expect(entry.status).toBe('success');
    expect(entry.n_segments).toBe(2);
    expect(entry.laps_used).toBe(2);
    expect(entry.segments_returned).toBe(2);
    expect(entry.top_segment).toBe('S2');
    expect(entry.duration_ms).toBe(12);
  });

  it('should log an empty result separately from success', () => {
    const logger = new AnalysisLogger();
    logger.logResult('req-2', analyzeSamples([], config()), 1);

    expect(logger.getLogsByStatus('empty_result')).toHaveLength(1);
    expect(logger.getRecentLogs()[0].top_segment).toBeNull();
  });

  it('should echo each entry as a JSON line', () => {
    const logger = new AnalysisLogger();
    logger.logFailure('req-3', 'schema_error', 'Missing required columns: brake');

    expect(console.log).toHaveBeenCalledTimes(1);
    expect(vi.mocked(console.log).mock.calls[0][0]).toBe('[AnalysisLog]');
  });

  it('should rotate out the oldest entries', () => {
    const logger = new AnalysisLogger(2);
    logger.logFailure('a', 'failed', 'x');
    logger.logFailure('b', 'config_error', 'y');
    logger.logFailure('c', 'schema_error', 'z');

    expect(logger.getRecentLogs().map(log => log.request_id)).toEqual(['b', 'c']);
    expect(logger.getStats()).toEqual({
      total: 2,
      success: 0,
      empty_result: 0,
      schema_error: 1,
      config_error: 1,
      failed: 0
    });
  });

  it('should clear all entries', () => {
    const logger = new AnalysisLogger();
    logger.logFailure('a', 'failed', 'x');
    logger.clear();
    expect(logger.getRecentLogs()).toEqual([]);
  });
});
