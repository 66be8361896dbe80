/**
 * ANALYZER TESTS
 *
 * End-to-end pipeline runs:
 * - Too few laps and single-sample laps yield an empty result
 * - Two-lap session with known segment times
 * - Duplicate timestamps and dropout gaps
 * - Config errors before schema errors, determinism
 */

import { describe, it, expect } from 'vitest';
import { analyzeSamples, analyzeTelemetry } from '../../src/analysis/analyzer';
import { ConfigError, SchemaError } from '../../src/analysis/errors';
import { config, lapSamples, toRawRows, TWO_LAP_SESSION } from '../fixtures/telemetry';

describe('analyzeSamples', () => {
  describe('Empty results', () => {
    it('should return nothing for a single lap', () => {
      const result = analyzeSamples(lapSamples(1, [[0, 0], [1, 0.3], [2, 0.6], [3, 0.9]]), config());

      expect(result.segments).toEqual([]);
      expect(result.diagnostics.empty_reason).toBe('insufficient_laps');
      expect(result.diagnostics.laps_used).toBe(1);
    });

    it('should drop a single-sample lap before counting laps', () => {
      const samples = [
        ...lapSamples(1, [[0, 0], [1, 0.3], [2, 0.6]]),
        ...lapSamples(2, [[10, 0.5]])
      ];

      const result = analyzeSamples(samples, config());

      expect(result.segments).toEqual([]);
      expect(result.diagnostics.dropped_laps).toEqual([2]);
      expect(result.diagnostics.laps_total).toBe(2);
      expect(result.diagnostics.empty_reason).toBe('insufficient_laps');
    });

    it('should return nothing when every delta is discarded', () => {
      const samples = [
        ...lapSamples(1, [[0, 0.1], [0, 0.2]]),
        ...lapSamples(2, [[5, 0.1], [5, 0.2]])
      ];

      const result = analyzeSamples(samples, config());

      expect(result.segments).toEqual([]);
      expect(result.diagnostics.deltas_discarded_non_positive).toBe(2);
      expect(result.diagnostics.empty_reason).toBe('no_segment_data');
    });

    it('should return nothing for no samples', () => {
      expect(analyzeSamples([], config()).segments).toEqual([]);
    });
  });

  describe('Two-lap session', () => {
    const result = analyzeSamples(TWO_LAP_SESSION, config({ nSegments: 2 }));

    it('should rank the slower segment first', () => {
      expect(result.segments.map(s => s.segment)).toEqual([1, 0]);
    });

    it('should compare each segment with its own best lap', () => {
      const [second, first] = result.segments;

      expect(second.avg_dt).toBe(1.5);
      expect(second.best_dt).toBe(1);
      expect(second.best_lap).toBe(2);
      expect(second.loss).toBe(0.5);
      expect(second.loss_percent).toBeCloseTo(100 / 3, 10);

      expect(first.avg_dt).toBe(1.25);
      expect(first.best_dt).toBe(1);
      expect(first.best_lap).toBe(1);
      expect(first.loss).toBe(0.25);
      expect(first.loss_percent).toBe(20);
    });

    it('should attribute sub-interval losses', () => {
      const [second, first] = result.segments;

      expect(second.brake_time_loss).toBe(0);
      expect(second.exit_time_loss).toBe(0.5);
      expect(second.exit_throttle_delay_loss).toBe(0.25);
      expect(second.entry_time_loss).toBe(0.25);
      expect(second.top_cause).toBe('corner_exit');

      expect(first.exit_time_loss).toBe(0.25);
      expect(first.exit_throttle_delay_loss).toBe(0.25);
      expect(first.entry_time_loss).toBe(0);
      expect(first.top_cause).toBe('corner_exit');
    });

    it('should carry throttle and coast time averages', () => {
      const [second, first] = result.segments;

      expect(second.avg_throttle_time).toBe(1.5);
      expect(second.avg_coast_time).toBe(0);
      expect(second.samples_considered).toBe(4);
      expect(first.avg_throttle_time).toBe(1.25);
      expect(first.samples_considered).toBe(4);
    });

    it('should report pipeline diagnostics', () => {
      expect(result.diagnostics).toEqual({
        rows_received: 10,
        rows_dropped: 0,
        samples_parsed: 10,
        laps_total: 2,
        laps_used: 2,
        dropped_laps: [],
        deltas_total: 8,
        deltas_discarded_non_positive: 0,
        deltas_discarded_dropout: 0,
        segments_with_data: 2,
        empty_reason: null
      });
    });

    it('should give one segment per bin at most', () => {
      const many = analyzeSamples(TWO_LAP_SESSION, config({ nSegments: 10 }));
      const segments = many.segments.map(s => s.segment);
      expect(new Set(segments).size).toBe(segments.length);
      for (const segment of segments) {
        expect(segment).toBeGreaterThanOrEqual(0);
        expect(segment).toBeLessThan(10);
      }
    });
  });

  describe('Timing anomalies', () => {
    it('should ignore duplicate timestamps', () => {
      const samples = [
        ...lapSamples(1, [[0, 0], [1, 0.3], [1, 0.4], [2, 0.8]]),
        ...lapSamples(2, [[10, 0], [11, 0.4], [12, 0.8]])
      ];

      const result = analyzeSamples(samples, config({ nSegments: 1 }));

      expect(result.diagnostics.deltas_discarded_non_positive).toBe(1);
      expect(result.segments).toHaveLength(1);
      expect(result.segments[0].avg_dt).toBe(2);
      expect(result.segments[0].loss).toBe(0);
    });

    it('should drop dropout gaps only when max_dt is set', () => {
      const samples = [
        ...lapSamples(1, [[0, 0], [0.5, 0.1], [5.5, 0.2], [6, 0.3]]),
        ...lapSamples(2, [[10, 0], [10.5, 0.1], [11, 0.2], [11.5, 0.3]])
      ];

      const filtered = analyzeSamples(samples, config({ nSegments: 1, maxDt: 0.5 }));
      expect(filtered.diagnostics.deltas_discarded_dropout).toBe(1);
      expect(filtered.segments[0].avg_dt).toBe(1.25);
      expect(filtered.segments[0].best_lap).toBe(1);
      expect(filtered.segments[0].loss).toBe(0.25);

      const unfiltered = analyzeSamples(samples, config({ nSegments: 1 }));
      expect(unfiltered.segments[0].avg_dt).toBe(3.75);
      expect(unfiltered.segments[0].best_lap).toBe(2);
      expect(unfiltered.segments[0].loss).toBe(2.25);
    });
  });

  it('should be deterministic', () => {
    const first = analyzeSamples(TWO_LAP_SESSION, config({ nSegments: 3 }));
    const second = analyzeSamples(TWO_LAP_SESSION, config({ nSegments: 3 }));
    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });

  it('should not depend on sample order within the input', () => {
    const shuffled = [...TWO_LAP_SESSION].reverse();
    const a = analyzeSamples(TWO_LAP_SESSION, config({ nSegments: 2 }));
    const b = analyzeSamples(shuffled, config({ nSegments: 2 }));
    expect(b.segments).toEqual(a.segments);
  });

  it('should reject an invalid structured config', () => {
    expect(() => analyzeSamples(TWO_LAP_SESSION, config({ nSegments: 0 }))).toThrow(ConfigError);
  });
});

describe('analyzeTelemetry', () => {
  it('should run the full pipeline from string rows', () => {
    const result = analyzeTelemetry(toRawRows(TWO_LAP_SESSION), config({ nSegments: 2 }));
    expect(result.segments.map(s => [s.segment_label, s.loss])).toEqual([['S2', 0.5], ['S1', 0.25]]);
  });

  it('should drop malformed rows and carry their warnings', () => {
    const rows = toRawRows(TWO_LAP_SESSION);
    rows.splice(3, 0, { ...rows[3], speed: 'n/a' });

    const result = analyzeTelemetry(rows, config({ nSegments: 2 }));

    expect(result.diagnostics.rows_received).toBe(11);
    expect(result.diagnostics.rows_dropped).toBe(1);
    expect(result.warnings).toEqual([
      { row_index: 3, field: 'speed', value: 'n/a', reason: 'speed is not a finite number' }
    ]);
    expect(result.segments.map(s => s.loss)).toEqual([0.5, 0.25]);
  });

  it('should take the received row count from the caller when given', () => {
    const result = analyzeTelemetry(toRawRows(TWO_LAP_SESSION), config(), { rowsReceived: 12 });
    expect(result.diagnostics.rows_received).toBe(12);
  });

  it('should raise SchemaError for a missing column', () => {
    const rows = toRawRows(TWO_LAP_SESSION).map(({ steering: _steering, ...rest }) => rest);
    expect(() => analyzeTelemetry(rows, config())).toThrow(SchemaError);
  });

  it('should raise ConfigError before looking at the rows', () => {
    expect(() => analyzeTelemetry([{ speed: '1' }], config({ brakeThreshold: 2 }))).toThrow(ConfigError);
  });
});
