/**
 * Telemetry analysis orchestrator
 *
 * Runs the pipeline strictly forward:
 *   1. validate samples      5. per-lap segment aggregation
 *   2. partition laps        6. cross-lap aggregation
 *   3. segment positions     7. loss attribution
 *   4. time deltas           8. ranking
 *
 * Synchronous and stateless: nothing survives between calls, so identical
 * input and config always produce identical output.
 */

import { AnalysisConfig, validateAnalysisConfig } from '../config/analysis';
import {
  RawTelemetryRow,
  RowParseWarning,
  SegmentSummary,
  TelemetrySample
} from '../types/telemetry';
import {
  aggregateLapSegments,
  aggregateSegments,
  attributeLosses,
  computeDeltas,
  hasEnoughLaps,
  partitionLaps,
  rankSegments,
  validateSamples
} from './pipeline';

export type EmptyResultReason = 'insufficient_laps' | 'no_segment_data';

export interface AnalysisDiagnostics {
  rows_received: number;
  rows_dropped: number;
  samples_parsed: number;
  laps_total: number;
  laps_used: number;
  dropped_laps: number[];
  deltas_total: number;
  deltas_discarded_non_positive: number;
  deltas_discarded_dropout: number;
  segments_with_data: number;
  /** Set when the result is empty; an empty result is not an error */
  empty_reason: EmptyResultReason | null;
}

export interface AnalysisResult {
  config: AnalysisConfig;
  segments: SegmentSummary[];
  diagnostics: AnalysisDiagnostics;
  warnings: RowParseWarning[];
}

export interface AnalyzeOptions {
  /** Header fields when known (CSV); otherwise derived from the rows */
  columns?: readonly string[];
  /** Rows received before the validator, when parsing happened upstream */
  rowsReceived?: number;
}

/**
 * Full pipeline from raw rows.
 * Throws ConfigError (before any processing) or SchemaError.
 */
export function analyzeTelemetry(
  rows: readonly RawTelemetryRow[],
  config: AnalysisConfig,
  options: AnalyzeOptions = {}
): AnalysisResult {
  validateAnalysisConfig(config);

  const validation = validateSamples(rows, options.columns);
  const result = analyzeSamples(validation.samples, config);

  return {
    ...result,
    diagnostics: {
      ...result.diagnostics,
      rows_received: options.rowsReceived ?? validation.rows_received,
      rows_dropped: validation.warnings.length
    },
    warnings: validation.warnings
  };
}

/**
 * Pipeline stages 2-8 over already-parsed samples
 */
export function analyzeSamples(
  samples: readonly TelemetrySample[],
  config: AnalysisConfig
): AnalysisResult {
  validateAnalysisConfig(config);

  const partition = partitionLaps(samples);
  const diagnostics: AnalysisDiagnostics = {
    rows_received: samples.length,
    rows_dropped: 0,
    samples_parsed: samples.length,
    laps_total: partition.laps.length + partition.dropped_laps.length,
    laps_used: partition.laps.length,
    dropped_laps: partition.dropped_laps,
    deltas_total: 0,
    deltas_discarded_non_positive: 0,
    deltas_discarded_dropout: 0,
    segments_with_data: 0,
    empty_reason: null
  };

  if (!hasEnoughLaps(partition)) {
    return {
      config,
      segments: [],
      diagnostics: { ...diagnostics, empty_reason: 'insufficient_laps' },
      warnings: []
    };
  }

  const deltas = computeDeltas(partition.laps, {
    nSegments: config.nSegments,
    maxDt: config.maxDt
  });
  diagnostics.deltas_total = deltas.deltas_total;
  diagnostics.deltas_discarded_non_positive = deltas.discarded_non_positive;
  diagnostics.deltas_discarded_dropout = deltas.discarded_dropouts;

  const records = aggregateLapSegments(deltas.timed, config);
  const segments = rankSegments(attributeLosses(aggregateSegments(records)));
  diagnostics.segments_with_data = segments.length;

  return {
    config,
    segments,
    diagnostics: {
      ...diagnostics,
      empty_reason: segments.length === 0 ? 'no_segment_data' : null
    },
    warnings: []
  };
}

