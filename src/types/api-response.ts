import type { AnalysisDiagnostics } from '../analysis/analyzer';
import type { RowParseWarning, TopCause } from './telemetry';

/**
 * Output record as served to consumers.
 *
 * `loss` is canonical. `time_loss` carries the same value under the name
 * older consumers read; both are always emitted.
 */
export interface AnalysisRecord {
  segment: number;
  segment_label: string;
  avg_dt: number;
  best_dt: number;
  time_loss: number;
  loss: number;
  loss_percent: number | null;
  brake_time_loss: number;
  exit_time_loss: number;
  exit_throttle_delay_loss: number;
  entry_time_loss: number;
  top_cause: TopCause;
  best_lap: number;
  laps_considered: number;
  avg_speed: number;
  avg_throttle: number;
  avg_brake: number;
  avg_throttle_time: number;
  avg_coast_time: number;
  samples_considered: number;
}

export interface AnalysisReportResponse {
  request_id: string;
  config: {
    n_segments: number;
    max_dt: number | null;
    brake_threshold: number;
    throttle_threshold: number;
  };
  headline: string;
  segments: AnalysisRecord[];
  diagnostics: AnalysisDiagnostics & {
    csv_issues: number;
    warnings_reported: number;
    warnings: RowParseWarning[];
  };
  metadata: {
    total_latency_ms: number;
  };
}
