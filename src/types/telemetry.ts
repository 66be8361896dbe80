/**
 * Telemetry and analysis record types
 *
 * Every entity here is transient: produced and consumed within a single
 * analysis run, never persisted or shared between runs.
 */

/**
 * Required telemetry columns (case-sensitive, order independent)
 */
export const REQUIRED_FIELDS = [
  'timestamp',
  'lap',
  'speed',
  'throttle',
  'brake',
  'steering',
  'track_position'
] as const;

export type TelemetryField = typeof REQUIRED_FIELDS[number];

/**
 * Raw input row as it arrives from a CSV parse or a JSON body.
 * CSV values are strings; JSON values may already be numbers.
 */
export type RawTelemetryRow = Record<string, unknown>;

/**
 * One parsed telemetry sample
 */
export interface TelemetrySample {
  readonly timestamp: number;
  readonly lap: number;
  readonly speed: number;
  readonly throttle: number;
  readonly brake: number;
  readonly steering: number;
  /** Normalized track position, clamped into [0, 1] */
  readonly track_position: number;
}

/**
 * A row dropped during parsing
 */
export interface RowParseWarning {
  /** Zero-based index of the row in the input sequence */
  row_index: number;
  field: TelemetryField | null;
  value: string | null;
  reason: string;
}

/**
 * Samples of one lap, sorted by timestamp ascending
 */
export interface LapSamples {
  lap: number;
  samples: TelemetrySample[];
}

/**
 * A retained inter-sample delta, represented by the later sample of the pair
 */
export interface TimedSample {
  lap: number;
  segment: number;
  dt: number;
  sample: TelemetrySample;
}

/**
 * Per (lap, segment) timing and driver-input breakdown
 */
export interface SegmentLapRecord {
  lap: number;
  segment: number;
  dt_sum: number;
  avg_speed: number;
  avg_throttle: number;
  avg_brake: number;
  /** Time with brake at or above the brake threshold */
  brake_time: number;
  /** Time from the first throttle application to the end of the segment */
  exit_time: number;
  /** Time from the apex proxy until throttle is re-applied */
  late_throttle_time: number;
  /** Time from the segment start through the apex proxy */
  entry_time: number;
  throttle_time: number;
  coast_time: number;
  sample_count: number;
}

/**
 * Cross-lap aggregate for one segment
 */
export interface SegmentAggregate {
  segment: number;
  laps_considered: number;
  avg_dt: number;
  best_dt: number;
  best_lap: number;
  avg_brake_time: number;
  avg_exit_time: number;
  avg_late_throttle_time: number;
  avg_entry_time: number;
  avg_speed: number;
  avg_throttle: number;
  avg_brake: number;
  avg_throttle_time: number;
  avg_coast_time: number;
  /** Retained deltas across all laps in this segment */
  samples_considered: number;
  /** The best lap's record, used as the reference for sub-losses */
  best: SegmentLapRecord;
}

export type TopCause = 'braking' | 'corner_exit' | 'corner_exit (late throttle)';

/**
 * Loss attribution for one segment, before ranking
 */
export interface AttributedSegment {
  segment: number;
  segment_label: string;
  avg_dt: number;
  best_dt: number;
  loss: number;
  /** Alias of `loss`, kept for existing consumers */
  time_loss: number;
  /** null when avg_dt is zero */
  loss_percent: number | null;
  brake_time_loss: number;
  exit_time_loss: number;
  exit_throttle_delay_loss: number;
  entry_time_loss: number;
  best_lap: number;
  laps_considered: number;
  avg_speed: number;
  avg_throttle: number;
  avg_brake: number;
  /** Mean per-lap time at or above the throttle threshold */
  avg_throttle_time: number;
  /** Mean per-lap time with neither brake nor throttle applied */
  avg_coast_time: number;
  samples_considered: number;
}

/**
 * Final output row, one per segment with data
 */
export interface SegmentSummary extends AttributedSegment {
  top_cause: TopCause;
}
