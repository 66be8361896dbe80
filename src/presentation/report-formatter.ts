/**
 * Report formatting
 *
 * Turns ranked segment summaries into wire records, a one-line headline and
 * a plain-text table. Pure functions: the same summaries always format the
 * same way.
 */

import { segmentBounds, TOP_CAUSE_COPY } from '../analysis/pipeline';
import { AnalysisRecord } from '../types/api-response';
import { SegmentSummary } from '../types/telemetry';

export const NO_RESULTS_MESSAGE = 'No results. Upload a CSV with at least 2 laps.';

/**
 * Fixed-decimal formatting; non-finite and null values render empty
 */
export function formatNumber(value: number | null, decimals: number = 3): string {
  if (value === null || !Number.isFinite(value)) {
    return '';
  }
  return value.toFixed(decimals);
}

/**
 * Wire record with a stable key order
 */
export function toAnalysisRecord(summary: SegmentSummary): AnalysisRecord {
  return {
    segment: summary.segment,
    segment_label: summary.segment_label,
    avg_dt: summary.avg_dt,
    best_dt: summary.best_dt,
    time_loss: summary.loss,
    loss: summary.loss,
    loss_percent: summary.loss_percent,
    brake_time_loss: summary.brake_time_loss,
    exit_time_loss: summary.exit_time_loss,
    exit_throttle_delay_loss: summary.exit_throttle_delay_loss,
    entry_time_loss: summary.entry_time_loss,
    top_cause: summary.top_cause,
    best_lap: summary.best_lap,
    laps_considered: summary.laps_considered,
    avg_speed: summary.avg_speed,
    avg_throttle: summary.avg_throttle,
    avg_brake: summary.avg_brake,
    avg_throttle_time: summary.avg_throttle_time,
    avg_coast_time: summary.avg_coast_time,
    samples_considered: summary.samples_considered
  };
}

/**
 * One-line summary of the biggest bottleneck
 */
export function buildHeadline(segments: readonly SegmentSummary[]): string {
  if (segments.length === 0) {
    return NO_RESULTS_MESSAGE;
  }

  const [worst] = segments;
  if (worst.loss === 0) {
    return `No time lost against the best lap in any of ${segments.length} segment(s).`;
  }

  const percent = worst.loss_percent === null ? '' : ` (${formatNumber(worst.loss_percent, 1)}%)`;
  return `${worst.segment_label} loses the most time: ${formatNumber(worst.loss)} s per lap on average${percent}, ` +
    `mostly ${TOP_CAUSE_COPY[worst.top_cause]}.`;
}

const TABLE_COLUMNS: Array<{ header: string; width: number; cell: (s: SegmentSummary, nSegments: number) => string }> = [
  { header: 'Segment', width: 9, cell: s => s.segment_label },
  {
    header: 'Range',
    width: 11,
    cell: (s, n) => {
      const { start, end } = segmentBounds(s.segment, n);
      return `${formatNumber(start, 2)}-${formatNumber(end, 2)}`;
    }
  },
  { header: 'Avg (s)', width: 9, cell: s => formatNumber(s.avg_dt) },
  { header: 'Best (s)', width: 9, cell: s => formatNumber(s.best_dt) },
  { header: 'Loss (s)', width: 9, cell: s => formatNumber(s.loss) },
  { header: 'Loss %', width: 7, cell: s => formatNumber(s.loss_percent, 1) },
  { header: 'Brake', width: 8, cell: s => formatNumber(s.brake_time_loss) },
  { header: 'Exit', width: 8, cell: s => formatNumber(s.exit_time_loss) },
  { header: 'Throttle', width: 9, cell: s => formatNumber(s.exit_throttle_delay_loss) },
  { header: 'Top cause', width: 0, cell: s => s.top_cause }
];

function pad(text: string, width: number): string {
  return width > 0 ? text.padEnd(width) : text;
}

/**
 * Plain-text ranked table, one line per segment
 */
export function formatReportTable(segments: readonly SegmentSummary[], nSegments: number): string[] {
  if (segments.length === 0) {
    return [NO_RESULTS_MESSAGE];
  }

  const header = TABLE_COLUMNS.map(col => pad(col.header, col.width)).join(' ').trimEnd();
  const rows = segments.map(summary =>
    TABLE_COLUMNS.map(col => pad(col.cell(summary, nSegments), col.width)).join(' ').trimEnd()
  );
  return [header, ...rows];
}
