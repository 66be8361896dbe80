import { SegmentAggregate, SegmentLapRecord } from '../../types/telemetry';

function average(records: readonly SegmentLapRecord[], pick: (record: SegmentLapRecord) => number): number {
  let total = 0;
  for (const record of records) {
    total += pick(record);
  }
  return total / records.length;
}

/**
 * Cross-lap aggregation per segment.
 *
 * Best lap = lowest dt_sum; on equal times the lower lap id wins (records
 * arrive ordered by lap). Segments no lap touched are absent from the output,
 * which is ordered by segment index.
 */
export function aggregateSegments(records: readonly SegmentLapRecord[]): SegmentAggregate[] {
  const bySegment = new Map<number, SegmentLapRecord[]>();
  for (const record of records) {
    const bucket = bySegment.get(record.segment);
    if (bucket) {
      bucket.push(record);
    } else {
      bySegment.set(record.segment, [record]);
    }
  }

  const aggregates: SegmentAggregate[] = [];
  const segments = Array.from(bySegment.keys()).sort((a, b) => a - b);

  for (const segment of segments) {
    const laps = bySegment.get(segment) ?? [];
    if (laps.length === 0) {
      continue;
    }

    let best = laps[0];
    for (const record of laps) {
      if (record.dt_sum < best.dt_sum) {
        best = record;
      }
    }

    aggregates.push({
      segment,
      laps_considered: laps.length,
      avg_dt: average(laps, r => r.dt_sum),
      best_dt: best.dt_sum,
      best_lap: best.lap,
      avg_brake_time: average(laps, r => r.brake_time),
      avg_exit_time: average(laps, r => r.exit_time),
      avg_late_throttle_time: average(laps, r => r.late_throttle_time),
      avg_entry_time: average(laps, r => r.entry_time),
      avg_speed: average(laps, r => r.avg_speed),
      avg_throttle: average(laps, r => r.avg_throttle),
      avg_brake: average(laps, r => r.avg_brake),
      avg_throttle_time: average(laps, r => r.throttle_time),
      avg_coast_time: average(laps, r => r.coast_time),
      samples_considered: laps.reduce((total, r) => total + r.sample_count, 0),
      best
    });
  }

  return aggregates;
}
