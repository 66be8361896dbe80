import { AttributedSegment, SegmentAggregate } from '../../types/telemetry';
import { segmentLabel } from './segment';

/**
 * Loss attribution against the per-segment best lap.
 *
 * loss is avg_dt - best_dt. The three sub-losses compare the lap-average of
 * a sub-interval duration with the best lap's value. They measure overlapping
 * intervals, so they need not sum to loss, and negative values are kept.
 */
export function attributeLoss(aggregate: SegmentAggregate): AttributedSegment {
  const { best } = aggregate;

  // a mean can round a hair below its own minimum when all laps tie
  const avg_dt = Math.max(aggregate.avg_dt, aggregate.best_dt);
  const loss = avg_dt - aggregate.best_dt;
  const loss_percent = avg_dt === 0 ? null : (100 * loss) / avg_dt;

  const brake_time_loss = aggregate.avg_brake_time - best.brake_time;
  const exit_time_loss = aggregate.avg_exit_time - best.exit_time;
  const exit_throttle_delay_loss = aggregate.avg_late_throttle_time - best.late_throttle_time;

  return {
    segment: aggregate.segment,
    segment_label: segmentLabel(aggregate.segment),
    avg_dt,
    best_dt: aggregate.best_dt,
    loss,
    time_loss: loss,
    loss_percent,
    brake_time_loss,
    exit_time_loss,
    exit_throttle_delay_loss,
    entry_time_loss: aggregate.avg_entry_time - best.entry_time,
    best_lap: aggregate.best_lap,
    laps_considered: aggregate.laps_considered,
    avg_speed: aggregate.avg_speed,
    avg_throttle: aggregate.avg_throttle,
    avg_brake: aggregate.avg_brake,
    avg_throttle_time: aggregate.avg_throttle_time,
    avg_coast_time: aggregate.avg_coast_time,
    samples_considered: aggregate.samples_considered
  };
}

export function attributeLosses(aggregates: readonly SegmentAggregate[]): AttributedSegment[] {
  return aggregates.map(attributeLoss);
}
