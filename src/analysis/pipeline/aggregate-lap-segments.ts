import { SegmentLapRecord, TimedSample } from '../../types/telemetry';

export interface InputThresholds {
  brakeThreshold: number;
  throttleThreshold: number;
}

function sumDt(group: readonly TimedSample[], from: number = 0, to: number = group.length - 1): number {
  let total = 0;
  for (let i = from; i <= to; i++) {
    total += group[i].dt;
  }
  return total;
}

function mean(group: readonly TimedSample[], pick: (item: TimedSample) => number): number {
  let total = 0;
  for (const item of group) {
    total += pick(item);
  }
  return total / group.length;
}

/**
 * Index of the first minimum-speed sample (apex proxy)
 */
export function findApexIndex(group: readonly TimedSample[]): number {
  let apex = 0;
  for (let i = 1; i < group.length; i++) {
    if (group[i].sample.speed < group[apex].sample.speed) {
      apex = i;
    }
  }
  return apex;
}

/**
 * Time from the first throttle application in the segment to its end
 */
export function computeExitTime(group: readonly TimedSample[], throttleThreshold: number): number {
  const firstOn = group.findIndex(item => item.sample.throttle >= throttleThreshold);
  return firstOn === -1 ? 0 : sumDt(group, firstOn);
}

/**
 * Time after the apex proxy up to and including the first throttle-on sample.
 * Zero when the apex is the last sample or throttle never comes back.
 */
export function computeLateThrottleTime(
  group: readonly TimedSample[],
  apex: number,
  throttleThreshold: number
): number {
  for (let i = apex + 1; i < group.length; i++) {
    if (group[i].sample.throttle >= throttleThreshold) {
      return sumDt(group, apex + 1, i);
    }
  }
  return 0;
}

/**
 * Build one record from a (lap, segment) group, in timestamp order.
 * Each item carries its delta and the later sample of the pair.
 */
export function buildSegmentLapRecord(
  lap: number,
  segment: number,
  group: readonly TimedSample[],
  thresholds: InputThresholds
): SegmentLapRecord {
  const { brakeThreshold, throttleThreshold } = thresholds;

  let brake_time = 0;
  let throttle_time = 0;
  let coast_time = 0;
  for (const { dt, sample } of group) {
    const braking = sample.brake >= brakeThreshold;
    const throttle = sample.throttle >= throttleThreshold;
    if (braking) { brake_time += dt; }
    if (throttle) { throttle_time += dt; }
    if (!braking && !throttle) { coast_time += dt; }
  }

  const apex = findApexIndex(group);

  return {
    lap,
    segment,
    dt_sum: sumDt(group),
    avg_speed: mean(group, item => item.sample.speed),
    avg_throttle: mean(group, item => item.sample.throttle),
    avg_brake: mean(group, item => item.sample.brake),
    brake_time,
    exit_time: computeExitTime(group, throttleThreshold),
    late_throttle_time: computeLateThrottleTime(group, apex, throttleThreshold),
    entry_time: sumDt(group, 0, apex),
    throttle_time,
    coast_time,
    sample_count: group.length
  };
}

/**
 * Per (lap, segment) aggregation of retained deltas.
 * Pairs with no retained delta yield no record; records come back ordered
 * by lap, then segment.
 */
export function aggregateLapSegments(
  timed: readonly TimedSample[],
  thresholds: InputThresholds
): SegmentLapRecord[] {
  const groups = new Map<string, { lap: number; segment: number; items: TimedSample[] }>();

  for (const item of timed) {
    const key = `${item.lap}:${item.segment}`;
    const group = groups.get(key);
    if (group) {
      group.items.push(item);
    } else {
      groups.set(key, { lap: item.lap, segment: item.segment, items: [item] });
    }
  }

  return Array.from(groups.values())
    .sort((a, b) => a.lap - b.lap || a.segment - b.segment)
    .map(group => buildSegmentLapRecord(group.lap, group.segment, group.items, thresholds));
}
