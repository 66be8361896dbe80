import { LapSamples, TelemetrySample } from '../../types/telemetry';

/** A lap needs two samples to yield one timing delta */
export const MIN_SAMPLES_PER_LAP = 2;

/** Fewer usable laps than this means there is nothing to compare */
export const MIN_LAPS_FOR_COMPARISON = 2;

export interface LapPartition {
  laps: LapSamples[];
  /** Lap ids discarded for having too few samples */
  dropped_laps: number[];
}

/**
 * Group samples by lap id (ascending) and sort each lap by timestamp.
 * Array.prototype.sort is stable, so equal timestamps keep input order.
 */
export function partitionLaps(samples: readonly TelemetrySample[]): LapPartition {
  const byLap = new Map<number, TelemetrySample[]>();
  for (const sample of samples) {
    const bucket = byLap.get(sample.lap);
    if (bucket) {
      bucket.push(sample);
    } else {
      byLap.set(sample.lap, [sample]);
    }
  }

  const laps: LapSamples[] = [];
  const dropped_laps: number[] = [];

  const lapIds = Array.from(byLap.keys()).sort((a, b) => a - b);
  for (const lap of lapIds) {
    const lapSamples = byLap.get(lap) ?? [];
    if (lapSamples.length < MIN_SAMPLES_PER_LAP) {
      dropped_laps.push(lap);
      continue;
    }
    laps.push({
      lap,
      samples: [...lapSamples].sort((a, b) => a.timestamp - b.timestamp)
    });
  }

  return { laps, dropped_laps };
}

export function hasEnoughLaps(partition: LapPartition): boolean {
  return partition.laps.length >= MIN_LAPS_FOR_COMPARISON;
}
