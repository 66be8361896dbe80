import { LapSamples, TimedSample } from '../../types/telemetry';
import { segmentIndex } from './segment';

export interface DeltaOptions {
  nSegments: number;
  /** Deltas above this are dropouts; null keeps every positive delta */
  maxDt: number | null;
}

export interface DeltaResult {
  /** Retained deltas, lap by lap, in timestamp order */
  timed: TimedSample[];
  deltas_total: number;
  /** dt <= 0: duplicate or out-of-order timestamps */
  discarded_non_positive: number;
  /** dt > maxDt */
  discarded_dropouts: number;
}

/**
 * Inter-sample deltas per lap.
 *
 * Each retained dt is attributed in full to the segment of the LATER sample
 * of its pair. A pair straddling a segment boundary is not split: the
 * earlier segment under-counts and the later one over-counts by up to one
 * sample interval.
 */
export function computeDeltas(laps: readonly LapSamples[], options: DeltaOptions): DeltaResult {
  const timed: TimedSample[] = [];
  let deltas_total = 0;
  let discarded_non_positive = 0;
  let discarded_dropouts = 0;

  for (const { lap, samples } of laps) {
    for (let i = 1; i < samples.length; i++) {
      const sample = samples[i];
      const dt = sample.timestamp - samples[i - 1].timestamp;
      deltas_total++;

      if (!(dt > 0)) {
        discarded_non_positive++;
        continue;
      }
      if (options.maxDt !== null && dt > options.maxDt) {
        discarded_dropouts++;
        continue;
      }

      timed.push({
        lap,
        segment: segmentIndex(sample.track_position, options.nSegments),
        dt,
        sample
      });
    }
  }

  return { timed, deltas_total, discarded_non_positive, discarded_dropouts };
}
