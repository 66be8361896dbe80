import { AttributedSegment, SegmentSummary, TopCause } from '../../types/telemetry';

export interface SubLosses {
  brake_time_loss: number;
  exit_time_loss: number;
  exit_throttle_delay_loss: number;
}

/**
 * Candidate order doubles as the tie-break: braking, then corner exit,
 * then late throttle.
 */
const CAUSE_ORDER: Array<{ cause: TopCause; pick: (losses: SubLosses) => number }> = [
  { cause: 'braking', pick: l => l.brake_time_loss },
  { cause: 'corner_exit', pick: l => l.exit_time_loss },
  { cause: 'corner_exit (late throttle)', pick: l => l.exit_throttle_delay_loss }
];

/**
 * Sub-loss with the largest magnitude
 */
export function selectTopCause(losses: SubLosses): TopCause {
  let top = CAUSE_ORDER[0];
  let topMagnitude = Math.abs(top.pick(losses));

  for (const candidate of CAUSE_ORDER.slice(1)) {
    const magnitude = Math.abs(candidate.pick(losses));
    if (magnitude > topMagnitude) {
      top = candidate;
      topMagnitude = magnitude;
    }
  }
  return top.cause;
}

/**
 * Order by loss descending (equal losses keep segment index ascending) and
 * label each segment with its dominant cause
 */
export function rankSegments(segments: readonly AttributedSegment[]): SegmentSummary[] {
  return [...segments]
    .sort((a, b) => a.segment - b.segment)
    .sort((a, b) => b.loss - a.loss)
    .map(segment => ({ ...segment, top_cause: selectTopCause(segment) }));
}

export const TOP_CAUSE_COPY: Record<TopCause, string> = {
  braking: 'braking',
  corner_exit: 'corner exit',
  'corner_exit (late throttle)': 'late throttle after apex'
};
