/**
 * Track segmentation
 *
 * [0, 1] is split into n equal-width half-open bins [k/n, (k+1)/n), the last
 * bin closed at 1.0. Segments are an indexing scheme only.
 */

import { ConfigError } from '../errors';

export function assertSegmentCount(nSegments: number): void {
  if (!Number.isInteger(nSegments) || nSegments < 1) {
    throw new ConfigError('n_segments', `must be a positive integer, got ${nSegments}`);
  }
}

/**
 * Segment index for a (clamped) track position
 */
export function segmentIndex(trackPosition: number, nSegments: number): number {
  const position = Math.min(1, Math.max(0, trackPosition));
  // position == 1.0 would land in bin n
  return Math.min(Math.floor(position * nSegments), nSegments - 1);
}

/**
 * Display label, 1-based: segment 0 is "S1"
 */
export function segmentLabel(index: number): string {
  return `S${index + 1}`;
}

/**
 * Bounds of a segment as [start, end)
 */
export function segmentBounds(index: number, nSegments: number): { start: number; end: number } {
  return {
    start: index / nSegments,
    end: (index + 1) / nSegments
  };
}
