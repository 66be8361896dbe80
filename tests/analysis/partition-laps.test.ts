/**
 * LAP PARTITIONING TESTS
 */

import { describe, it, expect } from 'vitest';
import { hasEnoughLaps, partitionLaps } from '../../src/analysis/pipeline';
import { lapSamples, makeSample } from '../fixtures/telemetry';

describe('partitionLaps', () => {
  it('should group by lap id in ascending order', () => {
    const samples = [
      ...lapSamples(3, [[20, 0], [21, 0.5]]),
      ...lapSamples(1, [[0, 0], [1, 0.5]]),
      ...lapSamples(2, [[10, 0], [11, 0.5]])
    ];

    const { laps, dropped_laps } = partitionLaps(samples);

    expect(laps.map(l => l.lap)).toEqual([1, 2, 3]);
    expect(dropped_laps).toEqual([]);
  });

  it('should sort each lap by timestamp', () => {
    const samples = lapSamples(1, [[2, 0.6], [0, 0.1], [1, 0.3]]);
    const { laps } = partitionLaps(samples);
    expect(laps[0].samples.map(s => s.timestamp)).toEqual([0, 1, 2]);
  });

  it('should keep input order for equal timestamps', () => {
    const first = makeSample({ timestamp: 1, lap: 1, track_position: 0.2, speed: 90 });
    const second = makeSample({ timestamp: 1, lap: 1, track_position: 0.3, speed: 91 });
    const start = makeSample({ timestamp: 0, lap: 1, track_position: 0.1 });

    const { laps } = partitionLaps([first, second, start]);

    expect(laps[0].samples).toEqual([start, first, second]);
  });

  it('should drop laps with fewer than two samples', () => {
    const samples = [
      ...lapSamples(1, [[0, 0], [1, 0.5]]),
      ...lapSamples(2, [[10, 0]])
    ];

    const partition = partitionLaps(samples);

    expect(partition.laps.map(l => l.lap)).toEqual([1]);
    expect(partition.dropped_laps).toEqual([2]);
    expect(hasEnoughLaps(partition)).toBe(false);
  });

  it('should treat lap ids as opaque integers', () => {
    const samples = [
      ...lapSamples(0, [[0, 0], [1, 0.5]]),
      ...lapSamples(-4, [[5, 0], [6, 0.5]])
    ];
    const partition = partitionLaps(samples);
    expect(partition.laps.map(l => l.lap)).toEqual([-4, 0]);
    expect(hasEnoughLaps(partition)).toBe(true);
  });

  it('should not mutate the input', () => {
    const samples = lapSamples(1, [[2, 0.6], [0, 0.1]]);
    const copy = [...samples];
    partitionLaps(samples);
    expect(samples).toEqual(copy);
  });
});
