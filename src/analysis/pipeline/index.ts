export { validateSamples, collectColumns, assertRequiredColumns } from './validate-samples';
export type { SampleValidationResult } from './validate-samples';
export { partitionLaps, hasEnoughLaps, MIN_SAMPLES_PER_LAP, MIN_LAPS_FOR_COMPARISON } from './partition-laps';
export type { LapPartition } from './partition-laps';
export { segmentIndex, segmentLabel, segmentBounds, assertSegmentCount } from './segment';
export { computeDeltas } from './compute-deltas';
export type { DeltaOptions, DeltaResult } from './compute-deltas';
export { aggregateLapSegments, buildSegmentLapRecord } from './aggregate-lap-segments';
export type { InputThresholds } from './aggregate-lap-segments';
export { aggregateSegments } from './aggregate-segments';
export { attributeLoss, attributeLosses } from './attribute-loss';
export { rankSegments, selectTopCause, TOP_CAUSE_COPY } from './rank-segments';
export type { SubLosses } from './rank-segments';
