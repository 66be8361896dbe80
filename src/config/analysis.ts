/**
 * ANALYSIS CONFIGURATION
 *
 * One explicit, validated structure consumed once at pipeline entry.
 * Wire values may arrive as strings (query string, form fields, CLI flags)
 * or numbers (JSON bodies).
 */

import { ConfigError } from '../analysis/errors';
import { assertSegmentCount } from '../analysis/pipeline/segment';

export interface AnalysisConfig {
  /** Number of equal-width track segments (>= 1) */
  nSegments: number;
  /** Deltas above this are treated as telemetry dropouts; null disables filtering */
  maxDt: number | null;
  /** Brake input at or above this counts as braking */
  brakeThreshold: number;
  /** Throttle input at or above this counts as throttle applied */
  throttleThreshold: number;
}

/**
 * Loosely-typed configuration as supplied by callers.
 * `segments` is the preferred name; `n_segments` is the legacy one.
 */
export interface AnalysisConfigInput {
  segments?: unknown;
  n_segments?: unknown;
  max_dt?: unknown;
  brake_threshold?: unknown;
  throttle_threshold?: unknown;
}

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  nSegments: 4,
  maxDt: null,
  brakeThreshold: 0.15,
  throttleThreshold: 0.25
};

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

function toNumber(field: string, value: unknown): number {
  const parsed = typeof value === 'number'
    ? value
    : typeof value === 'string' ? Number(value.trim()) : NaN;

  if (!Number.isFinite(parsed)) {
    throw new ConfigError(field, `expected a number, got ${JSON.stringify(value)}`);
  }
  return parsed;
}

function parseSegmentCount(input: AnalysisConfigInput): number {
  const field = isBlank(input.segments) ? 'n_segments' : 'segments';
  const raw = isBlank(input.segments) ? input.n_segments : input.segments;
  if (isBlank(raw)) {
    return DEFAULT_ANALYSIS_CONFIG.nSegments;
  }

  const value = toNumber(field, raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(field, `must be a positive integer, got ${value}`);
  }
  return value;
}

function parseMaxDt(raw: unknown): number | null {
  if (isBlank(raw)) {
    return null;
  }
  const value = toNumber('max_dt', raw);
  if (value <= 0) {
    throw new ConfigError('max_dt', `must be positive, got ${value}`);
  }
  return value;
}

function parseThreshold(field: string, raw: unknown, fallback: number): number {
  if (isBlank(raw)) {
    return fallback;
  }
  const value = toNumber(field, raw);
  if (value < 0 || value > 1) {
    throw new ConfigError(field, `must be within [0, 1], got ${value}`);
  }
  return value;
}

/**
 * Resolve caller input into a validated AnalysisConfig.
 * Omitted values take their defaults; invalid values throw ConfigError.
 */
export function resolveAnalysisConfig(input: AnalysisConfigInput = {}): AnalysisConfig {
  return {
    nSegments: parseSegmentCount(input),
    maxDt: parseMaxDt(input.max_dt),
    brakeThreshold: parseThreshold('brake_threshold', input.brake_threshold, DEFAULT_ANALYSIS_CONFIG.brakeThreshold),
    throttleThreshold: parseThreshold('throttle_threshold', input.throttle_threshold, DEFAULT_ANALYSIS_CONFIG.throttleThreshold)
  };
}

/**
 * Check an already-structured config (e.g. built in code rather than parsed)
 */
export function validateAnalysisConfig(config: AnalysisConfig): AnalysisConfig {
  assertSegmentCount(config.nSegments);
  if (config.maxDt !== null && !(Number.isFinite(config.maxDt) && config.maxDt > 0)) {
    throw new ConfigError('max_dt', `must be positive, got ${config.maxDt}`);
  }
  for (const [field, value] of [
    ['brake_threshold', config.brakeThreshold],
    ['throttle_threshold', config.throttleThreshold]
  ] as const) {
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      throw new ConfigError(field, `must be within [0, 1], got ${value}`);
    }
  }
  return config;
}

/**
 * Wire representation of a resolved config (snake_case, as accepted)
 */
export function serializeAnalysisConfig(config: AnalysisConfig): {
  n_segments: number;
  max_dt: number | null;
  brake_threshold: number;
  throttle_threshold: number;
} {
  return {
    n_segments: config.nSegments,
    max_dt: config.maxDt,
    brake_threshold: config.brakeThreshold,
    throttle_threshold: config.throttleThreshold
  };
}
