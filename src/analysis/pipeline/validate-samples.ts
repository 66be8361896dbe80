import {
  REQUIRED_FIELDS,
  RawTelemetryRow,
  RowParseWarning,
  TelemetryField,
  TelemetrySample
} from '../../types/telemetry';
import { SchemaError } from '../errors';

export interface SampleValidationResult {
  samples: TelemetrySample[];
  warnings: RowParseWarning[];
  rows_received: number;
}

/**
 * Columns present in a row set: the union of keys across all rows
 */
export function collectColumns(rows: readonly RawTelemetryRow[]): string[] {
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      seen.add(key);
    }
  }
  return Array.from(seen);
}

/**
 * Fail with SchemaError listing every required column the input lacks
 */
export function assertRequiredColumns(columns: readonly string[]): void {
  const present = new Set(columns);
  const missing = REQUIRED_FIELDS.filter(field => !present.has(field));
  if (missing.length > 0) {
    throw new SchemaError(missing);
  }
}

// plain decimal or exponent notation; rejects hex, binary and octal literals
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

function coerceNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!DECIMAL_PATTERN.test(trimmed)) {
      return null;
    }
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function describeValue(value: unknown): string | null {
  if (value === undefined || value === null) {
    return null;
  }
  return typeof value === 'string' ? value : String(value);
}

function clampUnit(value: number): number {
  if (value < 0) { return 0; }
  if (value > 1) { return 1; }
  return value;
}

type ParsedRow =
  | { ok: true; sample: TelemetrySample }
  | { ok: false; field: TelemetryField; value: unknown; reason: string };

function parseRow(row: RawTelemetryRow): ParsedRow {
  const values = new Map<TelemetryField, number>();

  for (const field of REQUIRED_FIELDS) {
    const coerced = coerceNumber(row[field]);
    if (coerced === null) {
      return { ok: false, field, value: row[field], reason: `${field} is not a finite number` };
    }
    if (field === 'lap' && !Number.isInteger(coerced)) {
      return { ok: false, field, value: row[field], reason: 'lap id must be an integer' };
    }
    values.set(field, coerced);
  }

  // every field was set above
  const read = (field: TelemetryField): number => values.get(field) ?? NaN;

  return {
    ok: true,
    sample: Object.freeze({
      timestamp: read('timestamp'),
      lap: read('lap'),
      // speed/throttle/brake pass through unclamped
      speed: read('speed'),
      throttle: read('throttle'),
      brake: read('brake'),
      steering: read('steering'),
      track_position: clampUnit(read('track_position'))
    })
  };
}

/**
 * Parse raw rows into typed samples.
 *
 * - Missing required column(s) anywhere in the input: SchemaError (fatal)
 * - Row with a value that does not coerce: dropped with a RowParseWarning
 *
 * @param columns header fields when known (CSV); otherwise derived from the rows
 */
export function validateSamples(
  rows: readonly RawTelemetryRow[],
  columns?: readonly string[]
): SampleValidationResult {
  assertRequiredColumns(columns ?? collectColumns(rows));

  const samples: TelemetrySample[] = [];
  const warnings: RowParseWarning[] = [];

  rows.forEach((row, index) => {
    const parsed = parseRow(row);
    if (parsed.ok) {
      samples.push(parsed.sample);
      return;
    }
    warnings.push({
      row_index: index,
      field: parsed.field,
      value: describeValue(parsed.value),
      reason: parsed.reason
    });
  });

  return { samples, warnings, rows_received: rows.length };
}
