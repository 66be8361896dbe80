import fs from 'fs';
import Papa from 'papaparse';
import { RawTelemetryRow } from '../types/telemetry';

export interface CsvParseIssue {
  /** Zero-based data row index, null when the issue is not row-specific */
  row: number | null;
  code: string;
  message: string;
}

export interface CsvLoadResult {
  rows: RawTelemetryRow[];
  /** Header fields, trimmed, in file order */
  columns: string[];
  issues: CsvParseIssue[];
}

/**
 * Parse telemetry CSV text into raw rows.
 *
 * Values stay strings: numeric coercion and row rejection belong to the
 * sample validator, so a malformed row is reported there rather than here.
 */
export function parseTelemetryCsv(text: string): CsvLoadResult {
  const parseResult = Papa.parse<Record<string, string>>(text, {
    header: true,
    dynamicTyping: false,
    skipEmptyLines: true,
    transformHeader: (header: string) => header.trim()
  });

  const issues: CsvParseIssue[] = parseResult.errors.map(error => ({
    row: typeof error.row === 'number' ? error.row : null,
    code: error.code,
    message: error.message
  }));

  return {
    rows: parseResult.data,
    columns: parseResult.meta.fields ?? [],
    issues
  };
}

/**
 * Read and parse a telemetry CSV file from disk
 */
export function loadTelemetryFile(filePath: string): CsvLoadResult {
  const text = fs.readFileSync(filePath, 'utf-8');
  return parseTelemetryCsv(text);
}
