/**
 * CSV LOADER TESTS
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, it, expect } from 'vitest';
import { loadTelemetryFile, parseTelemetryCsv } from '../../src/ingestion/csv-loader';
import { toCsv, TWO_LAP_SESSION } from '../fixtures/telemetry';

const HEADER = 'timestamp,lap,speed,throttle,brake,steering,track_position';

describe('parseTelemetryCsv', () => {
  it('should return string-valued rows keyed by header', () => {
    const result = parseTelemetryCsv(`${HEADER}\n0.05,1,212.4,1,0,0.02,0.013\n`);

    expect(result.columns).toEqual(HEADER.split(','));
    expect(result.rows).toEqual([{
      timestamp: '0.05',
      lap: '1',
      speed: '212.4',
      throttle: '1',
      brake: '0',
      steering: '0.02',
      track_position: '0.013'
    }]);
    expect(result.issues).toEqual([]);
  });

  it('should trim header names', () => {
    const result = parseTelemetryCsv(' timestamp , lap ,speed\n1,2,3\n');
    expect(result.columns).toEqual(['timestamp', 'lap', 'speed']);
    expect(result.rows[0].lap).toBe('2');
  });

  it('should skip blank lines', () => {
    const result = parseTelemetryCsv(`${HEADER}\n0,1,100,1,0,0,0\n\n1,1,100,1,0,0,0.5\n\n`);
    expect(result.rows).toHaveLength(2);
  });

  it('should read CRLF line endings', () => {
    const result = parseTelemetryCsv(`${HEADER}\r\n0,1,100,1,0,0,0\r\n1,1,100,1,0,0,0.5\r\n`);
    expect(result.rows).toHaveLength(2);
    expect(result.rows[1].track_position).toBe('0.5');
  });

  it('should report short rows as issues without dropping them', () => {
    const result = parseTelemetryCsv(`${HEADER}\n0,1,100,1,0,0,0\n1,1,100\n`);

    expect(result.rows).toHaveLength(2);
    expect(result.issues).toHaveLength(1);
    expect(result.issues[0].code).toBe('TooFewFields');
  });

  it('should return a header-only file with no rows', () => {
    const result = parseTelemetryCsv(`${HEADER}\n`);
    expect(result.rows).toEqual([]);
    expect(result.columns).toHaveLength(7);
  });
});

describe('loadTelemetryFile', () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) {
      fs.rmSync(dir, { recursive: true, force: true });
      dir = null;
    }
  });

  it('should read and parse a file from disk', () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lap-telemetry-'));
    const file = path.join(dir, 'session.csv');
    fs.writeFileSync(file, toCsv(TWO_LAP_SESSION));

    const result = loadTelemetryFile(file);

    expect(result.rows).toHaveLength(10);
    expect(result.rows[9]).toEqual({
      timestamp: '12.5',
      lap: '2',
      speed: '100',
      throttle: '0.8',
      brake: '0',
      steering: '0',
      track_position: '0.95'
    });
  });
});
