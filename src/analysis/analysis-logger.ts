import { AnalysisResult } from './analyzer';

/**
 * Analysis log entry structure
 */
export interface AnalysisLogEntry {
  timestamp: string;
  request_id: string;
  status: 'success' | 'empty_result' | 'schema_error' | 'config_error' | 'failed';
  n_segments?: number;
  rows_received?: number;
  rows_dropped?: number;
  laps_used?: number;
  segments_returned?: number;
  top_segment?: string | null;
  rejection_reason?: string;
  duration_ms?: number;
}

export type AnalysisLogStatus = AnalysisLogEntry['status'];

/**
 * Bounded log of recent analysis runs
 *
 * Each entry is echoed to stdout as a JSON line and kept in memory until
 * rotated out.
 */
export class AnalysisLogger {
  private logs: AnalysisLogEntry[];
  private maxLogs: number;

  constructor(maxLogs: number = 1000) {
    this.logs = [];
    this.maxLogs = maxLogs;
  }

  /**
   * Log a completed run (empty results included)
   */
  logResult(requestId: string, result: AnalysisResult, durationMs: number): void {
    const [top] = result.segments;
    this.addLog({
      timestamp: new Date().toISOString(),
      request_id: requestId,
      status: result.segments.length > 0 ? 'success' : 'empty_result',
      n_segments: result.config.nSegments,
      rows_received: result.diagnostics.rows_received,
      rows_dropped: result.diagnostics.rows_dropped,
      laps_used: result.diagnostics.laps_used,
      segments_returned: result.segments.length,
      top_segment: top ? top.segment_label : null,
      duration_ms: durationMs
    });
  }

  /**
   * Log a rejected or failed run
   */
  logFailure(
    requestId: string,
    status: Exclude<AnalysisLogStatus, 'success' | 'empty_result'>,
    reason: string
  ): void {
    this.addLog({
      timestamp: new Date().toISOString(),
      request_id: requestId,
      status,
      rejection_reason: reason
    });
  }

  /**
   * Add log entry with rotation
   */
  private addLog(entry: AnalysisLogEntry): void {
    console.log('[AnalysisLog]', JSON.stringify(entry));

    this.logs.push(entry);
    if (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }
  }

  getRecentLogs(limit: number = 100): AnalysisLogEntry[] {
    return this.logs.slice(-limit);
  }

  getLogsByStatus(status: AnalysisLogStatus): AnalysisLogEntry[] {
    return this.logs.filter(log => log.status === status);
  }

  getStats(): Record<AnalysisLogStatus | 'total', number> {
    const count = (status: AnalysisLogStatus) => this.logs.filter(log => log.status === status).length;
    return {
      total: this.logs.length,
      success: count('success'),
      empty_result: count('empty_result'),
      schema_error: count('schema_error'),
      config_error: count('config_error'),
      failed: count('failed')
    };
  }

  clear(): void {
    this.logs = [];
  }
}
