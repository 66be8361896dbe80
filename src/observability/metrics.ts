/**
 * PRODUCTION OBSERVABILITY - METRICS COLLECTION
 *
 * Lightweight in-process metrics, exposed as a Prometheus-compatible
 * /metrics endpoint and a JSON summary.
 *
 * Collected metrics:
 * - CSV parse latency histogram
 * - Analysis pipeline latency histogram
 * - Total request latency
 * - Rows received / dropped, deltas discarded by reason
 * - Analyses run, empty results
 * - Error counts by type
 */

import { Router, Request, Response, NextFunction } from 'express';

// Histogram bucket boundaries (milliseconds)
const LATENCY_BUCKETS = [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000];

const METRIC_PREFIX = 'lapfinder';

interface HistogramData {
  buckets: Map<number, number>;
  sum: number;
  count: number;
}

export type DeltaDiscardReason = 'non_positive' | 'dropout';

class MetricsCollector {
  // Histograms
  private parseLatency: HistogramData;
  private analysisLatency: HistogramData;
  private totalRequestLatency: HistogramData;

  // Counters
  private analysesTotal: number = 0;
  private emptyResults: number = 0;
  private rowsReceived: number = 0;
  private rowsDropped: number = 0;
  private deltasDiscarded: Map<DeltaDiscardReason, number> = new Map();
  private errorsByType: Map<string, number> = new Map();

  // Gauges
  private activeConcurrentRequests: number = 0;
  private peakConcurrentRequests: number = 0;

  constructor() {
    this.parseLatency = this.createHistogram();
    this.analysisLatency = this.createHistogram();
    this.totalRequestLatency = this.createHistogram();
  }

  private createHistogram(): HistogramData {
    const buckets = new Map<number, number>();
    LATENCY_BUCKETS.forEach(b => buckets.set(b, 0));
    buckets.set(Infinity, 0);
    return { buckets, sum: 0, count: 0 };
  }

  private recordHistogram(histogram: HistogramData, value: number): void {
    histogram.sum += value;
    histogram.count += 1;

    // first bucket that fits; formatHistogram accumulates
    for (const bucket of LATENCY_BUCKETS) {
      if (value <= bucket) {
        histogram.buckets.set(bucket, (histogram.buckets.get(bucket) || 0) + 1);
        break;
      }
    }
    histogram.buckets.set(Infinity, (histogram.buckets.get(Infinity) || 0) + 1);
  }

  recordParseLatency(ms: number): void {
    this.recordHistogram(this.parseLatency, ms);
  }

  recordAnalysisLatency(ms: number): void {
    this.recordHistogram(this.analysisLatency, ms);
  }

  recordRequestLatency(ms: number): void {
    this.recordHistogram(this.totalRequestLatency, ms);
  }

  /**
   * Record one completed analysis run
   */
  recordAnalysis(run: {
    rows_received: number;
    rows_dropped: number;
    deltas_discarded_non_positive: number;
    deltas_discarded_dropout: number;
    empty: boolean;
  }): void {
    this.analysesTotal++;
    this.rowsReceived += run.rows_received;
    this.rowsDropped += run.rows_dropped;
    this.addDeltaDiscards('non_positive', run.deltas_discarded_non_positive);
    this.addDeltaDiscards('dropout', run.deltas_discarded_dropout);
    if (run.empty) {
      this.emptyResults++;
    }
  }

  private addDeltaDiscards(reason: DeltaDiscardReason, count: number): void {
    this.deltasDiscarded.set(reason, (this.deltasDiscarded.get(reason) || 0) + count);
  }

  incrementError(errorType: string): void {
    this.errorsByType.set(errorType, (this.errorsByType.get(errorType) || 0) + 1);
  }

  // Concurrency tracking
  incrementConcurrentRequests(): void {
    this.activeConcurrentRequests++;
    if (this.activeConcurrentRequests > this.peakConcurrentRequests) {
      this.peakConcurrentRequests = this.activeConcurrentRequests;
    }
  }

  decrementConcurrentRequests(): void {
    this.activeConcurrentRequests = Math.max(0, this.activeConcurrentRequests - 1);
  }

  getRowDropRate(): number {
    return this.rowsReceived > 0 ? this.rowsDropped / this.rowsReceived : 0;
  }

  // Format histogram for Prometheus
  private formatHistogram(name: string, histogram: HistogramData, help: string): string {
    const lines: string[] = [];
    lines.push(`# HELP ${name} ${help}`);
    lines.push(`# TYPE ${name} histogram`);

    let cumulative = 0;
    for (const bucket of LATENCY_BUCKETS) {
      cumulative += histogram.buckets.get(bucket) || 0;
      lines.push(`${name}_bucket{le="${bucket}"} ${cumulative}`);
    }
    lines.push(`${name}_bucket{le="+Inf"} ${histogram.count}`);
    lines.push(`${name}_sum ${histogram.sum}`);
    lines.push(`${name}_count ${histogram.count}`);

    return lines.join('\n');
  }

  private formatCounter(name: string, value: number, help: string, type: 'counter' | 'gauge' = 'counter'): string {
    return [
      `# HELP ${name} ${help}`,
      `# TYPE ${name} ${type}`,
      `${name} ${value}`
    ].join('\n');
  }

  // Generate Prometheus-compatible metrics output
  toPrometheus(): string {
    const sections: string[] = [];

    sections.push(this.formatHistogram(
      `${METRIC_PREFIX}_csv_parse_latency_ms`,
      this.parseLatency,
      'CSV parsing latency in milliseconds'
    ));

    sections.push(this.formatHistogram(
      `${METRIC_PREFIX}_analysis_latency_ms`,
      this.analysisLatency,
      'Analysis pipeline latency in milliseconds'
    ));

    sections.push(this.formatHistogram(
      `${METRIC_PREFIX}_request_latency_ms`,
      this.totalRequestLatency,
      'Total request latency in milliseconds'
    ));

    sections.push(this.formatCounter(`${METRIC_PREFIX}_analyses_total`, this.analysesTotal, 'Completed analysis runs'));
    sections.push(this.formatCounter(`${METRIC_PREFIX}_empty_results_total`, this.emptyResults, 'Analysis runs with no segment results'));
    sections.push(this.formatCounter(`${METRIC_PREFIX}_rows_received_total`, this.rowsReceived, 'Telemetry rows received'));
    sections.push(this.formatCounter(`${METRIC_PREFIX}_rows_dropped_total`, this.rowsDropped, 'Telemetry rows dropped as unparseable'));

    const discarded = `${METRIC_PREFIX}_deltas_discarded_total`;
    const discardLines = [
      `# HELP ${discarded} Timing deltas discarded by reason`,
      `# TYPE ${discarded} counter`
    ];
    for (const [reason, count] of this.deltasDiscarded) {
      discardLines.push(`${discarded}{reason="${reason}"} ${count}`);
    }
    if (this.deltasDiscarded.size === 0) {
      discardLines.push(`${discarded} 0`);
    }
    sections.push(discardLines.join('\n'));

    const errors = `${METRIC_PREFIX}_errors_total`;
    const errorLines = [
      `# HELP ${errors} Errors by type`,
      `# TYPE ${errors} counter`
    ];
    for (const [type, count] of this.errorsByType) {
      errorLines.push(`${errors}{type="${type}"} ${count}`);
    }
    sections.push(errorLines.join('\n'));

    sections.push(this.formatCounter(
      `${METRIC_PREFIX}_concurrent_requests`, this.activeConcurrentRequests, 'Current concurrent requests', 'gauge'
    ));
    sections.push(this.formatCounter(
      `${METRIC_PREFIX}_peak_concurrent_requests`, this.peakConcurrentRequests, 'Peak concurrent requests', 'gauge'
    ));

    return sections.join('\n\n') + '\n';
  }

  // Get summary for JSON endpoint
  toJSON(): Record<string, unknown> {
    return {
      analyses: {
        total: this.analysesTotal,
        empty_results: this.emptyResults,
        latency: {
          count: this.analysisLatency.count,
          sum_ms: this.analysisLatency.sum,
          avg_ms: this.analysisLatency.count > 0
            ? Math.round(this.analysisLatency.sum / this.analysisLatency.count)
            : 0,
        },
      },
      csv_parse: {
        count: this.parseLatency.count,
        sum_ms: this.parseLatency.sum,
      },
      rows: {
        received: this.rowsReceived,
        dropped: this.rowsDropped,
        drop_rate: this.getRowDropRate(),
      },
      deltas_discarded: Object.fromEntries(this.deltasDiscarded),
      errors_by_type: Object.fromEntries(this.errorsByType),
      concurrency: {
        current: this.activeConcurrentRequests,
        peak: this.peakConcurrentRequests,
      },
    };
  }

  // Reset all metrics (for testing)
  reset(): void {
    this.parseLatency = this.createHistogram();
    this.analysisLatency = this.createHistogram();
    this.totalRequestLatency = this.createHistogram();
    this.analysesTotal = 0;
    this.emptyResults = 0;
    this.rowsReceived = 0;
    this.rowsDropped = 0;
    this.deltasDiscarded.clear();
    this.errorsByType.clear();
    this.activeConcurrentRequests = 0;
    this.peakConcurrentRequests = 0;
  }
}

// Singleton instance
export const metrics = new MetricsCollector();

/**
 * Create metrics router
 */
export function createMetricsRouter(): Router {
  const router = Router();

  router.get('/metrics', (_req: Request, res: Response) => {
    res.set('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
    res.send(metrics.toPrometheus());
  });

  router.get('/metrics/json', (_req: Request, res: Response) => {
    res.json(metrics.toJSON());
  });

  return router;
}

/**
 * Middleware to track request metrics
 */
export function metricsMiddleware() {
  return (_req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();
    metrics.incrementConcurrentRequests();

    res.on('finish', () => {
      metrics.decrementConcurrentRequests();
      metrics.recordRequestLatency(Date.now() - startTime);
    });

    next();
  };
}
