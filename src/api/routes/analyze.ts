import { Router, Request, Response } from 'express';
import multer from 'multer';
import { analyzeTelemetry, AnalysisResult } from '../../analysis/analyzer';
import { AnalysisLogger } from '../../analysis/analysis-logger';
import { ConfigError, SchemaError } from '../../analysis/errors';
import {
  AnalysisConfigInput,
  resolveAnalysisConfig,
  serializeAnalysisConfig
} from '../../config/analysis';
import { ServerConfig } from '../../config/server';
import { parseTelemetryCsv } from '../../ingestion/csv-loader';
import { metrics } from '../../observability/metrics';
import { buildHeadline, toAnalysisRecord } from '../../presentation/report-formatter';
import { AnalysisReportResponse } from '../../types/api-response';
import { RawTelemetryRow } from '../../types/telemetry';
import {
  analyzeCounters,
  buildErrorResponse,
  fromAnalysisError,
  getStatusCode,
  AnalyzeStructuredError
} from '../analyze-errors';
import { getRequestId, logError } from '../middleware/production-safety';

type TelemetrySource =
  | { kind: 'csv'; text: string }
  | { kind: 'rows'; rows: RawTelemetryRow[] };

interface AnalyzeInput {
  source: TelemetrySource;
  configInput: AnalysisConfigInput;
}

type InputReadResult =
  | { ok: true; input: AnalyzeInput }
  | { ok: false; code: string; reason: string };

interface AnalyzeOutcome {
  requestId: string;
  result: AnalysisResult;
  csvIssues: number;
  totalMs: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Config fields from a query string or JSON object
 */
function pickConfigInput(source: Record<string, unknown>): AnalysisConfigInput {
  return {
    segments: source.segments,
    n_segments: source.n_segments,
    max_dt: source.max_dt,
    brake_threshold: source.brake_threshold,
    throttle_threshold: source.throttle_threshold
  };
}

function mergeConfigInput(base: AnalysisConfigInput, override: AnalysisConfigInput): AnalysisConfigInput {
  return {
    segments: override.segments ?? base.segments,
    n_segments: override.n_segments ?? base.n_segments,
    max_dt: override.max_dt ?? base.max_dt,
    brake_threshold: override.brake_threshold ?? base.brake_threshold,
    throttle_threshold: override.throttle_threshold ?? base.throttle_threshold
  };
}

/**
 * Accepted bodies:
 * - multipart/form-data with a `file` part, config in form fields or the query string
 * - CSV text (text/csv, text/plain), config in the query string
 * - JSON { rows: [...], config?: {...} } or { csv: "...", config?: {...} }
 */
export function readAnalyzeInput(
  body: unknown,
  query: Record<string, unknown>,
  file?: { buffer: Buffer }
): InputReadResult {
  const queryConfig = pickConfigInput(query);

  if (file) {
    const configInput = isRecord(body)
      ? mergeConfigInput(queryConfig, pickConfigInput(body))
      : queryConfig;
    const text = file.buffer.toString('utf-8');
    if (text.trim() === '') {
      return { ok: false, code: 'missing_body', reason: 'Uploaded file is empty' };
    }
    return { ok: true, input: { source: { kind: 'csv', text }, configInput } };
  }

  if (typeof body === 'string') {
    if (body.trim() === '') {
      return { ok: false, code: 'missing_body', reason: 'Request body is empty; send telemetry CSV text' };
    }
    return { ok: true, input: { source: { kind: 'csv', text: body }, configInput: queryConfig } };
  }

  if (!isRecord(body) || Object.keys(body).length === 0) {
    return {
      ok: false,
      code: 'missing_body',
      reason: 'Send telemetry as text/csv, or JSON with a "rows" array or a "csv" string'
    };
  }

  const configInput = isRecord(body.config)
    ? mergeConfigInput(queryConfig, pickConfigInput(body.config))
    : queryConfig;

  if (typeof body.csv === 'string') {
    return { ok: true, input: { source: { kind: 'csv', text: body.csv }, configInput } };
  }

  if (!Array.isArray(body.rows)) {
    return { ok: false, code: 'invalid_request', reason: 'JSON body must carry a "rows" array or a "csv" string' };
  }

  const rows: RawTelemetryRow[] = [];
  for (const [index, row] of body.rows.entries()) {
    if (!isRecord(row)) {
      return { ok: false, code: 'invalid_rows', reason: `rows[${index}] is not an object` };
    }
    rows.push(row);
  }

  return { ok: true, input: { source: { kind: 'rows', rows }, configInput } };
}

export function createAnalyzeRoutes(logger: AnalysisLogger, serverConfig: ServerConfig): Router {
  const router = Router();

  // form uploads stay in memory; nothing touches disk
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: serverConfig.maxUploadBytes, files: 1 }
  });

  function sendError(res: Response, error: AnalyzeStructuredError): void {
    metrics.incrementError(error.error_type);
    res.status(getStatusCode(error.error_type, error.error_code)).json(error);
  }

  /**
   * Shared request handling; returns null once an error response is sent
   */
  function executeAnalyze(req: Request, res: Response): AnalyzeOutcome | null {
    const start = Date.now();
    const requestId = getRequestId(res);
    analyzeCounters.incrementTotal();

    const read = readAnalyzeInput(req.body, isRecord(req.query) ? req.query : {}, req.file);
    if (!read.ok) {
      logger.logFailure(requestId, 'failed', read.reason);
      sendError(res, buildErrorResponse(requestId, read.code, read.reason));
      return null;
    }

    let result: AnalysisResult;
    let csvIssues = 0;
    try {
      // config errors surface before any telemetry is parsed
      const config = resolveAnalysisConfig(read.input.configInput);

      let rows: RawTelemetryRow[];
      let columns: string[] | undefined;
      if (read.input.source.kind === 'csv') {
        const parseStart = Date.now();
        const csv = parseTelemetryCsv(read.input.source.text);
        metrics.recordParseLatency(Date.now() - parseStart);
        rows = csv.rows;
        columns = csv.columns;
        csvIssues = csv.issues.length;
      } else {
        rows = read.input.source.rows;
      }

      const analysisStart = Date.now();
      result = analyzeTelemetry(rows, config, { columns });
      metrics.recordAnalysisLatency(Date.now() - analysisStart);
    } catch (err) {
      if (err instanceof SchemaError) {
        logger.logFailure(requestId, 'schema_error', err.message);
      } else if (err instanceof ConfigError) {
        logger.logFailure(requestId, 'config_error', err.message);
      } else {
        logger.logFailure(requestId, 'failed', String(err));
        logError(err, { context: 'analyze', request_id: requestId });
      }
      sendError(res, fromAnalysisError(requestId, err));
      return null;
    }

    const totalMs = Date.now() - start;
    metrics.recordAnalysis({
      rows_received: result.diagnostics.rows_received,
      rows_dropped: result.diagnostics.rows_dropped,
      deltas_discarded_non_positive: result.diagnostics.deltas_discarded_non_positive,
      deltas_discarded_dropout: result.diagnostics.deltas_discarded_dropout,
      empty: result.segments.length === 0
    });
    analyzeCounters.incrementSuccess();
    if (result.segments.length === 0) {
      analyzeCounters.incrementEmptyResult();
    }
    logger.logResult(requestId, result, totalMs);

    return { requestId, result, csvIssues, totalMs };
  }

  /**
   * Ranked segment records; an empty array means "no results"
   */
  router.post('/analyze', upload.single('file'), (req: Request, res: Response) => {
    const outcome = executeAnalyze(req, res);
    if (!outcome) {
      return;
    }
    res.status(200).json(outcome.result.segments.map(toAnalysisRecord));
  });

  /**
   * Ranked records plus config echo, headline and diagnostics
   */
  router.post('/analyze/report', upload.single('file'), (req: Request, res: Response) => {
    const outcome = executeAnalyze(req, res);
    if (!outcome) {
      return;
    }

    const { result } = outcome;
    const warnings = result.warnings.slice(0, serverConfig.maxReportedWarnings);
    const response: AnalysisReportResponse = {
      request_id: outcome.requestId,
      config: serializeAnalysisConfig(result.config),
      headline: buildHeadline(result.segments),
      segments: result.segments.map(toAnalysisRecord),
      diagnostics: {
        ...result.diagnostics,
        csv_issues: outcome.csvIssues,
        warnings_reported: warnings.length,
        warnings
      },
      metadata: {
        total_latency_ms: outcome.totalMs
      }
    };
    res.status(200).json(response);
  });

  return router;
}
