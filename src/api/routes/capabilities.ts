import { Router, Request, Response } from 'express';
import { DEFAULT_ANALYSIS_CONFIG, serializeAnalysisConfig } from '../../config/analysis';
import { ServerConfig } from '../../config/server';
import { TOP_CAUSE_COPY } from '../../analysis/pipeline';
import { REQUIRED_FIELDS } from '../../types/telemetry';

export function createCapabilitiesRoutes(serverConfig: ServerConfig): Router {
  const router = Router();

  router.get('/capabilities', (_req: Request, res: Response) => {
    return res.status(200).json({
      required_columns: REQUIRED_FIELDS,
      accepted_bodies: ['multipart/form-data (file part "file")', 'text/csv', 'text/plain', 'application/json'],
      config: {
        defaults: serializeAnalysisConfig(DEFAULT_ANALYSIS_CONFIG),
        aliases: { segments: 'n_segments' },
        ranges: {
          n_segments: 'integer >= 1',
          max_dt: 'number > 0, omit to disable dropout filtering',
          brake_threshold: '[0, 1]',
          throttle_threshold: '[0, 1]'
        }
      },
      top_causes: TOP_CAUSE_COPY,
      limits: {
        max_upload_bytes: serverConfig.maxUploadBytes,
        request_timeout_ms: serverConfig.requestTimeoutMs,
        rate_limit: {
          max: serverConfig.rateLimitMax,
          window_ms: serverConfig.rateLimitWindowMs
        }
      }
    });
  });

  return router;
}
