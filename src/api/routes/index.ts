import { Router, Request, Response } from 'express';
import { AnalysisLogger } from '../../analysis/analysis-logger';
import { ServerConfig } from '../../config/server';
import { createAnalyzeRoutes } from './analyze';
import { createCapabilitiesRoutes } from './capabilities';
import { createHealthRoutes } from './health';

export const ENDPOINTS: Record<string, string> = {
  'POST /analyze': 'Ranked segment time-loss records for uploaded telemetry',
  'POST /analyze/report': 'Ranked records with headline, config echo and diagnostics',
  'GET /health': 'Health check',
  'GET /health/analysis': 'Recent analysis outcomes',
  'GET /live': 'Liveness check',
  'GET /capabilities': 'Accepted input, defaults and limits',
  'GET /metrics': 'Prometheus metrics',
  'GET /metrics/json': 'JSON metrics',
  'GET /': 'API information'
};

export function createRoutes(logger: AnalysisLogger, serverConfig: ServerConfig): Router {
  const router = Router();

  router.use('/', createHealthRoutes(logger));
  router.use('/', createCapabilitiesRoutes(serverConfig));
  router.use('/', createAnalyzeRoutes(logger, serverConfig));

  router.get('/', (_req: Request, res: Response) => {
    return res.status(200).json({
      name: 'Lap Time Bottleneck Finder API',
      description: 'Ranks track segments by time lost against the best lap, with braking and corner-exit breakdowns',
      version: '1.0.0',
      endpoints: ENDPOINTS
    });
  });

  return router;
}
