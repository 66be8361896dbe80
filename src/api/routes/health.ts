import { Router, Request, Response } from 'express';
import { AnalysisLogger } from '../../analysis/analysis-logger';
import { analyzeCounters } from '../analyze-errors';

const startedAt = Date.now();

export function createHealthRoutes(logger: AnalysisLogger): Router {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    return res.status(200).json({
      status: 'healthy',
      uptime_s: Math.round((Date.now() - startedAt) / 1000),
      timestamp: new Date().toISOString()
    });
  });

  // Liveness
  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).send('OK');
  });

  router.get('/health/analysis', (_req: Request, res: Response) => {
    return res.status(200).json({
      requests: analyzeCounters.getStats(),
      recent_runs: logger.getStats(),
      last_runs: logger.getRecentLogs(10)
    });
  });

  return router;
}
