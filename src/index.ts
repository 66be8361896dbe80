import 'dotenv/config';
import { AnalysisLogger } from './analysis/analysis-logger';
import { createApp } from './app';
import { ENDPOINTS } from './api/routes';
import { logError } from './api/middleware/production-safety';
import { DEFAULT_ANALYSIS_CONFIG } from './config/analysis';
import { getServerConfig } from './config/server';

/**
 * Lap Time Bottleneck Finder API - Entry Point
 *
 * Features:
 * - CSV or JSON telemetry upload, analyzed in memory per request
 * - Prometheus-compatible metrics
 * - Rate limiting and request timeout
 * - Graceful shutdown
 */
function main() {
  const serverConfig = getServerConfig();
  const logger = new AnalysisLogger();
  const app = createApp({ serverConfig, logger });

  console.log('Analysis defaults:');
  console.log(`  Segments: ${DEFAULT_ANALYSIS_CONFIG.nSegments}`);
  console.log(`  Brake threshold: ${DEFAULT_ANALYSIS_CONFIG.brakeThreshold}`);
  console.log(`  Throttle threshold: ${DEFAULT_ANALYSIS_CONFIG.throttleThreshold}`);
  console.log(`  Max upload: ${Math.round(serverConfig.maxUploadBytes / (1024 * 1024))}MB`);

  const server = app.listen(serverConfig.port, () => {
    console.log(`\nLap Time Bottleneck Finder API listening on port ${serverConfig.port}`);
    console.log(`\nEndpoints:`);
    for (const [route, description] of Object.entries(ENDPOINTS)) {
      console.log(`  ${route.padEnd(22)} - ${description}`);
    }
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`\n${signal} received, shutting down gracefully...`);
    server.close((err) => {
      if (err) {
        logError(err, { context: 'shutdown' });
        process.exit(1);
      }
      console.log('Shutdown complete');
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    logError(reason, { context: 'unhandled_rejection' });
  });
}

try {
  main();
} catch (err) {
  logError(err, { context: 'startup' });
  process.exit(1);
}
