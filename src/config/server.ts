/**
 * Server Configuration
 * centralized config for the HTTP layer, read from the environment
 */

export interface ServerConfig {
  port: number;

  // request limits
  requestTimeoutMs: number;
  maxUploadBytes: number;

  // rate limiting
  rateLimitMax: number;
  rateLimitWindowMs: number;

  // how many row warnings a report carries
  maxReportedWarnings: number;

  // extra CORS origins (comma-separated in CORS_ALLOWED_ORIGINS)
  corsAllowedOrigins: string[];
}

function parseIntEnv(key: string, defaultValue: number): number {
  const val = process.env[key];
  if (!val) {
    return defaultValue;
  }
  const parsed = parseInt(val, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function parseListEnv(key: string): string[] {
  const val = process.env[key];
  if (!val) {
    return [];
  }
  return val.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

export function getServerConfigFromEnv(): ServerConfig {
  return {
    port: parseIntEnv('PORT', 5001),

    requestTimeoutMs: parseIntEnv('REQUEST_TIMEOUT_MS', 15000),
    // generated sessions run to tens of MB
    maxUploadBytes: parseIntEnv('MAX_UPLOAD_BYTES', 50 * 1024 * 1024),

    rateLimitMax: parseIntEnv('RATE_LIMIT_MAX', 60),
    rateLimitWindowMs: parseIntEnv('RATE_LIMIT_WINDOW_MS', 15 * 60 * 1000),

    maxReportedWarnings: parseIntEnv('MAX_REPORTED_WARNINGS', 20),

    corsAllowedOrigins: parseListEnv('CORS_ALLOWED_ORIGINS'),
  };
}

// singleton config instance
let configInstance: ServerConfig | null = null;

export function getServerConfig(): ServerConfig {
  if (!configInstance) {
    configInstance = getServerConfigFromEnv();
  }
  return configInstance;
}

export function resetServerConfig(): void {
  configInstance = null;
}
