/**
 * SERVER CONFIG TESTS
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { getServerConfig, getServerConfigFromEnv, resetServerConfig } from '../../src/config/server';

describe('Server Config', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetServerConfig();
  });

  it('should read limits from the environment', () => {
    vi.stubEnv('PORT', '8081');
    vi.stubEnv('MAX_UPLOAD_BYTES', '1024');
    vi.stubEnv('CORS_ALLOWED_ORIGINS', 'https://laps.example.test, ,http://localhost:4000');

    const config = getServerConfigFromEnv();

    expect(config.port).toBe(8081);
    expect(config.maxUploadBytes).toBe(1024);
    expect(config.corsAllowedOrigins).toEqual(['https://laps.example.test', 'http://localhost:4000']);
  });

  it('should fall back to defaults for unparseable values', () => {
    vi.stubEnv('REQUEST_TIMEOUT_MS', 'soon');
    vi.stubEnv('RATE_LIMIT_MAX', '');

    const config = getServerConfigFromEnv();

    expect(config.requestTimeoutMs).toBe(15000);
    expect(config.rateLimitMax).toBe(60);
  });

  it('should cache the config until reset', () => {
    vi.stubEnv('PORT', '7000');
    const first = getServerConfig();
    vi.stubEnv('PORT', '7001');

    expect(getServerConfig()).toBe(first);
    resetServerConfig();
    expect(getServerConfig().port).toBe(7001);
  });
});
