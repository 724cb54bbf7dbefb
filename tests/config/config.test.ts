/**
 * Configuration Loading Unit Tests
 */

import { ConfigError, loadConfig } from '../../src/config';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      env: 'development',
      port: 5050,
      apiPrefix: '/api',
      logLevel: 'info',
      corsEnabled: true,
      rateLimit: { windowMs: 900000, max: 200 },
      adminJwtSecret: undefined,
      bannerSeedFile: 'data/banners.json',
      slowRequestMs: 5000,
    });
  });

  it('parses values from the environment', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      PORT: '8080',
      API_PREFIX: '/v1',
      LOG_LEVEL: 'debug',
      CORS_ENABLED: 'false',
      RATE_LIMIT_WINDOW_MS: '60000',
      RATE_LIMIT_MAX: '0',
      ADMIN_JWT_SECRET: 'test-secret',
      BANNER_SEED_FILE: '',
      SLOW_REQUEST_MS: '250',
    });

    expect(config).toEqual({
      env: 'production',
      port: 8080,
      apiPrefix: '/v1',
      logLevel: 'debug',
      corsEnabled: false,
      rateLimit: { windowMs: 60000, max: 0 },
      adminJwtSecret: 'test-secret',
      bannerSeedFile: '',
      slowRequestMs: 250,
    });
  });

  it('treats an empty admin secret as unset', () => {
    expect(loadConfig({ ADMIN_JWT_SECRET: '' }).adminJwtSecret).toBeUndefined();
  });

  it('accepts an empty prefix', () => {
    expect(loadConfig({ API_PREFIX: '' }).apiPrefix).toBe('');
  });

  it('rejects a non-numeric port', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(ConfigError);
  });

  it('rejects a prefix with a trailing slash', () => {
    expect(() => loadConfig({ API_PREFIX: '/api/' })).toThrow(
      'Invalid configuration: API_PREFIX: API_PREFIX must start with / and not end with /',
    );
  });

  it('rejects an unknown boolean spelling', () => {
    expect(() => loadConfig({ CORS_ENABLED: 'yes' })).toThrow(/CORS_ENABLED/);
  });
});
