import { describe, it, expect } from 'vitest';
import { loadConfig } from '../app-config';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 8000,
      nodeEnv: 'development',
      staticDir: 'static',
      maxUploadBytes: 10 * 1024 * 1024,
      rateLimitWindowMs: 5 * 60 * 1000,
      rateLimitMax: 200,
      allowedOrigins: '*'
    });
  });

  it('reads numeric settings', () => {
    const config = loadConfig({ PORT: '3100', MAX_UPLOAD_SIZE_MB: '2', RATE_LIMIT_MAX: '50' });
    expect(config.port).toBe(3100);
    expect(config.maxUploadBytes).toBe(2 * 1024 * 1024);
    expect(config.rateLimitMax).toBe(50);
  });

  it('falls back to defaults for unusable numbers', () => {
    const config = loadConfig({ PORT: 'eighty', RATE_LIMIT_MAX: '-1', MAX_UPLOAD_SIZE_MB: '1.5' });
    expect(config.port).toBe(8000);
    expect(config.rateLimitMax).toBe(200);
    expect(config.maxUploadBytes).toBe(10 * 1024 * 1024);
  });

  it('restricts CORS origins in production', () => {
    const config = loadConfig({ NODE_ENV: 'production', ALLOWED_ORIGINS: 'https://a.example, https://b.example,' });
    expect(config.allowedOrigins).toEqual(['https://a.example', 'https://b.example']);
  });
});
