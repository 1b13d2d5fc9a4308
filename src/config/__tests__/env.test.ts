import { describe, expect, it } from 'vitest';
import { ConfigError, loadConfig } from '../env.js';

const MEMORY = { STORE_DRIVER: 'memory' };

function issuesOf(env: Record<string, string>): string[] {
  try {
    loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) return err.issues;
    throw err;
  }
  return [];
}

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const cfg = loadConfig(MEMORY);

    expect(cfg.port).toBe(8000);
    expect(cfg.store).toEqual({ driver: 'memory' });
    expect(cfg.tables).toEqual({ observations: 'observation_data', predictions: 'model_predictions' });
    expect(cfg.pipeline).toEqual({ modelLookbackHours: 72, maxRetrievalHours: 72, bufferHours: 1 });
    expect(cfg.requests).toEqual({ defaultHours: 72, maxHours: 168 });
    expect(cfg.feed).toEqual({
      baseUrl: 'https://services.swpc.noaa.gov/json/goes/primary',
      energyChannel: '0.1-0.8nm',
      timeoutMs: 10_000,
    });
    expect(cfg.model.artifactPath).toBeNull();
    expect(cfg.schedulerAuth).toEqual({ mode: 'allow' });
  });

  it('should coerce numeric variables', () => {
    const cfg = loadConfig({ ...MEMORY, PORT: '9090', ML_LOOKBACK_HOURS: '24', BUFFER_HOURS: '0' });

    expect(cfg.port).toBe(9090);
    expect(cfg.pipeline.modelLookbackHours).toBe(24);
    expect(cfg.pipeline.bufferHours).toBe(0);
  });

  it('should require MONGO_URL for the mongo driver', () => {
    expect(issuesOf({})).toEqual(['MONGO_URL: required when STORE_DRIVER=mongo']);
    expect(loadConfig({ MONGO_URL: 'mongodb://localhost:27017' }).store).toEqual({
      driver: 'mongo',
      url: 'mongodb://localhost:27017',
      dbName: 'flare_forecast',
    });
  });

  it('should treat a blank MONGO_URL as missing', () => {
    expect(issuesOf({ MONGO_URL: '  ' })).toEqual(['MONGO_URL: required when STORE_DRIVER=mongo']);
  });

  it('should reject a default request window larger than the maximum', () => {
    expect(issuesOf({ ...MEMORY, DEFAULT_REQUEST_HOURS: '200', MAX_REQUEST_HOURS: '100' })).toEqual([
      'DEFAULT_REQUEST_HOURS: must not exceed MAX_REQUEST_HOURS',
    ]);
  });

  it('should require a secret in secret mode', () => {
    expect(issuesOf({ ...MEMORY, SCHEDULER_AUTH_MODE: 'secret' })).toEqual([
      'SCHEDULER_SECRET: required when SCHEDULER_AUTH_MODE=secret',
    ]);
    expect(loadConfig({ ...MEMORY, SCHEDULER_AUTH_MODE: 'secret', SCHEDULER_SECRET: 'test-secret' }).schedulerAuth).toEqual({
      mode: 'secret',
      secret: 'test-secret',
    });
  });

  it('should require issuer and audience in oidc mode', () => {
    expect(issuesOf({ ...MEMORY, SCHEDULER_AUTH_MODE: 'oidc' })).toEqual([
      'SCHEDULER_OIDC_ISSUER: required when SCHEDULER_AUTH_MODE=oidc',
      'SCHEDULER_OIDC_AUDIENCE: required when SCHEDULER_AUTH_MODE=oidc',
    ]);
  });

  it('should strip trailing slashes from the feed base url', () => {
    expect(loadConfig({ ...MEMORY, GOES_FEED_BASE_URL: 'https://feed.test/json/' }).feed.baseUrl).toBe(
      'https://feed.test/json',
    );
  });

  it('should parse CORS origins', () => {
    expect(loadConfig({ ...MEMORY, CORS_ORIGINS: '*' }).corsOrigins).toBe(true);
    expect(loadConfig({ ...MEMORY, CORS_ORIGINS: 'https://a.test, https://b.test,' }).corsOrigins).toEqual([
      'https://a.test',
      'https://b.test',
    ]);
  });

  it('should list every invalid variable', () => {
    const issues = issuesOf({ ...MEMORY, PORT: 'eighty', STORE_DRIVER: 'sqlite' });
    expect(issues).toHaveLength(2);
    expect(issues[0]).toMatch(/^PORT: /);
    expect(issues[1]).toMatch(/^STORE_DRIVER: /);
  });
});
