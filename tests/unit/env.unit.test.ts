import { loadConfig } from '@/config/env';

describe('loadConfig', () => {
  it('applies defaults for optional keys', () => {
    const config = loadConfig({ NODE_ENV: 'test', JWT_SECRET: 'test-secret' });

    expect(config).toEqual({
      nodeEnv: 'test',
      port: 3000,
      storageDriver: 'mongo',
      mongoUri: 'mongodb://127.0.0.1:27017/wifi-attendance',
      jwtSecret: 'test-secret',
      routerApiKey: null,
      lookupTimeoutMs: 2000,
      attachmentMaxAgeMs: 300000,
    });
  });

  it('coerces numeric keys from strings', () => {
    const config = loadConfig({ NODE_ENV: 'test', PORT: '8080', ATTACHMENT_MAX_AGE_SECONDS: '0', STORAGE_DRIVER: 'memory' });

    expect(config).toMatchObject({ port: 8080, attachmentMaxAgeMs: 0, storageDriver: 'memory' });
  });

  it('rejects invalid values with the offending keys', () => {
    expect(() => loadConfig({ NODE_ENV: 'test', STORAGE_DRIVER: 'postgres', LOOKUP_TIMEOUT_MS: '-5' })).toThrow(
      /STORAGE_DRIVER[\s\S]*LOOKUP_TIMEOUT_MS/
    );
  });

  it('requires a JWT secret in production', () => {
    expect(() => loadConfig({ NODE_ENV: 'production' })).toThrow('JWT_SECRET: required in production');
  });
});
