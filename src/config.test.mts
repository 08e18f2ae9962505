import { describe, expect, it } from 'vitest';

import { loadConfig } from './config.mts';
import { ConfigurationError } from './errors.mts';

const credentials = {
  ROUTEROS_USERNAME: 'admin',
  ROUTEROS_PASSWORD: 'test-secret',
};

describe('loadConfig', () => {
  it('fills in defaults', () => {
    expect(loadConfig(credentials)).toEqual({
      routeros: {
        username: 'admin',
        password: 'test-secret',
        port: 8728,
        timeout: 10,
      },
      directory: { filter: '(objectClass=computer)' },
      app: {
        probeTimeoutMs: 1000,
        hostTimeoutMs: 60_000,
        concurrency: 1,
        recordDir: '.',
        logLevel: 'info',
      },
    });
  });

  it('coerces numeric settings', () => {
    const config = loadConfig({
      ...credentials,
      ROUTEROS_PORT: '8729',
      CONCURRENCY: '8',
      HOST_TIMEOUT_MS: '30000',
      LDAP_URL: 'ldap://dc01.example.com',
    });

    expect(config.routeros.port).toBe(8729);
    expect(config.app.concurrency).toBe(8);
    expect(config.app.hostTimeoutMs).toBe(30_000);
    expect(config.directory.url).toBe('ldap://dc01.example.com');
  });

  it('treats empty values as unset', () => {
    const { app } = loadConfig({
      ...credentials,
      RECORD_DIR: '',
      LOG_LEVEL: '',
    });

    expect(app).toMatchObject({
      recordDir: '.',
      logLevel: 'info',
    });
  });

  it('rejects missing credentials', () => {
    expect(() => loadConfig({ ROUTEROS_USERNAME: 'admin' })).toThrow(
      ConfigurationError,
    );
  });

  it('rejects a zero worker pool', () => {
    expect(() => loadConfig({ ...credentials, CONCURRENCY: '0' })).toThrow(
      /^Invalid environment configuration: app\.concurrency: /,
    );
  });
});
