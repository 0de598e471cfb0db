import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { loadConfig } from './config.js';
import { ConfigurationError } from './errors.js';

const baseEnv = {
  DATABASE_URL: 'postgres://user:pw@host:5432/dbname',
  OPENAI_API_KEY: 'test-secret'
};

describe('loadConfig', () => {
  it('applies defaults for optional settings', () => {
    const config = loadConfig(baseEnv);

    assert.equal(config.port, 8002);
    assert.equal(config.allowedOrigins, '*');
    assert.equal(config.llmTimeoutMs, 45000);
    assert.equal(config.llmMaxAttempts, 3);
    assert.equal(config.memoryRecallLimit, 5);
    assert.equal(config.serviceName, 'Memory Chat Gateway');
    assert.equal(config.serviceVersion, '1.0.0');
  });

  it('parses numeric and list settings', () => {
    const config = loadConfig({
      ...baseEnv,
      PORT: '9100',
      ALLOWED_ORIGINS: 'http://a.test, http://b.test',
      MEMORY_RECALL_LIMIT: '0'
    });

    assert.equal(config.port, 9100);
    assert.deepEqual(config.allowedOrigins, ['http://a.test', 'http://b.test']);
    assert.equal(config.memoryRecallLimit, 0);
  });

  it('fails fast when credentials are missing', () => {
    assert.throws(
      () => loadConfig({ DATABASE_URL: 'postgres://user:pw@host/db', OPENAI_API_KEY: '   ' }),
      (error: unknown) =>
        error instanceof ConfigurationError && error.missing.length === 1 && error.missing[0] === 'OPENAI_API_KEY'
    );
    assert.throws(() => loadConfig({}), ConfigurationError);
  });
});
