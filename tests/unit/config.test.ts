/**
 * Unit tests for the Configuration Module
 */

import { describe, test, expect } from '@jest/globals';
import { DEFAULT_MODEL, loadConfig } from '../../src/config/index.js';
import { expectFailure, expectSuccess } from '../helpers/fakes.js';

describe('Configuration Module', () => {
  test('should apply defaults to an empty environment', () => {
    const config = expectSuccess(loadConfig({}));

    expect(config).toEqual({
      ai: { model: DEFAULT_MODEL, maxTokens: 1024, timeout: 60000 },
      sources: { timeout: 10000 },
      storage: { backend: 'memory' },
      logLevel: 'info',
    });
    expect('apiKey' in config.ai).toBe(false);
  });

  test('should read AI and provider settings', () => {
    const config = expectSuccess(
      loadConfig({
        ANTHROPIC_API_KEY: 'test-secret',
        ANTHROPIC_MODEL: 'test-model',
        ANTHROPIC_MAX_TOKENS: '512',
        SOURCE_API_URL: 'https://provider.test',
        SOURCE_API_KEY: 'test-secret',
        SOURCE_TIMEOUT_MS: '2500',
        LOG_LEVEL: 'debug',
      })
    );

    expect(config.ai).toEqual({ apiKey: 'test-secret', model: 'test-model', maxTokens: 512, timeout: 60000 });
    expect(config.sources).toEqual({ apiUrl: 'https://provider.test', apiKey: 'test-secret', timeout: 2500 });
    expect(config.logLevel).toBe('debug');
  });

  test('should treat blank values as unset', () => {
    const config = expectSuccess(loadConfig({ ANTHROPIC_API_KEY: '   ', SOURCE_API_URL: '' }));

    expect('apiKey' in config.ai).toBe(false);
    expect('apiUrl' in config.sources).toBe(false);
  });

  test('should build an S3 storage config with defaults', () => {
    const config = expectSuccess(loadConfig({ STORAGE_BACKEND: 's3', S3_BUCKET: 'test-bucket' }));

    expect(config.storage).toEqual({
      backend: 's3',
      bucket: 'test-bucket',
      region: 'us-east-1',
      prefix: 'profiles',
      forcePathStyle: false,
    });
  });

  test('should pass an S3 endpoint through', () => {
    const config = expectSuccess(
      loadConfig({
        STORAGE_BACKEND: 's3',
        S3_BUCKET: 'test-bucket',
        S3_ENDPOINT: 'http://localhost:9000',
        S3_FORCE_PATH_STYLE: 'true',
      })
    );

    expect(config.storage).toEqual({
      backend: 's3',
      bucket: 'test-bucket',
      region: 'us-east-1',
      prefix: 'profiles',
      endpoint: 'http://localhost:9000',
      forcePathStyle: true,
    });
  });

  test('should require a bucket for S3 storage', () => {
    const error = expectFailure(loadConfig({ STORAGE_BACKEND: 's3' }));

    expect(error.code).toBe('INVALID_REQUEST');
    expect(error.message).toBe('Invalid configuration');
    expect(error.details).toEqual(['S3_BUCKET: S3_BUCKET is required when STORAGE_BACKEND is s3']);
  });

  test('should reject a malformed provider url', () => {
    const error = expectFailure(loadConfig({ SOURCE_API_URL: 'not a url' }));

    expect(error.code).toBe('INVALID_REQUEST');
    expect(error.details).toEqual([expect.stringMatching(/^SOURCE_API_URL: /)]);
  });

  test('should reject an unknown log level', () => {
    expect(expectFailure(loadConfig({ LOG_LEVEL: 'verbose' })).code).toBe('INVALID_REQUEST');
  });
});
