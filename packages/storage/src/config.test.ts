import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { retryPolicyFromEnv, storageConfigFromEnv } from './config.js';

const KEYS = [
  'STORAGE_PROVIDER',
  'STORAGE_REGION',
  'STORAGE_ENDPOINT',
  'STORAGE_ACCESS_KEY_ID',
  'STORAGE_SECRET_ACCESS_KEY',
  'STORAGE_DISABLE_TLS',
  'STORAGE_RETRY_MAX_ATTEMPTS',
  'STORAGE_RETRY_INITIAL_DELAY_MS',
  'STORAGE_RETRY_BACKOFF_MULTIPLIER',
];

describe('storage config from env', () => {
  let saved: Record<string, string | undefined>;

  beforeEach(() => {
    saved = {};
    for (const key of KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of KEYS) {
      if (saved[key] === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = saved[key];
      }
    }
  });

  describe('storageConfigFromEnv', () => {
    it('defaults to s3 with TLS disabled', () => {
      process.env.STORAGE_REGION = 'us-west-2';

      expect(storageConfigFromEnv()).toEqual({
        provider: 's3',
        region: 'us-west-2',
        disableTls: true,
      });
    });

    it('reads a full minio configuration', () => {
      process.env.STORAGE_PROVIDER = 'MINIO';
      process.env.STORAGE_REGION = 'panda-region';
      process.env.STORAGE_ENDPOINT = 'http://minio-s3:9000';
      process.env.STORAGE_ACCESS_KEY_ID = 'test-access-key';
      process.env.STORAGE_SECRET_ACCESS_KEY = 'test-secret';
      process.env.STORAGE_DISABLE_TLS = 'false';

      expect(storageConfigFromEnv()).toEqual({
        provider: 'minio',
        region: 'panda-region',
        endpoint: 'http://minio-s3:9000',
        accessKeyId: 'test-access-key',
        secretAccessKey: 'test-secret',
        disableTls: false,
      });
    });

    it('requires a region', () => {
      expect(() => storageConfigFromEnv()).toThrow('Invalid storage configuration: region: Required');
    });

    it('requires an endpoint for minio', () => {
      process.env.STORAGE_PROVIDER = 'minio';
      process.env.STORAGE_REGION = 'panda-region';

      expect(() => storageConfigFromEnv()).toThrow(
        'Invalid storage configuration: endpoint: STORAGE_ENDPOINT is required for minio and r2'
      );
    });

    it('requires credentials in pairs', () => {
      process.env.STORAGE_REGION = 'us-west-2';
      process.env.STORAGE_ACCESS_KEY_ID = 'test-access-key';

      expect(() => storageConfigFromEnv()).toThrow(
        'Invalid storage configuration: accessKeyId: STORAGE_ACCESS_KEY_ID and STORAGE_SECRET_ACCESS_KEY must be set together'
      );
    });

    it('rejects unknown providers', () => {
      process.env.STORAGE_PROVIDER = 'gcs';
      process.env.STORAGE_REGION = 'us-west-2';

      expect(() => storageConfigFromEnv()).toThrow(/^Invalid storage configuration: provider:/);
    });
  });

  describe('retryPolicyFromEnv', () => {
    it('uses defaults for unset fields', () => {
      process.env.STORAGE_RETRY_MAX_ATTEMPTS = '6';

      expect(retryPolicyFromEnv()).toEqual({ maxAttempts: 6, initialDelayMs: 1000, backoffMultiplier: 2 });
    });

    it('validates the values', () => {
      process.env.STORAGE_RETRY_BACKOFF_MULTIPLIER = '0.5';

      expect(() => retryPolicyFromEnv()).toThrow(/^Invalid retry policy: backoffMultiplier:/);
    });
  });
});
