/**
 * Storage configuration from environment variables
 */

import { z } from 'zod';
import { readEnv, readEnvFlag, readEnvNumber } from '@archive-probe/config';
import { DEFAULT_RETRY_POLICY, createRetryPolicy } from './retry.js';
import type { RetryPolicy, StorageClientConfig } from './types.js';

export const StorageClientConfigSchema = z
  .object({
    provider: z.enum(['s3', 'minio', 'r2']),
    region: z.string().min(1),
    endpoint: z.string().min(1).optional(),
    accessKeyId: z.string().min(1).optional(),
    secretAccessKey: z.string().min(1).optional(),
    disableTls: z.boolean(),
  })
  .refine((config) => config.provider === 's3' || config.endpoint !== undefined, {
    message: 'STORAGE_ENDPOINT is required for minio and r2',
    path: ['endpoint'],
  })
  .refine((config) => (config.accessKeyId === undefined) === (config.secretAccessKey === undefined), {
    message: 'STORAGE_ACCESS_KEY_ID and STORAGE_SECRET_ACCESS_KEY must be set together',
    path: ['accessKeyId'],
  });

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Read and validate the backend connection settings
 */
export function storageConfigFromEnv(): StorageClientConfig {
  const parsed = StorageClientConfigSchema.safeParse({
    provider: (readEnv('STORAGE_PROVIDER') ?? 's3').toLowerCase(),
    region: readEnv('STORAGE_REGION'),
    endpoint: readEnv('STORAGE_ENDPOINT'),
    accessKeyId: readEnv('STORAGE_ACCESS_KEY_ID'),
    secretAccessKey: readEnv('STORAGE_SECRET_ACCESS_KEY'),
    disableTls: readEnvFlag('STORAGE_DISABLE_TLS', true),
  });

  if (!parsed.success) {
    throw new Error(`Invalid storage configuration: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Read the retry policy, falling back to the defaults per field
 */
export function retryPolicyFromEnv(): RetryPolicy {
  return createRetryPolicy({
    maxAttempts: readEnvNumber('STORAGE_RETRY_MAX_ATTEMPTS', DEFAULT_RETRY_POLICY.maxAttempts),
    initialDelayMs: readEnvNumber('STORAGE_RETRY_INITIAL_DELAY_MS', DEFAULT_RETRY_POLICY.initialDelayMs),
    backoffMultiplier: readEnvNumber('STORAGE_RETRY_BACKOFF_MULTIPLIER', DEFAULT_RETRY_POLICY.backoffMultiplier),
  });
}
