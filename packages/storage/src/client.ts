/**
 * Storage client for archival-tier test suites.
 *
 * Every single backend call is retried on throttling; composite operations
 * (move, empty) are sequences of independently retried calls and may stop
 * part-way. Mutations can optionally wait for read-after-write consistency.
 */

import { createWriteStream } from 'fs';
import { pipeline } from 'stream/promises';
import { buffer } from 'stream/consumers';
import { pino } from 'pino';
import { loadEnv } from '@archive-probe/config';
import { createS3Backend, extractEndpointHost, locationConstraintFor, normalizeEndpoint } from './backend.js';
import { retryPolicyFromEnv, storageConfigFromEnv } from './config.js';
import { StorageError, ThrottledError, describeError, errorKind } from './errors.js';
import { DEFAULT_POLL_INTERVAL_MS, waitForKeyAbsent, waitForKeyPresent, type PollContext } from './polling.js';
import { createRetryPolicy, withRetry } from './retry.js';
import { archivalKeyToTopic } from './topics.js';
import type {
  ListObjectsPage,
  ObjectMetadata,
  StorageClient,
  StorageClientConfig,
  StorageClientOptions,
} from './types.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

/** Per-request key limit of DeleteObjects */
export const DELETE_BATCH_LIMIT = 1000;
export const LIST_PAGE_SIZE = 100;
export const DOWNLOAD_CHUNK_SIZE = 0x1000;
export const DEFAULT_VALIDATION_TIMEOUT_MS = 30_000;
export const DEFAULT_DELETE_VERIFY_TIMEOUT_MS = 10_000;

/**
 * Strip the double quotes S3 puts around ETag values
 */
export function unquoteEtag(etag: string): string {
  return etag.replace(/^"(.*)"$/, '$1');
}

/**
 * Re-slice a byte stream into fixed-size chunks; only the last may be shorter
 */
export function inChunks(size: number) {
  return async function* (source: AsyncIterable<Buffer | string>): AsyncGenerator<Buffer> {
    let pending: Buffer = Buffer.alloc(0);
    for await (const piece of source) {
      pending = Buffer.concat([pending, typeof piece === 'string' ? Buffer.from(piece) : piece]);
      while (pending.length >= size) {
        yield pending.subarray(0, size);
        pending = pending.subarray(size);
      }
    }
    if (pending.length > 0) {
      yield pending;
    }
  };
}

/**
 * Create a storage client over any backend
 */
export function createStorageClient(options: StorageClientOptions): StorageClient {
  const {
    backend,
    keyToTopic = archivalKeyToTopic,
    pollIntervalMs = DEFAULT_POLL_INTERVAL_MS,
  } = options;
  const log = options.logger ?? logger;
  const policy = createRetryPolicy(options.retry);

  /**
   * One backend call: throttles become ThrottledError and are retried,
   * anything else propagates untouched
   */
  function call<T>(operation: string, target: Record<string, string>, fn: () => Promise<T>): Promise<T> {
    return withRetry(
      async () => {
        try {
          return await fn();
        } catch (error) {
          log.debug(
            { event: 'storage.object.error', operation, ...target, error: describeError(error) },
            `Error response from ${operation}`
          );
          if (errorKind(error) === 'throttled' && !(error instanceof ThrottledError)) {
            throw new ThrottledError(operation, error);
          }
          throw error;
        }
      },
      policy,
      {
        onRetry: ({ attempt, delayMs }) => {
          log.warn(
            { event: 'storage.retry', operation, ...target, attempt, delayMs },
            `${operation} throttled, retrying in ${delayMs}ms`
          );
        },
      }
    );
  }

  const poll: PollContext = {
    head: (bucket, key) => call('headObject', { bucket, key }, () => backend.headObject(bucket, key)),
    logger: log,
    pollIntervalMs,
  };

  async function listBuckets() {
    try {
      return await backend.listBuckets();
    } catch (error) {
      log.error({ event: 'storage.list.buckets_failed', error: describeError(error) }, 'Error listing buckets');
      throw error;
    }
  }

  async function logAllBuckets(): Promise<void> {
    try {
      for (const bucket of await listBuckets()) {
        log.error(
          { event: 'storage.list.bucket', bucket: bucket.name, creationDate: bucket.creationDate?.toISOString() },
          `Listed bucket ${bucket.name}`
        );
      }
    } catch (error) {
      log.debug({ event: 'storage.list.diagnostic_failed', error: describeError(error) }, 'Bucket diagnostics unavailable');
    }
  }

  async function* listObjects(bucket: string, topic?: string): AsyncGenerator<ObjectMetadata> {
    let continuationToken: string | undefined;
    let truncated = true;

    while (truncated) {
      let page: ListObjectsPage;
      try {
        page = await call('listObjects', { bucket }, () =>
          backend.listObjects({ bucket, maxKeys: LIST_PAGE_SIZE, continuationToken })
        );
      } catch (error) {
        log.error(
          { event: 'storage.list.failed', bucket, error: describeError(error) },
          `Error in listObjects '${bucket}', listing all buckets`
        );
        await logAllBuckets();
        throw error;
      }

      continuationToken = page.nextContinuationToken;
      truncated = page.isTruncated;
      if (truncated && continuationToken === undefined) {
        throw new StorageError('backend', `Truncated listing of ${bucket} carried no continuation token`);
      }

      for (const item of page.contents) {
        if (topic !== undefined && keyToTopic(item.key) !== topic) {
          log.debug({ event: 'storage.list.skip', bucket, key: item.key, topic }, `Skip ${item.key} for ${topic}`);
          continue;
        }
        yield { bucket, key: item.key, etag: unquoteEtag(item.etag), contentLength: item.size };
      }
    }
  }

  async function logLeftovers(name: string): Promise<void> {
    log.warn({ event: 'storage.bucket.leftover', bucket: name }, `Contents of bucket ${name}:`);
    try {
      for await (const object of listObjects(name)) {
        log.warn({ event: 'storage.bucket.leftover', bucket: name, key: object.key }, `  ${object.key}`);
      }
    } catch (error) {
      log.debug(
        { event: 'storage.bucket.leftover_failed', bucket: name, error: describeError(error) },
        `Could not enumerate ${name}`
      );
    }
  }

  const deleteObject: StorageClient['deleteObject'] = async (bucket, key, { verify = false, timeoutMs } = {}) => {
    await call('deleteObject', { bucket, key }, () => backend.deleteObject(bucket, key));
    if (verify) {
      await waitForKeyAbsent(poll, bucket, key, timeoutMs ?? DEFAULT_DELETE_VERIFY_TIMEOUT_MS);
    }
  };

  const copySingleObject = (bucket: string, src: string, dst: string) =>
    call('copyObject', { bucket, key: src, destination: dst }, () => backend.copyObject(bucket, src, dst));

  const getObject = (bucket: string, key: string) =>
    call('getObject', { bucket, key }, () => backend.getObject(bucket, key));

  return {
    async createBucket(name) {
      try {
        await backend.createBucket(name);
      } catch (error) {
        if (errorKind(error) !== 'already_owned') {
          throw error;
        }
        log.debug({ event: 'storage.bucket.already_owned', bucket: name }, `Bucket ${name} already owned`);
      }

      // Surface creation-visibility races right away
      try {
        await backend.listObjects({ bucket: name, maxKeys: DELETE_BATCH_LIMIT });
      } catch (error) {
        log.error(
          { event: 'storage.bucket.list_after_create_failed', bucket: name, error: describeError(error) },
          `Listing ${name} failed immediately after creation succeeded`
        );
        throw error;
      }
      log.info({ event: 'storage.bucket.created', bucket: name }, `Listing ${name} succeeded immediately after creation`);
    },

    async deleteBucket(name) {
      log.info({ event: 'storage.bucket.delete', bucket: name }, `Deleting bucket ${name}...`);
      try {
        await backend.deleteBucket(name);
      } catch (error) {
        log.warn(
          { event: 'storage.bucket.delete_failed', bucket: name, error: describeError(error) },
          `Error deleting bucket ${name}`
        );
        await logLeftovers(name);
        throw error;
      }
    },

    async emptyBucket(name) {
      const keys: string[] = [];
      try {
        log.debug({ event: 'storage.bucket.empty', bucket: name }, `Running bucket cleanup on ${name}`);
        for await (const object of listObjects(name)) {
          keys.push(object.key);
        }
      } catch (error) {
        // Expected when the bucket does not exist
        log.debug(
          { event: 'storage.bucket.empty_enumeration_failed', bucket: name, error: describeError(error) },
          `emptyBucket enumeration failed on ${name}`
        );
      }

      const failedKeys: string[] = [];
      for (let offset = 0; offset < keys.length; offset += DELETE_BATCH_LIMIT) {
        const batch = keys.slice(offset, offset + DELETE_BATCH_LIMIT);
        const range = `${batch[0]}..${batch[batch.length - 1]}`;
        try {
          const reply = await backend.deleteObjects(name, batch);
          log.debug(
            { event: 'storage.bucket.batch_delete', bucket: name, range, deleted: reply.deleted.length, errors: reply.errors.length },
            `Deleted keys ${range}`
          );
          for (const failure of reply.errors) {
            log.warn(
              { event: 'storage.bucket.batch_delete_failed', bucket: name, key: failure.key, code: failure.code },
              `Could not delete ${failure.key}: ${failure.message}`
            );
            failedKeys.push(failure.key);
          }
        } catch (error) {
          log.error(
            { event: 'storage.bucket.batch_delete_failed', bucket: name, range, error: describeError(error) },
            `Delete request failed for keys ${range}`
          );
          failedKeys.push(...batch);
        }
      }
      return failedKeys;
    },

    listBuckets,

    async getObjectData(bucket, key) {
      const object = await getObject(bucket, key);
      return buffer(object.body);
    },

    async getObjectMeta(bucket, key) {
      const head = await poll.head(bucket, key);
      return { bucket, key, etag: unquoteEtag(head.etag), contentLength: head.contentLength };
    },

    async writeObjectToFile(bucket, key, destPath) {
      const object = await getObject(bucket, key);
      await pipeline(object.body, inChunks(DOWNLOAD_CHUNK_SIZE), createWriteStream(destPath));
    },

    async putObject(bucket, key, content) {
      await call('putObject', { bucket, key }, () => backend.putObject(bucket, key, Buffer.from(content, 'utf-8')));
    },

    deleteObject,

    async copyObject(bucket, src, dst, { validate = false, timeoutMs = DEFAULT_VALIDATION_TIMEOUT_MS } = {}) {
      await copySingleObject(bucket, src, dst);
      if (validate) {
        await waitForKeyPresent(poll, bucket, dst, timeoutMs);
      }
    },

    async moveObject(bucket, src, dst, { validate = false, timeoutMs = DEFAULT_VALIDATION_TIMEOUT_MS } = {}) {
      await copySingleObject(bucket, src, dst);
      await call('deleteObject', { bucket, key: src }, () => backend.deleteObject(bucket, src));
      if (validate) {
        await waitForKeyPresent(poll, bucket, dst, timeoutMs);
        await waitForKeyAbsent(poll, bucket, src, timeoutMs);
      }
    },

    listObjects,

    waitForKeyPresent: (bucket, key, timeoutMs) => waitForKeyPresent(poll, bucket, key, timeoutMs),

    waitForKeyAbsent: (bucket, key, timeoutMs) => waitForKeyAbsent(poll, bucket, key, timeoutMs),

    destroy() {
      backend.destroy();
    },
  };
}

/**
 * Create a client talking to S3 (or minio / r2) through the AWS SDK
 */
export function createS3StorageClient(
  config: StorageClientConfig,
  options: Omit<StorageClientOptions, 'backend'> = {}
): StorageClient {
  const log = options.logger ?? logger;
  log.debug(
    {
      event: 'storage.client.created',
      provider: config.provider,
      region: config.region,
      endpointHost: config.endpoint
        ? extractEndpointHost(normalizeEndpoint(config.endpoint, config.disableTls))
        : 'aws-s3',
      credentialsSet: config.accessKeyId !== undefined,
      tls: !config.disableTls,
    },
    'Constructed storage client'
  );
  if (config.region !== 'us-east-1' && locationConstraintFor(config.region) === undefined) {
    log.warn(
      { event: 'storage.client.region_unlisted', region: config.region },
      `Region ${config.region} is not a known bucket location; new buckets use the server default region`
    );
  }
  return createStorageClient({ ...options, backend: createS3Backend(config) });
}

/**
 * Create a client from the session environment (.env, .env.local, process env)
 */
export function createStorageClientFromEnv(options: Omit<StorageClientOptions, 'backend'> = {}): StorageClient {
  loadEnv();
  return createS3StorageClient(storageConfigFromEnv(), { retry: retryPolicyFromEnv(), ...options });
}
