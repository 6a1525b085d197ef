/**
 * S3-compatible backend over @aws-sdk/client-s3
 */

import {
  S3Client,
  type S3ClientConfig,
  CreateBucketCommand,
  DeleteBucketCommand,
  ListBucketsCommand,
  ListObjectsV2Command,
  HeadObjectCommand,
  GetObjectCommand,
  PutObjectCommand,
  DeleteObjectCommand,
  DeleteObjectsCommand,
  CopyObjectCommand,
  BucketLocationConstraint,
} from '@aws-sdk/client-s3';
import { Readable } from 'stream';
import { StorageError } from './errors.js';
import type { ObjectStoreBackend, StorageClientConfig } from './types.js';

/**
 * Validate endpoint URL format
 */
export function validateEndpoint(endpoint: string): void {
  if (!endpoint || endpoint.trim().length === 0) {
    throw new Error('STORAGE_ENDPOINT is required but is empty or missing');
  }

  if (!endpoint.startsWith('http://') && !endpoint.startsWith('https://')) {
    throw new Error(
      `STORAGE_ENDPOINT must start with http:// or https://. Got: ${endpoint.substring(0, 50)}${endpoint.length > 50 ? '...' : ''}`
    );
  }

  let url: URL;
  try {
    url = new URL(endpoint);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`STORAGE_ENDPOINT is not a valid URL: ${reason}`);
  }
  if (!url.hostname) {
    throw new Error(`STORAGE_ENDPOINT has invalid hostname: ${endpoint}`);
  }
}

/**
 * Give a bare host:port endpoint the scheme matching the TLS setting
 */
export function normalizeEndpoint(endpoint: string, disableTls: boolean): string {
  const trimmed = endpoint.trim();
  if (/^[a-z]+:\/\//i.test(trimmed)) {
    return trimmed;
  }
  return `${disableTls ? 'http' : 'https'}://${trimmed}`;
}

/**
 * Extract hostname from endpoint URL for logging (safe, no secrets)
 */
export function extractEndpointHost(endpoint: string): string {
  try {
    return new URL(endpoint).hostname;
  } catch {
    return 'invalid';
  }
}

/**
 * Build the SDK client configuration
 */
export function buildS3ClientConfig(config: StorageClientConfig): S3ClientConfig {
  const clientConfig: S3ClientConfig = {
    region: config.region,
  };

  if (config.accessKeyId && config.secretAccessKey) {
    clientConfig.credentials = {
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.secretAccessKey,
    };
  }

  if (config.provider === 'minio' || config.provider === 'r2') {
    if (!config.endpoint) {
      throw new Error(`STORAGE_ENDPOINT is required for provider "${config.provider}"`);
    }
    // minio and r2 need path-style addressing
    clientConfig.forcePathStyle = true;
  }

  if (config.endpoint) {
    const endpoint = normalizeEndpoint(config.endpoint, config.disableTls);
    validateEndpoint(endpoint);
    clientConfig.endpoint = endpoint;
  }

  return clientConfig;
}

const KNOWN_LOCATIONS: ReadonlySet<string> = new Set(Object.values(BucketLocationConstraint));

function isLocationConstraint(region: string): region is BucketLocationConstraint {
  return KNOWN_LOCATIONS.has(region);
}

/**
 * Bucket configuration for CreateBucket. us-east-1 rejects an explicit
 * constraint. Regions missing from the SDK's location table (custom minio
 * regions, AWS regions newer than the installed SDK) get no constraint, so
 * the bucket lands in the server's default region.
 */
export function locationConstraintFor(region: string): { LocationConstraint: BucketLocationConstraint } | undefined {
  if (region === 'us-east-1' || !isLocationConstraint(region)) {
    return undefined;
  }
  return { LocationConstraint: region };
}

/**
 * Percent-encode each path segment of a copy source key. A raw `?` would
 * otherwise be read as the start of a versionId selector.
 */
export function encodeCopySourceKey(key: string): string {
  return key.split('/').map(encodeURIComponent).join('/');
}

/**
 * Create the production backend
 */
export function createS3Backend(config: StorageClientConfig, s3: S3Client = new S3Client(buildS3ClientConfig(config))): ObjectStoreBackend {
  const locationConstraint = locationConstraintFor(config.region);

  return {
    async createBucket(bucket) {
      await s3.send(new CreateBucketCommand({ Bucket: bucket, CreateBucketConfiguration: locationConstraint }));
    },

    async deleteBucket(bucket) {
      await s3.send(new DeleteBucketCommand({ Bucket: bucket }));
    },

    async listBuckets() {
      const response = await s3.send(new ListBucketsCommand({}));
      return (response.Buckets ?? []).map((bucket) => ({
        name: bucket.Name ?? '',
        creationDate: bucket.CreationDate,
      }));
    },

    async listObjects({ bucket, maxKeys, continuationToken }) {
      const response = await s3.send(
        new ListObjectsV2Command({ Bucket: bucket, MaxKeys: maxKeys, ContinuationToken: continuationToken })
      );
      return {
        contents: (response.Contents ?? []).map((item) => ({
          key: item.Key ?? '',
          etag: item.ETag ?? '',
          size: item.Size ?? 0,
        })),
        isTruncated: response.IsTruncated ?? false,
        nextContinuationToken: response.NextContinuationToken,
      };
    },

    async headObject(bucket, key) {
      const response = await s3.send(new HeadObjectCommand({ Bucket: bucket, Key: key }));
      return { etag: response.ETag ?? '', contentLength: response.ContentLength ?? 0 };
    },

    async getObject(bucket, key) {
      const response = await s3.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
      const body = response.Body;
      if (!(body instanceof Readable)) {
        throw new StorageError('backend', `GetObject ${bucket}/${key} returned no readable body`);
      }
      return { etag: response.ETag ?? '', contentLength: response.ContentLength ?? 0, body };
    },

    async putObject(bucket, key, body) {
      await s3.send(new PutObjectCommand({ Bucket: bucket, Key: key, Body: body }));
    },

    async deleteObject(bucket, key) {
      await s3.send(new DeleteObjectCommand({ Bucket: bucket, Key: key }));
    },

    async deleteObjects(bucket, keys) {
      const response = await s3.send(
        new DeleteObjectsCommand({ Bucket: bucket, Delete: { Objects: keys.map((key) => ({ Key: key })) } })
      );
      return {
        deleted: (response.Deleted ?? []).map((item) => item.Key ?? ''),
        errors: (response.Errors ?? []).map((item) => ({
          key: item.Key ?? '',
          code: item.Code ?? 'Unknown',
          message: item.Message ?? '',
        })),
      };
    },

    async copyObject(bucket, sourceKey, destinationKey) {
      await s3.send(
        new CopyObjectCommand({ Bucket: bucket, Key: destinationKey, CopySource: `${bucket}/${encodeCopySourceKey(sourceKey)}` })
      );
    },

    destroy() {
      s3.destroy();
    },
  };
}
