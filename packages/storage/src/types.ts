/**
 * Types for storage operations
 */

import type { Readable } from 'stream';
import type { Logger } from 'pino';

export type StorageProvider = 's3' | 'minio' | 'r2';

export interface StorageClientConfig {
  provider: StorageProvider;
  region: string;
  endpoint?: string; // Required for minio/r2, empty for AWS S3
  accessKeyId?: string;
  secretAccessKey?: string;
  disableTls: boolean;
}

export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly initialDelayMs: number;
  readonly backoffMultiplier: number;
}

export interface ObjectMetadata {
  readonly key: string;
  readonly bucket: string;
  readonly etag: string;
  readonly contentLength: number;
}

export interface BucketSummary {
  name: string;
  creationDate?: Date;
}

export interface ObjectHead {
  etag: string;
  contentLength: number;
}

export interface ObjectBody extends ObjectHead {
  body: Readable;
}

export interface ListedObject {
  key: string;
  etag: string;
  size: number;
}

export interface ListObjectsPageRequest {
  bucket: string;
  maxKeys: number;
  continuationToken?: string;
}

export interface ListObjectsPage {
  contents: ListedObject[];
  isTruncated: boolean;
  nextContinuationToken?: string;
}

export interface DeleteObjectsReply {
  deleted: string[];
  errors: Array<{ key: string; code: string; message: string }>;
}

/**
 * The calls the client makes against object storage. Implementations throw
 * the SDK's own errors; the client classifies them.
 */
export interface ObjectStoreBackend {
  createBucket(bucket: string): Promise<void>;
  deleteBucket(bucket: string): Promise<void>;
  listBuckets(): Promise<BucketSummary[]>;
  listObjects(request: ListObjectsPageRequest): Promise<ListObjectsPage>;
  headObject(bucket: string, key: string): Promise<ObjectHead>;
  getObject(bucket: string, key: string): Promise<ObjectBody>;
  putObject(bucket: string, key: string, body: Buffer): Promise<void>;
  deleteObject(bucket: string, key: string): Promise<void>;
  /** At most 1000 keys per call */
  deleteObjects(bucket: string, keys: string[]): Promise<DeleteObjectsReply>;
  copyObject(bucket: string, sourceKey: string, destinationKey: string): Promise<void>;
  destroy(): void;
}

/** Maps an object key to the topic it belongs to, if any */
export type KeyClassifier = (key: string) => string | undefined;

export interface StorageClientOptions {
  backend: ObjectStoreBackend;
  retry?: Partial<RetryPolicy>;
  logger?: Logger;
  keyToTopic?: KeyClassifier;
  /** Delay between head-object probes while waiting for consistency (default 5000) */
  pollIntervalMs?: number;
}

export interface ValidateOptions {
  validate?: boolean;
  timeoutMs?: number;
}

export interface DeleteObjectOptions {
  verify?: boolean;
  timeoutMs?: number;
}

export interface StorageClient {
  createBucket(name: string): Promise<void>;
  deleteBucket(name: string): Promise<void>;
  /** Returns the keys that could not be deleted */
  emptyBucket(name: string): Promise<string[]>;
  listBuckets(): Promise<BucketSummary[]>;
  getObjectData(bucket: string, key: string): Promise<Buffer>;
  getObjectMeta(bucket: string, key: string): Promise<ObjectMetadata>;
  writeObjectToFile(bucket: string, key: string, destPath: string): Promise<void>;
  putObject(bucket: string, key: string, content: string): Promise<void>;
  deleteObject(bucket: string, key: string, options?: DeleteObjectOptions): Promise<void>;
  copyObject(bucket: string, src: string, dst: string, options?: ValidateOptions): Promise<void>;
  moveObject(bucket: string, src: string, dst: string, options?: ValidateOptions): Promise<void>;
  listObjects(bucket: string, topic?: string): AsyncIterable<ObjectMetadata>;
  waitForKeyPresent(bucket: string, key: string, timeoutMs: number): Promise<void>;
  waitForKeyAbsent(bucket: string, key: string, timeoutMs: number): Promise<void>;
  /** Release the backend connection */
  destroy(): void;
}
