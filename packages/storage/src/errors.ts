/**
 * Error taxonomy for storage operations
 */

import { S3ServiceException } from '@aws-sdk/client-s3';

export type StorageErrorKind = 'throttled' | 'not_found' | 'already_owned' | 'timeout' | 'backend';

export class StorageError extends Error {
  readonly kind: StorageErrorKind;

  constructor(kind: StorageErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
    this.kind = kind;
  }
}

/**
 * The backend asked us to slow down
 */
export class ThrottledError extends StorageError {
  readonly operation: string;

  constructor(operation: string, cause?: unknown) {
    super('throttled', `Backend throttled ${operation}`, { cause });
    this.name = 'ThrottledError';
    this.operation = operation;
  }
}

/**
 * A consistency wait passed its deadline
 */
export class WaitTimeoutError extends StorageError {
  readonly bucket: string;
  readonly key: string;
  readonly timeoutMs: number;
  readonly condition: 'present' | 'absent';

  constructor(bucket: string, key: string, condition: 'present' | 'absent', timeoutMs: number) {
    super('timeout', `Timed out after ${timeoutMs}ms waiting for ${bucket}/${key} to be ${condition}`);
    this.name = 'WaitTimeoutError';
    this.bucket = bucket;
    this.key = key;
    this.condition = condition;
    this.timeoutMs = timeoutMs;
  }
}

const THROTTLE_CODES = new Set([
  'SlowDown',
  'Throttling',
  'ThrottlingException',
  'TooManyRequestsException',
  'RequestLimitExceeded',
]);

const NOT_FOUND_CODES = new Set(['NotFound', 'NoSuchKey', 'NoSuchBucket']);

/**
 * Classify any thrown value so callers can branch on kind
 */
export function errorKind(error: unknown): StorageErrorKind {
  if (error instanceof StorageError) {
    return error.kind;
  }
  if (error instanceof S3ServiceException) {
    if (THROTTLE_CODES.has(error.name)) return 'throttled';
    if (NOT_FOUND_CODES.has(error.name) || error.$metadata.httpStatusCode === 404) return 'not_found';
    if (error.name === 'BucketAlreadyOwnedByYou') return 'already_owned';
  }
  return 'backend';
}

export function isThrottled(error: unknown): boolean {
  return errorKind(error) === 'throttled';
}

export function isNotFound(error: unknown): boolean {
  return errorKind(error) === 'not_found';
}

/**
 * Human-readable description of a thrown value for log fields
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
