/**
 * Read-after-write consistency waits built on head-object probes
 */

import { S3ServiceException } from '@aws-sdk/client-s3';
import type { Logger } from 'pino';
import { WaitTimeoutError, describeError, errorKind } from './errors.js';
import { sleep } from './retry.js';
import type { ObjectHead } from './types.js';

export const DEFAULT_POLL_INTERVAL_MS = 5000;

export interface PollContext {
  /** Head-object probe, already wrapped in retry */
  head: (bucket: string, key: string) => Promise<ObjectHead>;
  logger: Logger;
  pollIntervalMs: number;
}

/**
 * Poll until head-object reports the key missing
 */
export async function waitForKeyAbsent(ctx: PollContext, bucket: string, key: string, timeoutMs: number): Promise<void> {
  const deadline = Date.now() + timeoutMs;

  for (;;) {
    try {
      await ctx.head(bucket, key);
    } catch (error) {
      if (errorKind(error) !== 'not_found') {
        throw error;
      }
      ctx.logger.debug({ event: 'storage.wait.done', bucket, key, condition: 'absent' }, `Object ${key} is gone`);
      return;
    }

    if (Date.now() > deadline) {
      throw new WaitTimeoutError(bucket, key, 'absent', timeoutMs);
    }
    await sleep(ctx.pollIntervalMs);
  }
}

/**
 * Poll until head-object succeeds. Any error the service answers with
 * (not-found, a 403 before the key is listable, an exhausted throttle) counts
 * as not visible yet; client-side failures propagate.
 */
export async function waitForKeyPresent(ctx: PollContext, bucket: string, key: string, timeoutMs: number): Promise<void> {
  const deadline = Date.now() + timeoutMs;

  for (;;) {
    try {
      const head = await ctx.head(bucket, key);
      ctx.logger.debug(
        { event: 'storage.wait.done', bucket, key, condition: 'present', etag: head.etag },
        `Object ${key} is available`
      );
      return;
    } catch (error) {
      if (!(error instanceof S3ServiceException) && errorKind(error) !== 'throttled') {
        throw error;
      }
      ctx.logger.debug(
        { event: 'storage.wait.probe', bucket, key, error: describeError(error) },
        `Object ${key} not visible yet`
      );
    }

    if (Date.now() > deadline) {
      throw new WaitTimeoutError(bucket, key, 'present', timeoutMs);
    }
    await sleep(ctx.pollIntervalMs);
  }
}
