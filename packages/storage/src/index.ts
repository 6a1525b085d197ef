/**
 * Storage client for S3-compatible object storage used by archival-tier tests
 * Supports AWS S3, minio and Cloudflare R2 via custom endpoint
 */

export * from './client.js';
export * from './backend.js';
export * from './config.js';
export * from './errors.js';
export * from './polling.js';
export * from './retry.js';
export * from './topics.js';
export * from './types.js';
