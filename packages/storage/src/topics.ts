/**
 * Default key-to-topic classifier for archival object layouts.
 *
 *   segments:  <hash>/<namespace>/<topic>/<partition>_<revision>/<segment>
 *   manifests: <hash>/meta/<namespace>/<topic>/<manifest...>
 */

import type { KeyClassifier } from './types.js';

const MANIFEST_KEY = /^[0-9a-f]+\/meta\/[^/]+\/([^/]+)\/.+$/;
const SEGMENT_KEY = /^[0-9a-f]+\/[^/]+\/([^/]+)\/\d+_\d+\/.+$/;

export const archivalKeyToTopic: KeyClassifier = (key) => {
  const match = MANIFEST_KEY.exec(key) ?? SEGMENT_KEY.exec(key);
  return match?.[1];
};
