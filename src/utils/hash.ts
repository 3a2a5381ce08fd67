/**
 * Content checksum utilities
 */

import { CID } from 'multiformats/cid';
import * as raw from 'multiformats/codecs/raw';
import { sha256 } from 'multiformats/hashes/sha2';

/**
 * Compute a CIDv1 (raw codec, SHA-256) for file content.
 * Returns the base32-encoded string form.
 */
export async function computeChecksum(data: Uint8Array): Promise<string> {
  const hash = await sha256.digest(data);
  const cid = CID.create(1, raw.code, hash);
  return cid.toString();
}
