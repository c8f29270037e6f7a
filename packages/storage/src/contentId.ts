import { sha256Hex } from '@pinrelay/shared';

/**
 * Prefix of ids minted by the local fallback. These are internal
 * placeholders, not CIDs: no gateway or pinning service can resolve them.
 */
export const LOCAL_ID_PREFIX = 'local-sha256-';

const LOCAL_ID = /^local-sha256-[0-9a-f]{64}$/;
// CIDv0 (Qm…) and base32/base58 CIDv1 are plain alphanumerics
const REMOTE_ID = /^[A-Za-z0-9]{16,128}$/;

/** Same bytes, same id. */
export function localContentId(bytes: Uint8Array): string {
  return `${LOCAL_ID_PREFIX}${sha256Hex(bytes)}`;
}

export function isLocalContentId(id: string): boolean {
  return LOCAL_ID.test(id);
}

/** Shape check only; also keeps ids safe to use as cache file names. */
export function isValidContentId(id: string): boolean {
  return LOCAL_ID.test(id) || REMOTE_ID.test(id);
}
