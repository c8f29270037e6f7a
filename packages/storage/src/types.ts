export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type StorageBackendName = 'web3.storage' | 'nft.storage' | 'pinata';

export type UploadInput = {
  bytes: Uint8Array;
  name: string;
  /** hex SHA-256 of `bytes` */
  contentHash: string;
  metadata?: Record<string, string> | undefined;
};

export type BackendUploadResult = {
  contentId: string;
};

/**
 * One credentialed upload strategy. A backend without its credential reports
 * isEnabled() === false and is skipped by the uploader.
 */
export interface StorageBackend {
  readonly name: string;
  isEnabled(): boolean;
  upload(input: UploadInput, signal: AbortSignal): Promise<BackendUploadResult>;
}

export type UploadAttempt = {
  backend: string;
  contentHash: string;
  size: number;
  outcome: 'success' | 'failure';
  error?: string | undefined;
  durationMs: number;
};

export type ContentRecord = {
  contentId: string;
  size: number;
  /** Set only when the local fallback produced the id. */
  cachePath?: string | undefined;
};

export type UploadResult = ContentRecord & {
  /** Backend name, or 'local' for the fallback. */
  backend: string;
  attempts: UploadAttempt[];
};
