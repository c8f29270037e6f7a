import type { HttpBackendConfig, HttpUploadBackend } from './httpUploadBackend';
import { NftStorageBackend } from './nftStorageBackend';
import { PinataBackend } from './pinataBackend';
import type { FetchLike, StorageBackendName } from './types';
import { Web3StorageBackend } from './web3StorageBackend';

export type BackendSpec = {
  name: StorageBackendName;
  url: string;
  token: string | null;
};

export function createBackend(name: StorageBackendName, config: HttpBackendConfig): HttpUploadBackend {
  switch (name) {
    case 'web3.storage':
      return new Web3StorageBackend(config);
    case 'nft.storage':
      return new NftStorageBackend(config);
    case 'pinata':
      return new PinataBackend(config);
  }
}

/** Keeps the given order; disabled backends are built too so status can report them. */
export function createBackends(specs: readonly BackendSpec[], fetch?: FetchLike): HttpUploadBackend[] {
  return specs.map((spec) =>
    createBackend(spec.name, { baseUrl: spec.url, token: spec.token, ...(fetch ? { fetch } : {}) }),
  );
}
