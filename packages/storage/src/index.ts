export * from './types';
export { StorageBackendError, mapUnknownError, type StorageBackendErrorCode } from './errors';
export { LOCAL_ID_PREFIX, isLocalContentId, isValidContentId, localContentId } from './contentId';
export { LocalContentCache } from './localCache';
export { HttpUploadBackend, type HttpBackendConfig } from './httpUploadBackend';
export { Web3StorageBackend } from './web3StorageBackend';
export { NftStorageBackend } from './nftStorageBackend';
export { PinataBackend } from './pinataBackend';
export { createBackend, createBackends, type BackendSpec } from './registry';
export { ContentUploader, DEFAULT_GATEWAYS, type ContentUploaderOptions, type StorageStatus } from './contentUploader';
