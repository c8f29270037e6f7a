export * from './types';
export { EndpointPool } from './endpointPool';
export { postJsonRpc, RpcHttpError, RpcTransportError } from './transport';
export { RpcClient, type RequestOptions, type RpcClientOptions, type RpcClientStatus } from './rpcClient';
export { readNetworkInfo, type NetworkInfo } from './networkInfo';
