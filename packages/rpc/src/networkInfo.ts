import { formatEther } from 'viem';

import { describeError, getLogger, type AppLogger } from '@pinrelay/shared';

import type { RpcClient, RpcClientStatus } from './rpcClient';

export type NetworkInfo = {
  chainId: number | null;
  blockNumber: string | null;
  address: string | null;
  balanceWei: string | null;
  balanceEther: string | null;
  rpc: RpcClientStatus;
  errors: string[];
};

/**
 * Display-only snapshot of the connected network. Each field degrades to null
 * on its own; the call never rejects.
 */
export async function readNetworkInfo(
  client: RpcClient,
  address?: string | null,
  logger?: AppLogger,
): Promise<NetworkInfo> {
  const log = logger ?? getLogger();

  const [chainId, blockNumber, balance] = await Promise.allSettled([
    client.chainId(),
    client.blockNumber(),
    address ? client.getBalance(address) : Promise.resolve(null),
  ]);

  const errors: string[] = [];
  for (const [field, result] of [
    ['chainId', chainId],
    ['blockNumber', blockNumber],
    ['balance', balance],
  ] as const) {
    if (result.status === 'rejected') {
      errors.push(`${field}: ${describeError(result.reason)}`);
    }
  }
  if (errors.length > 0) {
    log.debug({ event: 'network_info_partial', errors }, 'Network info incomplete');
  }

  const balanceWei = balance.status === 'fulfilled' ? balance.value : null;

  return {
    chainId: chainId.status === 'fulfilled' ? chainId.value : null,
    blockNumber: blockNumber.status === 'fulfilled' ? blockNumber.value.toString() : null,
    address: address ?? null,
    balanceWei: balanceWei === null ? null : balanceWei.toString(),
    balanceEther: balanceWei === null ? null : formatEther(balanceWei),
    rpc: client.getStatus(),
    errors,
  };
}
