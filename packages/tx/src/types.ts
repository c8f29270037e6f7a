import type { Address, Hex } from 'viem';

/** One contract write, already ABI-encoded. */
export type ContractCall = {
  to: Address;
  data: Hex;
  value?: bigint | undefined;
  /** For the audit trail only. */
  functionName: string;
  parameters?: Record<string, string> | undefined;
};

export type TransactionResult = {
  hash: Hex;
  blockNumber: bigint;
  gasUsed: bigint;
  /** 1 = success, 0 = reverted on-chain. */
  status: 0 | 1;
  nonce: number;
  gas: bigint;
  gasPrice: bigint;
  from: Address;
  explorerUrl: string | null;
};
