import { keccak256, toHex, type Address, type Hex } from 'viem';
import { privateKeyToAccount, type PrivateKeyAccount } from 'viem/accounts';

import type { AuditLog, AuditStatus } from '@pinrelay/audit';
import type { RpcClient, TransactionReceipt } from '@pinrelay/rpc';
import {
  BroadcastError,
  ConfirmationTimeoutError,
  GasEstimationError,
  RpcResponseError,
  ValidationError,
  describeError,
  getLogger,
  isPinrelayError,
  logError,
  sleep,
  type AppLogger,
  type Sleep,
} from '@pinrelay/shared';

import type { ContractCall, TransactionResult } from './types';

export type TransactionPipelineOptions = {
  rpc: RpcClient;
  chainId: number;
  /** gas = estimate × margin / 100 */
  gasMarginPercent?: number;
  receiptTimeoutMs?: number;
  pollIntervalMs?: number;
  explorerTxBaseUrl?: string | null;
  audit?: AuditLog | null;
  sleep?: Sleep;
  now?: () => number;
  logger?: AppLogger;
};

// What is known about a submission so far; filled in step by step for the audit entry.
type Progress = {
  from: Address | null;
  nonce: number | null;
  gas: bigint | null;
  gasPrice: bigint | null;
  hash: Hex | null;
};

function signerFor(signingKey: Hex): PrivateKeyAccount {
  if (!/^0x[0-9a-fA-F]{64}$/.test(signingKey)) {
    throw new ValidationError('invalid_signing_key: expected 32 bytes of hex');
  }
  return privateKeyToAccount(signingKey);
}

const SINGLE_ATTEMPT = { maxAttempts: 1, delayMs: 0 } as const;
const SINGLE_SEND = { failover: false, policy: SINGLE_ATTEMPT } as const;

/**
 * nonce → gas estimate → gas price → sign → broadcast → receipt.
 *
 * Strictly sequential. A failed gas estimate never reaches the network, and a
 * broadcast is sent exactly once: after a BroadcastError or a
 * ConfirmationTimeoutError, re-query by hash instead of resubmitting.
 */
export class TransactionPipeline {
  private readonly gasMarginPercent: number;
  private readonly receiptTimeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly log: AppLogger;

  constructor(private readonly options: TransactionPipelineOptions) {
    this.gasMarginPercent = options.gasMarginPercent ?? 120;
    this.receiptTimeoutMs = options.receiptTimeoutMs ?? 120_000;
    this.pollIntervalMs = options.pollIntervalMs ?? 2_000;
    this.log = (options.logger ?? getLogger()).child({ component: 'tx' });

    if (!Number.isInteger(this.gasMarginPercent) || this.gasMarginPercent < 100) {
      throw new ValidationError(`invalid_gas_margin: ${this.gasMarginPercent}`);
    }
  }

  async submit(call: ContractCall, signingKey: Hex): Promise<TransactionResult> {
    const started = this.now();
    const progress: Progress = { from: null, nonce: null, gas: null, gasPrice: null, hash: null };

    let result: TransactionResult;
    try {
      result = await this.execute(call, signerFor(signingKey), progress);
    } catch (err) {
      await this.recordSafely(call, progress, started, 'failed', null, err);
      throw err;
    }

    // Already on-chain: an audit failure must not read as a failed submission.
    await this.recordSafely(call, progress, started, result.status === 1 ? 'success' : 'reverted', result);
    return result;
  }

  /** Single lookup; null while the transaction is pending or unknown. */
  async getReceipt(hash: Hex): Promise<TransactionReceipt | null> {
    return this.options.rpc.getTransactionReceipt(hash);
  }

  explorerUrl(hash: string): string | null {
    const base = this.options.explorerTxBaseUrl?.replace(/\/+$/, '');
    return base ? `${base}/${hash}` : null;
  }

  private async execute(
    call: ContractCall,
    account: PrivateKeyAccount,
    progress: Progress,
  ): Promise<TransactionResult> {
    const rpc = this.options.rpc;
    const value = call.value ?? 0n;
    progress.from = account.address;

    const nonce = await rpc.getTransactionCount(account.address, 'pending');
    progress.nonce = nonce;

    let estimate: bigint;
    try {
      estimate = await rpc.estimateGas({ from: account.address, to: call.to, data: call.data, value: toHex(value) });
    } catch (err) {
      // The node answered: the call would revert. Connectivity errors pass through.
      if (err instanceof RpcResponseError) {
        throw new GasEstimationError(`gas_estimation_failed: ${err.message}`, err);
      }
      throw err;
    }

    const gas = (estimate * BigInt(this.gasMarginPercent)) / 100n;
    progress.gas = gas;
    const gasPrice = await rpc.gasPrice();
    progress.gasPrice = gasPrice;

    const serialized = await account.signTransaction({
      type: 'legacy',
      chainId: this.options.chainId,
      nonce,
      gas,
      gasPrice,
      to: call.to,
      data: call.data,
      value,
    });
    const hash = keccak256(serialized);
    progress.hash = hash;

    try {
      const returned = await rpc.sendRawTransaction(serialized, SINGLE_SEND);
      if (returned.toLowerCase() !== hash.toLowerCase()) {
        this.log.warn({ event: 'tx_hash_mismatch', local: hash, returned }, 'Node returned a different transaction hash');
      }
    } catch (err) {
      throw new BroadcastError({ hash, message: `broadcast_failed: ${describeError(err)}`, cause: err });
    }

    this.log.info({ event: 'tx_broadcast', hash, nonce, gas: gas.toString(), gasPrice: gasPrice.toString() }, 'Transaction broadcast');

    const receipt = await this.waitForReceipt(hash);
    return {
      hash,
      blockNumber: receipt.blockNumber,
      gasUsed: receipt.gasUsed,
      status: receipt.status,
      nonce,
      gas,
      gasPrice,
      from: account.address,
      explorerUrl: this.explorerUrl(hash),
    };
  }

  private async waitForReceipt(hash: Hex): Promise<TransactionReceipt> {
    const wait = this.options.sleep ?? sleep;
    const deadline = this.now() + this.receiptTimeoutMs;
    let lastError: unknown;

    for (;;) {
      try {
        // One attempt on one endpoint, never outliving the deadline.
        const receipt = await this.options.rpc.getTransactionReceipt(hash, {
          failover: false,
          policy: SINGLE_ATTEMPT,
          timeoutMs: Math.max(1, deadline - this.now()),
        });
        if (receipt) return receipt;
      } catch (err) {
        lastError = err;
        if (!(err instanceof RpcResponseError)) {
          this.options.rpc.pool.advance();
        }
        this.log.debug({ event: 'receipt_poll_failed', hash, error: describeError(err) }, 'Receipt poll failed');
      }

      const remaining = deadline - this.now();
      if (remaining <= 0) {
        throw new ConfirmationTimeoutError({ hash, timeoutMs: this.receiptTimeoutMs, cause: lastError });
      }
      await wait(Math.min(this.pollIntervalMs, remaining));
    }
  }

  private now(): number {
    return this.options.now?.() ?? Date.now();
  }

  private async recordSafely(
    call: ContractCall,
    progress: Progress,
    started: number,
    status: AuditStatus,
    result: TransactionResult | null,
    error?: unknown,
  ): Promise<void> {
    try {
      await this.record(call, progress, started, status, result, error);
    } catch (auditErr) {
      // The submission outcome is the one the caller must see.
      logError(this.log, auditErr instanceof Error ? auditErr : new Error(describeError(auditErr)), {
        event: 'tx_audit_failed',
        hash: progress.hash,
      });
    }
  }

  private async record(
    call: ContractCall,
    progress: Progress,
    started: number,
    status: AuditStatus,
    result: TransactionResult | null,
    error?: unknown,
  ): Promise<void> {
    if (!this.options.audit) return;
    await this.options.audit.append({
      type: 'transaction',
      status,
      payload: {
        functionName: call.functionName,
        ...(call.parameters ? { parameters: call.parameters } : {}),
        to: call.to,
        from: progress.from,
        hash: progress.hash,
        nonce: progress.nonce,
        gas: progress.gas?.toString() ?? null,
        gasPrice: progress.gasPrice?.toString() ?? null,
        gasUsed: result ? result.gasUsed.toString() : null,
        blockNumber: result ? result.blockNumber.toString() : null,
        explorerUrl: progress.hash ? this.explorerUrl(progress.hash) : null,
        durationMs: Math.max(0, this.now() - started),
        ...(error !== undefined
          ? { errorCode: isPinrelayError(error) ? error.code : 'UNKNOWN', error: describeError(error) }
          : {}),
      },
    });
  }
}
