import { encodeFunctionData, parseAbi, type Address } from 'viem';

import { ValidationError } from '@pinrelay/shared';

import type { ContractCall } from './types';

export const ANCHOR_ABI = parseAbi(['function anchor(string contentId)']);

/** `anchor(contentId)` on the registry contract. */
export function anchorCall(contract: Address, contentId: string): ContractCall {
  if (contentId.trim().length === 0) {
    throw new ValidationError('empty_content_id');
  }
  return {
    to: contract,
    data: encodeFunctionData({ abi: ANCHOR_ABI, functionName: 'anchor', args: [contentId] }),
    functionName: 'anchor',
    parameters: { contentId },
  };
}
