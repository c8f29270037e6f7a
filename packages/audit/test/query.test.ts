import { describe, expect, it } from 'vitest';

import { MemoryAuditLog } from '../src/memoryAuditLog';
import { toCsv } from '../src/query';
import type { AuditEntryInput } from '../src/types';

const T0 = Date.UTC(2024, 5, 1);

function clock() {
  let t = T0;
  return () => new Date((t += 60_000));
}

const uploadOk: AuditEntryInput = {
  type: 'upload',
  status: 'success',
  payload: { name: 'Cat.png', backend: 'pinata', contentId: 'bafyone', contentHash: 'h1', size: 2048, durationMs: 12 },
};

const uploadFailed: AuditEntryInput = {
  type: 'upload',
  status: 'failed',
  payload: {
    name: 'cat.png',
    backend: 'web3.storage',
    contentId: null,
    contentHash: 'h1',
    size: 2048,
    durationMs: 30,
    error: 'http_500, "oops"',
  },
};

function tx(status: 'success' | 'reverted' | 'failed', hash: string | null, gasUsed: string | null): AuditEntryInput {
  return {
    type: 'transaction',
    status,
    payload: {
      functionName: 'anchor',
      parameters: { contentId: 'bafyone' },
      to: '0x0000000000000000000000000000000000000002',
      from: '0x0000000000000000000000000000000000000001',
      hash,
      nonce: 3,
      gas: '60000',
      gasPrice: '100',
      gasUsed,
      blockNumber: gasUsed === null ? null : '12',
      durationMs: 5,
    },
  };
}

async function seeded() {
  const log = new MemoryAuditLog({ now: clock() });
  await log.append(uploadFailed);
  await log.append(uploadOk);
  await log.append(tx('success', '0xAbC', '50000'));
  await log.append(tx('reverted', '0xdef', '21000'));
  await log.append(tx('failed', null, null));
  return log;
}

describe('audit queries', () => {
  it('filters by type, status and content id', async () => {
    const log = await seeded();
    expect((await log.query({ type: 'upload' })).map((e) => e.sequence)).toEqual([1, 2]);
    expect((await log.query({ status: 'failed' })).map((e) => e.sequence)).toEqual([1, 5]);
    expect((await log.query({ contentId: 'bafyone' })).map((e) => e.sequence)).toEqual([2, 3, 4, 5]);
  });

  it('matches tx hashes case-insensitively and names by substring', async () => {
    const log = await seeded();
    expect((await log.query({ txHash: '0xabc' })).map((e) => e.sequence)).toEqual([3]);
    expect((await log.query({ name: 'CAT' })).map((e) => e.sequence)).toEqual([1, 2]);
  });

  it('applies time bounds, limit and order', async () => {
    const log = await seeded();
    const from = new Date(T0 + 2 * 60_000);
    const to = new Date(T0 + 4 * 60_000);
    expect((await log.query({ from, to })).map((e) => e.sequence)).toEqual([2, 3, 4]);
    expect((await log.query({ limit: 2 })).map((e) => e.sequence)).toEqual([4, 5]);
    expect((await log.query({ limit: 2, order: 'desc' })).map((e) => e.sequence)).toEqual([5, 4]);
  });

  it('aggregates by scanning every entry', async () => {
    const log = await seeded();
    expect(await log.aggregate()).toEqual({
      totalEntries: 5,
      byType: { upload: 2, transaction: 3 },
      byStatus: { success: 2, failed: 2, reverted: 1 },
      totalBytes: 2048,
      totalGasUsed: '71000',
      firstTimestamp: new Date(T0 + 60_000).toISOString(),
      lastTimestamp: new Date(T0 + 5 * 60_000).toISOString(),
      successRate: 40,
    });
  });

  it('reports zeros for an empty log', async () => {
    const stats = await new MemoryAuditLog().aggregate();
    expect(stats.totalEntries).toBe(0);
    expect(stats.successRate).toBe(0);
    expect(stats.firstTimestamp).toBeNull();
  });

  it('trims the memory log to the last N', async () => {
    const log = await seeded();
    expect(await log.trim(1)).toBe(4);
    expect((await log.query()).map((e) => e.sequence)).toEqual([5]);
    expect(await log.append(uploadOk)).toBe(6);
  });

  it('keeps stored entries apart from caller objects', async () => {
    const log = new MemoryAuditLog();
    const metadata = { owner: 'alice' };
    await log.append({
      type: 'upload',
      status: 'success',
      payload: { name: 'Dog.png', backend: 'local', contentId: 'bafytwo', contentHash: 'h2', size: 10, durationMs: 1, metadata },
    });
    metadata.owner = 'mallory';

    const [first] = await log.query();
    if (first?.type !== 'upload') throw new Error('expected an upload entry');
    first.payload.name = 'renamed.png';

    const [again] = await log.query();
    expect(again?.type === 'upload' ? [again.payload.name, again.payload.metadata?.owner] : null).toEqual([
      'Dog.png',
      'alice',
    ]);
  });
});

describe('toCsv', () => {
  it('writes a header and one escaped row per entry', async () => {
    const log = await seeded();
    const [failed, , confirmed] = await log.query();
    if (!failed || !confirmed) throw new Error('seed missing');

    const lines = toCsv([failed, confirmed]).split('\n');
    expect(lines[0]).toBe('sequence,timestamp,type,status,name,backend,contentId,size,txHash,blockNumber,gasUsed,error');
    expect(lines[1]).toBe(`1,${failed.timestamp},upload,failed,cat.png,web3.storage,,2048,,,,"http_500, ""oops"""`);
    expect(lines[2]).toBe(`3,${confirmed.timestamp},transaction,success,anchor,,bafyone,,0xAbC,12,50000,`);
    expect(lines[3]).toBe('');
  });
});
