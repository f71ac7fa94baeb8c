/**
 * Sequence manager tests
 */

import { SequenceManager } from '../src/account/sequence';
import { makeLogger } from '../src/logging';
import { BroadcastError, SequenceError } from '../src/types';
import type { AccountInfo, Bech32Address } from '../src/types';
import { MockChainNode } from './helpers/mock-node';

const ALICE = 'cosmos1nx7vqq8hsy8chwe27mcr4cmazdwus7zjl2ds0p';
const BOB = 'cosmos19rl4cm2hmr8afy4kldpxz3fka4jguq0auqdal4';

const logger = makeLogger('silent');

describe('SequenceManager', () => {
  let node: MockChainNode;
  let sequences: SequenceManager;

  beforeEach(() => {
    node = new MockChainNode();
    node.setAccount(ALICE, 42n, 10n);
    node.setAccount(BOB, 43n, 0n);
    sequences = new SequenceManager(node, 'testchain-1', logger);
  });

  it('should fetch on first use and count up locally afterwards', async () => {
    const first = await sequences.nextSequence(ALICE);
    const second = await sequences.nextSequence(ALICE);

    expect(first).toEqual({ accountNumber: 42n, sequence: 10n });
    expect(second).toEqual({ accountNumber: 42n, sequence: 11n });
    expect(node.accountQueries).toBe(1);
  });

  it('should hand out distinct, gap-free sequences to concurrent callers', async () => {
    const reservations = await Promise.all(
      Array.from({ length: 20 }, () => sequences.nextSequence(ALICE))
    );

    const values = reservations.map((r) => r.sequence).sort((a, b) => (a < b ? -1 : 1));
    expect(values).toEqual(Array.from({ length: 20 }, (_, i) => 10n + BigInt(i)));
    expect(node.accountQueries).toBe(1);
  });

  it('should keep accounts independent', async () => {
    const [alice, bob] = await Promise.all([
      sequences.nextSequence(ALICE),
      sequences.nextSequence(BOB),
    ]);

    expect(alice.sequence).toBe(10n);
    expect(bob.sequence).toBe(0n);
    expect(sequences.peek(ALICE)).toEqual({ status: 'synced', accountNumber: 42n, sequence: 11n });
    expect(sequences.peek(BOB)).toEqual({ status: 'synced', accountNumber: 43n, sequence: 1n });
  });

  it('should report unknown accounts before the first fetch', () => {
    expect(sequences.peek(ALICE)).toEqual({ status: 'unknown' });
  });

  it('should re-fetch after markStale', async () => {
    await sequences.nextSequence(ALICE);
    sequences.markStale(ALICE);

    expect(sequences.peek(ALICE)).toEqual({ status: 'stale', accountNumber: 42n, sequence: 11n });

    node.setAccount(ALICE, 42n, 15n);
    const next = await sequences.nextSequence(ALICE);

    expect(next.sequence).toBe(15n);
    expect(node.accountQueries).toBe(2);
  });

  it('should ignore markStale for accounts it has never seen', () => {
    sequences.markStale(ALICE);

    expect(sequences.peek(ALICE)).toEqual({ status: 'unknown' });
  });

  it('should overwrite local state on resync without reserving', async () => {
    await sequences.nextSequence(ALICE);
    await sequences.nextSequence(ALICE);
    node.setAccount(ALICE, 42n, 11n);

    const resynced = await sequences.resync(ALICE);

    expect(resynced).toEqual({ accountNumber: 42n, sequence: 11n });
    expect(sequences.peek(ALICE)).toEqual({ status: 'synced', accountNumber: 42n, sequence: 11n });
    expect((await sequences.nextSequence(ALICE)).sequence).toBe(11n);
  });

  it('should surface unknown accounts and leave them unknown', async () => {
    const stranger = 'cosmos1qqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqnrql8a';

    await expect(sequences.nextSequence(stranger)).rejects.toBeInstanceOf(SequenceError);
    expect(sequences.peek(stranger)).toEqual({ status: 'unknown' });
  });

  it('should propagate a failed fetch to every waiting caller and retry on the next call', async () => {
    const getAccount = jest
      .fn<Promise<AccountInfo>, [Bech32Address]>()
      .mockRejectedValueOnce(new BroadcastError('node_unavailable', 'Network error: down'))
      .mockResolvedValue({ address: ALICE, accountNumber: 42n, sequence: 3n });
    const flaky = new SequenceManager({ getAccount }, 'testchain-1', logger);

    const results = await Promise.allSettled([
      flaky.nextSequence(ALICE),
      flaky.nextSequence(ALICE),
    ]);

    expect(results.map((r) => r.status)).toEqual(['rejected', 'rejected']);
    expect(getAccount).toHaveBeenCalledTimes(1);

    await expect(flaky.nextSequence(ALICE)).resolves.toEqual({ accountNumber: 42n, sequence: 3n });
    expect(getAccount).toHaveBeenCalledTimes(2);
  });

  it('should keep separate tables per chain id', async () => {
    const other = new SequenceManager(node, 'testchain-2', logger);

    await sequences.nextSequence(ALICE);

    expect(other.peek(ALICE)).toEqual({ status: 'unknown' });
  });

  it('should forget one account or all of them on reset', async () => {
    await sequences.nextSequence(ALICE);
    await sequences.nextSequence(BOB);

    sequences.reset(ALICE);
    expect(sequences.peek(ALICE)).toEqual({ status: 'unknown' });
    expect(sequences.peek(BOB).status).toBe('synced');

    sequences.reset();
    expect(sequences.peek(BOB)).toEqual({ status: 'unknown' });
  });
});
