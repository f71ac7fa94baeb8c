/**
 * Broadcast and confirmation tests
 *
 * Runs the broadcaster against the in-memory node, which enforces account
 * sequences like CheckTx does.
 */

import { SequenceManager } from '../src/account/sequence';
import { Broadcaster } from '../src/broadcast/broadcaster';
import type { TxDraft } from '../src/broadcast/broadcaster';
import { classifyNodeError, isStaleSequence } from '../src/broadcast/errors';
import { coin } from '../src/tx/coin';
import { createMsgSend } from '../src/tx/msg';
import { Secp256k1Signer } from '../src/wallet/signer';
import { makeLogger } from '../src/logging';
import {
  BroadcastError,
  EncodingError,
  SequenceError,
  StakelineError,
} from '../src/types';
import type { SubmissionResult, TxStatus } from '../src/types';
import { MockChainNode } from './helpers/mock-node';

const logger = makeLogger('silent');
const signer = Secp256k1Signer.fromSecret('test-secret');
const ADDRESS = signer.address();
const RECIPIENT = 'cosmos1qqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqnrql8a';

const draft: TxDraft = {
  messages: [createMsgSend(ADDRESS, RECIPIENT, [coin(1000, 'uatom')])],
  fee: { amount: [coin(2500, 'uatom')], gasLimit: 100_000n },
  memo: '',
  timeoutHeight: 0n,
};

function errorOf(result: SubmissionResult): StakelineError {
  if (result.status !== 'rejected') {
    throw new Error(`expected a rejection, got ${result.status}`);
  }
  return result.error;
}

describe('Broadcaster', () => {
  let node: MockChainNode;
  let sequences: SequenceManager;
  let broadcaster: Broadcaster;

  beforeEach(() => {
    node = new MockChainNode();
    node.setAccount(ADDRESS, 7n, 2n);
    sequences = new SequenceManager(node, 'testchain-1', logger);
    broadcaster = new Broadcaster(node, sequences, {
      logger,
      prefix: 'cosmos',
      backoff: { maxRetries: 3, initialDelay: 1, maxDelay: 4 },
      pollInterval: 2,
      deadline: 50,
    });
  });

  describe('submit', () => {
    it('should sign at the reserved sequence and return pending', async () => {
      const result = await broadcaster.submit(draft, [signer]);
      const [sent] = node.getBroadcasts();

      expect(result).toEqual({ status: 'pending', txHash: sent.hash });
      expect(sent.tx.signers[0].sequence).toBe(2n);
      expect(sequences.peek(ADDRESS)).toEqual({
        status: 'synced',
        accountNumber: 7n,
        sequence: 3n,
      });
    });

    it('should submit back to back without refetching', async () => {
      await broadcaster.submit(draft, [signer]);
      await broadcaster.submit(draft, [signer]);

      const sent = node.getBroadcasts().map((b) => b.tx.signers[0].sequence);
      expect(sent).toEqual([2n, 3n]);
      expect(node.accountQueries).toBe(1);
    });

    it('should resync and retry once when the sequence moved on chain', async () => {
      await broadcaster.submit(draft, [signer]);
      // another wallet spent sequences 3 and 4
      node.setAccount(ADDRESS, 7n, 5n);

      const result = await broadcaster.submit(draft, [signer]);
      const sent = node.getBroadcasts().map((b) => b.tx.signers[0].sequence);

      expect(result.status).toBe('pending');
      expect(sent).toEqual([2n, 3n, 5n]);
      expect(node.accountQueries).toBe(2);
      expect(sequences.peek(ADDRESS)).toEqual({
        status: 'synced',
        accountNumber: 7n,
        sequence: 6n,
      });
    });

    it('should fill a gap left by a reservation that never reached the chain', async () => {
      await sequences.nextSequence(ADDRESS);

      const result = await broadcaster.submit(draft, [signer]);
      const sent = node.getBroadcasts().map((b) => b.tx.signers[0].sequence);

      expect(result.status).toBe('pending');
      expect(sent).toEqual([3n, 2n]);
    });

    it('should give up after a second stale rejection', async () => {
      const mismatch = {
        code: 32,
        rawLog: 'account sequence mismatch, expected 9, got 2: incorrect account sequence',
      };
      node.queueBroadcast(mismatch, mismatch);

      const result = await broadcaster.submit(draft, [signer]);
      const error = errorOf(result);

      expect(isStaleSequence(error)).toBe(true);
      expect(node.getBroadcasts()).toHaveLength(2);
      expect(sequences.peek(ADDRESS).status).toBe('stale');
    });

    it('should report a rejection and mark the account stale', async () => {
      node.queueBroadcast({ code: 13, rawLog: 'insufficient fees; got: 1uatom required: 2500uatom' });

      const result = await broadcaster.submit(draft, [signer]);
      const error = errorOf(result);

      expect(error).toBeInstanceOf(BroadcastError);
      expect(error instanceof BroadcastError && error.kind).toBe('insufficient_fee');
      expect(node.getBroadcasts()).toHaveLength(1);
      expect(sequences.peek(ADDRESS).status).toBe('stale');
    });

    it('should retry while the mempool is full', async () => {
      node.queueBroadcast({ code: 20, rawLog: 'mempool is full' });

      const result = await broadcaster.submit(draft, [signer]);

      expect(result.status).toBe('pending');
      expect(node.getBroadcasts()).toHaveLength(2);
    });

    it('should throw once the mempool stays full past the retry budget', async () => {
      const full = { code: 20, rawLog: 'mempool is full' };
      node.queueBroadcast(full, full, full, full);

      await expect(broadcaster.submit(draft, [signer])).rejects.toMatchObject({
        name: 'BroadcastError',
        kind: 'mempool_full',
      });
      expect(node.getBroadcasts()).toHaveLength(4);
      expect(sequences.peek(ADDRESS).status).toBe('stale');
    });

    it('should treat a transaction already in the mempool as pending', async () => {
      node.queueBroadcast({ code: 19, rawLog: 'tx already exists in cache' });

      const result = await broadcaster.submit(draft, [signer]);

      expect(result.status).toBe('pending');
    });

    it('should fail for an account the chain does not know', async () => {
      const stranger = Secp256k1Signer.fromSecret('another-test-secret');

      await expect(broadcaster.submit(draft, [stranger])).rejects.toBeInstanceOf(SequenceError);
      expect(node.getBroadcasts()).toHaveLength(0);
    });
  });

  describe('awaitConfirmation', () => {
    const HASH = 'A1B2C3';

    it('should return included once the node reports the transaction', async () => {
      node.include(HASH, 12n);

      const result = await broadcaster.awaitConfirmation(HASH);

      expect(result).toEqual({
        status: 'included',
        txHash: HASH,
        height: 12n,
        code: 0,
        rawLog: '',
        gasUsed: 50_000n,
        events: [{ type: 'tx', attributes: [{ key: 'fee', value: '2500uatom' }] }],
      });
      expect(node.txQueries).toBe(1);
    });

    it('should keep polling until the transaction appears', async () => {
      setTimeout(() => node.include(HASH, 13n), 10);

      const result = await broadcaster.awaitConfirmation(HASH, { deadline: 2_000 });

      expect(result.status).toBe('included');
      expect(node.txQueries).toBeGreaterThan(1);
    });

    it('should report a failed execution as included with its code', async () => {
      node.include(HASH, 14n, 5);

      const result = await broadcaster.awaitConfirmation(HASH);

      expect(result.status === 'included' && result.code).toBe(5);
    });

    it('should time out without failing the transaction', async () => {
      const result = await broadcaster.awaitConfirmation(HASH, { deadline: 20, pollInterval: 5 });

      expect(result).toEqual({ status: 'timed_out', txHash: HASH });
    });

    it('should stop at the deadline while a status query is still running', async () => {
      let release: () => void = () => undefined;
      jest.spyOn(node, 'getTx').mockImplementation(
        () =>
          new Promise<TxStatus>((resolve) => {
            release = () => resolve({ status: 'not_found' });
          })
      );

      const started = Date.now();
      const result = await broadcaster.awaitConfirmation(HASH, { deadline: 30, pollInterval: 5 });
      const waited = Date.now() - started;
      release();

      expect(result).toEqual({ status: 'timed_out', txHash: HASH });
      expect(waited).toBeLessThan(500);
    });

    it('should not let retry backoff outlast the deadline', async () => {
      const patient = new Broadcaster(node, sequences, {
        logger,
        prefix: 'cosmos',
        backoff: { maxRetries: 3, initialDelay: 5_000, maxDelay: 10_000 },
      });
      const down = new BroadcastError('node_unavailable', 'Network error: refused');
      node.failNextGetTx(down, down, down, down);

      const started = Date.now();
      const result = await patient.awaitConfirmation(HASH, { deadline: 30, pollInterval: 5 });

      expect(result).toEqual({ status: 'timed_out', txHash: HASH });
      expect(Date.now() - started).toBeLessThan(500);
    });

    it('should retry transient query failures', async () => {
      node.failNextGetTx(
        new BroadcastError('node_unavailable', 'Network error: reset'),
        new BroadcastError('node_unavailable', 'Network error: reset')
      );
      node.include(HASH, 12n);

      const result = await broadcaster.awaitConfirmation(HASH);

      expect(result.status).toBe('included');
      expect(node.txQueries).toBe(3);
    });

    it('should give up when the node stays unavailable', async () => {
      const down = new BroadcastError('node_unavailable', 'Network error: refused');
      node.failNextGetTx(down, down, down, down);

      const error = await broadcaster.awaitConfirmation(HASH).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BroadcastError);
      expect(error instanceof BroadcastError && error.kind).toBe('node_unavailable');
      expect(error instanceof BroadcastError && error.details?.attempts).toBe(4);
    });

    it('should not retry responses it cannot understand', async () => {
      node.failNextGetTx(new BroadcastError('bad_response', 'Unexpected response'));

      await expect(broadcaster.awaitConfirmation(HASH)).rejects.toMatchObject({
        kind: 'bad_response',
      });
      expect(node.txQueries).toBe(1);
    });
  });
});

describe('classifyNodeError', () => {
  it('should accept code 0', () => {
    expect(classifyNodeError(0, '', '')).toEqual({ accepted: true, alreadyKnown: false });
  });

  it('should accept a transaction already in the mempool cache', () => {
    expect(classifyNodeError(19, 'sdk', 'tx already exists in cache')).toEqual({
      accepted: true,
      alreadyKnown: true,
    });
  });

  it('should parse the expected and submitted sequence', () => {
    const verdict = classifyNodeError(
      32,
      'sdk',
      'account sequence mismatch, expected 12, got 10: incorrect account sequence'
    );

    expect(verdict.accepted).toBe(false);
    const error = verdict.accepted ? undefined : verdict.error;
    expect(error).toBeInstanceOf(SequenceError);
    expect(error?.details?.expected).toBe(12n);
    expect(error?.details?.got).toBe(10n);
  });

  it.each([
    [2, EncodingError, 'malformed_payload'],
    [3, SequenceError, 'stale'],
    [4, BroadcastError, 'invalid_signature'],
    [13, BroadcastError, 'insufficient_fee'],
    [20, BroadcastError, 'mempool_full'],
    [5, BroadcastError, 'rejected'],
  ] as const)('should map sdk code %i', (code, errorClass, kind) => {
    const verdict = classifyNodeError(code, 'sdk', 'log');
    const error = verdict.accepted ? undefined : verdict.error;

    expect(error).toBeInstanceOf(errorClass);
    expect(error).toMatchObject({ kind, details: { code, codespace: 'sdk', rawLog: 'log' } });
  });

  it('should not interpret codes from other codespaces', () => {
    const verdict = classifyNodeError(13, 'wasm', 'out of gas');
    const error = verdict.accepted ? undefined : verdict.error;

    expect(error).toMatchObject({ kind: 'rejected' });
  });
});
