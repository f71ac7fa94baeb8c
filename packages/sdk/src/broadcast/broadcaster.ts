/**
 * Broadcast & Confirmation
 *
 * Submits signed transactions and follows them to inclusion:
 *   built -> signed -> submitted -> pending -> included | timed_out
 *                                \-> rejected
 *
 * A stale-sequence rejection gets exactly one resync, re-sign and retry.
 * Mempool-full and node failures are retried with bounded backoff.
 */

import { BroadcastError, isTransientError } from '../types/index.js';
import type {
  Bech32Address,
  BroadcastMode,
  ChainNode,
  ConfirmationOptions,
  SignedTx,
  SubmissionResult,
  TxHash,
  TxSigner,
  TxStatus,
  UnsignedTx,
} from '../types/index.js';
import type { SequenceManager, SequenceReservation } from '../account/sequence.js';
import { signTx } from '../tx/builder.js';
import { retry, sleep } from '../utils/index.js';
import type { RetryOptions } from '../utils/index.js';
import { errorContext } from '../logging.js';
import type { Logger } from '../logging.js';
import { classifyNodeError, isStaleSequence } from './errors.js';

/** Everything of a transaction except its signer entries */
export type TxDraft = Omit<UnsignedTx, 'signers'>;

export type BackoffOptions = Pick<RetryOptions, 'maxRetries' | 'initialDelay' | 'maxDelay'>;

export interface BroadcasterOptions {
  logger: Logger;
  /** Bech32 prefix used to key signer accounts */
  prefix: string;
  mode?: BroadcastMode;
  backoff?: BackoffOptions;
  pollInterval?: number;
  deadline?: number;
}

export const DEFAULT_BACKOFF: Required<BackoffOptions> = {
  maxRetries: 3,
  initialDelay: 500,
  maxDelay: 10_000,
};

export const DEFAULT_POLL_INTERVAL = 1_000;
export const DEFAULT_DEADLINE = 60_000;

export class Broadcaster {
  private readonly logger: Logger;
  private readonly prefix: string;
  private readonly mode: BroadcastMode;
  private readonly backoff: Required<BackoffOptions>;
  private readonly pollInterval: number;
  private readonly deadline: number;

  constructor(
    private readonly node: ChainNode,
    private readonly sequences: SequenceManager,
    options: BroadcasterOptions
  ) {
    this.logger = options.logger;
    this.prefix = options.prefix;
    this.mode = options.mode ?? 'sync';
    this.backoff = { ...DEFAULT_BACKOFF, ...options.backoff };
    this.pollInterval = options.pollInterval ?? DEFAULT_POLL_INTERVAL;
    this.deadline = options.deadline ?? DEFAULT_DEADLINE;
  }

  get chainId(): string {
    return this.sequences.chainId;
  }

  /**
   * Sends a signed transaction once the node accepts it into its mempool,
   * or reports the node's rejection. Transient failures that outlast the
   * retry budget are thrown.
   */
  async broadcast(tx: SignedTx): Promise<SubmissionResult> {
    return retry<SubmissionResult>(
      async () => {
        const response = await this.node.broadcastTx(tx.txBytes, this.mode);
        const verdict = classifyNodeError(response.code, response.codespace, response.rawLog);
        const txHash = response.txHash || tx.hash;

        if (verdict.accepted) {
          this.logger.info(
            { txHash, alreadyKnown: verdict.alreadyKnown },
            'transaction accepted into mempool'
          );
          return { status: 'pending', txHash };
        }
        if (isTransientError(verdict.error)) {
          throw verdict.error;
        }

        this.logger.warn({ txHash, ...errorContext(verdict.error) }, 'transaction rejected');
        return { status: 'rejected', txHash, error: verdict.error };
      },
      {
        ...this.backoff,
        shouldRetry: isTransientError,
        onRetry: (error, attempt, delay) =>
          this.logger.warn(
            { txHash: tx.hash, attempt, delay, ...errorContext(error) },
            'broadcast failed, retrying'
          ),
      }
    );
  }

  /**
   * Reserves sequences for every signer, signs and broadcasts. Reserved
   * sequences that never reach the chain mark their accounts stale.
   */
  async submit(draft: TxDraft, signers: TxSigner[]): Promise<SubmissionResult> {
    const addresses = signers.map((s) => s.address(this.prefix));

    try {
      const reservations = await Promise.all(
        addresses.map((a) => this.sequences.nextSequence(a))
      );
      const first = await this.broadcast(this.sign(draft, signers, reservations));
      if (first.status !== 'rejected' || !isStaleSequence(first.error)) {
        if (first.status === 'rejected') {
          this.markStale(addresses);
        }
        return first;
      }

      this.logger.warn(
        { chainId: this.chainId, signers: addresses, ...first.error.details },
        'stale account sequence, resyncing once'
      );
      const resynced = await Promise.all(
        addresses.map(async (a) => {
          await this.sequences.resync(a);
          return this.sequences.nextSequence(a);
        })
      );

      const second = await this.broadcast(this.sign(draft, signers, resynced));
      if (second.status === 'rejected') {
        this.markStale(addresses);
      }
      return second;
    } catch (error) {
      this.markStale(addresses);
      throw error;
    }
  }

  /**
   * Polls until the transaction is included or the deadline passes. A
   * timed_out result does not mean the transaction failed, only that
   * waiting stopped.
   */
  async awaitConfirmation(
    txHash: TxHash,
    options: ConfirmationOptions = {}
  ): Promise<SubmissionResult> {
    const pollInterval = options.pollInterval ?? this.pollInterval;
    const deadline = options.deadline ?? this.deadline;
    const started = Date.now();

    for (;;) {
      const remaining = Math.max(deadline - (Date.now() - started), 0);
      const status = await withinDeadline(this.pollStatus(txHash, remaining), remaining);
      if (status === undefined) {
        return this.timedOut(txHash, Date.now() - started);
      }
      if (status.status === 'included') {
        this.logger.info(
          { txHash, height: status.height.toString(), code: status.code },
          'transaction included'
        );
        return {
          status: 'included',
          txHash: status.txHash,
          height: status.height,
          code: status.code,
          rawLog: status.rawLog,
          gasUsed: status.gasUsed,
          events: status.events,
        };
      }

      const elapsed = Date.now() - started;
      if (elapsed >= deadline) {
        return this.timedOut(txHash, elapsed);
      }
      await sleep(Math.min(pollInterval, deadline - elapsed));
    }
  }

  private sign(
    draft: TxDraft,
    signers: TxSigner[],
    reservations: SequenceReservation[]
  ): SignedTx {
    const unsigned: UnsignedTx = {
      ...draft,
      signers: signers.map((signer, i) => ({
        publicKey: signer.publicKey,
        sequence: reservations[i].sequence,
        accountNumber: reservations[i].accountNumber,
      })),
    };
    return signTx(unsigned, this.chainId, signers);
  }

  private timedOut(txHash: TxHash, waitedMs: number): SubmissionResult {
    this.logger.warn({ txHash, waitedMs }, 'stopped waiting for transaction');
    return { status: 'timed_out', txHash };
  }

  private async pollStatus(txHash: TxHash, remaining: number): Promise<TxStatus> {
    try {
      return await retry(() => this.node.getTx(txHash), {
        ...this.backoff,
        initialDelay: Math.min(this.backoff.initialDelay, remaining),
        maxDelay: Math.min(this.backoff.maxDelay, remaining),
        shouldRetry: isTransientError,
        onRetry: (error, attempt, delay) =>
          this.logger.debug(
            { txHash, attempt, delay, ...errorContext(error) },
            'status query failed, retrying'
          ),
      });
    } catch (error) {
      if (isTransientError(error)) {
        throw new BroadcastError(
          'node_unavailable',
          `Node unavailable while waiting for ${txHash}`,
          { txHash, attempts: this.backoff.maxRetries + 1, ...errorContext(error) }
        );
      }
      throw error;
    }
  }

  private markStale(addresses: Bech32Address[]): void {
    for (const address of addresses) {
      this.sequences.markStale(address);
    }
  }
}

/**
 * Settles with the work's outcome, or with undefined once ms have passed.
 * The work itself is abandoned, not cancelled.
 */
async function withinDeadline<T>(work: Promise<T>, ms: number): Promise<T | undefined> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<undefined>((resolve) => {
    timer = setTimeout(() => resolve(undefined), ms);
  });
  try {
    return await Promise.race([work, expired]);
  } finally {
    clearTimeout(timer);
  }
}
