/**
 * Account Sequence Manager
 *
 * Keeps one entry per (chain id, address) and hands out sequence numbers
 * ahead of confirmation so transactions can be submitted back to back.
 *
 * Entry states: unknown -> synced(n) -> synced(n + 1) | stale -> synced.
 *
 * Allocation is a synchronous read-and-increment that runs only after the
 * entry's fetch has settled. Concurrent callers for an entry share that
 * one fetch, and no lock is held across the network wait, so entries for
 * different accounts never block each other.
 */

import type { AccountInfo, Bech32Address, ChainNode } from '../types/index.js';
import type { Logger } from '../logging.js';

export type AccountSource = Pick<ChainNode, 'getAccount'>;

export type SequenceState =
  | { status: 'unknown' }
  | { status: 'synced'; accountNumber: bigint; sequence: bigint }
  | { status: 'stale'; accountNumber: bigint; sequence: bigint };

export interface SequenceReservation {
  accountNumber: bigint;
  sequence: bigint;
}

interface Entry {
  state: SequenceState;
  inflight?: Promise<void>;
}

export class SequenceManager {
  private readonly entries = new Map<string, Entry>();

  constructor(
    private readonly source: AccountSource,
    public readonly chainId: string,
    private readonly logger: Logger
  ) {}

  /**
   * Reserves the next sequence for an account, fetching it from the node
   * first when the entry is unknown or stale
   */
  async nextSequence(address: Bech32Address): Promise<SequenceReservation> {
    const entry = this.entry(address);

    for (;;) {
      const state = entry.state;
      if (state.status === 'synced') {
        entry.state = { ...state, sequence: state.sequence + 1n };
        this.logger.debug(
          { chainId: this.chainId, address, sequence: state.sequence.toString() },
          'sequence reserved'
        );
        return { accountNumber: state.accountNumber, sequence: state.sequence };
      }
      await this.sync(address, entry);
    }
  }

  /**
   * Re-fetches the authoritative sequence and overwrites local state
   */
  async resync(address: Bech32Address): Promise<SequenceReservation> {
    const entry = this.entry(address);
    this.logger.info({ chainId: this.chainId, address }, 'resyncing account sequence');

    // a fetch already running may predate the caller's evidence of staleness
    if (entry.inflight) {
      await entry.inflight;
    }
    this.markEntryStale(entry);

    for (;;) {
      const state = entry.state;
      if (state.status === 'synced') {
        return { accountNumber: state.accountNumber, sequence: state.sequence };
      }
      await this.sync(address, entry);
    }
  }

  /**
   * Forces the next allocation to re-fetch, e.g. after a reserved sequence
   * was rejected for good and will never reach the chain
   */
  markStale(address: Bech32Address): void {
    const entry = this.entries.get(this.key(address));
    if (entry) {
      this.markEntryStale(entry);
      this.logger.warn({ chainId: this.chainId, address }, 'account sequence marked stale');
    }
  }

  peek(address: Bech32Address): SequenceState {
    const entry = this.entries.get(this.key(address));
    return entry ? { ...entry.state } : { status: 'unknown' };
  }

  /**
   * Forgets one account, or every account when none is given
   */
  reset(address?: Bech32Address): void {
    if (address === undefined) {
      this.entries.clear();
    } else {
      this.entries.delete(this.key(address));
    }
  }

  private key(address: Bech32Address): string {
    return `${this.chainId}/${address}`;
  }

  private entry(address: Bech32Address): Entry {
    const key = this.key(address);
    let entry = this.entries.get(key);
    if (!entry) {
      entry = { state: { status: 'unknown' } };
      this.entries.set(key, entry);
    }
    return entry;
  }

  private markEntryStale(entry: Entry): void {
    const state = entry.state;
    if (state.status === 'synced') {
      entry.state = { ...state, status: 'stale' };
    }
  }

  private sync(address: Bech32Address, entry: Entry): Promise<void> {
    if (entry.inflight) {
      return entry.inflight;
    }

    const inflight = this.source
      .getAccount(address)
      .then((info: AccountInfo) => {
        entry.state = {
          status: 'synced',
          accountNumber: info.accountNumber,
          sequence: info.sequence,
        };
        this.logger.debug(
          { chainId: this.chainId, address, sequence: info.sequence.toString() },
          'account sequence fetched'
        );
      })
      .finally(() => {
        entry.inflight = undefined;
      });

    entry.inflight = inflight;
    return inflight;
  }
}
