/**
 * Mock Chain Node
 *
 * In-memory stand-in for a node's account, broadcast and tx queries.
 * Broadcasts are decoded and checked against the stored account sequence
 * the way CheckTx does, so sequence handling is exercised for real.
 */

import { decodeTxRaw, txHash } from '../../src/tx/builder';
import type { DecodedTx } from '../../src/tx/builder';
import { toAddress } from '../../src/wallet/keys';
import { SequenceError } from '../../src/types';
import type {
  AccountInfo,
  Bech32Address,
  BroadcastResponse,
  ChainNode,
  TxHash,
  TxStatus,
} from '../../src/types';

export interface RecordedBroadcast {
  hash: TxHash;
  tx: DecodedTx;
}

export type BroadcastOverride = Pick<BroadcastResponse, 'code'> &
  Partial<Omit<BroadcastResponse, 'code'>>;

export class MockChainNode implements ChainNode {
  private accounts: Map<Bech32Address, AccountInfo> = new Map();
  private transactions: Map<TxHash, TxStatus> = new Map();
  private broadcastQueue: BroadcastOverride[] = [];
  private getTxFailures: Error[] = [];
  private broadcasts: RecordedBroadcast[] = [];

  accountQueries = 0;
  txQueries = 0;

  constructor(private readonly prefix = 'cosmos') {}

  setAccount(address: Bech32Address, accountNumber: bigint, sequence: bigint): void {
    this.accounts.set(address, { address, accountNumber, sequence });
  }

  /**
   * The next broadcast answers with this response instead of being checked
   */
  queueBroadcast(...responses: BroadcastOverride[]): void {
    this.broadcastQueue.push(...responses);
  }

  failNextGetTx(...errors: Error[]): void {
    this.getTxFailures.push(...errors);
  }

  include(hash: TxHash, height: bigint, code = 0): void {
    this.transactions.set(hash, {
      status: 'included',
      txHash: hash,
      height,
      code,
      codespace: code === 0 ? '' : 'sdk',
      rawLog: '',
      gasUsed: 50_000n,
      gasWanted: 100_000n,
      events: [{ type: 'tx', attributes: [{ key: 'fee', value: '2500uatom' }] }],
    });
  }

  getBroadcasts(): RecordedBroadcast[] {
    return [...this.broadcasts];
  }

  async getAccount(address: Bech32Address): Promise<AccountInfo> {
    this.accountQueries++;
    const account = this.accounts.get(address);
    if (!account) {
      throw new SequenceError('unknown', `Account ${address} does not exist on chain`, {
        address,
      });
    }
    return { ...account };
  }

  async broadcastTx(txBytes: Uint8Array): Promise<BroadcastResponse> {
    const hash = txHash(txBytes);
    const tx = decodeTxRaw(txBytes);
    this.broadcasts.push({ hash, tx });

    const override = this.broadcastQueue.shift();
    if (override) {
      return { txHash: hash, codespace: 'sdk', rawLog: '', ...override };
    }

    const accounts: AccountInfo[] = [];
    for (const signer of tx.signers) {
      const account = signer.publicKey
        ? this.accounts.get(toAddress(signer.publicKey, this.prefix))
        : undefined;
      if (!account) {
        return { txHash: hash, code: 9, codespace: 'sdk', rawLog: 'unknown address' };
      }
      if (account.sequence !== signer.sequence) {
        return {
          txHash: hash,
          code: 32,
          codespace: 'sdk',
          rawLog: `account sequence mismatch, expected ${account.sequence}, got ${signer.sequence}: incorrect account sequence`,
        };
      }
      accounts.push(account);
    }

    for (const account of accounts) {
      account.sequence += 1n;
    }
    return { txHash: hash, code: 0, codespace: '', rawLog: '[]' };
  }

  async getTx(hash: TxHash): Promise<TxStatus> {
    this.txQueries++;
    const failure = this.getTxFailures.shift();
    if (failure) {
      throw failure;
    }
    return this.transactions.get(hash) ?? { status: 'not_found' };
  }
}
