/**
 * Stakeline Chain Client
 *
 * High-level entry point that ties the pipeline together: one REST client,
 * one sequence table, one broadcaster and one logger per instance.
 */

import { BroadcastError, ConfirmationTimeout } from '../types/index.js';
import type {
  Bech32Address,
  ChainStatus,
  Coin,
  ConfirmationOptions,
  Fee,
  Msg,
  SubmissionResult,
  TxSigner,
} from '../types/index.js';
import { RpcClient } from '../rpc/client.js';
import { SequenceManager } from '../account/sequence.js';
import { Broadcaster } from '../broadcast/broadcaster.js';
import type { TxDraft } from '../broadcast/broadcaster.js';
import { signTx } from '../tx/builder.js';
import { createMsgSend } from '../tx/msg.js';
import { AccountAddress } from '../wallet/keys.js';
import { sleep } from '../utils/index.js';
import { makeLogger } from '../logging.js';
import type { Logger } from '../logging.js';
import { feeFromGasPrice, resolveClientConfig, scaleGas } from './config.js';
import type { ClientConfig, ClientOptions } from './config.js';

/** Gas limit used for simulation, the largest the node accepts */
const SIMULATION_GAS_LIMIT = 9223372036854775807n;

const BLOCK_POLL_INTERVAL = 1_000;

export interface SendOptions {
  /** Explicit fee; estimated by simulation when absent */
  fee?: Fee;
  memo?: string;
  /** Overrides the configured expiry distance; 0 disables expiry */
  timeoutBlocks?: number;
  /** Wait for inclusion before returning */
  wait?: boolean | ConfirmationOptions;
}

export class ChainClient {
  public readonly config: ClientConfig;
  public readonly rpc: RpcClient;
  public readonly sequences: SequenceManager;
  public readonly broadcaster: Broadcaster;
  private readonly logger: Logger;

  constructor(options: ClientOptions = {}) {
    this.config = resolveClientConfig(options);
    this.logger = options.logger ?? makeLogger(options.logLevel ?? 'info');

    const { network } = this.config;
    this.rpc = new RpcClient({
      url: network.restUrl,
      network: network.type,
      timeout: this.config.timeout,
      ...(options.fetch ? { fetch: options.fetch } : {}),
    });
    this.sequences = new SequenceManager(this.rpc, network.chainId, this.logger);
    this.broadcaster = new Broadcaster(this.rpc, this.sequences, {
      logger: this.logger,
      prefix: network.prefix,
      backoff: this.config.backoff,
      pollInterval: this.config.pollInterval,
      deadline: this.config.deadline,
    });
  }

  get chainId(): string {
    return this.config.network.chainId;
  }

  get prefix(): string {
    return this.config.network.prefix;
  }

  /**
   * Moving (with the latest height), syncing, or waiting for its first block
   */
  async getChainStatus(): Promise<ChainStatus> {
    if (await this.rpc.isSyncing()) {
      return { status: 'syncing' };
    }
    const block = await this.rpc.getLatestBlock();
    if (!block) {
      return { status: 'waiting_to_start' };
    }
    return { status: 'moving', height: block.height };
  }

  /**
   * Resolves once the chain is past the height observed on entry
   */
  async waitForNextBlock(timeoutMs: number = this.config.deadline): Promise<bigint> {
    const started = Date.now();
    const initial = await this.getChainStatus();
    if (initial.status !== 'moving') {
      throw new BroadcastError(
        'node_unavailable',
        `Chain is not producing blocks (${initial.status})`,
        { status: initial.status }
      );
    }

    for (;;) {
      const elapsed = Date.now() - started;
      if (elapsed >= timeoutMs) {
        throw new BroadcastError('node_unavailable', `No block produced within ${timeoutMs}ms`, {
          height: initial.height.toString(),
          timeoutMs,
        });
      }
      await sleep(Math.min(BLOCK_POLL_INTERVAL, timeoutMs - elapsed));

      const current = await this.getChainStatus();
      if (current.status === 'moving' && current.height > initial.height) {
        return current.height;
      }
    }
  }

  /**
   * Simulates the messages and returns a fee whose gas limit is the
   * simulated usage times the configured multiplier. Without explicit fee
   * coins the amount follows the network's gas price.
   */
  async estimateFee(messages: Msg[], signer: TxSigner, feeCoins: Coin[] = []): Promise<Fee> {
    const address = signer.address(this.prefix);
    const account = await this.rpc.getAccount(address);

    const simulated = signTx(
      {
        messages,
        fee: { amount: feeCoins, gasLimit: SIMULATION_GAS_LIMIT },
        memo: '',
        timeoutHeight: 0n,
        signers: [
          {
            publicKey: signer.publicKey,
            sequence: account.sequence,
            accountNumber: account.accountNumber,
          },
        ],
      },
      this.chainId,
      [signer]
    );

    const { gasUsed } = await this.rpc.simulate(simulated.txBytes);
    const gasLimit = scaleGas(gasUsed, this.config.gasMultiplier);
    this.logger.debug(
      { address, gasUsed: gasUsed.toString(), gasLimit: gasLimit.toString() },
      'fee estimated'
    );

    if (feeCoins.length > 0) {
      return { amount: feeCoins, gasLimit };
    }
    return feeFromGasPrice(gasLimit, this.config.network.gasPrice);
  }

  /**
   * Signs and submits messages from one signer. With `wait`, resolves
   * only once the transaction is included and throws ConfirmationTimeout
   * when the deadline passes first.
   */
  async sendMessages(
    messages: Msg[],
    signer: TxSigner,
    options: SendOptions = {}
  ): Promise<SubmissionResult> {
    const fee = options.fee ?? (await this.estimateFee(messages, signer));
    const timeoutHeight = await this.timeoutHeight(
      options.timeoutBlocks ?? this.config.timeoutBlocks
    );

    const draft: TxDraft = {
      messages,
      fee,
      memo: options.memo ?? '',
      timeoutHeight,
    };

    const result = await this.broadcaster.submit(draft, [signer]);
    if (result.status !== 'pending' || !options.wait) {
      return result;
    }

    const waitOptions: ConfirmationOptions = options.wait === true ? {} : options.wait;
    const confirmed = await this.broadcaster.awaitConfirmation(result.txHash, waitOptions);
    if (confirmed.status === 'timed_out') {
      throw new ConfirmationTimeout(
        confirmed.txHash,
        waitOptions.deadline ?? this.config.deadline
      );
    }
    return confirmed;
  }

  async sendCoins(
    amount: Coin | Coin[],
    destination: Bech32Address,
    signer: TxSigner,
    options: SendOptions = {}
  ): Promise<SubmissionResult> {
    AccountAddress.fromBech32(destination, this.prefix);
    const coins = Array.isArray(amount) ? amount : [amount];
    const msg = createMsgSend(signer.address(this.prefix), destination, coins);
    return this.sendMessages([msg], signer, options);
  }

  private async timeoutHeight(blocks: number): Promise<bigint> {
    if (blocks === 0) {
      return 0n;
    }
    const latest = await this.rpc.getLatestBlock();
    if (!latest) {
      throw new BroadcastError('node_unavailable', 'Chain has not produced a block yet');
    }
    return latest.height + BigInt(blocks);
  }
}
