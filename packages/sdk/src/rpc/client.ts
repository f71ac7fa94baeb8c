/**
 * Stakeline RPC Client
 *
 * Talks to a node's REST gateway (the JSON face of its gRPC services).
 * Implements the ChainNode interface used by the sequencing and
 * broadcast layers, plus the status queries the high-level client needs.
 */

import { z } from 'zod';
import type {
  AccountInfo,
  Bech32Address,
  BroadcastMode,
  BroadcastResponse,
  ChainNode,
  GasInfo,
  LatestBlock,
  NetworkConfig,
  NetworkType,
  TxHash,
  TxStatus,
} from '../types/index.js';
import { BroadcastError, ConfigError, NETWORKS, SequenceError } from '../types/index.js';
import { toBase64 } from '../utils/index.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * RPC Client options
 */
export interface RpcClientOptions {
  /** REST endpoint URL */
  url?: string;
  /** Network type (uses pre-configured URL if not providing custom URL) */
  network?: NetworkType;
  /** Request timeout in milliseconds */
  timeout?: number;
  /** Custom headers for requests */
  headers?: Record<string, string>;
  /** fetch implementation, the global one by default */
  fetch?: FetchLike;
}

/** gRPC status code the gateway reports for missing entities */
const GRPC_NOT_FOUND = 5;

const BROADCAST_MODES: Record<BroadcastMode, string> = {
  sync: 'BROADCAST_MODE_SYNC',
  async: 'BROADCAST_MODE_ASYNC',
};

// ============================================================================
// Response Schemas
// ============================================================================

const u64 = z
  .union([z.string(), z.number()])
  .transform((v) => String(v))
  .pipe(z.string().regex(/^\d+$/, 'expected an unsigned integer'))
  .transform((v) => BigInt(v));

const GatewayErrorSchema = z.object({
  code: z.number().optional(),
  message: z.string().optional(),
});

const BaseAccountSchema = z.object({
  address: z.string(),
  pub_key: z
    .object({ '@type': z.string(), key: z.string().optional() })
    .nullish(),
  account_number: u64,
  sequence: u64,
});
type BaseAccount = z.infer<typeof BaseAccountSchema>;

const AnyObjectSchema = z.record(z.unknown());

const AccountResponseSchema = z.object({ account: AnyObjectSchema });

const TxResponseSchema = z.object({
  height: u64,
  txhash: z.string(),
  codespace: z.string().default(''),
  code: z.number().default(0),
  raw_log: z.string().default(''),
  gas_wanted: u64.default('0'),
  gas_used: u64.default('0'),
  events: z
    .array(
      z.object({
        type: z.string(),
        attributes: z
          .array(z.object({ key: z.string(), value: z.string().nullish() }))
          .default([]),
      })
    )
    .default([]),
});

const BroadcastResponseSchema = z.object({ tx_response: TxResponseSchema });

const GetTxResponseSchema = z.object({ tx_response: TxResponseSchema });

const SimulateResponseSchema = z.object({
  gas_info: z.object({ gas_wanted: u64, gas_used: u64 }),
});

const LatestBlockResponseSchema = z.object({
  block: z
    .object({
      header: z.object({ chain_id: z.string(), height: u64 }),
    })
    .nullish(),
});

const SyncingResponseSchema = z.object({ syncing: z.boolean() });

function extractBaseAccount(account: Record<string, unknown>, depth = 0): BaseAccount | undefined {
  const direct = BaseAccountSchema.safeParse(account);
  if (direct.success) {
    return direct.data;
  }
  if (depth >= 3) {
    return undefined;
  }
  // vesting, module and other wrapped accounts nest the base account
  for (const key of ['base_account', 'base_vesting_account']) {
    const nested = AnyObjectSchema.safeParse(account[key]);
    if (nested.success) {
      const found = extractBaseAccount(nested.data, depth + 1);
      if (found) {
        return found;
      }
    }
  }
  return undefined;
}

export function isNotFound(error: unknown): boolean {
  return (
    error instanceof BroadcastError &&
    error.kind === 'rejected' &&
    (error.details?.status === 404 || error.details?.grpcCode === GRPC_NOT_FOUND)
  );
}

/**
 * Stakeline RPC Client
 *
 * Provides type-safe access to a node's REST gateway.
 */
export class RpcClient implements ChainNode {
  private url: string;
  private timeout: number;
  private headers: Record<string, string>;
  private fetchFn: FetchLike;
  public readonly network: NetworkConfig;

  constructor(options: RpcClientOptions = {}) {
    const networkType = options.network || 'testnet';
    this.network = NETWORKS[networkType];
    this.url = (options.url || this.network.restUrl).replace(/\/+$/, '');
    this.timeout = options.timeout || 30000;
    this.headers = {
      'Content-Type': 'application/json',
      ...options.headers,
    };
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  get endpoint(): string {
    return this.url;
  }

  /**
   * Makes a request to the gateway and validates the JSON it returns
   */
  private async request<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    body?: unknown
  ): Promise<z.output<S>> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    let response: Response;
    let text: string;
    try {
      response = await this.fetchFn(`${this.url}${path}`, {
        method: body === undefined ? 'GET' : 'POST',
        headers: this.headers,
        ...(body === undefined ? {} : { body: JSON.stringify(body) }),
        signal: controller.signal,
      });
      text = await response.text();
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new BroadcastError('node_unavailable', 'Request timeout', {
          path,
          timeout: this.timeout,
        });
      }
      throw new BroadcastError(
        'node_unavailable',
        `Network error: ${error instanceof Error ? error.message : String(error)}`,
        { path }
      );
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      const gatewayError = GatewayErrorSchema.safeParse(parseJsonLenient(text));
      const message = gatewayError.success ? gatewayError.data.message : undefined;
      const details = {
        path,
        status: response.status,
        grpcCode: gatewayError.success ? gatewayError.data.code : undefined,
      };

      if (response.status >= 500 || response.status === 429) {
        throw new BroadcastError(
          'node_unavailable',
          `HTTP error: ${response.status} ${message ?? response.statusText}`,
          details
        );
      }
      throw new BroadcastError(
        'rejected',
        message ?? `HTTP error: ${response.status} ${response.statusText}`,
        details
      );
    }

    const parsed = schema.safeParse(parseJson(text));
    if (!parsed.success) {
      throw new BroadcastError('bad_response', `Unexpected response from ${path}`, {
        path,
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
    }
    return parsed.data;
  }

  // ============================================================================
  // Account Methods
  // ============================================================================

  /**
   * Returns the account number and current sequence of an account
   */
  async getAccount(address: Bech32Address): Promise<AccountInfo> {
    let response: z.output<typeof AccountResponseSchema>;
    try {
      response = await this.request(
        `/cosmos/auth/v1beta1/accounts/${encodeURIComponent(address)}`,
        AccountResponseSchema
      );
    } catch (error) {
      if (isNotFound(error)) {
        throw new SequenceError('unknown', `Account ${address} does not exist on chain`, {
          address,
        });
      }
      throw error;
    }

    const base = extractBaseAccount(response.account);
    if (!base) {
      throw new BroadcastError('bad_response', `Unrecognized account type for ${address}`, {
        address,
        type: response.account['@type'],
      });
    }

    return {
      address: base.address,
      accountNumber: base.account_number,
      sequence: base.sequence,
      ...(base.pub_key?.key ? { pubKey: base.pub_key.key } : {}),
    };
  }

  // ============================================================================
  // Transaction Methods
  // ============================================================================

  /**
   * Submits encoded TxRaw bytes; CheckTx failures come back as a non-zero code
   */
  async broadcastTx(txBytes: Uint8Array, mode: BroadcastMode = 'sync'): Promise<BroadcastResponse> {
    const { tx_response } = await this.request('/cosmos/tx/v1beta1/txs', BroadcastResponseSchema, {
      tx_bytes: toBase64(txBytes),
      mode: BROADCAST_MODES[mode],
    });

    return {
      txHash: tx_response.txhash.toUpperCase(),
      code: tx_response.code,
      codespace: tx_response.codespace,
      rawLog: tx_response.raw_log,
    };
  }

  /**
   * Returns a transaction by hash, or not_found while it is not in a block
   */
  async getTx(hash: TxHash): Promise<TxStatus> {
    let response: z.output<typeof GetTxResponseSchema>;
    try {
      response = await this.request(
        `/cosmos/tx/v1beta1/txs/${encodeURIComponent(hash.toUpperCase())}`,
        GetTxResponseSchema
      );
    } catch (error) {
      if (isNotFound(error)) {
        return { status: 'not_found' };
      }
      throw error;
    }

    const tx = response.tx_response;
    return {
      status: 'included',
      txHash: tx.txhash.toUpperCase(),
      height: tx.height,
      code: tx.code,
      codespace: tx.codespace,
      rawLog: tx.raw_log,
      gasUsed: tx.gas_used,
      gasWanted: tx.gas_wanted,
      events: tx.events.map((e) => ({
        type: e.type,
        attributes: e.attributes.map((a) => ({ key: a.key, value: a.value ?? '' })),
      })),
    };
  }

  /**
   * Dry-runs a transaction and reports the gas it would consume
   */
  async simulate(txBytes: Uint8Array): Promise<GasInfo> {
    const { gas_info } = await this.request('/cosmos/tx/v1beta1/simulate', SimulateResponseSchema, {
      tx_bytes: toBase64(txBytes),
    });
    return { gasUsed: gas_info.gas_used, gasWanted: gas_info.gas_wanted };
  }

  // ============================================================================
  // Node Methods
  // ============================================================================

  /**
   * Returns the latest block, or null while the chain has produced none
   */
  async getLatestBlock(): Promise<LatestBlock | null> {
    let response: z.output<typeof LatestBlockResponseSchema>;
    try {
      response = await this.request(
        '/cosmos/base/tendermint/v1beta1/blocks/latest',
        LatestBlockResponseSchema
      );
    } catch (error) {
      if (error instanceof BroadcastError && error.message.includes('nil Block')) {
        return null;
      }
      throw error;
    }

    if (!response.block) {
      return null;
    }
    return { chainId: response.block.header.chain_id, height: response.block.header.height };
  }

  async isSyncing(): Promise<boolean> {
    const { syncing } = await this.request(
      '/cosmos/base/tendermint/v1beta1/syncing',
      SyncingResponseSchema
    );
    return syncing;
  }

  /**
   * Checks if the node answers status queries
   */
  async isHealthy(): Promise<boolean> {
    try {
      await this.isSyncing();
      return true;
    } catch {
      return false;
    }
  }
}

function parseJson(text: string): unknown {
  if (text.trim() === '') {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    throw new BroadcastError('bad_response', 'Node returned invalid JSON', {
      body: text.slice(0, 200),
    });
  }
}

function parseJsonLenient(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function isNetworkType(value: string): value is NetworkType {
  return Object.prototype.hasOwnProperty.call(NETWORKS, value);
}

/**
 * Creates an RPC client for the specified network
 */
export function createRpcClient(
  networkOrUrl: NetworkType | string = 'testnet',
  options: Omit<RpcClientOptions, 'url' | 'network'> = {}
): RpcClient {
  if (networkOrUrl.startsWith('http')) {
    return new RpcClient({ ...options, url: networkOrUrl });
  }
  if (!isNetworkType(networkOrUrl)) {
    throw new ConfigError(`Unknown network "${networkOrUrl}"`, { network: networkOrUrl });
  }
  return new RpcClient({ ...options, network: networkOrUrl });
}
