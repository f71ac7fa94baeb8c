/**
 * Stakeline Type Definitions
 *
 * These types define the core abstractions shared by the wallet,
 * transaction, sequencing and broadcast layers.
 */

// ============================================================================
// Network Configuration
// ============================================================================

export type NetworkType = 'cosmoshub' | 'testnet' | 'local';

export interface GasPrice {
  /** Decimal price per unit of gas, e.g. "0.025" */
  amount: string;
  denom: string;
}

export interface NetworkConfig {
  /** Network identifier */
  type: NetworkType;
  /** REST gateway (grpc-gateway / LCD) endpoint URL */
  restUrl: string;
  /** Chain identifier embedded in every sign doc */
  chainId: string;
  /** Bech32 human-readable prefix for account addresses */
  prefix: string;
  /** Minimum gas price accepted by public validators; fees are paid in its denom */
  gasPrice: GasPrice;
}

export const NETWORKS: Record<NetworkType, NetworkConfig> = {
  cosmoshub: {
    type: 'cosmoshub',
    restUrl: 'https://cosmos-rest.publicnode.com',
    chainId: 'cosmoshub-4',
    prefix: 'cosmos',
    gasPrice: { amount: '0.025', denom: 'uatom' },
  },
  testnet: {
    type: 'testnet',
    restUrl: 'https://cosmos-testnet-rest.publicnode.com',
    chainId: 'theta-testnet-001',
    prefix: 'cosmos',
    gasPrice: { amount: '0.025', denom: 'uatom' },
  },
  local: {
    type: 'local',
    restUrl: 'http://localhost:1317',
    chainId: 'localnet',
    prefix: 'cosmos',
    gasPrice: { amount: '0', denom: 'stake' },
  },
};

// ============================================================================
// Key & Address Types
// ============================================================================

/** Normalized BIP-39 phrase (single-spaced, NFKD) */
export type SeedPhrase = string & { readonly __brand: 'SeedPhrase' };

/** Bech32 account address, e.g. cosmos1... */
export type Bech32Address = string;

/** Upper-case hex SHA-256 of the encoded TxRaw */
export type TxHash = string;

export interface PathSegment {
  index: number;
  hardened: boolean;
}

export interface ExtendedKey {
  /** 32-byte scalar; absent on watch-only keys */
  readonly privateKey?: Uint8Array;
  /** 33-byte compressed point */
  readonly publicKey: Uint8Array;
  readonly chainCode: Uint8Array;
  readonly depth: number;
  /** Child index including the hardened bit */
  readonly index: number;
  readonly parentFingerprint: number;
}

// ============================================================================
// Transaction Types
// ============================================================================

export interface Coin {
  denom: string;
  amount: bigint;
}

export interface Fee {
  amount: Coin[];
  gasLimit: bigint;
  /** Bech32 address of the fee payer, defaults to the first signer */
  payer?: Bech32Address;
  /** Bech32 address of a fee grant issuer */
  granter?: Bech32Address;
}

/**
 * A chain-defined message: protobuf type url plus its encoded value.
 * The pipeline never decodes message contents.
 */
export interface Msg {
  readonly typeUrl: string;
  readonly value: Uint8Array;
}

export interface SignerData {
  /** 33-byte compressed secp256k1 public key */
  publicKey: Uint8Array;
  sequence: bigint;
  accountNumber: bigint;
}

export interface UnsignedTx {
  messages: Msg[];
  fee: Fee;
  memo: string;
  /** Block height after which the tx is invalid; 0n disables it */
  timeoutHeight: bigint;
  /** Ordered signer metadata; signatures must follow the same order */
  signers: SignerData[];
}

export interface SignDoc {
  bodyBytes: Uint8Array;
  authInfoBytes: Uint8Array;
  chainId: string;
  accountNumber: bigint;
}

export interface SignedTx {
  bodyBytes: Uint8Array;
  authInfoBytes: Uint8Array;
  signatures: Uint8Array[];
  /** Encoded TxRaw, ready for submission */
  txBytes: Uint8Array;
  hash: TxHash;
}

/**
 * Anything that can authorize a sign doc. The private key never leaves
 * the implementation.
 */
export interface TxSigner {
  readonly publicKey: Uint8Array;
  address(prefix: string): Bech32Address;
  signDoc(doc: SignDoc): Uint8Array;
}

// ============================================================================
// Node Types
// ============================================================================

export interface AccountInfo {
  address: Bech32Address;
  accountNumber: bigint;
  sequence: bigint;
  /** Base64 key bytes when the node already knows the account's key */
  pubKey?: string;
}

export type BroadcastMode = 'sync' | 'async';

export interface BroadcastResponse {
  txHash: TxHash;
  code: number;
  codespace: string;
  rawLog: string;
}

export interface TxEventAttribute {
  key: string;
  value: string;
}

export interface TxEvent {
  type: string;
  attributes: TxEventAttribute[];
}

export type TxStatus =
  | { status: 'not_found' }
  | {
      status: 'included';
      txHash: TxHash;
      height: bigint;
      code: number;
      codespace: string;
      rawLog: string;
      gasUsed: bigint;
      gasWanted: bigint;
      events: TxEvent[];
    };

export interface LatestBlock {
  chainId: string;
  height: bigint;
}

export interface GasInfo {
  gasUsed: bigint;
  gasWanted: bigint;
}

/**
 * The remote collaborator consumed by the sequencing and broadcast layers.
 */
export interface ChainNode {
  getAccount(address: Bech32Address): Promise<AccountInfo>;
  broadcastTx(txBytes: Uint8Array, mode?: BroadcastMode): Promise<BroadcastResponse>;
  getTx(hash: TxHash): Promise<TxStatus>;
}

export type ChainStatus =
  | { status: 'moving'; height: bigint }
  | { status: 'syncing' }
  | { status: 'waiting_to_start' };

// ============================================================================
// Submission Types
// ============================================================================

export type SubmissionResult =
  | { status: 'rejected'; txHash?: TxHash; error: StakelineError }
  | { status: 'pending'; txHash: TxHash }
  | {
      status: 'included';
      txHash: TxHash;
      height: bigint;
      code: number;
      rawLog: string;
      gasUsed: bigint;
      events: TxEvent[];
    }
  | { status: 'timed_out'; txHash: TxHash };

export interface ConfirmationOptions {
  /** Milliseconds between status queries */
  pollInterval?: number;
  /** Milliseconds after which waiting is abandoned */
  deadline?: number;
}

// ============================================================================
// Error Types
// ============================================================================

export class StakelineError extends Error {
  constructor(
    message: string,
    public code: StakelineErrorCode,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'StakelineError';
  }
}

export enum StakelineErrorCode {
  // Seed phrase errors (1xxx)
  INVALID_CHECKSUM = 1001,
  UNKNOWN_WORD = 1002,
  INVALID_LENGTH = 1003,
  INVALID_STRENGTH = 1004,

  // Derivation errors (2xxx)
  INVALID_PATH = 2001,
  SCALAR_OUT_OF_RANGE = 2002,
  INVALID_SEED = 2003,

  // Signing errors (3xxx)
  INVALID_KEY = 3001,
  INVALID_PREFIX = 3002,

  // Encoding errors (4xxx)
  MALFORMED_PAYLOAD = 4001,
  INVALID_ADDRESS = 4002,

  // Sequence errors (5xxx)
  SEQUENCE_STALE = 5001,
  ACCOUNT_UNKNOWN = 5002,

  // Broadcast errors (6xxx)
  INVALID_SIGNATURE = 6001,
  INSUFFICIENT_FEE = 6002,
  MEMPOOL_FULL = 6003,
  NODE_UNAVAILABLE = 6004,
  TX_REJECTED = 6005,
  BAD_RESPONSE = 6006,

  // Confirmation errors (7xxx)
  CONFIRMATION_TIMEOUT = 7001,

  // Configuration errors (8xxx)
  INVALID_CONFIG = 8001,
}

export type PhraseErrorKind =
  | 'invalid_checksum'
  | 'unknown_word'
  | 'invalid_length'
  | 'invalid_strength';

const PHRASE_CODES: Record<PhraseErrorKind, StakelineErrorCode> = {
  invalid_checksum: StakelineErrorCode.INVALID_CHECKSUM,
  unknown_word: StakelineErrorCode.UNKNOWN_WORD,
  invalid_length: StakelineErrorCode.INVALID_LENGTH,
  invalid_strength: StakelineErrorCode.INVALID_STRENGTH,
};

export class PhraseError extends StakelineError {
  constructor(
    public readonly kind: PhraseErrorKind,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message, PHRASE_CODES[kind], details);
    this.name = 'PhraseError';
  }
}

export type DerivationErrorKind = 'invalid_path' | 'scalar_out_of_range' | 'invalid_seed';

const DERIVATION_CODES: Record<DerivationErrorKind, StakelineErrorCode> = {
  invalid_path: StakelineErrorCode.INVALID_PATH,
  scalar_out_of_range: StakelineErrorCode.SCALAR_OUT_OF_RANGE,
  invalid_seed: StakelineErrorCode.INVALID_SEED,
};

export class DerivationError extends StakelineError {
  constructor(
    public readonly kind: DerivationErrorKind,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message, DERIVATION_CODES[kind], details);
    this.name = 'DerivationError';
  }
}

export type SigningErrorKind = 'invalid_key' | 'invalid_prefix';

export class SigningError extends StakelineError {
  constructor(
    public readonly kind: SigningErrorKind,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(
      message,
      kind === 'invalid_key' ? StakelineErrorCode.INVALID_KEY : StakelineErrorCode.INVALID_PREFIX,
      details
    );
    this.name = 'SigningError';
  }
}

export type EncodingErrorKind = 'malformed_payload' | 'invalid_address';

export class EncodingError extends StakelineError {
  constructor(
    public readonly kind: EncodingErrorKind,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(
      message,
      kind === 'malformed_payload'
        ? StakelineErrorCode.MALFORMED_PAYLOAD
        : StakelineErrorCode.INVALID_ADDRESS,
      details
    );
    this.name = 'EncodingError';
  }
}

export type SequenceErrorKind = 'stale' | 'unknown';

export class SequenceError extends StakelineError {
  constructor(
    public readonly kind: SequenceErrorKind,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(
      message,
      kind === 'stale' ? StakelineErrorCode.SEQUENCE_STALE : StakelineErrorCode.ACCOUNT_UNKNOWN,
      details
    );
    this.name = 'SequenceError';
  }
}

export type BroadcastErrorKind =
  | 'invalid_signature'
  | 'insufficient_fee'
  | 'mempool_full'
  | 'node_unavailable'
  | 'rejected'
  | 'bad_response';

const BROADCAST_CODES: Record<BroadcastErrorKind, StakelineErrorCode> = {
  invalid_signature: StakelineErrorCode.INVALID_SIGNATURE,
  insufficient_fee: StakelineErrorCode.INSUFFICIENT_FEE,
  mempool_full: StakelineErrorCode.MEMPOOL_FULL,
  node_unavailable: StakelineErrorCode.NODE_UNAVAILABLE,
  rejected: StakelineErrorCode.TX_REJECTED,
  bad_response: StakelineErrorCode.BAD_RESPONSE,
};

export class BroadcastError extends StakelineError {
  constructor(
    public readonly kind: BroadcastErrorKind,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message, BROADCAST_CODES[kind], details);
    this.name = 'BroadcastError';
  }
}

export class ConfirmationTimeout extends StakelineError {
  constructor(
    public readonly txHash: TxHash,
    public readonly waitedMs: number
  ) {
    super(
      `Transaction ${txHash} was not included within ${waitedMs}ms`,
      StakelineErrorCode.CONFIRMATION_TIMEOUT,
      { txHash, waitedMs }
    );
    this.name = 'ConfirmationTimeout';
  }
}

export class ConfigError extends StakelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, StakelineErrorCode.INVALID_CONFIG, details);
    this.name = 'ConfigError';
  }
}

/**
 * Transient failures that may succeed when repeated unchanged
 */
export function isTransientError(error: unknown): boolean {
  return (
    error instanceof BroadcastError &&
    (error.kind === 'mempool_full' || error.kind === 'node_unavailable')
  );
}
