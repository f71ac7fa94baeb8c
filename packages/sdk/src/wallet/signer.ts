/**
 * Stakeline Transaction Signer
 *
 * ECDSA over secp256k1 with RFC 6979 deterministic nonces. This is the
 * only place curve signing happens; signatures are 64-byte r||s with S
 * normalized to the lower half of the curve order.
 */

import * as secp256k1 from '@noble/secp256k1';
import { hmac } from '@noble/hashes/hmac';
import { sha256 } from '@noble/hashes/sha256';
import { SigningError } from '../types/index.js';
import type { Bech32Address, SignDoc, TxSigner } from '../types/index.js';
import { hexToBytes } from '../utils/index.js';
import { encodeSignDoc } from '../tx/builder.js';
import { DEFAULT_HD_PATH, derivePath } from './hd.js';
import type { InvalidChildPolicy } from './hd.js';
import { privateKeyFromSecret, publicKeyFromPrivate, toAddress } from './keys.js';
import { seedFromPhrase } from './mnemonic.js';

// RFC6979 deterministic k generation for secp256k1 signing
secp256k1.utils.hmacSha256Sync = (k, ...m) => hmac(sha256, k, secp256k1.utils.concatBytes(...m));

export const DEFAULT_PREFIX = 'cosmos';

export interface SignerOptions {
  /** Bech32 prefix used by address() when none is passed */
  prefix?: string;
}

export interface HdSignerOptions extends SignerOptions {
  path?: string;
  passphrase?: string;
  invalidChild?: InvalidChildPolicy;
}

/**
 * Signs SHA-256(message) and returns the low-S compact signature
 */
export function sign(privateKey: Uint8Array, message: Uint8Array): Uint8Array {
  if (privateKey.length !== 32 || !secp256k1.utils.isValidPrivateKey(privateKey)) {
    throw new SigningError('invalid_key', 'Private key must be a 32-byte scalar in [1, n-1]');
  }

  const compact = secp256k1.signSync(sha256(message), privateKey, {
    der: false,
    canonical: true,
  });

  const signature = secp256k1.Signature.fromCompact(compact);
  return signature.hasHighS()
    ? signature.normalizeS().toCompactRawBytes()
    : signature.toCompactRawBytes();
}

/**
 * Strict verification: high-S signatures are rejected
 */
export function verifySignature(
  publicKey: Uint8Array,
  message: Uint8Array,
  signature: Uint8Array
): boolean {
  if (signature.length !== 64) {
    return false;
  }
  try {
    return secp256k1.verify(signature, sha256(message), publicKey, { strict: true });
  } catch {
    return false;
  }
}

/**
 * Single-key signer. The private key stays inside the instance.
 */
export class Secp256k1Signer implements TxSigner {
  private readonly privateKey: Uint8Array;
  public readonly publicKey: Uint8Array;
  public readonly prefix: string;

  constructor(privateKey: Uint8Array, options: SignerOptions = {}) {
    this.publicKey = publicKeyFromPrivate(privateKey);
    this.privateKey = privateKey.slice();
    this.prefix = options.prefix ?? DEFAULT_PREFIX;
  }

  static fromPhrase(phrase: string, options: HdSignerOptions = {}): Secp256k1Signer {
    return Secp256k1Signer.fromSeed(seedFromPhrase(phrase, options.passphrase ?? ''), options);
  }

  static fromSeed(seed: Uint8Array, options: HdSignerOptions = {}): Secp256k1Signer {
    const key = derivePath(seed, options.path ?? DEFAULT_HD_PATH, {
      invalidChild: options.invalidChild,
    });
    if (!key.privateKey) {
      throw new SigningError('invalid_key', 'Derived key has no private scalar');
    }
    return new Secp256k1Signer(key.privateKey, options);
  }

  /**
   * Accepts raw bytes or a hex string (optionally 0x-prefixed)
   */
  static fromPrivateKey(privateKey: Uint8Array | string, options: SignerOptions = {}): Secp256k1Signer {
    const bytes = typeof privateKey === 'string' ? hexToBytes(privateKey) : privateKey;
    return new Secp256k1Signer(bytes, options);
  }

  /**
   * Development key derived from an arbitrary secret
   */
  static fromSecret(secret: string | Uint8Array, options: SignerOptions = {}): Secp256k1Signer {
    return new Secp256k1Signer(privateKeyFromSecret(secret), options);
  }

  address(prefix: string = this.prefix): Bech32Address {
    return toAddress(this.publicKey, prefix);
  }

  sign(message: Uint8Array): Uint8Array {
    return sign(this.privateKey, message);
  }

  signDoc(doc: SignDoc): Uint8Array {
    return this.sign(encodeSignDoc(doc));
  }

  verify(message: Uint8Array, signature: Uint8Array): boolean {
    return verifySignature(this.publicKey, message, signature);
  }
}
