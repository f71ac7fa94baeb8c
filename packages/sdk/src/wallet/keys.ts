/**
 * Stakeline Key & Address Helpers
 *
 * Account addresses are bech32(prefix, RIPEMD-160(SHA-256(compressed key))).
 * The 20-byte account id behind an address is modelled by AccountAddress.
 */

import { bech32 } from 'bech32';
import { sha256 } from '@noble/hashes/sha256';
import { ripemd160 } from '@noble/hashes/ripemd160';
import * as secp256k1 from '@noble/secp256k1';
import { EncodingError, SigningError } from '../types/index.js';
import type { Bech32Address } from '../types/index.js';
import { bigIntToBytes, bytesEqual, bytesToBigInt, bytesToHex, hexToBytes } from '../utils/index.js';

/** Amino prefix of a secp256k1 public key (tendermint/PubKeySecp256k1) */
const AMINO_SECP256K1_PREFIX = new Uint8Array([0xeb, 0x5a, 0xe9, 0x87, 0x21]);

const ADDRESS_LENGTHS = [20, 32];

/**
 * Checks and canonicalizes a bech32 human-readable part
 */
export function normalizePrefix(prefix: string): string {
  if (prefix.length === 0) {
    throw new SigningError('invalid_prefix', 'Address prefix must not be empty');
  }
  for (let i = 0; i < prefix.length; i++) {
    const c = prefix.charCodeAt(i);
    if (c < 33 || c > 126) {
      throw new SigningError('invalid_prefix', 'Address prefix contains non-printable characters', {
        prefix,
      });
    }
  }

  const lower = prefix.toLowerCase();
  const upper = prefix.toUpperCase();
  if (prefix !== lower && prefix !== upper) {
    throw new SigningError('invalid_prefix', `Address prefix "${prefix}" mixes upper and lower case`, {
      prefix,
    });
  }
  return lower;
}

function encodeBech32(prefix: string, data: Uint8Array): string {
  const hrp = normalizePrefix(prefix);
  try {
    return bech32.encode(hrp, bech32.toWords(data));
  } catch (error) {
    throw new SigningError(
      'invalid_prefix',
      `Cannot encode with prefix "${hrp}": ${error instanceof Error ? error.message : String(error)}`,
      { prefix: hrp }
    );
  }
}

function decodeBech32(value: string, limit?: number): { prefix: string; data: Uint8Array } {
  try {
    const decoded = bech32.decode(value, limit);
    return { prefix: decoded.prefix, data: new Uint8Array(bech32.fromWords(decoded.words)) };
  } catch (error) {
    throw new EncodingError(
      'invalid_address',
      `Invalid bech32 string ${value}: ${error instanceof Error ? error.message : String(error)}`,
      { value }
    );
  }
}

/**
 * Compressed 33-byte public key for a 32-byte scalar
 */
export function publicKeyFromPrivate(privateKey: Uint8Array): Uint8Array {
  if (privateKey.length !== 32 || !secp256k1.utils.isValidPrivateKey(privateKey)) {
    throw new SigningError('invalid_key', 'Private key must be a 32-byte scalar in [1, n-1]');
  }
  return secp256k1.getPublicKey(privateKey, true);
}

export function addressBytes(publicKey: Uint8Array): Uint8Array {
  if (publicKey.length !== 33 || (publicKey[0] !== 0x02 && publicKey[0] !== 0x03)) {
    throw new SigningError('invalid_key', 'Public key must be a 33-byte compressed point', {
      length: publicKey.length,
    });
  }
  return ripemd160(sha256(publicKey));
}

export function toAddress(publicKey: Uint8Array, prefix: string): Bech32Address {
  return encodeBech32(prefix, addressBytes(publicKey));
}

/**
 * Legacy amino-encoded bech32 public key, e.g. cosmospub1addwnpep...
 */
export function publicKeyToBech32(publicKey: Uint8Array, prefix: string): string {
  addressBytes(publicKey);
  const data = new Uint8Array(AMINO_SECP256K1_PREFIX.length + publicKey.length);
  data.set(AMINO_SECP256K1_PREFIX, 0);
  data.set(publicKey, AMINO_SECP256K1_PREFIX.length);
  return encodeBech32(`${normalizePrefix(prefix)}pub`, data);
}

export function publicKeyFromBech32(value: string): Uint8Array {
  const { data } = decodeBech32(value);
  const prefix = data.slice(0, AMINO_SECP256K1_PREFIX.length);
  if (data.length !== 38 || !bytesEqual(prefix, AMINO_SECP256K1_PREFIX)) {
    throw new EncodingError('invalid_address', 'Not an amino secp256k1 public key', { value });
  }
  return data.slice(AMINO_SECP256K1_PREFIX.length);
}

/**
 * Maps an arbitrary secret to a valid scalar: SHA-256(secret) mod (n - 1) + 1.
 * Meant for test and development keys only.
 */
export function privateKeyFromSecret(secret: string | Uint8Array): Uint8Array {
  const bytes = typeof secret === 'string' ? new TextEncoder().encode(secret) : secret;
  const scalar = (bytesToBigInt(sha256(bytes)) % (secp256k1.CURVE.n - 1n)) + 1n;
  return bigIntToBytes(scalar, 32);
}

/**
 * Raw account id behind a bech32 address
 */
export class AccountAddress {
  private readonly data: Uint8Array;

  constructor(bytes: Uint8Array) {
    if (!ADDRESS_LENGTHS.includes(bytes.length)) {
      throw new EncodingError(
        'invalid_address',
        `Address must be ${ADDRESS_LENGTHS.join(' or ')} bytes, got ${bytes.length}`,
        { length: bytes.length }
      );
    }
    this.data = bytes.slice();
  }

  static fromPublicKey(publicKey: Uint8Array): AccountAddress {
    return new AccountAddress(addressBytes(publicKey));
  }

  /**
   * Parses a bech32 address, optionally requiring a specific prefix
   */
  static fromBech32(address: string, expectedPrefix?: string): AccountAddress {
    const { prefix, data } = decodeBech32(address);
    if (expectedPrefix !== undefined && prefix !== expectedPrefix.toLowerCase()) {
      throw new EncodingError(
        'invalid_address',
        `Expected prefix "${expectedPrefix}", got "${prefix}"`,
        { address }
      );
    }
    return new AccountAddress(data);
  }

  static fromHex(hex: string): AccountAddress {
    try {
      return new AccountAddress(hexToBytes(hex));
    } catch (error) {
      if (error instanceof EncodingError && error.kind === 'malformed_payload') {
        throw new EncodingError('invalid_address', `Invalid hex address ${hex}`, { hex });
      }
      throw error;
    }
  }

  static isValid(address: string, expectedPrefix?: string): boolean {
    try {
      AccountAddress.fromBech32(address, expectedPrefix);
      return true;
    } catch {
      return false;
    }
  }

  get bytes(): Uint8Array {
    return this.data.slice();
  }

  toBech32(prefix: string): Bech32Address {
    return encodeBech32(prefix, this.data);
  }

  /** Upper-case hex, as the node prints account ids */
  toHex(): string {
    return bytesToHex(this.data).toUpperCase();
  }

  equals(other: AccountAddress): boolean {
    return bytesEqual(this.data, other.data);
  }
}
