/**
 * Hierarchical Deterministic Key Tree (BIP-32 over secp256k1)
 *
 * Derivation is an iterative fold over the path segments. Every returned
 * key owns fresh byte arrays, so callers may zero or mutate them freely.
 */

import * as secp256k1 from '@noble/secp256k1';
import { hmac } from '@noble/hashes/hmac';
import { sha512 } from '@noble/hashes/sha512';
import { sha256 } from '@noble/hashes/sha256';
import { ripemd160 } from '@noble/hashes/ripemd160';
import { DerivationError } from '../types/index.js';
import type { ExtendedKey, PathSegment } from '../types/index.js';
import { bigIntToBytes, bytesToBigInt } from '../utils/index.js';

export const HARDENED_OFFSET = 0x80000000;

/** Default account path for coin type 118 */
export const DEFAULT_HD_PATH = "m/44'/118'/0'/0/0";

const MASTER_SECRET = new TextEncoder().encode('Bitcoin seed');
const N = secp256k1.CURVE.n;

export type InvalidChildPolicy = 'error' | 'skip';

export interface DerivePathOptions {
  /**
   * What to do when a child scalar falls outside the curve order.
   * 'skip' retries at the next index, as BIP-32 permits.
   */
  invalidChild?: InvalidChildPolicy;
}

// ============================================================================
// Paths
// ============================================================================

export function parsePath(path: string): PathSegment[] {
  const parts = path.trim().split('/');
  if (parts[0] !== 'm') {
    throw new DerivationError('invalid_path', `Derivation path must start with "m": ${path}`, {
      path,
    });
  }

  return parts.slice(1).map((part) => {
    const match = /^(\d+)(['hH]?)$/.exec(part);
    if (!match) {
      throw new DerivationError('invalid_path', `Invalid path segment "${part}" in ${path}`, {
        path,
      });
    }
    const index = Number(match[1]);
    if (!Number.isSafeInteger(index) || index >= HARDENED_OFFSET) {
      throw new DerivationError('invalid_path', `Path index ${match[1]} is out of range`, {
        path,
      });
    }
    return { index, hardened: match[2] !== '' };
  });
}

export function formatPath(segments: PathSegment[]): string {
  return ['m', ...segments.map((s) => `${s.index}${s.hardened ? "'" : ''}`)].join('/');
}

// ============================================================================
// Keys
// ============================================================================

/**
 * Root key from a 16-64 byte seed
 */
export function rootKey(seed: Uint8Array): ExtendedKey {
  if (seed.length < 16 || seed.length > 64) {
    throw new DerivationError('invalid_seed', `Seed must be 16-64 bytes, got ${seed.length}`, {
      length: seed.length,
    });
  }

  const I = hmac(sha512, MASTER_SECRET, seed);
  const key = I.slice(0, 32);
  const scalar = bytesToBigInt(key);
  if (scalar === 0n || scalar >= N) {
    throw new DerivationError('scalar_out_of_range', 'Seed produces an invalid master key');
  }

  return {
    privateKey: key,
    publicKey: secp256k1.getPublicKey(key, true),
    chainCode: I.slice(32),
    depth: 0,
    index: 0,
    parentFingerprint: 0,
  };
}

/**
 * Derives one child. Hardened children need the parent's private key;
 * non-hardened children of a watch-only key go through
 * {@link derivePublicChild}.
 */
export function deriveChild(parent: ExtendedKey, index: number, hardened: boolean): ExtendedKey {
  if (!Number.isInteger(index) || index < 0 || index >= HARDENED_OFFSET) {
    throw new DerivationError('invalid_path', `Child index ${index} is out of range`, { index });
  }

  const parentKey = parent.privateKey;
  if (parentKey === undefined) {
    if (hardened) {
      throw new DerivationError(
        'invalid_path',
        'Hardened derivation requires a private key'
      );
    }
    return derivePublicChild(parent, index);
  }

  const childIndex = hardened ? index + HARDENED_OFFSET : index;
  const indexBuffer = new Uint8Array(4);
  new DataView(indexBuffer.buffer).setUint32(0, childIndex, false);

  let data: Uint8Array;
  if (hardened) {
    data = new Uint8Array(1 + 32 + 4);
    data[0] = 0x00;
    data.set(parentKey, 1);
    data.set(indexBuffer, 33);
  } else {
    data = new Uint8Array(33 + 4);
    data.set(parent.publicKey, 0);
    data.set(indexBuffer, 33);
  }

  const I = hmac(sha512, parent.chainCode, data);
  const il = bytesToBigInt(I.slice(0, 32));
  if (il >= N) {
    throw outOfRange(childIndex);
  }

  // child = parse256(IL) + parent (mod n)
  const child = (il + bytesToBigInt(parentKey)) % N;
  if (child === 0n) {
    throw outOfRange(childIndex);
  }

  const privateKey = bigIntToBytes(child, 32);
  return {
    privateKey,
    publicKey: secp256k1.getPublicKey(privateKey, true),
    chainCode: I.slice(32),
    depth: parent.depth + 1,
    index: childIndex,
    parentFingerprint: fingerprint(parent.publicKey),
  };
}

/**
 * Non-hardened derivation using only the parent's public point
 */
export function derivePublicChild(parent: ExtendedKey, index: number): ExtendedKey {
  if (!Number.isInteger(index) || index < 0 || index >= HARDENED_OFFSET) {
    throw new DerivationError(
      'invalid_path',
      `Public derivation needs a non-hardened index, got ${index}`,
      { index }
    );
  }

  const data = new Uint8Array(33 + 4);
  data.set(parent.publicKey, 0);
  new DataView(data.buffer).setUint32(33, index, false);

  const I = hmac(sha512, parent.chainCode, data);
  const il = bytesToBigInt(I.slice(0, 32));
  if (il >= N) {
    throw outOfRange(index);
  }

  const parentPoint = secp256k1.Point.fromHex(parent.publicKey);
  const point = il === 0n ? parentPoint : parentPoint.add(secp256k1.Point.BASE.multiply(il));
  if (point.equals(secp256k1.Point.ZERO)) {
    throw outOfRange(index);
  }

  return {
    publicKey: point.toRawBytes(true),
    chainCode: I.slice(32),
    depth: parent.depth + 1,
    index,
    parentFingerprint: fingerprint(parent.publicKey),
  };
}

/**
 * Watch-only copy of a key
 */
export function neuter(key: ExtendedKey): ExtendedKey {
  return {
    publicKey: key.publicKey.slice(),
    chainCode: key.chainCode.slice(),
    depth: key.depth,
    index: key.index,
    parentFingerprint: key.parentFingerprint,
  };
}

export function derivePath(
  seed: Uint8Array,
  path: string | PathSegment[],
  options: DerivePathOptions = {}
): ExtendedKey {
  const segments = typeof path === 'string' ? parsePath(path) : path;
  return deriveSegments(rootKey(seed), segments, options.invalidChild ?? 'error');
}

function deriveSegments(
  start: ExtendedKey,
  segments: PathSegment[],
  policy: InvalidChildPolicy
): ExtendedKey {
  let key = start;
  for (const segment of segments) {
    key = deriveWithPolicy(key, segment, policy);
  }
  return key;
}

function deriveWithPolicy(
  parent: ExtendedKey,
  segment: PathSegment,
  policy: InvalidChildPolicy
): ExtendedKey {
  let index = segment.index;
  for (;;) {
    try {
      return deriveChild(parent, index, segment.hardened);
    } catch (error) {
      const retryable =
        policy === 'skip' &&
        error instanceof DerivationError &&
        error.kind === 'scalar_out_of_range' &&
        index + 1 < HARDENED_OFFSET;
      if (!retryable) {
        throw error;
      }
      index += 1;
    }
  }
}

function fingerprint(publicKey: Uint8Array): number {
  const id = ripemd160(sha256(publicKey));
  return new DataView(id.buffer, id.byteOffset, 4).getUint32(0, false);
}

function outOfRange(index: number): DerivationError {
  return new DerivationError(
    'scalar_out_of_range',
    `Child ${index} is outside the curve order, the next index must be used`,
    { index }
  );
}

// ============================================================================
// Key Tree
// ============================================================================

/**
 * One seed plus an optional cache of derived keys by path.
 *
 * Cached keys are copied on the way out so the cache cannot be mutated
 * through a returned key.
 */
export class KeyTree {
  private readonly root: ExtendedKey;
  private readonly cache?: Map<string, ExtendedKey>;
  private readonly policy: InvalidChildPolicy;

  constructor(seed: Uint8Array, options: DerivePathOptions & { cache?: boolean } = {}) {
    this.root = rootKey(seed);
    this.policy = options.invalidChild ?? 'error';
    if (options.cache) {
      this.cache = new Map();
    }
  }

  get master(): ExtendedKey {
    return copyKey(this.root);
  }

  derive(path: string | PathSegment[]): ExtendedKey {
    const segments = typeof path === 'string' ? parsePath(path) : path;
    const cacheKey = formatPath(segments);

    const cached = this.cache?.get(cacheKey);
    if (cached) {
      return copyKey(cached);
    }

    const key = deriveSegments(this.root, segments, this.policy);
    this.cache?.set(cacheKey, key);
    return copyKey(key);
  }

  /**
   * Account key at m/44'/coinType'/account'/0/index
   */
  deriveAccount(coinType: number, account = 0, index = 0): ExtendedKey {
    return this.derive([
      { index: 44, hardened: true },
      { index: coinType, hardened: true },
      { index: account, hardened: true },
      { index: 0, hardened: false },
      { index, hardened: false },
    ]);
  }

  get cacheSize(): number {
    return this.cache?.size ?? 0;
  }

  clearCache(): void {
    this.cache?.clear();
  }
}

function copyKey(key: ExtendedKey): ExtendedKey {
  return {
    ...(key.privateKey ? { privateKey: key.privateKey.slice() } : {}),
    publicKey: key.publicKey.slice(),
    chainCode: key.chainCode.slice(),
    depth: key.depth,
    index: key.index,
    parentFingerprint: key.parentFingerprint,
  };
}
