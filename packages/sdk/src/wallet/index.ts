/**
 * Stakeline Wallet Module
 *
 * Seed phrases, hierarchical key derivation, addresses and signing for
 * secp256k1 accounts.
 */

export {
  generatePhrase,
  phraseFromEntropy,
  validatePhrase,
  isValidPhrase,
  seedFromPhrase,
  PHRASE_STRENGTHS,
} from './mnemonic.js';
export type { PhraseStrength } from './mnemonic.js';

export {
  parsePath,
  formatPath,
  rootKey,
  deriveChild,
  derivePublicChild,
  neuter,
  derivePath,
  KeyTree,
  DEFAULT_HD_PATH,
  HARDENED_OFFSET,
} from './hd.js';
export type { DerivePathOptions, InvalidChildPolicy } from './hd.js';

export {
  normalizePrefix,
  publicKeyFromPrivate,
  addressBytes,
  toAddress,
  publicKeyToBech32,
  publicKeyFromBech32,
  privateKeyFromSecret,
  AccountAddress,
} from './keys.js';

export { sign, verifySignature, Secp256k1Signer, DEFAULT_PREFIX } from './signer.js';
export type { SignerOptions, HdSignerOptions } from './signer.js';
