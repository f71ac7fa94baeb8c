/**
 * Seed phrase handling (BIP-39)
 *
 * Phrases are validated against the English wordlist and their embedded
 * checksum before any seed is derived from them. Phrases, passphrases and
 * seeds are never logged or attached to error details.
 */

import * as bip39 from 'bip39';
import { PhraseError } from '../types/index.js';
import type { SeedPhrase } from '../types/index.js';

/** Entropy sizes in bits and the word counts they produce */
export const PHRASE_STRENGTHS = [128, 160, 192, 224, 256] as const;
export type PhraseStrength = (typeof PHRASE_STRENGTHS)[number];

const WORD_COUNTS = [12, 15, 18, 21, 24];

const ENGLISH = bip39.wordlists.english;
const ENGLISH_INDEX = new Set(ENGLISH);

function isStrength(value: number): value is PhraseStrength {
  return PHRASE_STRENGTHS.some((s) => s === value);
}

function splitWords(phrase: string): string[] {
  return phrase
    .normalize('NFKD')
    .trim()
    .split(/\s+/)
    .filter((w) => w.length > 0);
}

/**
 * Generates a new phrase from fresh CSPRNG entropy
 */
export function generatePhrase(strength: number = 256): SeedPhrase {
  if (!isStrength(strength)) {
    throw new PhraseError(
      'invalid_strength',
      `Unsupported entropy strength ${strength}, expected one of ${PHRASE_STRENGTHS.join(', ')}`,
      { strength }
    );
  }
  return toSeedPhrase(bip39.generateMnemonic(strength, undefined, ENGLISH));
}

/**
 * Maps caller-supplied entropy to its phrase
 */
export function phraseFromEntropy(entropy: Uint8Array): SeedPhrase {
  const bits = entropy.length * 8;
  if (!isStrength(bits)) {
    throw new PhraseError(
      'invalid_strength',
      `Unsupported entropy length ${entropy.length} bytes`,
      { strength: bits }
    );
  }
  return toSeedPhrase(bip39.entropyToMnemonic(Buffer.from(entropy), ENGLISH));
}

/**
 * Checks word count, wordlist membership and checksum, returning the
 * normalized phrase
 */
export function validatePhrase(phrase: string): SeedPhrase {
  const words = splitWords(phrase);

  if (!WORD_COUNTS.includes(words.length)) {
    throw new PhraseError(
      'invalid_length',
      `Seed phrase has ${words.length} words, expected one of ${WORD_COUNTS.join(', ')}`,
      { wordCount: words.length }
    );
  }

  const unknown = words.findIndex((w) => !ENGLISH_INDEX.has(w));
  if (unknown !== -1) {
    throw new PhraseError(
      'unknown_word',
      `Seed phrase word ${unknown + 1} is not in the wordlist`,
      { position: unknown + 1, word: words[unknown] }
    );
  }

  const normalized = words.join(' ');
  try {
    bip39.mnemonicToEntropy(normalized, ENGLISH);
  } catch (error) {
    throw new PhraseError('invalid_checksum', 'Seed phrase checksum does not match', {
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  return toSeedPhrase(normalized);
}

export function isValidPhrase(phrase: string): boolean {
  try {
    validatePhrase(phrase);
    return true;
  } catch {
    return false;
  }
}

/**
 * Derives the 64-byte seed (PBKDF2-HMAC-SHA512, 2048 rounds)
 */
export function seedFromPhrase(phrase: string, passphrase = ''): Uint8Array {
  const normalized = validatePhrase(phrase);
  return new Uint8Array(bip39.mnemonicToSeedSync(normalized, passphrase));
}

function toSeedPhrase(value: string): SeedPhrase {
  // generated and checked phrases only
  return value as SeedPhrase;
}
