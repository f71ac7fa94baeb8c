/**
 * Maps the node's CheckTx result codes onto the error taxonomy.
 *
 * Codes are only meaningful together with their codespace; the numbers
 * below are the Cosmos SDK's own ("sdk") registrations.
 */

import {
  BroadcastError,
  EncodingError,
  SequenceError,
  StakelineError,
} from '../types/index.js';

export const SDK_CODESPACE = 'sdk';

export const SdkErrorCode = {
  TX_DECODE: 2,
  INVALID_SEQUENCE: 3,
  UNAUTHORIZED: 4,
  INSUFFICIENT_FEE: 13,
  TX_IN_MEMPOOL_CACHE: 19,
  MEMPOOL_IS_FULL: 20,
  WRONG_SEQUENCE: 32,
} as const;

const SEQUENCE_MISMATCH = /expected (\d+), got (\d+)/;

export type NodeVerdict =
  | { accepted: true; alreadyKnown: boolean }
  | { accepted: false; error: StakelineError };

/**
 * Classifies a broadcast response. Code 0 is acceptance; a tx already in
 * the mempool cache counts as accepted since it is pending either way.
 */
export function classifyNodeError(code: number, codespace: string, rawLog: string): NodeVerdict {
  if (code === 0) {
    return { accepted: true, alreadyKnown: false };
  }

  const details: Record<string, unknown> = { code, codespace, rawLog };

  if (codespace !== SDK_CODESPACE) {
    return {
      accepted: false,
      error: new BroadcastError('rejected', `Transaction rejected (${codespace}/${code}): ${rawLog}`, details),
    };
  }

  switch (code) {
    case SdkErrorCode.TX_IN_MEMPOOL_CACHE:
      return { accepted: true, alreadyKnown: true };

    case SdkErrorCode.TX_DECODE:
      return {
        accepted: false,
        error: new EncodingError('malformed_payload', `Node could not decode transaction: ${rawLog}`, details),
      };

    case SdkErrorCode.UNAUTHORIZED:
      return {
        accepted: false,
        error: new BroadcastError('invalid_signature', `Signature verification failed: ${rawLog}`, details),
      };

    case SdkErrorCode.INSUFFICIENT_FEE:
      return {
        accepted: false,
        error: new BroadcastError('insufficient_fee', `Insufficient fee: ${rawLog}`, details),
      };

    case SdkErrorCode.MEMPOOL_IS_FULL:
      return {
        accepted: false,
        error: new BroadcastError('mempool_full', `Mempool is full: ${rawLog}`, details),
      };

    case SdkErrorCode.INVALID_SEQUENCE:
    case SdkErrorCode.WRONG_SEQUENCE: {
      const match = SEQUENCE_MISMATCH.exec(rawLog);
      return {
        accepted: false,
        error: new SequenceError('stale', `Account sequence mismatch: ${rawLog}`, {
          ...details,
          ...(match ? { expected: BigInt(match[1]), got: BigInt(match[2]) } : {}),
        }),
      };
    }

    default:
      return {
        accepted: false,
        error: new BroadcastError('rejected', `Transaction rejected (${codespace}/${code}): ${rawLog}`, details),
      };
  }
}

export function isStaleSequence(error: unknown): error is SequenceError {
  return error instanceof SequenceError && error.kind === 'stale';
}
