/**
 * Transaction Builder (SIGN_MODE_DIRECT)
 *
 * Produces the exact protobuf bytes the node recomputes when it verifies a
 * signature: TxBody, AuthInfo, SignDoc and the final TxRaw. Every function
 * here is pure.
 */

import {
  AuthInfo,
  SignDoc as ProtoSignDoc,
  TxBody,
  TxRaw,
} from 'cosmjs-types/cosmos/tx/v1beta1/tx';
import { Any } from 'cosmjs-types/google/protobuf/any';
import { PubKey } from 'cosmjs-types/cosmos/crypto/secp256k1/keys';
import { SignMode } from 'cosmjs-types/cosmos/tx/signing/v1beta1/signing';
import { EncodingError, SigningError } from '../types/index.js';
import type {
  Fee,
  Msg,
  SignDoc,
  SignedTx,
  SignerData,
  TxSigner,
  UnsignedTx,
} from '../types/index.js';
import { bytesEqual, hashTxBytes } from '../utils/index.js';
import { coinFromProto, coinToProto, sortCoins } from './coin.js';
import { SECP256K1_PUBKEY_TYPE_URL, isValidTypeUrl } from './msg.js';

export const MAX_MEMO_BYTES = 256;

export interface DecodedTx {
  messages: Msg[];
  memo: string;
  timeoutHeight: bigint;
  signers: Array<{ publicKey?: Uint8Array; sequence: bigint }>;
  fee: Fee;
  signatures: Uint8Array[];
}

// ============================================================================
// Encoding
// ============================================================================

export function buildTxBody(messages: Msg[], memo = '', timeoutHeight = 0n): Uint8Array {
  if (messages.length === 0) {
    throw new EncodingError('malformed_payload', 'A transaction needs at least one message');
  }
  for (const msg of messages) {
    if (!isValidTypeUrl(msg.typeUrl)) {
      throw new EncodingError('malformed_payload', `Invalid message type url "${msg.typeUrl}"`, {
        typeUrl: msg.typeUrl,
      });
    }
  }
  const memoBytes = new TextEncoder().encode(memo).length;
  if (memoBytes > MAX_MEMO_BYTES) {
    throw new EncodingError(
      'malformed_payload',
      `Memo is ${memoBytes} bytes, the limit is ${MAX_MEMO_BYTES}`,
      { memoBytes }
    );
  }
  if (timeoutHeight < 0n) {
    throw new EncodingError('malformed_payload', 'Timeout height must not be negative');
  }

  return TxBody.encode(
    TxBody.fromPartial({
      messages: messages.map((m) => Any.fromPartial({ typeUrl: m.typeUrl, value: m.value })),
      memo,
      timeoutHeight,
    })
  ).finish();
}

export function encodePublicKey(publicKey: Uint8Array): Any {
  if (publicKey.length !== 33) {
    throw new SigningError('invalid_key', 'Public key must be a 33-byte compressed point');
  }
  return Any.fromPartial({
    typeUrl: SECP256K1_PUBKEY_TYPE_URL,
    value: PubKey.encode(PubKey.fromPartial({ key: publicKey })).finish(),
  });
}

/**
 * Signer infos in signer order, followed by the fee. Fee coins are sorted
 * by denom so any permutation of the same coins encodes identically.
 */
export function buildAuthInfo(signers: SignerData[], fee: Fee): Uint8Array {
  if (fee.gasLimit < 0n) {
    throw new EncodingError('malformed_payload', 'Gas limit must not be negative');
  }
  for (const c of fee.amount) {
    if (c.amount < 0n) {
      throw new EncodingError('malformed_payload', `Fee amount must not be negative: ${c.denom}`);
    }
  }

  return AuthInfo.encode(
    AuthInfo.fromPartial({
      signerInfos: signers.map((signer) => ({
        publicKey: encodePublicKey(signer.publicKey),
        modeInfo: { single: { mode: SignMode.SIGN_MODE_DIRECT } },
        sequence: signer.sequence,
      })),
      fee: {
        amount: sortCoins(fee.amount).map(coinToProto),
        gasLimit: fee.gasLimit,
        payer: fee.payer ?? '',
        granter: fee.granter ?? '',
      },
    })
  ).finish();
}

/**
 * The document one signer signs. Body and auth info are shared by every
 * signer; only the account number differs between their documents.
 */
export function buildSignDoc(tx: UnsignedTx, chainId: string, accountNumber: bigint): SignDoc {
  if (chainId.length === 0) {
    throw new EncodingError('malformed_payload', 'Chain id must not be empty');
  }
  return {
    bodyBytes: buildTxBody(tx.messages, tx.memo, tx.timeoutHeight),
    authInfoBytes: buildAuthInfo(tx.signers, tx.fee),
    chainId,
    accountNumber,
  };
}

export function encodeSignDoc(doc: SignDoc): Uint8Array {
  return ProtoSignDoc.encode(
    ProtoSignDoc.fromPartial({
      bodyBytes: doc.bodyBytes,
      authInfoBytes: doc.authInfoBytes,
      chainId: doc.chainId,
      accountNumber: doc.accountNumber,
    })
  ).finish();
}

// ============================================================================
// Signing & Assembly
// ============================================================================

/**
 * Signs with one signer per signer entry. Signatures are assembled in
 * signer order, which the node requires to match the signer infos.
 */
export function signTx(tx: UnsignedTx, chainId: string, signers: TxSigner[]): SignedTx {
  if (signers.length !== tx.signers.length || signers.length === 0) {
    throw new SigningError(
      'invalid_key',
      `Transaction lists ${tx.signers.length} signers but ${signers.length} were provided`
    );
  }

  const bodyBytes = buildTxBody(tx.messages, tx.memo, tx.timeoutHeight);
  const authInfoBytes = buildAuthInfo(tx.signers, tx.fee);

  const signatures = tx.signers.map((data, i) => {
    const signer = signers[i];
    if (!bytesEqual(signer.publicKey, data.publicKey)) {
      throw new SigningError('invalid_key', `Signer ${i} does not match the listed public key`, {
        index: i,
      });
    }
    return signer.signDoc({ bodyBytes, authInfoBytes, chainId, accountNumber: data.accountNumber });
  });

  return assembleTx(bodyBytes, authInfoBytes, signatures);
}

export function assembleTx(
  bodyBytes: Uint8Array,
  authInfoBytes: Uint8Array,
  signatures: Uint8Array[]
): SignedTx {
  const txBytes = encodeTxRaw({ bodyBytes, authInfoBytes, signatures });
  return { bodyBytes, authInfoBytes, signatures, txBytes, hash: txHash(txBytes) };
}

export function encodeTxRaw(raw: {
  bodyBytes: Uint8Array;
  authInfoBytes: Uint8Array;
  signatures: Uint8Array[];
}): Uint8Array {
  return TxRaw.encode(TxRaw.fromPartial(raw)).finish();
}

export function decodeTxRaw(txBytes: Uint8Array): DecodedTx {
  try {
    const raw = TxRaw.decode(txBytes);
    const body = TxBody.decode(raw.bodyBytes);
    const authInfo = AuthInfo.decode(raw.authInfoBytes);

    return {
      messages: body.messages.map((m) => ({ typeUrl: m.typeUrl, value: m.value })),
      memo: body.memo,
      timeoutHeight: body.timeoutHeight,
      signers: authInfo.signerInfos.map((info) => ({
        ...(info.publicKey?.typeUrl === SECP256K1_PUBKEY_TYPE_URL
          ? { publicKey: PubKey.decode(info.publicKey.value).key }
          : {}),
        sequence: info.sequence,
      })),
      fee: {
        amount: (authInfo.fee?.amount ?? []).map(coinFromProto),
        gasLimit: authInfo.fee?.gasLimit ?? 0n,
        ...(authInfo.fee?.payer ? { payer: authInfo.fee.payer } : {}),
        ...(authInfo.fee?.granter ? { granter: authInfo.fee.granter } : {}),
      },
      signatures: raw.signatures,
    };
  } catch (error) {
    if (error instanceof EncodingError) {
      throw error;
    }
    throw new EncodingError('malformed_payload', 'Cannot decode transaction bytes', {
      reason: error instanceof Error ? error.message : String(error),
    });
  }
}

export function txHash(txBytes: Uint8Array): string {
  return hashTxBytes(txBytes);
}
