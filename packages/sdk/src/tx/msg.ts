/**
 * Transaction messages
 *
 * A message is its protobuf type url plus the already-encoded value.
 * Nothing here decodes message contents; callers that need to read them
 * keep their own registry of decoders by type url.
 */

import { MsgSend } from 'cosmjs-types/cosmos/bank/v1beta1/tx';
import { EncodingError } from '../types/index.js';
import type { Bech32Address, Coin, Msg } from '../types/index.js';
import { coinToProto, sortCoins } from './coin.js';

export const MSG_SEND_TYPE_URL = '/cosmos.bank.v1beta1.MsgSend';
export const SECP256K1_PUBKEY_TYPE_URL = '/cosmos.crypto.secp256k1.PubKey';

export function isValidTypeUrl(typeUrl: string): boolean {
  return typeUrl.length > 1 && typeUrl.startsWith('/') && !/\s/.test(typeUrl);
}

export function createMsg(typeUrl: string, value: Uint8Array): Msg {
  if (!isValidTypeUrl(typeUrl)) {
    throw new EncodingError('malformed_payload', `Invalid message type url "${typeUrl}"`, {
      typeUrl,
    });
  }
  return { typeUrl, value: value.slice() };
}

export function createMsgSend(from: Bech32Address, to: Bech32Address, amount: Coin[]): Msg {
  const value = MsgSend.encode(
    MsgSend.fromPartial({
      fromAddress: from,
      toAddress: to,
      amount: sortCoins(amount).map(coinToProto),
    })
  ).finish();
  return createMsg(MSG_SEND_TYPE_URL, value);
}
