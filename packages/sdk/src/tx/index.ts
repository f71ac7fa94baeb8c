/**
 * Stakeline Transaction Module
 *
 * Coins, messages and SIGN_MODE_DIRECT transaction assembly.
 */

export {
  coin,
  parseCoins,
  formatCoin,
  formatCoins,
  addCoins,
  subtractCoins,
  sortCoins,
  isValidDenom,
  coinToProto,
  coinFromProto,
} from './coin.js';

export {
  createMsg,
  createMsgSend,
  isValidTypeUrl,
  MSG_SEND_TYPE_URL,
  SECP256K1_PUBKEY_TYPE_URL,
} from './msg.js';

export {
  buildTxBody,
  buildAuthInfo,
  buildSignDoc,
  encodeSignDoc,
  encodePublicKey,
  signTx,
  assembleTx,
  encodeTxRaw,
  decodeTxRaw,
  txHash,
  MAX_MEMO_BYTES,
} from './builder.js';
export type { DecodedTx } from './builder.js';
