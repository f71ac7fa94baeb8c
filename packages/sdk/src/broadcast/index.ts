/**
 * Stakeline Broadcast Module
 */

export {
  Broadcaster,
  DEFAULT_BACKOFF,
  DEFAULT_POLL_INTERVAL,
  DEFAULT_DEADLINE,
} from './broadcaster.js';
export type { BroadcasterOptions, BackoffOptions, TxDraft } from './broadcaster.js';

export { classifyNodeError, isStaleSequence, SdkErrorCode, SDK_CODESPACE } from './errors.js';
export type { NodeVerdict } from './errors.js';
