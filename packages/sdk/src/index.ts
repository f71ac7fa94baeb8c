/**
 * Stakeline SDK
 *
 * Seed phrases, hierarchical keys, SIGN_MODE_DIRECT signing and
 * sequence-aware broadcasting for Cosmos SDK chains.
 *
 * @packageDocumentation
 */

// Types
export * from './types/index.js';

// Wallet (Seed phrases, key derivation and signing)
export * from './wallet/index.js';

// Transactions (Coins, messages and assembly)
export * from './tx/index.js';

// Account sequencing
export * from './account/index.js';

// Broadcast & confirmation
export * from './broadcast/index.js';

// RPC Client (REST gateway communication)
export * from './rpc/index.js';

// High-level client
export * from './client/index.js';

// Logging
export { makeLogger } from './logging.js';
export type { Logger, LogLevel } from './logging.js';

// Utilities
export * from './utils/index.js';
