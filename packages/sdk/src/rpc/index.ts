/**
 * Stakeline RPC Module
 *
 * Provides communication with a node's REST gateway.
 */

export { RpcClient, createRpcClient, isNotFound } from './client.js';
export type { RpcClientOptions, FetchLike } from './client.js';
