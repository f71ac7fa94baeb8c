/**
 * Stakeline Client Module
 */

export { ChainClient } from './chain-client.js';
export type { SendOptions } from './chain-client.js';

export {
  resolveClientConfig,
  parseGasPrice,
  feeFromGasPrice,
  scaleGas,
  DEFAULT_CLIENT_SETTINGS,
} from './config.js';
export type { ClientOptions, ClientConfig } from './config.js';
