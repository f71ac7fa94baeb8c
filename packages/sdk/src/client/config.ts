/**
 * Client configuration: caller options merged over a network preset and
 * validated before any client is built.
 */

import { z } from 'zod';
import { ConfigError, NETWORKS } from '../types/index.js';
import type { Coin, Fee, GasPrice, NetworkConfig, NetworkType } from '../types/index.js';
import { parseUnits } from '../utils/index.js';
import type { LogLevel, Logger } from '../logging.js';
import type { FetchLike } from '../rpc/client.js';

const GAS_PRICE_PATTERN = /^(\d+(?:\.\d+)?)([a-zA-Z][a-zA-Z0-9/:._-]{2,127})$/;

/** Fixed-point precision used for gas price arithmetic */
const PRICE_DECIMALS = 18;

export interface ClientOptions {
  network?: NetworkType;
  restUrl?: string;
  chainId?: string;
  prefix?: string;
  /** "0.025uatom" or a parsed price */
  gasPrice?: GasPrice | string;
  /** Per-request timeout in milliseconds */
  timeout?: number;
  pollInterval?: number;
  deadline?: number;
  maxRetries?: number;
  initialBackoff?: number;
  maxBackoff?: number;
  /** Blocks past the latest height before a transaction expires; 0 disables */
  timeoutBlocks?: number;
  gasMultiplier?: number;
  logLevel?: LogLevel;
  logger?: Logger;
  fetch?: FetchLike;
}

const ClientConfigSchema = z.object({
  network: z.object({
    type: z.enum(['cosmoshub', 'testnet', 'local']),
    restUrl: z.string().url(),
    chainId: z.string().min(1),
    prefix: z.string().regex(/^[a-z][a-z0-9]*$/, 'lower-case alphanumeric prefix expected'),
    gasPrice: z.object({
      amount: z.string().regex(/^\d+(\.\d+)?$/, 'decimal gas price expected'),
      denom: z.string().min(1),
    }),
  }),
  timeout: z.number().int().positive(),
  pollInterval: z.number().int().positive(),
  deadline: z.number().int().positive(),
  backoff: z.object({
    maxRetries: z.number().int().nonnegative(),
    initialDelay: z.number().int().nonnegative(),
    maxDelay: z.number().int().nonnegative(),
  }),
  timeoutBlocks: z.number().int().nonnegative(),
  gasMultiplier: z.number().min(1),
});

export type ClientConfig = z.infer<typeof ClientConfigSchema>;

export const DEFAULT_CLIENT_SETTINGS = {
  timeout: 30_000,
  pollInterval: 1_000,
  deadline: 60_000,
  maxRetries: 3,
  initialBackoff: 500,
  maxBackoff: 10_000,
  timeoutBlocks: 100,
  gasMultiplier: 2,
} as const;

export function parseGasPrice(value: string): GasPrice {
  const match = GAS_PRICE_PATTERN.exec(value.trim());
  if (!match) {
    throw new ConfigError(`Invalid gas price "${value}", expected e.g. 0.025uatom`, { value });
  }
  return { amount: match[1], denom: match[2] };
}

export function resolveClientConfig(options: ClientOptions = {}): ClientConfig {
  const preset: NetworkConfig = NETWORKS[options.network ?? 'testnet'];
  if (!preset) {
    throw new ConfigError(`Unknown network "${String(options.network)}"`);
  }

  const gasPrice =
    typeof options.gasPrice === 'string' ? parseGasPrice(options.gasPrice) : options.gasPrice;

  const candidate = {
    network: {
      ...preset,
      restUrl: options.restUrl ?? preset.restUrl,
      chainId: options.chainId ?? preset.chainId,
      prefix: options.prefix ?? preset.prefix,
      gasPrice: gasPrice ?? preset.gasPrice,
    },
    timeout: options.timeout ?? DEFAULT_CLIENT_SETTINGS.timeout,
    pollInterval: options.pollInterval ?? DEFAULT_CLIENT_SETTINGS.pollInterval,
    deadline: options.deadline ?? DEFAULT_CLIENT_SETTINGS.deadline,
    backoff: {
      maxRetries: options.maxRetries ?? DEFAULT_CLIENT_SETTINGS.maxRetries,
      initialDelay: options.initialBackoff ?? DEFAULT_CLIENT_SETTINGS.initialBackoff,
      maxDelay: options.maxBackoff ?? DEFAULT_CLIENT_SETTINGS.maxBackoff,
    },
    timeoutBlocks: options.timeoutBlocks ?? DEFAULT_CLIENT_SETTINGS.timeoutBlocks,
    gasMultiplier: options.gasMultiplier ?? DEFAULT_CLIENT_SETTINGS.gasMultiplier,
  };

  const parsed = ClientConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigError('Invalid client configuration', {
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  return parsed.data;
}

/**
 * Fee for a gas limit at a decimal gas price, rounded up to whole units
 */
export function feeFromGasPrice(gasLimit: bigint, gasPrice: GasPrice): Fee {
  const scale = 10n ** BigInt(PRICE_DECIMALS);
  const price = parseUnits(gasPrice.amount, PRICE_DECIMALS);
  const amount = (gasLimit * price + scale - 1n) / scale;
  const coins: Coin[] = amount === 0n ? [] : [{ denom: gasPrice.denom, amount }];
  return { amount: coins, gasLimit };
}

/**
 * gasUsed × multiplier, rounded up
 */
export function scaleGas(gasUsed: bigint, multiplier: number): bigint {
  const permille = BigInt(Math.round(multiplier * 1000));
  return (gasUsed * permille + 999n) / 1000n;
}
