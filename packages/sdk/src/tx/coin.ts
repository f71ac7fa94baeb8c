/**
 * Coin amounts
 *
 * Amounts are bigint base units; the wire form is the decimal string the
 * protobuf Coin carries.
 */

import type { Coin as ProtoCoin } from 'cosmjs-types/cosmos/base/v1beta1/coin';
import { EncodingError } from '../types/index.js';
import type { Coin } from '../types/index.js';

const DENOM_PATTERN = /^[a-zA-Z][a-zA-Z0-9/:._-]{2,127}$/;
const COIN_PATTERN = /^(\d+)\s*([a-zA-Z][a-zA-Z0-9/:._-]{2,127})$/;

export function isValidDenom(denom: string): boolean {
  return DENOM_PATTERN.test(denom);
}

export function coin(amount: bigint | number | string, denom: string): Coin {
  if (!isValidDenom(denom)) {
    throw new EncodingError('malformed_payload', `Invalid denom "${denom}"`, { denom });
  }

  let value: bigint;
  try {
    value = BigInt(amount);
  } catch {
    throw new EncodingError('malformed_payload', `Invalid coin amount "${String(amount)}"`, {
      denom,
    });
  }
  if (value < 0n) {
    throw new EncodingError('malformed_payload', `Coin amount must not be negative: ${value}`, {
      denom,
    });
  }
  return { denom, amount: value };
}

/**
 * Parses "10uatom,5stake"
 */
export function parseCoins(text: string): Coin[] {
  const trimmed = text.trim();
  if (trimmed === '') {
    return [];
  }

  return trimmed.split(',').map((part) => {
    const match = COIN_PATTERN.exec(part.trim());
    if (!match) {
      throw new EncodingError('malformed_payload', `Invalid coin "${part}"`, { value: text });
    }
    return { denom: match[2], amount: BigInt(match[1]) };
  });
}

export function formatCoin(value: Coin): string {
  return `${value.amount}${value.denom}`;
}

export function formatCoins(coins: Coin[]): string {
  return coins.map(formatCoin).join(',');
}

/**
 * Stable ordering by denom, as the chain expects in fee and send amounts
 */
export function sortCoins(coins: Coin[]): Coin[] {
  return [...coins].sort((a, b) => (a.denom < b.denom ? -1 : a.denom > b.denom ? 1 : 0));
}

function toTotals(coins: Coin[]): Map<string, bigint> {
  const totals = new Map<string, bigint>();
  for (const c of coins) {
    totals.set(c.denom, (totals.get(c.denom) ?? 0n) + c.amount);
  }
  return totals;
}

function fromTotals(totals: Map<string, bigint>): Coin[] {
  const coins: Coin[] = [];
  for (const [denom, amount] of totals) {
    if (amount !== 0n) {
      coins.push({ denom, amount });
    }
  }
  return sortCoins(coins);
}

export function addCoins(a: Coin[], b: Coin[]): Coin[] {
  return fromTotals(toTotals([...a, ...b]));
}

/**
 * a - b per denom; zero balances are dropped
 */
export function subtractCoins(a: Coin[], b: Coin[]): Coin[] {
  const totals = toTotals(a);
  for (const c of b) {
    const remaining = (totals.get(c.denom) ?? 0n) - c.amount;
    if (remaining < 0n) {
      throw new EncodingError(
        'malformed_payload',
        `Insufficient ${c.denom}: cannot subtract ${c.amount}`,
        { denom: c.denom }
      );
    }
    totals.set(c.denom, remaining);
  }
  return fromTotals(totals);
}

export function coinToProto(value: Coin): ProtoCoin {
  return { denom: value.denom, amount: value.amount.toString() };
}

export function coinFromProto(value: ProtoCoin): Coin {
  return coin(value.amount, value.denom);
}
