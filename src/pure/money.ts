/**
 * MONEY ARITHMETIC
 *
 * Currency is fixed-point with two fractional digits, held as a bigint count
 * of hundredths. Quantities are plain integers. Nothing here goes through
 * floating point.
 */

import {Money} from '../domain';
import {Either, Left, Right} from 'purify-ts';

export const MONEY_SCALE = 2;

const SCALE_FACTOR = 10n ** BigInt(MONEY_SCALE);
const MONEY_PATTERN = /^(-?)(\d+)(?:\.(\d{1,2}))?$/;

export const ZERO: Money = 0n;

export function parseMoney(text: string): Either<string, Money> {
  const match = MONEY_PATTERN.exec(text.trim());
  if (!match) {
    return Left(`"${text}" is not a decimal amount with at most ${MONEY_SCALE} fractional digits`);
  }
  const [, sign = '', whole = '0', fraction = ''] = match;
  const units = BigInt(whole) * SCALE_FACTOR + BigInt(fraction.padEnd(MONEY_SCALE, '0'));
  return Right(sign === '-' ? -units : units);
}

export function formatMoney(amount: Money): string {
  const negative = amount < 0n;
  const units = negative ? -amount : amount;
  const whole = units / SCALE_FACTOR;
  const fraction = (units % SCALE_FACTOR).toString().padStart(MONEY_SCALE, '0');
  return `${negative ? '-' : ''}${whole}.${fraction}`;
}

export function addMoney(a: Money, b: Money): Money {
  return a + b;
}

export function sumMoney(amounts: readonly Money[]): Money {
  return amounts.reduce(addMoney, ZERO);
}

export function multiplyMoney(amount: Money, quantity: number): Money {
  return amount * toBigInt(quantity);
}

/**
 * `amount × percent / 100`, rounded half-to-even at the money scale.
 */
export function percentOf(amount: Money, percent: number): Money {
  return divideHalfEven(amount * toBigInt(percent), 100n);
}

/**
 * `amount × (1 + percent / 100)` with a single rounding step.
 */
export function applyMarkup(amount: Money, percent: number): Money {
  return divideHalfEven(amount * (100n + toBigInt(percent)), 100n);
}

function divideHalfEven(numerator: bigint, denominator: bigint): bigint {
  const quotient = numerator / denominator;
  const remainder = numerator % denominator;
  if (remainder === 0n) return quotient;

  const step = (numerator < 0n) !== (denominator < 0n) ? -1n : 1n;
  const twiceRemainder = 2n * (remainder < 0n ? -remainder : remainder);
  const absDenominator = denominator < 0n ? -denominator : denominator;

  if (twiceRemainder > absDenominator) return quotient + step;
  if (twiceRemainder < absDenominator) return quotient;
  return quotient % 2n === 0n ? quotient : quotient + step;
}

function toBigInt(value: number): bigint {
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`Expected a safe integer, got ${value}`);
  }
  return BigInt(value);
}
