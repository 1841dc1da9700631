import BigNumber from 'bignumber.js';
import { ErrorCode, ValidationError } from './errors';

export { BigNumber };

/**
 * A non-negative whole number. All ledger amounts, rates and accumulators use this type.
 */
export type Integer = BigNumber;

export const INTEGERS = {
  ZERO: new BigNumber(0),
  ONE: new BigNumber(1),
};

/**
 * Throws `InvalidAmount` unless `value` is a non-negative whole number
 */
export function toInteger(value: BigNumber.Value): Integer {
  const result = new BigNumber(value);
  if (!result.isInteger() || result.isNegative()) {
    throw new ValidationError(ErrorCode.InvalidAmount, result.toFixed());
  }
  return result;
}

/**
 * Like `toInteger`, and throws `ZeroAmount` for zero
 */
export function toPositiveInteger(value: BigNumber.Value): Integer {
  const result = toInteger(value);
  if (result.isZero()) {
    throw new ValidationError(ErrorCode.ZeroAmount);
  }
  return result;
}

export function minInteger(a: Integer, b: Integer): Integer {
  return a.lt(b) ? a : b;
}

export function maxInteger(a: Integer, b: Integer): Integer {
  return a.gt(b) ? a : b;
}
