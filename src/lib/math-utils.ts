import { Integer } from './integers';

/**
 * `amount * numerator / denominator`, truncated toward zero. The multiplication always happens first.
 */
export function getPartial(amount: Integer, numerator: Integer, denominator: Integer): Integer {
  return amount.times(numerator).dividedToIntegerBy(denominator);
}
