import { ONE_DAY_SECONDS, PRECISION } from './constants';
import { BigNumber, Integer, INTEGERS, minInteger } from './integers';
import { getPartial } from './math-utils';

interface DurationRateTier {
  minDays: number;
  rate: Integer;
}

/**
 * Ordered from the highest tier down. A duration equal to a tier's lower bound belongs to that tier.
 */
const DURATION_RATE_TIERS: DurationRateTier[] = [
  { minDays: 1000, rate: PRECISION.times(16) },
  { minDays: 600, rate: PRECISION.times(8) },
  { minDays: 300, rate: PRECISION.times(35).dividedToIntegerBy(10) },
  { minDays: 100, rate: PRECISION },
];

/**
 * Reward released over `[from, to]`, capped at what is left of the budget. `ratePerSecondScaled` carries the
 * `PRECISION` factor so the only division happens after the multiplication by the elapsed time.
 */
export function computeDistributed(
  from: number,
  to: number,
  ratePerSecondScaled: Integer,
  budget: Integer,
): Integer {
  if (to <= from) {
    return INTEGERS.ZERO;
  }
  const uncapped = getPartial(new BigNumber(to - from), ratePerSecondScaled, PRECISION);
  return minInteger(uncapped, budget);
}

export function accumulateRewardPerUnit(rewardPerUnit: Integer, distributed: Integer, totalWeight: Integer): Integer {
  if (totalWeight.isZero()) {
    return rewardPerUnit;
  }
  return rewardPerUnit.plus(getPartial(distributed, PRECISION, totalWeight));
}

export function accruedReward(weight: Integer, rewardPerUnit: Integer): Integer {
  return getPartial(weight, rewardPerUnit, PRECISION);
}

export function pendingSinceCheckpoint(weight: Integer, rewardPerUnit: Integer, rewardDebt: Integer): Integer {
  const accrued = accruedReward(weight, rewardPerUnit);
  if (accrued.lt(rewardDebt)) {
    throw new Error(`Reward debt ${rewardDebt.toFixed()} exceeds accrued reward ${accrued.toFixed()}`);
  }
  return accrued.minus(rewardDebt);
}

export function getDurationRate(durationSeconds: number): Integer {
  const tier = DURATION_RATE_TIERS.find(t => durationSeconds >= t.minDays * ONE_DAY_SECONDS);
  return tier ? tier.rate : INTEGERS.ZERO;
}

export function computeScore(amount: Integer, basicRate: Integer, durationRate: Integer): Integer {
  return amount.times(basicRate).times(durationRate).dividedToIntegerBy(PRECISION).dividedToIntegerBy(PRECISION);
}

export function applyRate(amount: Integer, rate: Integer): Integer {
  return getPartial(amount, rate, PRECISION);
}

/**
 * Linear release of `total` over `duration` seconds, saturating at `total`
 */
export function linearUnlocked(total: Integer, elapsedSeconds: number, durationSeconds: number): Integer {
  if (elapsedSeconds <= 0) {
    return durationSeconds === 0 ? total : INTEGERS.ZERO;
  }
  if (elapsedSeconds >= durationSeconds) {
    return total;
  }
  return getPartial(total, new BigNumber(elapsedSeconds), new BigNumber(durationSeconds));
}
