import { Duration } from 'luxon';
import { BigNumber } from './integers';

export const ONE_ETH_WEI = new BigNumber(10).pow(18);

/**
 * Fixed-point scale for scores, rates and the reward-per-unit accumulators
 */
export const PRECISION = new BigNumber(10).pow(12);

export const ONE_DAY_SECONDS = Duration.fromObject({ days: 1 }).as('seconds');

export const ADDRESS_ZERO = '0x0000000000000000000000000000000000000000';

export const BYTES32_REGEX = /^0x[a-fA-F0-9]{64}$/;

export const LOCK_STAKING_DOMAIN_NAME = 'LOCK_STAKING';
export const INDEX_STAKING_DOMAIN_NAME = 'INDEX_STAKING';
export const REFERRAL_DOMAIN_NAME = 'LOCKON_REFERRAL';
export const CLAIM_DOMAIN_VERSION = '1';

/**
 * 30% of the withdrawn amount while the lock is still running
 */
export const DEFAULT_PENALTY_RATE = new BigNumber(3).times(new BigNumber(10).pow(11));
