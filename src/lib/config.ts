import './env';
import { ChainId, toChainId } from './chain-id';
import { DEFAULT_PENALTY_RATE } from './constants';
import { BigNumber, Integer } from './integers';
import {
  checkBigNumber,
  checkBigNumberAndGreaterThan,
  checkBytes32,
  checkCategoryList,
  checkConditionally,
  checkEthereumAddress,
  checkExists,
  checkJsNumber,
  checkTimestamp,
} from './invariants';

export interface ProtocolConfig {
  chainId: ChainId;
  deployerAddress: string;
  ownerAddress: string;
  managementAddress: string;
  feeReceiverAddress: string;
  /**
   * Authority whose signatures the staking contracts accept for claims
   */
  operatorAddress: string;
  lockToken: {
    name: string;
    symbol: string;
    totalSupply: Integer;
  };
  lockStaking: {
    startTimestamp: number;
    basicRateDivider: Integer;
    bonusRatePerSecond: Integer;
    penaltyRate: Integer;
    vestingCategoryId: number;
  };
  /**
   * categoryId => duration in seconds
   */
  vestingCategories: Record<number, number>;
  airdrop: {
    startTimestamp: number;
    vestingCategoryId: number;
    merkleRoot?: string;
  };
}

/**
 * Validates the environment and reads it into a `ProtocolConfig`. Throws on the first missing or malformed key.
 */
export function loadProtocolConfig(): ProtocolConfig {
  _checkEnv();
  return _readConfig();
}

export function parseCategoryList(value: string): Record<number, number> {
  return value.split(',').reduce<Record<number, number>>((memo, entry) => {
    const [categoryId, duration] = entry.trim().split(':');
    memo[Number(categoryId)] = Number(duration);
    return memo;
  }, {});
}

// =================================================
// =============== Private Functions ===============
// =================================================

function _checkEnv() {
  checkJsNumber('NETWORK_ID');
  checkEthereumAddress('DEPLOYER_ADDRESS');
  checkEthereumAddress('OWNER_ADDRESS');
  checkEthereumAddress('MANAGEMENT_ADDRESS');
  checkEthereumAddress('FEE_RECEIVER_ADDRESS');
  checkEthereumAddress('OPERATOR_ADDRESS');
  checkExists('LOCK_TOKEN_NAME');
  checkExists('LOCK_TOKEN_SYMBOL');
  checkBigNumberAndGreaterThan('LOCK_TOKEN_TOTAL_SUPPLY', '0');
  checkBigNumber('LOCK_TOKEN_TOTAL_SUPPLY');
  checkTimestamp('LOCK_STAKING_START_TIMESTAMP');
  checkBigNumberAndGreaterThan('LOCK_STAKING_BASIC_RATE_DIVIDER', '0');
  checkBigNumber('LOCK_STAKING_BASIC_RATE_DIVIDER');
  checkBigNumber('LOCK_STAKING_BONUS_RATE_PER_SECOND');
  checkConditionally(!!process.env.LOCK_STAKING_PENALTY_RATE, () => checkBigNumber('LOCK_STAKING_PENALTY_RATE'));
  checkTimestamp('LOCK_STAKING_VESTING_CATEGORY_ID');
  checkCategoryList('VESTING_CATEGORIES', 1);
  checkTimestamp('AIRDROP_START_TIMESTAMP');
  checkTimestamp('AIRDROP_VESTING_CATEGORY_ID');
  checkConditionally(!!process.env.MERKLE_ROOT, () => checkBytes32('MERKLE_ROOT'));
}

function _readConfig(): ProtocolConfig {
  const env = process.env;
  return {
    chainId: toChainId(Number(env.NETWORK_ID)),
    deployerAddress: _required(env.DEPLOYER_ADDRESS).toLowerCase(),
    ownerAddress: _required(env.OWNER_ADDRESS).toLowerCase(),
    managementAddress: _required(env.MANAGEMENT_ADDRESS).toLowerCase(),
    feeReceiverAddress: _required(env.FEE_RECEIVER_ADDRESS).toLowerCase(),
    operatorAddress: _required(env.OPERATOR_ADDRESS).toLowerCase(),
    lockToken: {
      name: _required(env.LOCK_TOKEN_NAME),
      symbol: _required(env.LOCK_TOKEN_SYMBOL),
      totalSupply: new BigNumber(_required(env.LOCK_TOKEN_TOTAL_SUPPLY)),
    },
    lockStaking: {
      startTimestamp: Number(env.LOCK_STAKING_START_TIMESTAMP),
      basicRateDivider: new BigNumber(_required(env.LOCK_STAKING_BASIC_RATE_DIVIDER)),
      bonusRatePerSecond: new BigNumber(_required(env.LOCK_STAKING_BONUS_RATE_PER_SECOND)),
      penaltyRate: env.LOCK_STAKING_PENALTY_RATE ? new BigNumber(env.LOCK_STAKING_PENALTY_RATE) : DEFAULT_PENALTY_RATE,
      vestingCategoryId: Number(env.LOCK_STAKING_VESTING_CATEGORY_ID),
    },
    vestingCategories: parseCategoryList(_required(env.VESTING_CATEGORIES)),
    airdrop: {
      startTimestamp: Number(env.AIRDROP_START_TIMESTAMP),
      vestingCategoryId: Number(env.AIRDROP_VESTING_CATEGORY_ID),
      merkleRoot: env.MERKLE_ROOT ? env.MERKLE_ROOT.toLowerCase() : undefined,
    },
  };
}

function _required(value: string | undefined): string {
  if (value === undefined) {
    throw new Error('Expected a value that was checked to exist');
  }
  return value;
}
