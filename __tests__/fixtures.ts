import { ethers } from 'ethers';
import FixedSupplyToken from '../src/contracts/fixed-supply-token';
import VestingEscrow from '../src/contracts/vesting-escrow';
import BlockStore from '../src/lib/block-store';
import { ChainId } from '../src/lib/chain-id';
import { ONE_DAY_SECONDS, ONE_ETH_WEI } from '../src/lib/constants';
import { BigNumber, Integer } from '../src/lib/integers';
import Runtime from '../src/lib/runtime';

export const START_TIMESTAMP = 1_700_000_000;

export const OWNER = '0x00000000000000000000000000000000000000a1';
export const MANAGEMENT = '0x00000000000000000000000000000000000000a2';
export const FEE_RECEIVER = '0x00000000000000000000000000000000000000a3';
export const ALICE = '0x00000000000000000000000000000000000000b1';
export const BOB = '0x00000000000000000000000000000000000000b2';
export const CAROL = '0x00000000000000000000000000000000000000b3';

export const OPERATOR_PRIVATE_KEY = `0x${'1'.repeat(64)}`;
export const OTHER_PRIVATE_KEY = `0x${'2'.repeat(64)}`;
export const operatorWallet = new ethers.Wallet(OPERATOR_PRIVATE_KEY);
export const otherWallet = new ethers.Wallet(OTHER_PRIVATE_KEY);

export const STAKING_CATEGORY_ID = 0;
export const INSTANT_CATEGORY_ID = 1;
export const STAKING_CATEGORY_SECONDS = 300 * ONE_DAY_SECONDS;

export const TOTAL_SUPPLY = wei(10_000_000);

export function wei(tokens: BigNumber.Value): Integer {
  return new BigNumber(tokens).times(ONE_ETH_WEI);
}

export function days(count: number): number {
  return count * ONE_DAY_SECONDS;
}

export interface BaseFixture {
  runtime: Runtime;
  blockStore: BlockStore;
  token: FixedSupplyToken;
  vesting: VestingEscrow;
}

/**
 * Runtime at `START_TIMESTAMP` with the lock token minted to `MANAGEMENT` and a vesting escrow with a 300-day
 * category and an instant one
 */
export function deployBase(): BaseFixture {
  const blockStore = new BlockStore(START_TIMESTAMP);
  const runtime = new Runtime(ChainId.Hardhat, blockStore);
  const token = new FixedSupplyToken(runtime, {
    name: 'Lock Token',
    symbol: 'LOCK',
    owner: OWNER,
    managementAddress: MANAGEMENT,
    totalSupply: TOTAL_SUPPLY,
  });
  const vesting = new VestingEscrow(runtime, {
    owner: OWNER,
    token,
    categoryDurations: {
      [STAKING_CATEGORY_ID]: STAKING_CATEGORY_SECONDS,
      [INSTANT_CATEGORY_ID]: 0,
    },
  });
  return { runtime, blockStore, token, vesting };
}

export function fund(token: FixedSupplyToken, to: string, amount: Integer, spender?: string): void {
  token.transfer(MANAGEMENT, to, amount);
  if (spender) {
    token.approve(to, spender, amount);
  }
}

/**
 * A complete, valid environment for `loadProtocolConfig`
 */
export const TEST_ENV: Record<string, string> = {
  NETWORK_ID: '31337',
  DEPLOYER_ADDRESS: '0x00000000000000000000000000000000000000D0',
  OWNER_ADDRESS: '0x00000000000000000000000000000000000000A1',
  MANAGEMENT_ADDRESS: '0x00000000000000000000000000000000000000a2',
  FEE_RECEIVER_ADDRESS: '0x00000000000000000000000000000000000000a3',
  OPERATOR_ADDRESS: '0x00000000000000000000000000000000000000C1',
  LOCK_TOKEN_NAME: 'Lock Token',
  LOCK_TOKEN_SYMBOL: 'LOCK',
  LOCK_TOKEN_TOTAL_SUPPLY: '10000000000000000000000000',
  LOCK_STAKING_START_TIMESTAMP: '1700000000',
  LOCK_STAKING_BASIC_RATE_DIVIDER: '1000',
  LOCK_STAKING_BONUS_RATE_PER_SECOND: '1000000',
  LOCK_STAKING_VESTING_CATEGORY_ID: '0',
  VESTING_CATEGORIES: '0:25920000, 1:0',
  AIRDROP_START_TIMESTAMP: '1700000100',
  AIRDROP_VESTING_CATEGORY_ID: '1',
};
