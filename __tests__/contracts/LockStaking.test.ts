import LockStaking from '../../src/contracts/lock-staking';
import { signClaimRequest } from '../../src/helpers/signature-helpers';
import ClaimRequestSigner from '../../src/lib/claim-request-signer';
import { LOCK_STAKING_CLAIM_SCHEMA } from '../../src/contracts/claim-authorization';
import { PRECISION } from '../../src/lib/constants';
import { BudgetExhaustionError, ErrorCode, StateError, ValidationError } from '../../src/lib/errors';
import { BigNumber, Integer, INTEGERS } from '../../src/lib/integers';
import {
  ALICE,
  BOB,
  days,
  deployBase,
  FEE_RECEIVER,
  fund,
  operatorWallet,
  otherWallet,
  OWNER,
  STAKING_CATEGORY_ID,
  START_TIMESTAMP,
  wei,
} from '../fixtures';

interface SetupOptions {
  bonusRatePerSecond?: Integer;
  budget?: Integer;
  startTimestamp?: number;
}

function setup(options: SetupOptions = {}) {
  const base = deployBase();
  const lockStaking = new LockStaking(base.runtime, {
    owner: OWNER,
    token: base.token,
    vesting: base.vesting,
    feeReceiver: FEE_RECEIVER,
    authority: operatorWallet.address,
    startTimestamp: options.startTimestamp ?? START_TIMESTAMP,
    bonusRatePerSecond: options.bonusRatePerSecond ?? INTEGERS.ZERO,
    basicRateDivider: new BigNumber(1000),
    vestingCategoryId: STAKING_CATEGORY_ID,
  });
  base.vesting.addDepositor(OWNER, lockStaking.address);

  const budget = options.budget ?? wei(1000);
  fund(base.token, OWNER, budget, lockStaking.address);
  lockStaking.allocateReward(OWNER, budget);
  fund(base.token, ALICE, wei(10), lockStaking.address);
  fund(base.token, BOB, wei(10), lockStaking.address);

  return { ...base, lockStaking, signer: new ClaimRequestSigner(operatorWallet) };
}

// 1e18 staked at 1e6 emits 1e12 per second
const BONUS_RATE = new BigNumber(1_000_000);

describe('LockStaking', () => {
  describe('#deposit', () => {
    it('should score one token locked for 200 days at unit rates as 1e18', () => {
      const { lockStaking, token } = setup();
      expect(lockStaking.getBasicRate().toFixed()).toEqual(PRECISION.toFixed());

      lockStaking.deposit(ALICE, wei(1), days(200));

      const position = lockStaking.getLockPosition(ALICE);
      expect(position.score.toFixed()).toEqual(wei(1).toFixed());
      expect(position.lastBasicRate.toFixed()).toEqual(PRECISION.toFixed());
      expect(position.lockDuration).toEqual(days(200));
      expect(position.lockEndTimestamp).toEqual(START_TIMESTAMP + days(200));
      expect(lockStaking.getLockPool().totalScore.toFixed()).toEqual(wei(1).toFixed());
      expect(lockStaking.getLockPool().totalStaked.toFixed()).toEqual(wei(1).toFixed());
      expect(token.balanceOf(ALICE).toFixed()).toEqual(wei(9).toFixed());
      expect(token.balanceOf(lockStaking.address).toFixed()).toEqual(wei(1001).toFixed());
    });

    it('should reject deposits before the pool starts', () => {
      const { blockStore, lockStaking } = setup({ startTimestamp: START_TIMESTAMP + 1000 });
      expect(() => lockStaking.deposit(ALICE, wei(1), days(100))).toThrow(ErrorCode.PoolNotStarted);

      blockStore.mine(1000);
      lockStaking.deposit(ALICE, wei(1), days(100));
      expect(lockStaking.getLockPosition(ALICE).stakedAmount.toFixed()).toEqual(wei(1).toFixed());
    });

    it('should reject a zero amount', () => {
      const { lockStaking } = setup();
      expect(() => lockStaking.deposit(ALICE, INTEGERS.ZERO, days(100))).toThrow(ErrorCode.ZeroAmount);
    });

    it('should reject negative and fractional amounts without moving tokens', () => {
      const { lockStaking, token } = setup();
      expect(() => lockStaking.deposit(ALICE, wei(-5), days(100))).toThrow(ErrorCode.InvalidAmount);
      expect(() => lockStaking.deposit(ALICE, new BigNumber('0.5'), days(100))).toThrow(ValidationError);

      expect(token.balanceOf(ALICE).toFixed()).toEqual(wei(10).toFixed());
      expect(token.balanceOf(lockStaking.address).toFixed()).toEqual(wei(1000).toFixed());
      expect(lockStaking.getLockPool().totalStaked.toFixed()).toEqual('0');
    });

    it('should require the new duration to cover the rest of the current lock', () => {
      const { blockStore, lockStaking } = setup();
      lockStaking.deposit(ALICE, wei(1), days(200));
      blockStore.mine(days(10));

      expect(() => lockStaking.deposit(ALICE, wei(1), days(100))).toThrow(ErrorCode.InvalidDuration);

      lockStaking.deposit(ALICE, wei(1), days(190));
      const position = lockStaking.getLockPosition(ALICE);
      expect(position.stakedAmount.toFixed()).toEqual(wei(2).toFixed());
      expect(position.score.toFixed()).toEqual(wei(2).toFixed());
      expect(position.lockEndTimestamp).toEqual(START_TIMESTAMP + days(200));
    });

    it('should leave no trace when the token transfer fails', () => {
      const { lockStaking } = setup();
      expect(() => lockStaking.deposit(ALICE, wei(11), days(100))).toThrow(ErrorCode.InsufficientAllowance);

      expect(lockStaking.getLockPosition(ALICE).score.toFixed()).toEqual('0');
      expect(lockStaking.getLockPool().totalStaked.toFixed()).toEqual('0');
      expect(lockStaking.getLockPool().totalScore.toFixed()).toEqual('0');
    });

    it('should reject calls while paused', () => {
      const { lockStaking } = setup();
      lockStaking.pause(OWNER);
      expect(() => lockStaking.deposit(ALICE, wei(1), days(100))).toThrow(ErrorCode.Paused);
    });
  });

  describe('#extend', () => {
    it('should re-score the stake with the longer duration', () => {
      const { blockStore, lockStaking } = setup();
      lockStaking.deposit(ALICE, wei(1), days(100));
      blockStore.mine(days(10));

      lockStaking.extend(ALICE, days(300));

      const position = lockStaking.getLockPosition(ALICE);
      expect(position.score.toFixed()).toEqual(wei(3.5).toFixed());
      expect(position.lockEndTimestamp).toEqual(START_TIMESTAMP + days(310));
      expect(lockStaking.getLockPool().totalScore.toFixed()).toEqual(wei(3.5).toFixed());
      expect(() => lockStaking.extend(ALICE, days(50))).toThrow(ErrorCode.InvalidDuration);
    });

    it('should reject callers with nothing staked', () => {
      const { lockStaking } = setup();
      expect(() => lockStaking.extend(BOB, days(100))).toThrow(ErrorCode.InsufficientStake);
    });
  });

  describe('#withdraw', () => {
    it('should send the early-withdrawal penalty to the fee receiver', () => {
      const { blockStore, lockStaking, token } = setup();
      lockStaking.deposit(ALICE, wei(1), days(200));
      blockStore.mine(days(10));

      const received = lockStaking.withdraw(ALICE, wei(1));

      expect(received.toFixed()).toEqual('700000000000000000');
      expect(token.balanceOf(FEE_RECEIVER).toFixed()).toEqual('300000000000000000');
      expect(token.balanceOf(ALICE).toFixed()).toEqual(wei(9.7).toFixed());
      expect(lockStaking.getLockPosition(ALICE).score.toFixed()).toEqual('0');
      expect(lockStaking.getLockPool().totalScore.toFixed()).toEqual('0');
    });

    it('should not charge a penalty once the lock has ended', () => {
      const { blockStore, lockStaking, token } = setup();
      lockStaking.deposit(ALICE, wei(1), days(100));
      blockStore.mine(days(100));

      expect(lockStaking.withdraw(ALICE, wei(1)).toFixed()).toEqual(wei(1).toFixed());
      expect(token.balanceOf(FEE_RECEIVER).toFixed()).toEqual('0');
      expect(token.balanceOf(ALICE).toFixed()).toEqual(wei(10).toFixed());
    });

    it('should re-score the remainder at the recorded basic rate', () => {
      const { lockStaking } = setup();
      lockStaking.deposit(ALICE, wei(2), days(300));
      expect(lockStaking.getLockPosition(ALICE).score.toFixed()).toEqual(wei(7).toFixed());

      lockStaking.deallocateReward(OWNER, wei(500));
      expect(lockStaking.getBasicRate().toFixed()).toEqual('500000000000');

      lockStaking.withdraw(ALICE, wei(1));
      lockStaking.deposit(BOB, wei(1), days(300));

      const alice = lockStaking.getLockPosition(ALICE);
      const bob = lockStaking.getLockPosition(BOB);
      expect(alice.score.toFixed()).toEqual(wei(3.5).toFixed());
      expect(bob.score.toFixed()).toEqual(wei(1.75).toFixed());

      const pool = lockStaking.getLockPool();
      expect(pool.totalScore.toFixed()).toEqual(alice.score.plus(bob.score).toFixed());
      expect(pool.totalStaked.toFixed()).toEqual(alice.stakedAmount.plus(bob.stakedAmount).toFixed());
    });

    it('should reject amounts above the stake', () => {
      const { lockStaking } = setup();
      lockStaking.deposit(ALICE, wei(1), days(100));
      expect(() => lockStaking.withdraw(ALICE, wei(2))).toThrow(ErrorCode.InsufficientStake);
      expect(() => lockStaking.withdraw(ALICE, INTEGERS.ZERO)).toThrow(ErrorCode.ZeroAmount);
      expect(() => lockStaking.withdraw(ALICE, wei(-1))).toThrow(ErrorCode.InvalidAmount);
      expect(lockStaking.getLockPosition(ALICE).stakedAmount.toFixed()).toEqual(wei(1).toFixed());
    });
  });

  describe('accrual', () => {
    it('should accrue reward in proportion to score and time', () => {
      const { blockStore, lockStaking } = setup({ bonusRatePerSecond: BONUS_RATE });
      lockStaking.deposit(ALICE, wei(1), days(200));
      blockStore.mine(100);

      expect(lockStaking.getPendingReward(ALICE).toFixed()).toEqual('100000000000000');
      // Views never write
      expect(lockStaking.getRewardBudgetRemaining().toFixed()).toEqual(wei(1000).toFixed());
    });

    it('should never distribute more than the budget', () => {
      const { blockStore, lockStaking } = setup({ bonusRatePerSecond: BONUS_RATE, budget: new BigNumber('100000000000000') });
      lockStaking.deposit(ALICE, wei(1), days(200));
      expect(lockStaking.getLockPosition(ALICE).score.toFixed()).toEqual('100000000000');

      blockStore.mine(1000);
      lockStaking.extend(ALICE, days(200));

      expect(lockStaking.getRewardBudgetRemaining().toFixed()).toEqual('0');
      expect(lockStaking.getLockPosition(ALICE).cumulativePendingReward.toFixed()).toEqual('100000000000000');

      blockStore.mine(1000);
      expect(lockStaking.getPendingReward(ALICE).toFixed()).toEqual('100000000000000');
    });

    it('should never decrease the accumulator', () => {
      const { blockStore, lockStaking } = setup({ bonusRatePerSecond: BONUS_RATE });
      const seen: BigNumber[] = [lockStaking.getLockPool().rewardPerUnit];

      lockStaking.deposit(ALICE, wei(1), days(200));
      seen.push(lockStaking.getLockPool().rewardPerUnit);
      blockStore.mine(50);
      lockStaking.deposit(BOB, wei(3), days(700));
      seen.push(lockStaking.getLockPool().rewardPerUnit);
      blockStore.mine(50);
      lockStaking.withdraw(ALICE, wei(1));
      seen.push(lockStaking.getLockPool().rewardPerUnit);
      blockStore.mine(50);
      lockStaking.extend(BOB, days(1000));
      seen.push(lockStaking.getLockPool().rewardPerUnit);

      seen.slice(1).forEach((value, i) => expect(value.gte(seen[i])).toEqual(true));
      expect(seen[seen.length - 1].gt(0)).toEqual(true);
    });
  });

  describe('#claim', () => {
    it('should pay the banked reward into vesting', async () => {
      const { blockStore, lockStaking, signer, token, vesting } = setup({ bonusRatePerSecond: BONUS_RATE });
      lockStaking.deposit(ALICE, wei(1), days(200));
      blockStore.mine(100);

      const { input, signature } = await signer.signLockStakingClaim(lockStaking, ALICE, 'lock-1');
      expect(input.cumulativePendingReward.toFixed()).toEqual('100000000000000');

      const paid = lockStaking.claim(ALICE, input, signature);

      expect(paid.toFixed()).toEqual('100000000000000');
      expect(vesting.getWallet(ALICE, STAKING_CATEGORY_ID).vestingAmount.toFixed()).toEqual('100000000000000');
      expect(token.balanceOf(vesting.address).toFixed()).toEqual('100000000000000');
      expect(lockStaking.getLockPosition(ALICE).cumulativePendingReward.toFixed()).toEqual('0');
      expect(lockStaking.getRewardBudgetRemaining().toFixed()).toEqual(wei(1000).minus('100000000000000').toFixed());
      expect(lockStaking.isRequestProcessed('lock-1')).toEqual(true);
      expect(() => lockStaking.claim(ALICE, input, signature)).toThrow(ErrorCode.DuplicateRequest);
    });

    it('should draw the attested side amount from the budget', async () => {
      const { lockStaking, signer, vesting } = setup();
      const { input, signature } = await signer.signLockStakingClaim(lockStaking, BOB, 'lock-2', wei(1));

      expect(lockStaking.claim(BOB, input, signature).toFixed()).toEqual(wei(1).toFixed());
      expect(lockStaking.getRewardBudgetRemaining().toFixed()).toEqual(wei(999).toFixed());
      expect(vesting.getWallet(BOB, STAKING_CATEGORY_ID).vestingAmount.toFixed()).toEqual(wei(1).toFixed());
    });

    it('should reject an attested reward above the recorded one and roll back', async () => {
      const { blockStore, lockStaking } = setup({ bonusRatePerSecond: BONUS_RATE });
      lockStaking.deposit(ALICE, wei(1), days(200));
      blockStore.mine(100);
      const input = {
        requestId: 'lock-3',
        cumulativePendingReward: new BigNumber('200000000000000'),
        claimAmount: INTEGERS.ZERO,
      };
      const signature = await signClaimRequest(operatorWallet, lockStaking.getClaimDomain(), LOCK_STAKING_CLAIM_SCHEMA, {
        ...input,
        beneficiary: ALICE,
        stakeToken: lockStaking.token.address,
      });

      expect(() => lockStaking.claim(ALICE, input, signature)).toThrow(StateError);
      expect(() => lockStaking.claim(ALICE, input, signature)).toThrow(ErrorCode.InvalidClaimAmount);

      expect(lockStaking.isRequestProcessed('lock-3')).toEqual(false);
      expect(lockStaking.getRewardBudgetRemaining().toFixed()).toEqual(wei(1000).toFixed());
      expect(lockStaking.getLockPool().lastAccrualTimestamp).toEqual(START_TIMESTAMP);
      expect(lockStaking.getLockPosition(ALICE).cumulativePendingReward.toFixed()).toEqual('0');
    });

    it('should reject a side amount larger than the budget', async () => {
      const { lockStaking, signer } = setup();
      const { input, signature } = await signer.signLockStakingClaim(lockStaking, ALICE, 'lock-4', wei(2000));
      expect(() => lockStaking.claim(ALICE, input, signature)).toThrow(BudgetExhaustionError);
    });

    it('should reject negative attested amounts before checking the signature', () => {
      const { lockStaking } = setup();
      const input = { requestId: 'lock-9', cumulativePendingReward: INTEGERS.ZERO, claimAmount: new BigNumber(-1) };

      expect(() => lockStaking.claim(ALICE, input, '0x')).toThrow(ErrorCode.InvalidAmount);
      expect(lockStaking.isRequestProcessed('lock-9')).toEqual(false);
      expect(lockStaking.getRewardBudgetRemaining().toFixed()).toEqual(wei(1000).toFixed());
    });

    it('should reject a claim that pays nothing', async () => {
      const { lockStaking, signer } = setup();
      const { input, signature } = await signer.signLockStakingClaim(lockStaking, BOB, 'lock-5');
      expect(() => lockStaking.claim(BOB, input, signature)).toThrow(ErrorCode.NothingToClaim);
    });

    it('should reject requests not signed by the authority or for another beneficiary', async () => {
      const { lockStaking, signer } = setup();
      const forged = await new ClaimRequestSigner(otherWallet).signLockStakingClaim(lockStaking, ALICE, 'lock-6', wei(1));
      expect(() => lockStaking.claim(ALICE, forged.input, forged.signature)).toThrow(ErrorCode.InvalidSignature);

      const forAlice = await signer.signLockStakingClaim(lockStaking, ALICE, 'lock-7', wei(1));
      expect(() => lockStaking.claim(BOB, forAlice.input, forAlice.signature)).toThrow(ErrorCode.InvalidSignature);
    });
  });

  describe('#cancelClaim', () => {
    it('should burn the request id without paying', async () => {
      const { lockStaking, signer, token, vesting } = setup();
      const cancel = await signer.signLockStakingCancel(lockStaking, ALICE, 'lock-8');
      lockStaking.cancelClaim(ALICE, cancel.input, cancel.signature);

      expect(lockStaking.isRequestProcessed('lock-8')).toEqual(true);
      expect(token.balanceOf(vesting.address).toFixed()).toEqual('0');

      const claim = await signer.signLockStakingClaim(lockStaking, ALICE, 'lock-8', wei(1));
      expect(() => lockStaking.claim(ALICE, claim.input, claim.signature)).toThrow(ErrorCode.DuplicateRequest);
    });
  });

  describe('admin', () => {
    it('should validate rates', () => {
      const { lockStaking } = setup();
      expect(() => lockStaking.setPenaltyRate(OWNER, PRECISION.plus(1))).toThrow(ErrorCode.InvalidRate);
      expect(() => lockStaking.setBasicRateDivider(OWNER, INTEGERS.ZERO)).toThrow(ErrorCode.InvalidRate);
      expect(() => lockStaking.setBonusRatePerSecond(ALICE, BONUS_RATE)).toThrow(ErrorCode.NotOwner);
      expect(() => lockStaking.setBonusRatePerSecond(OWNER, new BigNumber(-1))).toThrow(ErrorCode.InvalidRate);
      expect(lockStaking.getLockPool().bonusRatePerSecond.toFixed()).toEqual('0');
    });

    it('should refuse a negative reward allocation', () => {
      const { lockStaking, token } = setup();
      expect(() => lockStaking.allocateReward(OWNER, wei(-1))).toThrow(ErrorCode.InvalidAmount);
      expect(lockStaking.getRewardBudgetRemaining().toFixed()).toEqual(wei(1000).toFixed());
      expect(token.balanceOf(OWNER).toFixed()).toEqual('0');
    });

    it('should apply a new penalty rate to later withdrawals', () => {
      const { lockStaking, token } = setup();
      lockStaking.setPenaltyRate(OWNER, INTEGERS.ZERO);
      lockStaking.deposit(ALICE, wei(1), days(100));

      expect(lockStaking.withdraw(ALICE, wei(1)).toFixed()).toEqual(wei(1).toFixed());
      expect(token.balanceOf(FEE_RECEIVER).toFixed()).toEqual('0');
    });

    it('should return unaccrued budget to the owner', () => {
      const { lockStaking, token } = setup();
      lockStaking.deallocateReward(OWNER, wei(400));

      expect(token.balanceOf(OWNER).toFixed()).toEqual(wei(400).toFixed());
      expect(lockStaking.getRewardBudgetRemaining().toFixed()).toEqual(wei(600).toFixed());
      expect(() => lockStaking.deallocateReward(OWNER, wei(601))).toThrow(ErrorCode.BudgetExceeded);
    });
  });
});
