import { normalizeNonZeroAddress } from '../helpers/address-helpers';
import { DEFAULT_PENALTY_RATE, LOCK_STAKING_DOMAIN_NAME, ONE_ETH_WEI, PRECISION } from '../lib/constants';
import { BudgetExhaustionError, ErrorCode, StateError, ValidationError } from '../lib/errors';
import { applyRate, computeScore, getDurationRate } from '../lib/fixed-point-accrual';
import { Integer, INTEGERS, toInteger, toPositiveInteger } from '../lib/integers';
import { RestoreFn, TokenLedger } from '../lib/ledger-types';
import Logger from '../lib/logger';
import { getPartial } from '../lib/math-utils';
import Runtime from '../lib/runtime';
import { LOCK_STAKING_CLAIM_SCHEMA, LockStakingClaimRequest } from './claim-authorization';
import StakePool, { PoolState, UserPosition } from './stake-pool';
import VestingEscrow from './vesting-escrow';

export interface LockPoolState extends PoolState {
  totalScore: Integer;
}

export interface LockPosition extends UserPosition {
  lockEndTimestamp: number;
  lockDuration: number;
  /**
   * Basic rate the current score was priced at. Withdrawals re-score with this, not with the live rate.
   */
  lastBasicRate: Integer;
}

export interface LockStakingConfig {
  owner: string;
  token: TokenLedger;
  vesting: VestingEscrow;
  feeReceiver: string;
  authority: string;
  startTimestamp: number;
  bonusRatePerSecond: Integer;
  basicRateDivider: Integer;
  penaltyRate?: Integer;
  vestingCategoryId: number;
}

export interface LockClaimInput {
  requestId: string;
  cumulativePendingReward: Integer;
  claimAmount: Integer;
}

/**
 * Single pool that stakes the lock token for a chosen duration. Longer locks and a larger remaining reward budget
 * both raise the score a deposit earns with.
 */
export default class LockStaking extends StakePool<LockPoolState, LockPosition, LockStakingClaimRequest> {
  public readonly token: TokenLedger;

  private basicRateDivider: Integer;
  private penaltyRate: Integer;
  private feeReceiver: string;

  constructor(runtime: Runtime, config: LockStakingConfig) {
    super(runtime, 'LockStaking', {
      owner: config.owner,
      rewardToken: config.token,
      vesting: config.vesting,
      authority: config.authority,
      domainName: LOCK_STAKING_DOMAIN_NAME,
      claimSchema: LOCK_STAKING_CLAIM_SCHEMA,
    });
    this.token = config.token;
    this.basicRateDivider = LockStaking._validateDivider(config.basicRateDivider);
    this.penaltyRate = LockStaking._validatePenaltyRate(config.penaltyRate ?? DEFAULT_PENALTY_RATE);
    this.feeReceiver = normalizeNonZeroAddress(config.feeReceiver);

    const stakeToken = normalizeNonZeroAddress(config.token.address);
    this.pools.set(stakeToken, {
      stakeToken,
      bonusRatePerSecond: LockStaking._validateBonusRate(config.bonusRatePerSecond),
      startTimestamp: config.startTimestamp,
      vestingCategoryId: config.vestingCategoryId,
      totalStaked: INTEGERS.ZERO,
      totalScore: INTEGERS.ZERO,
      rewardPerUnit: INTEGERS.ZERO,
      lastAccrualTimestamp: Math.max(config.startTimestamp, runtime.now()),
    });
  }

  // ==================== Entry Points ====================

  /**
   * Adds `amount` to the caller's stake and relocks the whole position for `durationSeconds` from now
   */
  public deposit(sender: string, amount: Integer, durationSeconds: number): void {
    this.guard.run('deposit', () => {
      const user = normalizeNonZeroAddress(sender);
      toPositiveInteger(amount);
      LockStaking._validateDuration(durationSeconds);
      const pool = this._getLockPool();
      const now = this.now();
      if (now < pool.startTimestamp) {
        throw new StateError(ErrorCode.PoolNotStarted, `starts at ${pool.startTimestamp}`);
      }

      this._updatePool(pool);
      const position = this._getOrCreatePosition(pool.stakeToken, user);
      this._requireCoversRemainingLock(position, durationSeconds, now);
      this._bankPending(pool, position);
      this._relock(pool, position, position.stakedAmount.plus(amount), durationSeconds, now);

      this.token.transferFrom(this.address, user, this.address, amount);

      this.emit('Deposited', {
        user,
        amount: amount.toFixed(),
        durationSeconds,
        score: position.score.toFixed(),
      });
      Logger.info({
        at: 'LockStaking#deposit',
        message: 'Deposited lock tokens',
        user,
        amount: amount.toFixed(),
        durationSeconds,
        score: position.score.toFixed(),
        totalScore: pool.totalScore.toFixed(),
      });
    });
  }

  /**
   * Relocks the existing stake for `durationSeconds` from now, re-pricing it at the current basic rate
   */
  public extend(sender: string, durationSeconds: number): void {
    this.guard.run('extend', () => {
      const user = normalizeNonZeroAddress(sender);
      LockStaking._validateDuration(durationSeconds);
      const pool = this._getLockPool();
      const position = this._getOrCreatePosition(pool.stakeToken, user);
      if (position.stakedAmount.isZero()) {
        throw new StateError(ErrorCode.InsufficientStake, `${user} has nothing staked`);
      }

      const now = this.now();
      this._updatePool(pool);
      this._requireCoversRemainingLock(position, durationSeconds, now);
      this._bankPending(pool, position);
      this._relock(pool, position, position.stakedAmount, durationSeconds, now);

      this.emit('Extended', { user, durationSeconds, score: position.score.toFixed() });
      Logger.info({
        at: 'LockStaking#extend',
        message: 'Extended lock',
        user,
        durationSeconds,
        lockEndTimestamp: position.lockEndTimestamp,
        score: position.score.toFixed(),
      });
    });
  }

  /**
   * Unstakes `amount`. Before the lock ends a penalty share of it goes to the fee receiver.
   * @return the amount sent to the caller
   */
  public withdraw(sender: string, amount: Integer): Integer {
    return this.guard.run('withdraw', () => {
      const user = normalizeNonZeroAddress(sender);
      toPositiveInteger(amount);
      const pool = this._getLockPool();
      const position = this._getOrCreatePosition(pool.stakeToken, user);
      if (amount.gt(position.stakedAmount)) {
        throw new StateError(
          ErrorCode.InsufficientStake,
          `requested ${amount.toFixed()}, staked ${position.stakedAmount.toFixed()}`,
        );
      }

      const now = this.now();
      this._updatePool(pool);
      this._bankPending(pool, position);

      const remaining = position.stakedAmount.minus(amount);
      const score = computeScore(remaining, position.lastBasicRate, getDurationRate(position.lockDuration));
      pool.totalScore = pool.totalScore.minus(position.score).plus(score);
      pool.totalStaked = pool.totalStaked.minus(amount);
      position.stakedAmount = remaining;
      position.score = score;
      position.lastActionTimestamp = now;
      this._rebaseline(pool, position);

      const penalty = now < position.lockEndTimestamp ? applyRate(amount, this.penaltyRate) : INTEGERS.ZERO;
      const received = amount.minus(penalty);
      if (penalty.gt(INTEGERS.ZERO)) {
        this.token.transfer(this.address, this.feeReceiver, penalty);
      }
      if (received.gt(INTEGERS.ZERO)) {
        this.token.transfer(this.address, user, received);
      }

      this.emit('Withdrawn', {
        user,
        amount: amount.toFixed(),
        penalty: penalty.toFixed(),
        score: score.toFixed(),
      });
      Logger.info({
        at: 'LockStaking#withdraw',
        message: 'Withdrew lock tokens',
        user,
        amount: amount.toFixed(),
        penalty: penalty.toFixed(),
        score: score.toFixed(),
      });

      return received;
    });
  }

  /**
   * Pays the caller's banked reward plus the attested side amount into the vesting escrow
   * @return the amount handed to vesting
   */
  public claim(sender: string, input: LockClaimInput, signature: string): Integer {
    return this.guard.run('claim', () => {
      const user = normalizeNonZeroAddress(sender);
      LockStaking._validateClaimInput(input);
      const pool = this._getLockPool();
      this._authorizeRequest(this._toRequest(user, pool, input), input.requestId, signature);

      this._updatePool(pool);
      const position = this._getOrCreatePosition(pool.stakeToken, user);
      this._bankPending(pool, position);

      if (input.cumulativePendingReward.gt(position.cumulativePendingReward)) {
        throw new StateError(
          ErrorCode.InvalidClaimAmount,
          `attested ${input.cumulativePendingReward.toFixed()}, recorded ${position.cumulativePendingReward.toFixed()}`,
        );
      }
      if (input.claimAmount.gt(this.rewardBudgetRemaining)) {
        throw new BudgetExhaustionError(
          ErrorCode.BudgetExceeded,
          `requested ${input.claimAmount.toFixed()}, remaining ${this.rewardBudgetRemaining.toFixed()}`,
        );
      }
      const payout = position.cumulativePendingReward.plus(input.claimAmount);
      if (payout.isZero()) {
        throw new StateError(ErrorCode.NothingToClaim, user);
      }

      this.rewardBudgetRemaining = this.rewardBudgetRemaining.minus(input.claimAmount);
      position.cumulativePendingReward = INTEGERS.ZERO;
      position.lastActionTimestamp = this.now();
      this._payReward(user, payout, pool.vestingCategoryId);

      this.emit('Claimed', { user, requestId: input.requestId, amount: payout.toFixed() });
      Logger.info({
        at: 'LockStaking#claim',
        message: 'Claimed staking reward',
        user,
        requestId: input.requestId,
        amount: payout.toFixed(),
      });

      return payout;
    });
  }

  /**
   * Burns an attested request id without paying anything
   */
  public cancelClaim(sender: string, input: LockClaimInput, signature: string): void {
    this.guard.run('cancelClaim', () => {
      const user = normalizeNonZeroAddress(sender);
      LockStaking._validateClaimInput(input);
      this._authorizeRequest(this._toRequest(user, this._getLockPool(), input), input.requestId, signature);

      this.emit('ClaimCancelled', { user, requestId: input.requestId });
      Logger.info({
        at: 'LockStaking#cancelClaim',
        message: 'Cancelled claim request',
        user,
        requestId: input.requestId,
      });
    });
  }

  // ==================== Admin ====================

  public setBasicRateDivider(sender: string, divider: Integer): void {
    this.guard.run('setBasicRateDivider', () => {
      this.access.requireOwner(sender);
      this.basicRateDivider = LockStaking._validateDivider(divider);
      this.emit('BasicRateDividerSet', { divider: divider.toFixed() });
    });
  }

  public setBonusRatePerSecond(sender: string, rate: Integer): void {
    this.guard.run('setBonusRatePerSecond', () => {
      this.access.requireOwner(sender);
      LockStaking._validateBonusRate(rate);
      const pool = this._getLockPool();
      this._updatePool(pool);
      pool.bonusRatePerSecond = rate;
      this.emit('BonusRatePerSecondSet', { rate: rate.toFixed() });
    });
  }

  public setPenaltyRate(sender: string, rate: Integer): void {
    this.guard.run('setPenaltyRate', () => {
      this.access.requireOwner(sender);
      this.penaltyRate = LockStaking._validatePenaltyRate(rate);
      this.emit('PenaltyRateSet', { rate: rate.toFixed() });
    });
  }

  public setFeeReceiver(sender: string, feeReceiver: string): void {
    this.guard.run('setFeeReceiver', () => {
      this.access.requireOwner(sender);
      this.feeReceiver = normalizeNonZeroAddress(feeReceiver);
      this.emit('FeeReceiverSet', { feeReceiver: this.feeReceiver });
    });
  }

  // ==================== Views ====================

  /**
   * `rewardBudgetRemaining * PRECISION / (basicRateDivider * 1e18)`
   */
  public getBasicRate(): Integer {
    return getPartial(this.rewardBudgetRemaining, PRECISION, this.basicRateDivider.times(ONE_ETH_WEI));
  }

  public getBasicRateDivider(): Integer {
    return this.basicRateDivider;
  }

  public getPenaltyRate(): Integer {
    return this.penaltyRate;
  }

  public getFeeReceiver(): string {
    return this.feeReceiver;
  }

  public getLockPool(): LockPoolState {
    return { ...this._getLockPool() };
  }

  public getLockPosition(user: string): LockPosition {
    return this.getUserPosition(user, this.token.address);
  }

  public getPendingReward(user: string): Integer {
    return this.pendingReward(user, this.token.address);
  }

  public takeSnapshot(): RestoreFn {
    const restorePools = super.takeSnapshot();
    const { basicRateDivider, penaltyRate, feeReceiver } = this;
    return () => {
      restorePools();
      this.basicRateDivider = basicRateDivider;
      this.penaltyRate = penaltyRate;
      this.feeReceiver = feeReceiver;
    };
  }

  protected _getTotalWeight(pool: LockPoolState): Integer {
    return pool.totalScore;
  }

  protected _createEmptyPosition(): LockPosition {
    return {
      stakedAmount: INTEGERS.ZERO,
      score: INTEGERS.ZERO,
      rewardDebt: INTEGERS.ZERO,
      cumulativePendingReward: INTEGERS.ZERO,
      lastActionTimestamp: 0,
      lockEndTimestamp: 0,
      lockDuration: 0,
      lastBasicRate: INTEGERS.ZERO,
    };
  }

  // =================================================
  // =============== Private Functions ===============
  // =================================================

  private _getLockPool(): LockPoolState {
    return this._getPoolOrThrow(this.token.address);
  }

  private _toRequest(user: string, pool: LockPoolState, input: LockClaimInput): LockStakingClaimRequest {
    return {
      requestId: input.requestId,
      beneficiary: user,
      stakeToken: pool.stakeToken,
      cumulativePendingReward: input.cumulativePendingReward,
      claimAmount: input.claimAmount,
    };
  }

  private _requireCoversRemainingLock(position: LockPosition, durationSeconds: number, now: number): void {
    const remaining = position.lockEndTimestamp - now;
    if (durationSeconds < remaining) {
      throw new StateError(ErrorCode.InvalidDuration, `${durationSeconds}s is shorter than the ${remaining}s left`);
    }
  }

  /**
   * Re-prices the whole position at the current basic rate. Expects pending reward to be banked already.
   */
  private _relock(
    pool: LockPoolState,
    position: LockPosition,
    stakedAmount: Integer,
    durationSeconds: number,
    now: number,
  ): void {
    const basicRate = this.getBasicRate();
    const score = computeScore(stakedAmount, basicRate, getDurationRate(durationSeconds));

    pool.totalScore = pool.totalScore.minus(position.score).plus(score);
    pool.totalStaked = pool.totalStaked.minus(position.stakedAmount).plus(stakedAmount);
    position.stakedAmount = stakedAmount;
    position.score = score;
    position.lastBasicRate = basicRate;
    position.lockDuration = durationSeconds;
    position.lockEndTimestamp = now + durationSeconds;
    position.lastActionTimestamp = now;
    this._rebaseline(pool, position);
  }

  private static _validateDuration(durationSeconds: number): void {
    if (!Number.isInteger(durationSeconds) || durationSeconds < 0) {
      throw new StateError(ErrorCode.InvalidDuration, `${durationSeconds}`);
    }
  }

  private static _validateClaimInput(input: LockClaimInput): void {
    toInteger(input.cumulativePendingReward);
    toInteger(input.claimAmount);
  }

  private static _validateDivider(divider: Integer): Integer {
    if (!divider.isInteger() || divider.lte(INTEGERS.ZERO)) {
      throw new ValidationError(ErrorCode.InvalidRate, `basic rate divider ${divider.toFixed()}`);
    }
    return divider;
  }

  private static _validatePenaltyRate(rate: Integer): Integer {
    if (!rate.isInteger() || rate.isNegative() || rate.gt(PRECISION)) {
      throw new ValidationError(ErrorCode.InvalidRate, `penalty rate ${rate.toFixed()}`);
    }
    return rate;
  }
}
