import { normalizeNonZeroAddress } from '../helpers/address-helpers';
import { INDEX_STAKING_DOMAIN_NAME } from '../lib/constants';
import { BudgetExhaustionError, ErrorCode, StateError } from '../lib/errors';
import { Integer, INTEGERS, toPositiveInteger } from '../lib/integers';
import { TokenLedger } from '../lib/ledger-types';
import Logger from '../lib/logger';
import Runtime from '../lib/runtime';
import { INDEX_STAKING_CLAIM_SCHEMA, IndexStakingClaimRequest } from './claim-authorization';
import StakePool, { PoolState, UserPosition } from './stake-pool';
import VestingEscrow from './vesting-escrow';

export interface IndexPoolConfig {
  stakeToken: string;
  bonusRatePerSecond: Integer;
  startTimestamp: number;
  vestingCategoryId: number;
}

export interface IndexStakingConfig {
  owner: string;
  rewardToken: TokenLedger;
  vesting: VestingEscrow;
  authority: string;
  initialPools?: IndexPoolConfig[];
}

export interface IndexClaimInput {
  requestId: string;
  claimAmount: Integer;
}

/**
 * One pool per index token. A position's score is its staked amount.
 */
export default class IndexStaking extends StakePool<PoolState, UserPosition, IndexStakingClaimRequest> {
  constructor(runtime: Runtime, config: IndexStakingConfig) {
    super(runtime, 'IndexStaking', {
      owner: config.owner,
      rewardToken: config.rewardToken,
      vesting: config.vesting,
      authority: config.authority,
      domainName: INDEX_STAKING_DOMAIN_NAME,
      claimSchema: INDEX_STAKING_CLAIM_SCHEMA,
    });
    (config.initialPools ?? []).forEach(pool => this._addPool(pool));
  }

  // ==================== Entry Points ====================

  public deposit(sender: string, stakeToken: string, amount: Integer): void {
    this.guard.run('deposit', () => {
      const user = normalizeNonZeroAddress(sender);
      toPositiveInteger(amount);
      const pool = this._getPoolOrThrow(stakeToken);
      if (this.now() < pool.startTimestamp) {
        throw new StateError(ErrorCode.PoolNotStarted, `${pool.stakeToken} starts at ${pool.startTimestamp}`);
      }

      this._updatePool(pool);
      const position = this._getOrCreatePosition(pool.stakeToken, user);
      this._bankPending(pool, position);
      this._setStake(pool, position, position.stakedAmount.plus(amount));

      this.runtime.getToken(pool.stakeToken).transferFrom(this.address, user, this.address, amount);

      this.emit('Deposited', { user, stakeToken: pool.stakeToken, amount: amount.toFixed() });
      Logger.info({
        at: 'IndexStaking#deposit',
        message: 'Deposited index tokens',
        user,
        stakeToken: pool.stakeToken,
        amount: amount.toFixed(),
        totalStaked: pool.totalStaked.toFixed(),
      });
    });
  }

  public withdraw(sender: string, stakeToken: string, amount: Integer): void {
    this.guard.run('withdraw', () => {
      const user = normalizeNonZeroAddress(sender);
      toPositiveInteger(amount);
      const pool = this._getPoolOrThrow(stakeToken);
      const position = this._getOrCreatePosition(pool.stakeToken, user);
      if (amount.gt(position.stakedAmount)) {
        throw new StateError(
          ErrorCode.InsufficientStake,
          `requested ${amount.toFixed()}, staked ${position.stakedAmount.toFixed()}`,
        );
      }

      this._updatePool(pool);
      this._bankPending(pool, position);
      this._setStake(pool, position, position.stakedAmount.minus(amount));

      this.runtime.getToken(pool.stakeToken).transfer(this.address, user, amount);

      this.emit('Withdrawn', { user, stakeToken: pool.stakeToken, amount: amount.toFixed() });
      Logger.info({
        at: 'IndexStaking#withdraw',
        message: 'Withdrew index tokens',
        user,
        stakeToken: pool.stakeToken,
        amount: amount.toFixed(),
        totalStaked: pool.totalStaked.toFixed(),
      });
    });
  }

  /**
   * Pays the attested `claimAmount` out of the remaining budget into the vesting escrow. The attestation already
   * accounts for the caller's banked reward, so that is cleared.
   */
  public claim(sender: string, stakeToken: string, input: IndexClaimInput, signature: string): Integer {
    return this.guard.run('claim', () => {
      const user = normalizeNonZeroAddress(sender);
      toPositiveInteger(input.claimAmount);
      const pool = this._getPoolOrThrow(stakeToken);
      this._authorizeRequest(this._toRequest(user, pool, input), input.requestId, signature);

      this._updatePool(pool);
      const position = this._getOrCreatePosition(pool.stakeToken, user);
      this._bankPending(pool, position);

      if (input.claimAmount.gt(this.rewardBudgetRemaining)) {
        throw new BudgetExhaustionError(
          ErrorCode.BudgetExceeded,
          `requested ${input.claimAmount.toFixed()}, remaining ${this.rewardBudgetRemaining.toFixed()}`,
        );
      }

      this.rewardBudgetRemaining = this.rewardBudgetRemaining.minus(input.claimAmount);
      position.cumulativePendingReward = INTEGERS.ZERO;
      position.lastActionTimestamp = this.now();
      this._payReward(user, input.claimAmount, pool.vestingCategoryId);

      this.emit('Claimed', {
        user,
        stakeToken: pool.stakeToken,
        requestId: input.requestId,
        amount: input.claimAmount.toFixed(),
      });
      Logger.info({
        at: 'IndexStaking#claim',
        message: 'Claimed staking reward',
        user,
        stakeToken: pool.stakeToken,
        requestId: input.requestId,
        amount: input.claimAmount.toFixed(),
      });

      return input.claimAmount;
    });
  }

  public cancelClaim(sender: string, stakeToken: string, input: IndexClaimInput, signature: string): void {
    this.guard.run('cancelClaim', () => {
      const user = normalizeNonZeroAddress(sender);
      const pool = this._getPoolOrThrow(stakeToken);
      this._authorizeRequest(this._toRequest(user, pool, input), input.requestId, signature);

      this.emit('ClaimCancelled', { user, stakeToken: pool.stakeToken, requestId: input.requestId });
      Logger.info({
        at: 'IndexStaking#cancelClaim',
        message: 'Cancelled claim request',
        user,
        stakeToken: pool.stakeToken,
        requestId: input.requestId,
      });
    });
  }

  // ==================== Admin ====================

  public addPool(sender: string, config: IndexPoolConfig): void {
    this.guard.run('addPool', () => {
      this.access.requireOwner(sender);
      this._addPool(config);
    });
  }

  public setBonusRatePerSecond(sender: string, stakeToken: string, rate: Integer): void {
    this.guard.run('setBonusRatePerSecond', () => {
      this.access.requireOwner(sender);
      IndexStaking._validateBonusRate(rate);
      const pool = this._getPoolOrThrow(stakeToken);
      this._updatePool(pool);
      pool.bonusRatePerSecond = rate;
      this.emit('BonusRatePerSecondSet', { stakeToken: pool.stakeToken, rate: rate.toFixed() });
    });
  }

  // ==================== Views ====================

  public getStakeTokens(): string[] {
    return Array.from(this.pools.keys());
  }

  protected _getTotalWeight(pool: PoolState): Integer {
    return pool.totalStaked;
  }

  protected _createEmptyPosition(): UserPosition {
    return {
      stakedAmount: INTEGERS.ZERO,
      score: INTEGERS.ZERO,
      rewardDebt: INTEGERS.ZERO,
      cumulativePendingReward: INTEGERS.ZERO,
      lastActionTimestamp: 0,
    };
  }

  // =================================================
  // =============== Private Functions ===============
  // =================================================

  private _addPool(config: IndexPoolConfig): void {
    const stakeToken = normalizeNonZeroAddress(config.stakeToken);
    IndexStaking._validateBonusRate(config.bonusRatePerSecond);
    if (this.pools.has(stakeToken)) {
      throw new StateError(ErrorCode.PoolAlreadyExists, stakeToken);
    }
    this.runtime.getToken(stakeToken);

    this.pools.set(stakeToken, {
      stakeToken,
      bonusRatePerSecond: config.bonusRatePerSecond,
      startTimestamp: config.startTimestamp,
      vestingCategoryId: config.vestingCategoryId,
      totalStaked: INTEGERS.ZERO,
      rewardPerUnit: INTEGERS.ZERO,
      lastAccrualTimestamp: Math.max(config.startTimestamp, this.now()),
    });

    this.emit('PoolAdded', {
      stakeToken,
      bonusRatePerSecond: config.bonusRatePerSecond.toFixed(),
      startTimestamp: config.startTimestamp,
      vestingCategoryId: config.vestingCategoryId,
    });
    Logger.info({
      at: 'IndexStaking#_addPool',
      message: 'Added staking pool',
      stakeToken,
      bonusRatePerSecond: config.bonusRatePerSecond.toFixed(),
      startTimestamp: config.startTimestamp,
    });
  }

  private _toRequest(user: string, pool: PoolState, input: IndexClaimInput): IndexStakingClaimRequest {
    return {
      requestId: input.requestId,
      beneficiary: user,
      stakeToken: pool.stakeToken,
      claimAmount: input.claimAmount,
    };
  }

  /**
   * Expects pending reward to be banked already
   */
  private _setStake(pool: PoolState, position: UserPosition, stakedAmount: Integer): void {
    pool.totalStaked = pool.totalStaked.minus(position.stakedAmount).plus(stakedAmount);
    position.stakedAmount = stakedAmount;
    position.score = stakedAmount;
    position.lastActionTimestamp = this.now();
    this._rebaseline(pool, position);
  }
}
