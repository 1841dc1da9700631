import { normalizeAddress } from '../helpers/address-helpers';
import ProcessedRequestCache from '../lib/caches/processed-request-cache';
import { CLAIM_DOMAIN_VERSION } from '../lib/constants';
import { BudgetExhaustionError, ErrorCode, ValidationError } from '../lib/errors';
import {
  accruedReward,
  accumulateRewardPerUnit,
  computeDistributed,
  pendingSinceCheckpoint,
} from '../lib/fixed-point-accrual';
import { Integer, INTEGERS, toPositiveInteger } from '../lib/integers';
import { RestoreFn, TokenLedger } from '../lib/ledger-types';
import Logger from '../lib/logger';
import Runtime from '../lib/runtime';
import { cloneRecordMap, toPositionKey } from '../lib/utils';
import BaseContract from './base-contract';
import ClaimAuthorization, { ClaimDomain, ClaimSchema } from './claim-authorization';
import VestingEscrow from './vesting-escrow';

export interface PoolState {
  stakeToken: string;
  /**
   * Reward emitted per second per staked unit, scaled by `PRECISION`
   */
  bonusRatePerSecond: Integer;
  startTimestamp: number;
  vestingCategoryId: number;
  totalStaked: Integer;
  /**
   * Cumulative reward per unit of weight since the pool started, scaled by `PRECISION`. Never decreases.
   */
  rewardPerUnit: Integer;
  lastAccrualTimestamp: number;
}

export interface UserPosition {
  stakedAmount: Integer;
  /**
   * The weight the position earns with
   */
  score: Integer;
  /**
   * `score * rewardPerUnit / PRECISION` at the last checkpoint
   */
  rewardDebt: Integer;
  cumulativePendingReward: Integer;
  lastActionTimestamp: number;
}

export interface StakePoolConfig<R> {
  owner: string;
  rewardToken: TokenLedger;
  vesting: VestingEscrow;
  authority: string;
  domainName: string;
  claimSchema: ClaimSchema<R>;
}

/**
 * Reward-per-share accrual shared by the staking contracts. Every entry point that touches a position rolls the
 * pool forward with `_updatePool` before it reads the position, banks what the position earned since its last
 * checkpoint, changes the score and then re-baselines the reward debt against the updated accumulator.
 */
export default abstract class StakePool<P extends PoolState, U extends UserPosition, R> extends BaseContract {
  public readonly rewardToken: TokenLedger;
  public readonly vesting: VestingEscrow;

  protected pools: Map<string, P>;
  protected positions: Map<string, U>;
  protected rewardBudgetRemaining: Integer;
  protected readonly processedRequests: ProcessedRequestCache;
  protected readonly authorization: ClaimAuthorization<R>;

  protected constructor(runtime: Runtime, contractName: string, config: StakePoolConfig<R>) {
    super(runtime, contractName, config.owner);
    this.rewardToken = config.rewardToken;
    this.vesting = config.vesting;
    this.pools = new Map();
    this.positions = new Map();
    this.rewardBudgetRemaining = INTEGERS.ZERO;
    this.processedRequests = new ProcessedRequestCache(runtime);
    this.authorization = new ClaimAuthorization(
      runtime,
      {
        name: config.domainName,
        version: CLAIM_DOMAIN_VERSION,
        chainId: runtime.chainId,
        verifyingContract: this.address,
      },
      config.claimSchema,
      config.authority,
    );
  }

  // ==================== Reward Funding ====================

  public allocateReward(sender: string, amount: Integer): void {
    this.guard.run('allocateReward', () => {
      this.access.requireOwner(sender);
      toPositiveInteger(amount);
      this.rewardToken.transferFrom(this.address, sender, this.address, amount);
      this.rewardBudgetRemaining = this.rewardBudgetRemaining.plus(amount);

      this.emit('RewardAllocated', { amount: amount.toFixed(), budget: this.rewardBudgetRemaining.toFixed() });
      Logger.info({
        at: `${this.constructor.name}#allocateReward`,
        message: 'Allocated reward budget',
        amount: amount.toFixed(),
        rewardBudgetRemaining: this.rewardBudgetRemaining.toFixed(),
      });
    });
  }

  /**
   * Returns budget that has not been accrued to anyone yet
   */
  public deallocateReward(sender: string, amount: Integer): void {
    this.guard.run('deallocateReward', () => {
      this.access.requireOwner(sender);
      toPositiveInteger(amount);
      if (amount.gt(this.rewardBudgetRemaining)) {
        throw new BudgetExhaustionError(
          ErrorCode.BudgetExceeded,
          `requested ${amount.toFixed()}, remaining ${this.rewardBudgetRemaining.toFixed()}`,
        );
      }
      this.rewardBudgetRemaining = this.rewardBudgetRemaining.minus(amount);
      this.rewardToken.transfer(this.address, sender, amount);

      this.emit('RewardDeallocated', { amount: amount.toFixed(), budget: this.rewardBudgetRemaining.toFixed() });
      Logger.info({
        at: `${this.constructor.name}#deallocateReward`,
        message: 'Deallocated reward budget',
        amount: amount.toFixed(),
        rewardBudgetRemaining: this.rewardBudgetRemaining.toFixed(),
      });
    });
  }

  public setAuthority(sender: string, authority: string): void {
    this.guard.run('setAuthority', () => {
      this.access.requireOwner(sender);
      this.authorization.setAuthority(authority);
      this.emit('AuthoritySet', { authority: this.authorization.getAuthority() });
    });
  }

  // ==================== Views ====================

  public getRewardBudgetRemaining(): Integer {
    return this.rewardBudgetRemaining;
  }

  public getAuthority(): string {
    return this.authorization.getAuthority();
  }

  public getClaimDomain(): ClaimDomain {
    return { ...this.authorization.domain };
  }

  public getClaimDigest(request: R): string {
    return this.authorization.getDigest(request);
  }

  public isRequestProcessed(requestId: string): boolean {
    return this.processedRequests.contains(requestId);
  }

  public getPool(stakeToken: string): P {
    return { ...this._getPoolOrThrow(stakeToken) };
  }

  public getUserPosition(user: string, stakeToken: string): U {
    const position = this.positions.get(toPositionKey(normalizeAddress(stakeToken), normalizeAddress(user)));
    return { ...(position ?? this._createEmptyPosition()) };
  }

  /**
   * Reward the position would have banked if it were checkpointed now. Computed from the committed state without
   * writing, so it is stale as soon as another call lands.
   */
  public pendingReward(user: string, stakeToken: string): Integer {
    const pool = this._getPoolOrThrow(stakeToken);
    const position = this.getUserPosition(user, stakeToken);
    const { rewardPerUnit } = this._computeAccrual(pool);
    return position.cumulativePendingReward.plus(
      pendingSinceCheckpoint(position.score, rewardPerUnit, position.rewardDebt),
    );
  }

  public takeSnapshot(): RestoreFn {
    const pools = cloneRecordMap(this.pools);
    const positions = cloneRecordMap(this.positions);
    const rewardBudgetRemaining = this.rewardBudgetRemaining;
    return () => {
      this.pools = pools;
      this.positions = positions;
      this.rewardBudgetRemaining = rewardBudgetRemaining;
    };
  }

  // ==================== Accrual ====================

  /**
   * Total weight rewards are split by: score for lock staking, staked amount for index staking
   */
  protected abstract _getTotalWeight(pool: P): Integer;

  protected abstract _createEmptyPosition(): U;

  protected _computeAccrual(pool: P): { rewardPerUnit: Integer; distributed: Integer } {
    const totalWeight = this._getTotalWeight(pool);
    if (this.now() <= pool.lastAccrualTimestamp || totalWeight.isZero()) {
      return { rewardPerUnit: pool.rewardPerUnit, distributed: INTEGERS.ZERO };
    }
    const distributed = computeDistributed(
      pool.lastAccrualTimestamp,
      this.now(),
      pool.totalStaked.times(pool.bonusRatePerSecond),
      this.rewardBudgetRemaining,
    );
    return {
      rewardPerUnit: accumulateRewardPerUnit(pool.rewardPerUnit, distributed, totalWeight),
      distributed,
    };
  }

  /**
   * Rolls the accumulator forward to now. Time during which nothing is staked earns nothing.
   */
  protected _updatePool(pool: P): void {
    const now = this.now();
    if (now <= pool.lastAccrualTimestamp) {
      return;
    }

    const { rewardPerUnit, distributed } = this._computeAccrual(pool);
    pool.rewardPerUnit = rewardPerUnit;
    pool.lastAccrualTimestamp = now;
    this.rewardBudgetRemaining = this.rewardBudgetRemaining.minus(distributed);
  }

  /**
   * Moves what the position earned since its last checkpoint into `cumulativePendingReward`
   */
  protected _bankPending(pool: P, position: U): void {
    if (position.score.gt(INTEGERS.ZERO)) {
      const pending = pendingSinceCheckpoint(position.score, pool.rewardPerUnit, position.rewardDebt);
      position.cumulativePendingReward = position.cumulativePendingReward.plus(pending);
    }
    this._rebaseline(pool, position);
  }

  /**
   * Must run right after any change to `position.score`, against the already-updated accumulator
   */
  protected _rebaseline(pool: P, position: U): void {
    position.rewardDebt = accruedReward(position.score, pool.rewardPerUnit);
  }

  // ==================== Helpers ====================

  protected _getPoolOrThrow(stakeToken: string): P {
    const pool = this.pools.get(normalizeAddress(stakeToken));
    if (!pool) {
      throw new ValidationError(ErrorCode.PoolNotFound, stakeToken);
    }
    return pool;
  }

  protected _getOrCreatePosition(stakeToken: string, user: string): U {
    const key = toPositionKey(stakeToken, user);
    const existing = this.positions.get(key);
    if (existing) {
      return existing;
    }
    const position = this._createEmptyPosition();
    this.positions.set(key, position);
    return position;
  }

  protected static _validateBonusRate(rate: Integer): Integer {
    if (!rate.isInteger() || rate.isNegative()) {
      throw new ValidationError(ErrorCode.InvalidRate, `bonus rate ${rate.toFixed()}`);
    }
    return rate;
  }

  /**
   * Marks the request consumed and checks its attestation. Throws `DuplicateRequest` or `InvalidSignature`.
   */
  protected _authorizeRequest(request: R, requestId: string, signature: string): void {
    this.processedRequests.requireUnprocessed(requestId);
    this.authorization.verify(request, signature);
    this.processedRequests.consume(requestId);
  }

  /**
   * Hands `amount` of reward token to the vesting escrow on behalf of `user`
   */
  protected _payReward(user: string, amount: Integer, vestingCategoryId: number): void {
    this.rewardToken.approve(this.address, this.vesting.address, amount);
    this.vesting.deposit(this.address, user, amount, vestingCategoryId);
  }
}
