import { normalizeNonZeroAddress } from '../helpers/address-helpers';
import ProcessedRequestCache from '../lib/caches/processed-request-cache';
import { BYTES32_REGEX, CLAIM_DOMAIN_VERSION, REFERRAL_DOMAIN_NAME } from '../lib/constants';
import { BudgetExhaustionError, ErrorCode, ValidationError } from '../lib/errors';
import { Integer, INTEGERS, toInteger, toPositiveInteger } from '../lib/integers';
import { RestoreFn, TokenLedger } from '../lib/ledger-types';
import Logger from '../lib/logger';
import Runtime from '../lib/runtime';
import BaseContract from './base-contract';
import ClaimAuthorization, { ClaimDomain, REFERRAL_CLAIM_SCHEMA, ReferralClaimRequest } from './claim-authorization';
import VestingEscrow from './vesting-escrow';

export interface LockonReferralConfig {
  owner: string;
  authority: string;
  lockToken: TokenLedger;
  stableToken: TokenLedger;
  vesting: VestingEscrow;
  /**
   * bytes32 referral type => vesting category the lock token reward vests under
   */
  referralTypes: Record<string, number>;
}

export interface ReferralClaimInput {
  requestId: string;
  referralType: string;
  lockAmount: Integer;
  stableAmount: Integer;
}

export type RewardKind = 'lock' | 'stable';

/**
 * Pays operator-attested referral rewards. The lock token share vests under the referral type's category, the stable
 * token share is transferred straight to the referrer. Both come out of budgets the owner funds.
 */
export default class LockonReferral extends BaseContract {
  public readonly lockToken: TokenLedger;
  public readonly stableToken: TokenLedger;
  public readonly vesting: VestingEscrow;

  private referralTypes: Map<string, number>;
  private budgets: Record<RewardKind, Integer>;
  private readonly processedRequests: ProcessedRequestCache;
  private readonly authorization: ClaimAuthorization<ReferralClaimRequest>;

  constructor(runtime: Runtime, config: LockonReferralConfig) {
    super(runtime, 'LockonReferral', config.owner);
    this.lockToken = config.lockToken;
    this.stableToken = config.stableToken;
    this.vesting = config.vesting;
    this.referralTypes = new Map();
    this.budgets = { lock: INTEGERS.ZERO, stable: INTEGERS.ZERO };
    this.processedRequests = new ProcessedRequestCache(runtime);
    this.authorization = new ClaimAuthorization(
      runtime,
      {
        name: REFERRAL_DOMAIN_NAME,
        version: CLAIM_DOMAIN_VERSION,
        chainId: runtime.chainId,
        verifyingContract: this.address,
      },
      REFERRAL_CLAIM_SCHEMA,
      config.authority,
    );

    Object.entries(config.referralTypes).forEach(([referralType, categoryId]) => {
      this._setReferralType(referralType, categoryId);
    });
  }

  // ==================== Entry Points ====================

  public claim(sender: string, input: ReferralClaimInput, signature: string): void {
    this.guard.run('claim', () => {
      const user = normalizeNonZeroAddress(sender);
      toInteger(input.lockAmount);
      toInteger(input.stableAmount);
      if (input.lockAmount.isZero() && input.stableAmount.isZero()) {
        throw new ValidationError(ErrorCode.ZeroAmount);
      }
      const referralType = LockonReferral._validateReferralType(input.referralType);
      const categoryId = this._getCategoryOrThrow(referralType);
      this._authorizeRequest(this._toRequest(user, input), input.requestId, signature);

      this._drawBudget('lock', input.lockAmount);
      this._drawBudget('stable', input.stableAmount);

      if (input.lockAmount.gt(INTEGERS.ZERO)) {
        this.lockToken.approve(this.address, this.vesting.address, input.lockAmount);
        this.vesting.deposit(this.address, user, input.lockAmount, categoryId);
      }
      if (input.stableAmount.gt(INTEGERS.ZERO)) {
        this.stableToken.transfer(this.address, user, input.stableAmount);
      }

      this.emit('ReferralRewardClaimed', {
        user,
        requestId: input.requestId,
        referralType,
        lockAmount: input.lockAmount.toFixed(),
        stableAmount: input.stableAmount.toFixed(),
      });
      Logger.info({
        at: 'LockonReferral#claim',
        message: 'Claimed referral reward',
        user,
        requestId: input.requestId,
        referralType,
        lockAmount: input.lockAmount.toFixed(),
        stableAmount: input.stableAmount.toFixed(),
      });
    });
  }

  public cancelClaim(sender: string, input: ReferralClaimInput, signature: string): void {
    this.guard.run('cancelClaim', () => {
      const user = normalizeNonZeroAddress(sender);
      toInteger(input.lockAmount);
      toInteger(input.stableAmount);
      LockonReferral._validateReferralType(input.referralType);
      this._authorizeRequest(this._toRequest(user, input), input.requestId, signature);

      this.emit('ClaimCancelled', { user, requestId: input.requestId });
      Logger.info({
        at: 'LockonReferral#cancelClaim',
        message: 'Cancelled referral claim request',
        user,
        requestId: input.requestId,
      });
    });
  }

  // ==================== Admin ====================

  public allocateReward(sender: string, kind: RewardKind, amount: Integer): void {
    this.guard.run('allocateReward', () => {
      this.access.requireOwner(sender);
      toPositiveInteger(amount);
      this._getToken(kind).transferFrom(this.address, sender, this.address, amount);
      this.budgets[kind] = this.budgets[kind].plus(amount);

      this.emit('RewardAllocated', { kind, amount: amount.toFixed(), budget: this.budgets[kind].toFixed() });
      Logger.info({
        at: 'LockonReferral#allocateReward',
        message: 'Allocated referral budget',
        kind,
        amount: amount.toFixed(),
        budget: this.budgets[kind].toFixed(),
      });
    });
  }

  public deallocateReward(sender: string, kind: RewardKind, amount: Integer): void {
    this.guard.run('deallocateReward', () => {
      this.access.requireOwner(sender);
      toPositiveInteger(amount);
      this._drawBudget(kind, amount);
      this._getToken(kind).transfer(this.address, sender, amount);

      this.emit('RewardDeallocated', { kind, amount: amount.toFixed(), budget: this.budgets[kind].toFixed() });
      Logger.info({
        at: 'LockonReferral#deallocateReward',
        message: 'Deallocated referral budget',
        kind,
        amount: amount.toFixed(),
        budget: this.budgets[kind].toFixed(),
      });
    });
  }

  public setReferralType(sender: string, referralType: string, categoryId: number): void {
    this.guard.run('setReferralType', () => {
      this.access.requireOwner(sender);
      this._setReferralType(referralType, categoryId);
      this.emit('ReferralTypeSet', { referralType: referralType.toLowerCase(), categoryId });
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

  public getRewardBudget(kind: RewardKind): Integer {
    return this.budgets[kind];
  }

  public getReferralCategory(referralType: string): number | undefined {
    return this.referralTypes.get(referralType.toLowerCase());
  }

  public getAuthority(): string {
    return this.authorization.getAuthority();
  }

  public getClaimDomain(): ClaimDomain {
    return { ...this.authorization.domain };
  }

  public getClaimDigest(request: ReferralClaimRequest): string {
    return this.authorization.getDigest(request);
  }

  public isRequestProcessed(requestId: string): boolean {
    return this.processedRequests.contains(requestId);
  }

  public takeSnapshot(): RestoreFn {
    const referralTypes = new Map(this.referralTypes);
    const budgets = { ...this.budgets };
    return () => {
      this.referralTypes = referralTypes;
      this.budgets = budgets;
    };
  }

  // =================================================
  // =============== Private Functions ===============
  // =================================================

  private _getToken(kind: RewardKind): TokenLedger {
    return kind === 'lock' ? this.lockToken : this.stableToken;
  }

  private _drawBudget(kind: RewardKind, amount: Integer): void {
    if (amount.gt(this.budgets[kind])) {
      throw new BudgetExhaustionError(
        ErrorCode.BudgetExceeded,
        `requested ${amount.toFixed()} ${kind}, remaining ${this.budgets[kind].toFixed()}`,
      );
    }
    this.budgets[kind] = this.budgets[kind].minus(amount);
  }

  private _getCategoryOrThrow(referralType: string): number {
    const categoryId = this.referralTypes.get(referralType);
    if (categoryId === undefined) {
      throw new ValidationError(ErrorCode.InvalidReferralType, referralType);
    }
    return categoryId;
  }

  private _toRequest(user: string, input: ReferralClaimInput): ReferralClaimRequest {
    return {
      requestId: input.requestId,
      beneficiary: user,
      referralType: input.referralType.toLowerCase(),
      lockAmount: input.lockAmount,
      stableAmount: input.stableAmount,
    };
  }

  private _authorizeRequest(request: ReferralClaimRequest, requestId: string, signature: string): void {
    this.processedRequests.requireUnprocessed(requestId);
    this.authorization.verify(request, signature);
    this.processedRequests.consume(requestId);
  }

  private _setReferralType(referralType: string, categoryId: number): void {
    const normalized = LockonReferral._validateReferralType(referralType);
    if (!Number.isInteger(categoryId) || categoryId < 0) {
      throw new ValidationError(ErrorCode.InvalidCategory, `${categoryId}`);
    }
    this.referralTypes.set(normalized, categoryId);
  }

  private static _validateReferralType(referralType: string): string {
    if (!BYTES32_REGEX.test(referralType)) {
      throw new ValidationError(ErrorCode.InvalidReferralType, referralType);
    }
    return referralType.toLowerCase();
  }
}
