import { normalizeAddress, normalizeNonZeroAddress } from '../helpers/address-helpers';
import { AuthorizationError, ErrorCode, StateError, ValidationError } from '../lib/errors';
import { linearUnlocked } from '../lib/fixed-point-accrual';
import { Integer, INTEGERS, maxInteger, minInteger, toPositiveInteger } from '../lib/integers';
import { RestoreFn, TokenLedger } from '../lib/ledger-types';
import Logger from '../lib/logger';
import Runtime from '../lib/runtime';
import { cloneRecordMap, toPositionKey } from '../lib/utils';
import BaseContract from './base-contract';

export interface VestingWallet {
  /**
   * Principal released linearly from `startTime` over the category's duration
   */
  vestingAmount: Integer;
  /**
   * Unlocked under earlier schedules and not yet paid, frozen at the last re-baseline
   */
  claimableAmount: Integer;
  /**
   * Paid out under the current schedule
   */
  claimedAmount: Integer;
  startTime: number;
  categoryId: number;
}

export interface VestingEscrowConfig {
  owner: string;
  token: TokenLedger;
  /**
   * categoryId => duration in seconds
   */
  categoryDurations?: Record<number, number>;
}

function emptyWallet(categoryId: number): VestingWallet {
  return {
    vestingAmount: INTEGERS.ZERO,
    claimableAmount: INTEGERS.ZERO,
    claimedAmount: INTEGERS.ZERO,
    startTime: 0,
    categoryId,
  };
}

/**
 * Per-(user, category) linear vesting. Each deposit freezes what already unlocked into `claimableAmount` and restarts
 * the clock for the rest of the principal plus the new amount.
 */
export default class VestingEscrow extends BaseContract {
  public readonly token: TokenLedger;

  private wallets: Map<string, VestingWallet>;
  private categoryDurations: Map<number, number>;
  private bannedUsers: Set<string>;

  constructor(runtime: Runtime, config: VestingEscrowConfig) {
    super(runtime, 'VestingEscrow', config.owner);
    this.token = config.token;
    this.wallets = new Map();
    this.categoryDurations = new Map();
    this.bannedUsers = new Set();

    Object.entries(config.categoryDurations ?? {}).forEach(([categoryId, duration]) => {
      this._setCategoryDuration(Number(categoryId), duration);
    });
  }

  // ==================== Entry Points ====================

  /**
   * Pulls `amount` from `sender` and re-baselines the wallet of `user` for `categoryId`. Only the owner and
   * allow-listed depositors may call this.
   */
  public deposit(sender: string, user: string, amount: Integer, categoryId: number): void {
    this.guard.run('deposit', () => {
      this.access.requireOwnerOrAllowed(sender);
      const beneficiary = normalizeNonZeroAddress(user);
      this._requireNotBanned(beneficiary);
      toPositiveInteger(amount);
      const duration = this._getCategoryDurationOrThrow(categoryId);

      const now = this.now();
      const key = toPositionKey(beneficiary, categoryId);
      const wallet = this.wallets.get(key) ?? emptyWallet(categoryId);
      const currentlyClaimable = linearUnlocked(wallet.vestingAmount, now - wallet.startTime, duration);
      const unpaid = currentlyClaimable.plus(wallet.claimableAmount).minus(wallet.claimedAmount);

      // A longer category duration can leave more paid out than has unlocked; the excess comes off the principal
      const updated: VestingWallet = {
        vestingAmount: wallet.vestingAmount
          .plus(amount)
          .minus(currentlyClaimable)
          .plus(minInteger(unpaid, INTEGERS.ZERO)),
        claimableAmount: maxInteger(unpaid, INTEGERS.ZERO),
        claimedAmount: INTEGERS.ZERO,
        startTime: now,
        categoryId,
      };
      this.wallets.set(key, updated);

      this.token.transferFrom(this.address, sender, this.address, amount);

      this.emit('VestingDeposited', {
        depositor: sender.toLowerCase(),
        user: beneficiary,
        amount: amount.toFixed(),
        categoryId,
        vestingAmount: updated.vestingAmount.toFixed(),
        claimableAmount: updated.claimableAmount.toFixed(),
      });

      Logger.info({
        at: 'VestingEscrow#deposit',
        message: 'Deposited vesting tokens',
        user: beneficiary,
        amount: amount.toFixed(),
        categoryId,
        vestingAmount: updated.vestingAmount.toFixed(),
        claimableAmount: updated.claimableAmount.toFixed(),
      });
    });
  }

  /**
   * Pays `sender` everything unlocked for `categoryId`
   * @return the amount transferred
   */
  public claim(sender: string, categoryId: number): Integer {
    return this.guard.run('claim', () => {
      const beneficiary = normalizeNonZeroAddress(sender);
      this._requireNotBanned(beneficiary);
      const duration = this._getCategoryDurationOrThrow(categoryId);

      const key = toPositionKey(beneficiary, categoryId);
      const wallet = this.wallets.get(key) ?? emptyWallet(categoryId);
      const currentlyClaimable = linearUnlocked(wallet.vestingAmount, this.now() - wallet.startTime, duration);
      const payable = currentlyClaimable.plus(wallet.claimableAmount).minus(wallet.claimedAmount);
      if (payable.lte(INTEGERS.ZERO)) {
        throw new StateError(ErrorCode.NothingToClaim, `${beneficiary} in category ${categoryId}`);
      }

      this.wallets.set(key, {
        ...wallet,
        claimedAmount: currentlyClaimable,
        claimableAmount: INTEGERS.ZERO,
      });

      this.token.transfer(this.address, beneficiary, payable);

      this.emit('VestingClaimed', { user: beneficiary, amount: payable.toFixed(), categoryId });
      Logger.info({
        at: 'VestingEscrow#claim',
        message: 'Claimed vested tokens',
        user: beneficiary,
        amount: payable.toFixed(),
        categoryId,
      });

      return payable;
    });
  }

  // ==================== Admin ====================

  public setCategoryDuration(sender: string, categoryId: number, durationSeconds: number): void {
    this.guard.run('setCategoryDuration', () => {
      this.access.requireOwner(sender);
      this._setCategoryDuration(categoryId, durationSeconds);
      this.emit('CategoryDurationSet', { categoryId, durationSeconds });
    });
  }

  public addDepositor(sender: string, depositor: string): void {
    this.guard.run('addDepositor', () => {
      this.access.requireOwner(sender);
      if (this.access.allow(depositor)) {
        this.emit('DepositorAdded', { depositor: depositor.toLowerCase() });
      }
    });
  }

  public removeDepositor(sender: string, depositor: string): void {
    this.guard.run('removeDepositor', () => {
      this.access.requireOwner(sender);
      if (this.access.disallow(depositor)) {
        this.emit('DepositorRemoved', { depositor: depositor.toLowerCase() });
      }
    });
  }

  public banUser(sender: string, user: string): void {
    this.guard.run('banUser', () => {
      this.access.requireOwner(sender);
      const normalized = normalizeNonZeroAddress(user);
      this.bannedUsers.add(normalized);
      this.emit('UserBanned', { user: normalized });
    });
  }

  public unbanUser(sender: string, user: string): void {
    this.guard.run('unbanUser', () => {
      this.access.requireOwner(sender);
      const normalized = normalizeNonZeroAddress(user);
      this.bannedUsers.delete(normalized);
      this.emit('UserUnbanned', { user: normalized });
    });
  }

  // ==================== Views ====================

  public getWallet(user: string, categoryId: number): VestingWallet {
    return { ...(this.wallets.get(toPositionKey(normalizeAddress(user), categoryId)) ?? emptyWallet(categoryId)) };
  }

  public getCategoryDuration(categoryId: number): number | undefined {
    return this.categoryDurations.get(categoryId);
  }

  public getDepositors(): string[] {
    return this.access.getAllowList();
  }

  public isBanned(user: string): boolean {
    return this.bannedUsers.has(normalizeAddress(user));
  }

  /**
   * What `claim` would pay right now
   */
  public getClaimable(user: string, categoryId: number): Integer {
    const wallet = this.getWallet(user, categoryId);
    const duration = this._getCategoryDurationOrThrow(categoryId);
    const currentlyClaimable = linearUnlocked(wallet.vestingAmount, this.now() - wallet.startTime, duration);
    return maxInteger(currentlyClaimable.plus(wallet.claimableAmount).minus(wallet.claimedAmount), INTEGERS.ZERO);
  }

  /**
   * Principal of the current schedule that has not unlocked yet
   */
  public getLockedAmount(user: string, categoryId: number): Integer {
    const wallet = this.getWallet(user, categoryId);
    const duration = this._getCategoryDurationOrThrow(categoryId);
    return wallet.vestingAmount.minus(linearUnlocked(wallet.vestingAmount, this.now() - wallet.startTime, duration));
  }

  public takeSnapshot(): RestoreFn {
    const wallets = cloneRecordMap(this.wallets);
    const categoryDurations = new Map(this.categoryDurations);
    const bannedUsers = new Set(this.bannedUsers);
    return () => {
      this.wallets = wallets;
      this.categoryDurations = categoryDurations;
      this.bannedUsers = bannedUsers;
    };
  }

  // =================================================
  // =============== Private Functions ===============
  // =================================================

  private _requireNotBanned(user: string): void {
    if (this.bannedUsers.has(user)) {
      throw new AuthorizationError(ErrorCode.UserBanned, user);
    }
  }

  private _getCategoryDurationOrThrow(categoryId: number): number {
    const duration = this.categoryDurations.get(categoryId);
    if (duration === undefined) {
      throw new ValidationError(ErrorCode.InvalidCategory, `${categoryId}`);
    }
    return duration;
  }

  private _setCategoryDuration(categoryId: number, durationSeconds: number): void {
    if (!Number.isInteger(categoryId) || categoryId < 0) {
      throw new ValidationError(ErrorCode.InvalidCategory, `${categoryId}`);
    }
    if (!Number.isInteger(durationSeconds) || durationSeconds < 0) {
      throw new ValidationError(ErrorCode.InvalidCategory, `duration ${durationSeconds}`);
    }
    this.categoryDurations.set(categoryId, durationSeconds);
  }
}
