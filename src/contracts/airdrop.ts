import { normalizeNonZeroAddress } from '../helpers/address-helpers';
import { ErrorCode, StateError, ValidationError } from '../lib/errors';
import { Integer, INTEGERS, toInteger } from '../lib/integers';
import { RestoreFn, TokenLedger } from '../lib/ledger-types';
import Logger from '../lib/logger';
import Runtime from '../lib/runtime';
import BaseContract from './base-contract';
import VestingEscrow from './vesting-escrow';

export interface AirdropConfig {
  owner: string;
  token: TokenLedger;
  vesting: VestingEscrow;
  startTimestamp: number;
  vestingCategoryId: number;
}

interface Allocation {
  allocated: Integer;
  claimed: Integer;
}

/**
 * Owner-maintained allocation list. Raising a user's allocation after they claimed lets them claim the difference.
 */
export default class Airdrop extends BaseContract {
  public readonly token: TokenLedger;
  public readonly vesting: VestingEscrow;
  public readonly vestingCategoryId: number;

  private startTimestamp: number;
  private allocations: Map<string, Allocation>;

  constructor(runtime: Runtime, config: AirdropConfig) {
    super(runtime, 'Airdrop', config.owner);
    this.token = config.token;
    this.vesting = config.vesting;
    this.vestingCategoryId = config.vestingCategoryId;
    this.startTimestamp = config.startTimestamp;
    this.allocations = new Map();
  }

  public setAllocations(sender: string, users: string[], amounts: Integer[]): void {
    this.guard.run('setAllocations', () => {
      this.access.requireOwner(sender);
      if (users.length !== amounts.length) {
        throw new ValidationError(ErrorCode.LengthMismatch, `${users.length} users, ${amounts.length} amounts`);
      }

      const normalizedUsers = users.map(user => normalizeNonZeroAddress(user));
      amounts.forEach(amount => toInteger(amount));

      normalizedUsers.forEach((normalized, i) => {
        const current = this.allocations.get(normalized);
        this.allocations.set(normalized, {
          allocated: amounts[i],
          claimed: current ? current.claimed : INTEGERS.ZERO,
        });
      });

      this.emit('AllocationsSet', { users: normalizedUsers });
      Logger.info({
        at: 'Airdrop#setAllocations',
        message: 'Set airdrop allocations',
        count: users.length,
      });
    });
  }

  /**
   * @return the amount handed to vesting
   */
  public claim(sender: string): Integer {
    return this.guard.run('claim', () => {
      const user = normalizeNonZeroAddress(sender);
      if (this.now() < this.startTimestamp) {
        throw new StateError(ErrorCode.AirdropNotStarted, `starts at ${this.startTimestamp}`);
      }
      const allocation = this.allocations.get(user);
      const claimable = allocation ? allocation.allocated.minus(allocation.claimed) : INTEGERS.ZERO;
      if (!allocation || claimable.lte(INTEGERS.ZERO)) {
        throw new StateError(ErrorCode.NothingToClaim, user);
      }

      this.allocations.set(user, { allocated: allocation.allocated, claimed: allocation.allocated });
      this.token.approve(this.address, this.vesting.address, claimable);
      this.vesting.deposit(this.address, user, claimable, this.vestingCategoryId);

      this.emit('AirdropClaimed', { user, amount: claimable.toFixed() });
      Logger.info({
        at: 'Airdrop#claim',
        message: 'Claimed airdrop',
        user,
        amount: claimable.toFixed(),
      });

      return claimable;
    });
  }

  public setStartTimestamp(sender: string, startTimestamp: number): void {
    this.guard.run('setStartTimestamp', () => {
      this.access.requireOwner(sender);
      this.startTimestamp = startTimestamp;
      this.emit('StartTimestampSet', { startTimestamp });
    });
  }

  public getAllocation(user: string): Integer {
    return this.allocations.get(user.toLowerCase())?.allocated ?? INTEGERS.ZERO;
  }

  public getClaimed(user: string): Integer {
    return this.allocations.get(user.toLowerCase())?.claimed ?? INTEGERS.ZERO;
  }

  public getStartTimestamp(): number {
    return this.startTimestamp;
  }

  public takeSnapshot(): RestoreFn {
    const startTimestamp = this.startTimestamp;
    const allocations = new Map(this.allocations);
    return () => {
      this.startTimestamp = startTimestamp;
      this.allocations = allocations;
    };
  }
}
