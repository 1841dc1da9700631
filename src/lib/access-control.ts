import { normalizeNonZeroAddress } from '../helpers/address-helpers';
import { AuthorizationError, ErrorCode } from './errors';
import { RestoreFn, Snapshottable } from './ledger-types';
import Runtime from './runtime';

/**
 * Owner plus an allow-list of addresses. Membership is a plain set keyed by lower-cased address.
 */
export default class AccessControl implements Snapshottable {
  private owner: string;
  private allowList: Set<string>;

  constructor(runtime: Runtime, owner: string) {
    this.owner = normalizeNonZeroAddress(owner);
    this.allowList = new Set();
    runtime.register(this);
  }

  public getOwner(): string {
    return this.owner;
  }

  public isOwner(account: string): boolean {
    return account.toLowerCase() === this.owner;
  }

  public isAllowed(account: string): boolean {
    return this.allowList.has(account.toLowerCase());
  }

  public getAllowList(): string[] {
    return Array.from(this.allowList);
  }

  public requireOwner(sender: string): void {
    if (!this.isOwner(sender)) {
      throw new AuthorizationError(ErrorCode.NotOwner, sender);
    }
  }

  public requireOwnerOrAllowed(sender: string): void {
    if (!this.isOwner(sender) && !this.isAllowed(sender)) {
      throw new AuthorizationError(ErrorCode.NotAllowed, sender);
    }
  }

  public transferOwnership(newOwner: string): void {
    this.owner = normalizeNonZeroAddress(newOwner);
  }

  /**
   * @return false if the account was already present
   */
  public allow(account: string): boolean {
    const normalized = normalizeNonZeroAddress(account);
    if (this.allowList.has(normalized)) {
      return false;
    }
    this.allowList.add(normalized);
    return true;
  }

  /**
   * @return false if the account was not present
   */
  public disallow(account: string): boolean {
    return this.allowList.delete(normalizeNonZeroAddress(account));
  }

  public takeSnapshot(): RestoreFn {
    const owner = this.owner;
    const allowList = new Set(this.allowList);
    return () => {
      this.owner = owner;
      this.allowList = allowList;
    };
  }
}
