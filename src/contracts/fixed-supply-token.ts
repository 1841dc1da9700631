import { normalizeAddress, normalizeNonZeroAddress } from '../helpers/address-helpers';
import { ADDRESS_ZERO } from '../lib/constants';
import { ErrorCode, StateError } from '../lib/errors';
import { Integer, INTEGERS, toInteger, toPositiveInteger } from '../lib/integers';
import { RestoreFn, TokenLedger } from '../lib/ledger-types';
import Logger from '../lib/logger';
import Runtime from '../lib/runtime';
import { toPositionKey } from '../lib/utils';
import BaseContract from './base-contract';

export interface FixedSupplyTokenConfig {
  name: string;
  symbol: string;
  owner: string;
  managementAddress: string;
  totalSupply: Integer;
}

/**
 * ERC-20 style ledger whose entire supply is minted once, at construction, to the management address.
 */
export default class FixedSupplyToken extends BaseContract implements TokenLedger {
  public readonly name: string;
  public readonly symbol: string;
  public readonly decimals = 18;
  public readonly totalSupply: Integer;

  private balances: Map<string, Integer>;
  private allowances: Map<string, Integer>;

  constructor(runtime: Runtime, config: FixedSupplyTokenConfig) {
    super(runtime, `${config.symbol}Token`, config.owner);
    toPositiveInteger(config.totalSupply);

    this.name = config.name;
    this.symbol = config.symbol;
    this.totalSupply = config.totalSupply;
    this.balances = new Map();
    this.allowances = new Map();
    runtime.registerToken(this);

    const managementAddress = normalizeNonZeroAddress(config.managementAddress);
    this.balances.set(managementAddress, config.totalSupply);
    this.emit('Transfer', {
      from: ADDRESS_ZERO,
      to: managementAddress,
      amount: config.totalSupply.toFixed(),
    });
  }

  public balanceOf(account: string): Integer {
    return this.balances.get(normalizeAddress(account)) ?? INTEGERS.ZERO;
  }

  public allowance(owner: string, spender: string): Integer {
    return this.allowances.get(toPositionKey(normalizeAddress(owner), normalizeAddress(spender))) ?? INTEGERS.ZERO;
  }

  public transfer(sender: string, to: string, amount: Integer): void {
    this.guard.run('transfer', () => this._transfer(normalizeAddress(sender), normalizeNonZeroAddress(to), amount));
  }

  public approve(sender: string, spender: string, amount: Integer): void {
    this.guard.run('approve', () => {
      const owner = normalizeNonZeroAddress(sender);
      const normalizedSpender = normalizeNonZeroAddress(spender);
      toInteger(amount);
      this.allowances.set(toPositionKey(owner, normalizedSpender), amount);
      this.emit('Approval', {
        owner,
        spender: normalizedSpender,
        amount: amount.toFixed(),
      });
    });
  }

  public transferFrom(sender: string, from: string, to: string, amount: Integer): void {
    this.guard.run('transferFrom', () => {
      const spender = normalizeAddress(sender);
      const owner = normalizeNonZeroAddress(from);
      toInteger(amount);
      const key = toPositionKey(owner, spender);
      const allowance = this.allowances.get(key) ?? INTEGERS.ZERO;
      if (allowance.lt(amount)) {
        throw new StateError(
          ErrorCode.InsufficientAllowance,
          `${spender} may spend ${allowance.toFixed()} of ${owner}, needs ${amount.toFixed()}`,
        );
      }
      this.allowances.set(key, allowance.minus(amount));
      this._transfer(owner, normalizeNonZeroAddress(to), amount);
    });
  }

  public takeSnapshot(): RestoreFn {
    const balances = new Map(this.balances);
    const allowances = new Map(this.allowances);
    return () => {
      this.balances = balances;
      this.allowances = allowances;
    };
  }

  private _transfer(from: string, to: string, amount: Integer): void {
    toInteger(amount);
    const fromBalance = this.balances.get(from) ?? INTEGERS.ZERO;
    if (fromBalance.lt(amount)) {
      throw new StateError(
        ErrorCode.InsufficientBalance,
        `${from} holds ${fromBalance.toFixed()} ${this.symbol}, needs ${amount.toFixed()}`,
      );
    }
    this.balances.set(from, fromBalance.minus(amount));
    this.balances.set(to, (this.balances.get(to) ?? INTEGERS.ZERO).plus(amount));
    this.emit('Transfer', { from, to, amount: amount.toFixed() });

    Logger.debug({
      at: `${this.symbol}Token#_transfer`,
      message: 'Transferred tokens',
      from,
      to,
      amount: amount.toFixed(),
    });
  }
}
