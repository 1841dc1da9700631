import { Integer } from './integers';

/**
 * The fungible-token ledger the contracts move value through. Every mutating call names the account that is
 * executing it, the way `msg.sender` would.
 */
export interface TokenLedger {
  readonly address: string;

  balanceOf(account: string): Integer;

  allowance(owner: string, spender: string): Integer;

  transfer(sender: string, to: string, amount: Integer): void;

  approve(sender: string, spender: string, amount: Integer): void;

  transferFrom(sender: string, from: string, to: string, amount: Integer): void;
}

export type RestoreFn = () => void;

/**
 * State that can be captured before a call and put back if the call reverts
 */
export interface Snapshottable {
  takeSnapshot(): RestoreFn;
}

export type EventArgValue = string | number | boolean | string[];

export interface ContractEvent {
  address: string;
  name: string;
  args: Record<string, EventArgValue>;
  blockNumber: number;
  timestamp: number;
}
