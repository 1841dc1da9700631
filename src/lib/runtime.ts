import { ethers } from 'ethers';
import { normalizeAddress } from '../helpers/address-helpers';
import BlockStore from './block-store';
import { ChainId } from './chain-id';
import { ErrorCode, ValidationError } from './errors';
import { ContractEvent, EventArgValue, Snapshottable, TokenLedger } from './ledger-types';

const DEFAULT_DEPLOYER = '0x00000000000000000000000000000000000000de';

/**
 * In-process stand-in for the host ledger. It owns the clock, the event log and the all-or-nothing call boundary
 * every contract entry point runs inside.
 */
export default class Runtime {
  public readonly blockStore: BlockStore;
  public readonly chainId: ChainId;

  private readonly deployer: string;
  private readonly components: Snapshottable[];
  private readonly tokens: Map<string, TokenLedger>;
  private events: ContractEvent[];
  private nonce: number;
  private depth: number;

  constructor(chainId: ChainId, blockStore: BlockStore = new BlockStore(), deployer: string = DEFAULT_DEPLOYER) {
    this.chainId = chainId;
    this.blockStore = blockStore;
    this.deployer = normalizeAddress(deployer);
    this.components = [];
    this.tokens = new Map();
    this.events = [];
    this.nonce = 0;
    this.depth = 0;
  }

  public now(): number {
    return this.blockStore.getBlockTimestamp();
  }

  public nextContractAddress(): string {
    const address = ethers.utils.getContractAddress({ from: this.deployer, nonce: this.nonce });
    this.nonce += 1;
    return address.toLowerCase();
  }

  public register(component: Snapshottable): void {
    this.components.push(component);
  }

  public registerToken(token: TokenLedger): void {
    this.tokens.set(normalizeAddress(token.address), token);
  }

  public getToken(address: string): TokenLedger {
    const token = this.tokens.get(normalizeAddress(address));
    if (!token) {
      throw new ValidationError(ErrorCode.UnknownToken, address);
    }
    return token;
  }

  public emit(address: string, name: string, args: Record<string, EventArgValue>): void {
    this.events.push({
      address,
      name,
      args,
      blockNumber: this.blockStore.getBlockNumber(),
      timestamp: this.now(),
    });
  }

  public getEvents(filter: { address?: string; name?: string } = {}): ContractEvent[] {
    return this.events.filter(event => (!filter.address || event.address === filter.address.toLowerCase())
      && (!filter.name || event.name === filter.name));
  }

  /**
   * Runs `fn` so that either all of its writes land or none do. Nested calls join the outermost boundary.
   */
  public atomic<T>(fn: () => T): T {
    if (this.depth > 0) {
      this.depth += 1;
      try {
        return fn();
      } finally {
        this.depth -= 1;
      }
    }

    const restoreFns = this.components.map(component => component.takeSnapshot());
    const eventCount = this.events.length;
    this.depth += 1;
    try {
      return fn();
    } catch (error) {
      restoreFns.forEach(restore => restore());
      this.events = this.events.slice(0, eventCount);
      throw error;
    } finally {
      this.depth -= 1;
    }
  }
}
