import { normalizeNonZeroAddress } from '../helpers/address-helpers';
import { getAirdropLeaf, verifyMerkleProof } from '../helpers/merkle-helpers';
import { BYTES32_REGEX } from '../lib/constants';
import { AuthorizationError, ErrorCode, StateError, ValidationError } from '../lib/errors';
import { Integer, toPositiveInteger } from '../lib/integers';
import { RestoreFn, TokenLedger } from '../lib/ledger-types';
import Logger from '../lib/logger';
import Runtime from '../lib/runtime';
import BaseContract from './base-contract';
import VestingEscrow from './vesting-escrow';

export interface MerkleAirdropConfig {
  owner: string;
  token: TokenLedger;
  vesting: VestingEscrow;
  merkleRoot: string;
  startTimestamp: number;
  vestingCategoryId: number;
}

/**
 * One claim per address against a Merkle root of `(address, amount)` leaves. Claimed tokens vest.
 */
export default class MerkleAirdrop extends BaseContract {
  public readonly token: TokenLedger;
  public readonly vesting: VestingEscrow;
  public readonly vestingCategoryId: number;

  private merkleRoot: string;
  private startTimestamp: number;
  private claimed: Set<string>;

  constructor(runtime: Runtime, config: MerkleAirdropConfig) {
    super(runtime, 'MerkleAirdrop', config.owner);
    this.token = config.token;
    this.vesting = config.vesting;
    this.vestingCategoryId = config.vestingCategoryId;
    this.merkleRoot = MerkleAirdrop._validateRoot(config.merkleRoot);
    this.startTimestamp = config.startTimestamp;
    this.claimed = new Set();
  }

  public claim(sender: string, amount: Integer, proof: string[]): void {
    this.guard.run('claim', () => {
      const user = normalizeNonZeroAddress(sender);
      toPositiveInteger(amount);
      if (this.now() < this.startTimestamp) {
        throw new StateError(ErrorCode.AirdropNotStarted, `starts at ${this.startTimestamp}`);
      }
      if (this.claimed.has(user)) {
        throw new StateError(ErrorCode.AlreadyClaimed, user);
      }
      if (!verifyMerkleProof(proof, getAirdropLeaf(user, amount), this.merkleRoot)) {
        throw new AuthorizationError(ErrorCode.InvalidProof, user);
      }

      this.claimed.add(user);
      this.token.approve(this.address, this.vesting.address, amount);
      this.vesting.deposit(this.address, user, amount, this.vestingCategoryId);

      this.emit('AirdropClaimed', { user, amount: amount.toFixed() });
      Logger.info({
        at: 'MerkleAirdrop#claim',
        message: 'Claimed airdrop',
        user,
        amount: amount.toFixed(),
      });
    });
  }

  public setMerkleRoot(sender: string, merkleRoot: string): void {
    this.guard.run('setMerkleRoot', () => {
      this.access.requireOwner(sender);
      this.merkleRoot = MerkleAirdrop._validateRoot(merkleRoot);
      this.emit('MerkleRootSet', { merkleRoot: this.merkleRoot });
    });
  }

  public setStartTimestamp(sender: string, startTimestamp: number): void {
    this.guard.run('setStartTimestamp', () => {
      this.access.requireOwner(sender);
      this.startTimestamp = startTimestamp;
      this.emit('StartTimestampSet', { startTimestamp });
    });
  }

  public getMerkleRoot(): string {
    return this.merkleRoot;
  }

  public getStartTimestamp(): number {
    return this.startTimestamp;
  }

  public hasClaimed(user: string): boolean {
    return this.claimed.has(user.toLowerCase());
  }

  public takeSnapshot(): RestoreFn {
    const { merkleRoot, startTimestamp } = this;
    const claimed = new Set(this.claimed);
    return () => {
      this.merkleRoot = merkleRoot;
      this.startTimestamp = startTimestamp;
      this.claimed = claimed;
    };
  }

  private static _validateRoot(merkleRoot: string): string {
    if (!BYTES32_REGEX.test(merkleRoot)) {
      throw new ValidationError(ErrorCode.InvalidProof, `malformed root ${merkleRoot}`);
    }
    return merkleRoot.toLowerCase();
  }
}
