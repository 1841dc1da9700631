import { ethers } from 'ethers';
import {
  INDEX_STAKING_CLAIM_SCHEMA,
  IndexStakingClaimRequest,
  LOCK_STAKING_CLAIM_SCHEMA,
  LockStakingClaimRequest,
  REFERRAL_CLAIM_SCHEMA,
} from '../contracts/claim-authorization';
import IndexStaking, { IndexClaimInput } from '../contracts/index-staking';
import LockStaking, { LockClaimInput } from '../contracts/lock-staking';
import LockonReferral, { ReferralClaimInput } from '../contracts/lockon-referral';
import { normalizeNonZeroAddress } from '../helpers/address-helpers';
import { loadSignerWallet, signClaimRequest } from '../helpers/signature-helpers';
import { Integer, INTEGERS } from './integers';
import Logger from './logger';

export interface SignedClaim<I> {
  input: I;
  signature: string;
}

/**
 * Backend side of the claim flow. Reads what a user has earned, builds the typed request and attests to it with the
 * authority key configured on the staking contracts.
 */
export default class ClaimRequestSigner {
  constructor(private readonly wallet: ethers.Wallet) {}

  public static fromPrivateKey(privateKey: string, expectedAddress: string): ClaimRequestSigner {
    return new ClaimRequestSigner(loadSignerWallet(privateKey, expectedAddress));
  }

  public getAddress(): string {
    return this.wallet.address.toLowerCase();
  }

  /**
   * Attests to the reward `beneficiary` has banked right now plus an optional side amount from the budget
   */
  public async signLockStakingClaim(
    staking: LockStaking,
    beneficiary: string,
    requestId: string,
    claimAmount: Integer = INTEGERS.ZERO,
  ): Promise<SignedClaim<LockClaimInput>> {
    const input: LockClaimInput = {
      requestId,
      cumulativePendingReward: staking.getPendingReward(beneficiary),
      claimAmount,
    };
    const signature = await this._signLock(staking, beneficiary, input);

    Logger.info({
      at: 'ClaimRequestSigner#signLockStakingClaim',
      message: 'Signed lock staking claim',
      beneficiary: beneficiary.toLowerCase(),
      requestId,
      cumulativePendingReward: input.cumulativePendingReward.toFixed(),
      claimAmount: claimAmount.toFixed(),
    });
    return { input, signature };
  }

  public async signLockStakingCancel(
    staking: LockStaking,
    beneficiary: string,
    requestId: string,
  ): Promise<SignedClaim<LockClaimInput>> {
    const input: LockClaimInput = {
      requestId,
      cumulativePendingReward: INTEGERS.ZERO,
      claimAmount: INTEGERS.ZERO,
    };
    return { input, signature: await this._signLock(staking, beneficiary, input) };
  }

  public async signIndexStakingClaim(
    staking: IndexStaking,
    beneficiary: string,
    stakeToken: string,
    requestId: string,
    claimAmount: Integer,
  ): Promise<SignedClaim<IndexClaimInput>> {
    const input: IndexClaimInput = { requestId, claimAmount };
    const signature = await this._signIndex(staking, beneficiary, stakeToken, input);

    Logger.info({
      at: 'ClaimRequestSigner#signIndexStakingClaim',
      message: 'Signed index staking claim',
      beneficiary: beneficiary.toLowerCase(),
      stakeToken: stakeToken.toLowerCase(),
      requestId,
      claimAmount: claimAmount.toFixed(),
    });
    return { input, signature };
  }

  public async signIndexStakingCancel(
    staking: IndexStaking,
    beneficiary: string,
    stakeToken: string,
    requestId: string,
  ): Promise<SignedClaim<IndexClaimInput>> {
    const input: IndexClaimInput = { requestId, claimAmount: INTEGERS.ZERO };
    return { input, signature: await this._signIndex(staking, beneficiary, stakeToken, input) };
  }

  /**
   * Attests to a referral payout worked out off-chain. Either amount may be zero.
   */
  public async signReferralClaim(
    referral: LockonReferral,
    beneficiary: string,
    requestId: string,
    referralType: string,
    lockAmount: Integer,
    stableAmount: Integer = INTEGERS.ZERO,
  ): Promise<SignedClaim<ReferralClaimInput>> {
    const input: ReferralClaimInput = { requestId, referralType, lockAmount, stableAmount };
    const signature = await signClaimRequest(this.wallet, referral.getClaimDomain(), REFERRAL_CLAIM_SCHEMA, {
      ...input,
      beneficiary: normalizeNonZeroAddress(beneficiary),
      referralType: referralType.toLowerCase(),
    });

    Logger.info({
      at: 'ClaimRequestSigner#signReferralClaim',
      message: 'Signed referral claim',
      beneficiary: beneficiary.toLowerCase(),
      requestId,
      referralType: referralType.toLowerCase(),
      lockAmount: lockAmount.toFixed(),
      stableAmount: stableAmount.toFixed(),
    });
    return { input, signature };
  }

  private _signLock(staking: LockStaking, beneficiary: string, input: LockClaimInput): Promise<string> {
    const request: LockStakingClaimRequest = {
      ...input,
      beneficiary: normalizeNonZeroAddress(beneficiary),
      stakeToken: staking.token.address,
    };
    return signClaimRequest(this.wallet, staking.getClaimDomain(), LOCK_STAKING_CLAIM_SCHEMA, request);
  }

  private _signIndex(
    staking: IndexStaking,
    beneficiary: string,
    stakeToken: string,
    input: IndexClaimInput,
  ): Promise<string> {
    const request: IndexStakingClaimRequest = {
      ...input,
      beneficiary: normalizeNonZeroAddress(beneficiary),
      stakeToken: normalizeNonZeroAddress(stakeToken),
    };
    return signClaimRequest(this.wallet, staking.getClaimDomain(), INDEX_STAKING_CLAIM_SCHEMA, request);
  }
}
