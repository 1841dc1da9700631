import { ethers } from 'ethers';
import { normalizeNonZeroAddress } from '../helpers/address-helpers';
import { AuthorizationError, ErrorCode } from '../lib/errors';
import { Integer } from '../lib/integers';
import { RestoreFn, Snapshottable } from '../lib/ledger-types';
import Runtime from '../lib/runtime';

export interface ClaimDomain {
  name: string;
  version: string;
  chainId: number;
  verifyingContract: string;
}

export interface TypedField {
  name: string;
  type: string;
}

export interface ClaimSchema<R> {
  types: Record<string, TypedField[]>;
  encode(request: R): Record<string, string>;
}

export interface LockStakingClaimRequest {
  requestId: string;
  beneficiary: string;
  stakeToken: string;
  cumulativePendingReward: Integer;
  claimAmount: Integer;
}

export interface IndexStakingClaimRequest {
  requestId: string;
  beneficiary: string;
  stakeToken: string;
  claimAmount: Integer;
}

export const LOCK_STAKING_CLAIM_SCHEMA: ClaimSchema<LockStakingClaimRequest> = {
  types: {
    LockStakingClaim: [
      { name: 'requestId', type: 'string' },
      { name: 'beneficiary', type: 'address' },
      { name: 'stakeToken', type: 'address' },
      { name: 'cumulativePendingReward', type: 'uint256' },
      { name: 'claimAmount', type: 'uint256' },
    ],
  },
  encode: request => ({
    requestId: request.requestId,
    beneficiary: request.beneficiary,
    stakeToken: request.stakeToken,
    cumulativePendingReward: request.cumulativePendingReward.toFixed(0),
    claimAmount: request.claimAmount.toFixed(0),
  }),
};

export const INDEX_STAKING_CLAIM_SCHEMA: ClaimSchema<IndexStakingClaimRequest> = {
  types: {
    IndexStakingClaim: [
      { name: 'requestId', type: 'string' },
      { name: 'beneficiary', type: 'address' },
      { name: 'stakeToken', type: 'address' },
      { name: 'claimAmount', type: 'uint256' },
    ],
  },
  encode: request => ({
    requestId: request.requestId,
    beneficiary: request.beneficiary,
    stakeToken: request.stakeToken,
    claimAmount: request.claimAmount.toFixed(0),
  }),
};

export interface ReferralClaimRequest {
  requestId: string;
  beneficiary: string;
  /**
   * bytes32 referral program id
   */
  referralType: string;
  lockAmount: Integer;
  stableAmount: Integer;
}

export const REFERRAL_CLAIM_SCHEMA: ClaimSchema<ReferralClaimRequest> = {
  types: {
    ReferralClaim: [
      { name: 'requestId', type: 'string' },
      { name: 'beneficiary', type: 'address' },
      { name: 'referralType', type: 'bytes32' },
      { name: 'lockAmount', type: 'uint256' },
      { name: 'stableAmount', type: 'uint256' },
    ],
  },
  encode: request => ({
    requestId: request.requestId,
    beneficiary: request.beneficiary,
    referralType: request.referralType,
    lockAmount: request.lockAmount.toFixed(0),
    stableAmount: request.stableAmount.toFixed(0),
  }),
};

/**
 * Checks that a claim request was attested by the configured authority. The amounts inside an attested request are
 * trusted as-is; replay and budget bounds are the caller's job.
 */
export default class ClaimAuthorization<R> implements Snapshottable {
  private authority: string;

  constructor(
    runtime: Runtime,
    public readonly domain: ClaimDomain,
    private readonly schema: ClaimSchema<R>,
    authority: string,
  ) {
    this.authority = normalizeNonZeroAddress(authority);
    runtime.register(this);
  }

  public getAuthority(): string {
    return this.authority;
  }

  public setAuthority(authority: string): void {
    this.authority = normalizeNonZeroAddress(authority);
  }

  public getDigest(request: R): string {
    return ethers.utils._TypedDataEncoder.hash(this.domain, this.schema.types, this.schema.encode(request));
  }

  public recoverSigner(request: R, signature: string): string {
    try {
      return ethers.utils.verifyTypedData(this.domain, this.schema.types, this.schema.encode(request), signature)
        .toLowerCase();
    } catch (error) {
      throw new AuthorizationError(
        ErrorCode.InvalidSignature,
        error instanceof Error ? error.message : 'unreadable signature',
      );
    }
  }

  public verify(request: R, signature: string): void {
    const signer = this.recoverSigner(request, signature);
    if (signer !== this.authority) {
      throw new AuthorizationError(ErrorCode.InvalidSignature, `recovered ${signer}`);
    }
  }

  public takeSnapshot(): RestoreFn {
    const authority = this.authority;
    return () => {
      this.authority = authority;
    };
  }
}
