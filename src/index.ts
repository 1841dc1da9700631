export { default as Airdrop } from './contracts/airdrop';
export { default as BaseContract } from './contracts/base-contract';
export {
  default as ClaimAuthorization,
  INDEX_STAKING_CLAIM_SCHEMA,
  LOCK_STAKING_CLAIM_SCHEMA,
  REFERRAL_CLAIM_SCHEMA,
} from './contracts/claim-authorization';
export type {
  ClaimDomain,
  ClaimSchema,
  IndexStakingClaimRequest,
  LockStakingClaimRequest,
  ReferralClaimRequest,
} from './contracts/claim-authorization';
export { default as FixedSupplyToken } from './contracts/fixed-supply-token';
export { default as IndexStaking } from './contracts/index-staking';
export type { IndexClaimInput, IndexPoolConfig } from './contracts/index-staking';
export { default as LockStaking } from './contracts/lock-staking';
export type { LockClaimInput, LockPoolState, LockPosition } from './contracts/lock-staking';
export { default as LockonReferral } from './contracts/lockon-referral';
export type { ReferralClaimInput, RewardKind } from './contracts/lockon-referral';
export { default as MerkleAirdrop } from './contracts/merkle-airdrop';
export { default as StakePool } from './contracts/stake-pool';
export type { PoolState, UserPosition } from './contracts/stake-pool';
export { default as VestingEscrow } from './contracts/vesting-escrow';
export type { VestingWallet } from './contracts/vesting-escrow';
export { calculateMerkleRootAndProofs, getAirdropLeaf, verifyMerkleProof } from './helpers/merkle-helpers';
export { loadSignerWallet, signClaimRequest } from './helpers/signature-helpers';
export { default as BlockStore } from './lib/block-store';
export { ChainId } from './lib/chain-id';
export { default as ClaimRequestSigner } from './lib/claim-request-signer';
export { loadProtocolConfig } from './lib/config';
export type { ProtocolConfig } from './lib/config';
export * from './lib/constants';
export * from './lib/errors';
export * from './lib/fixed-point-accrual';
export { BigNumber, INTEGERS, toInteger, toPositiveInteger } from './lib/integers';
export type { Integer } from './lib/integers';
export type { ContractEvent, TokenLedger } from './lib/ledger-types';
export { createProtocol, createProtocolFromEnv } from './lib/protocol';
export type { Protocol } from './lib/protocol';
export { default as Runtime } from './lib/runtime';
