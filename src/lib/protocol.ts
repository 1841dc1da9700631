import Airdrop from '../contracts/airdrop';
import FixedSupplyToken from '../contracts/fixed-supply-token';
import IndexStaking from '../contracts/index-staking';
import LockStaking from '../contracts/lock-staking';
import MerkleAirdrop from '../contracts/merkle-airdrop';
import VestingEscrow from '../contracts/vesting-escrow';
import BlockStore from './block-store';
import { loadProtocolConfig, ProtocolConfig } from './config';
import { ErrorCode, ValidationError } from './errors';
import Logger from './logger';
import Runtime from './runtime';

export interface Protocol {
  runtime: Runtime;
  token: FixedSupplyToken;
  vesting: VestingEscrow;
  lockStaking: LockStaking;
  indexStaking: IndexStaking;
  airdrop: Airdrop;
  /**
   * Only deployed when a Merkle root is configured
   */
  merkleAirdrop?: MerkleAirdrop;
}

/**
 * Deploys every contract against `runtime` and allow-lists the distributors on the vesting escrow
 */
export function createProtocol(runtime: Runtime, config: ProtocolConfig): Protocol {
  [config.lockStaking.vestingCategoryId, config.airdrop.vestingCategoryId].forEach(categoryId => {
    if (config.vestingCategories[categoryId] === undefined) {
      throw new ValidationError(ErrorCode.InvalidCategory, `${categoryId} has no vesting duration`);
    }
  });

  const owner = config.ownerAddress;
  const token = new FixedSupplyToken(runtime, {
    name: config.lockToken.name,
    symbol: config.lockToken.symbol,
    owner,
    managementAddress: config.managementAddress,
    totalSupply: config.lockToken.totalSupply,
  });
  const vesting = new VestingEscrow(runtime, {
    owner,
    token,
    categoryDurations: config.vestingCategories,
  });
  const lockStaking = new LockStaking(runtime, {
    owner,
    token,
    vesting,
    feeReceiver: config.feeReceiverAddress,
    authority: config.operatorAddress,
    startTimestamp: config.lockStaking.startTimestamp,
    bonusRatePerSecond: config.lockStaking.bonusRatePerSecond,
    basicRateDivider: config.lockStaking.basicRateDivider,
    penaltyRate: config.lockStaking.penaltyRate,
    vestingCategoryId: config.lockStaking.vestingCategoryId,
  });
  const indexStaking = new IndexStaking(runtime, {
    owner,
    rewardToken: token,
    vesting,
    authority: config.operatorAddress,
  });
  const airdrop = new Airdrop(runtime, {
    owner,
    token,
    vesting,
    startTimestamp: config.airdrop.startTimestamp,
    vestingCategoryId: config.airdrop.vestingCategoryId,
  });
  const merkleAirdrop = config.airdrop.merkleRoot
    ? new MerkleAirdrop(runtime, {
      owner,
      token,
      vesting,
      merkleRoot: config.airdrop.merkleRoot,
      startTimestamp: config.airdrop.startTimestamp,
      vestingCategoryId: config.airdrop.vestingCategoryId,
    })
    : undefined;

  const distributors = [lockStaking, indexStaking, airdrop, ...(merkleAirdrop ? [merkleAirdrop] : [])];
  distributors.forEach(distributor => vesting.addDepositor(owner, distributor.address));

  Logger.info({
    at: 'protocol#createProtocol',
    message: 'Deployed protocol',
    chainId: runtime.chainId,
    token: token.address,
    vesting: vesting.address,
    lockStaking: lockStaking.address,
    indexStaking: indexStaking.address,
    airdrop: airdrop.address,
    merkleAirdrop: merkleAirdrop?.address,
  });

  return {
    runtime,
    token,
    vesting,
    lockStaking,
    indexStaking,
    airdrop,
    merkleAirdrop,
  };
}

export function createProtocolFromEnv(blockStore: BlockStore = new BlockStore()): Protocol {
  const config = loadProtocolConfig();
  return createProtocol(new Runtime(config.chainId, blockStore, config.deployerAddress), config);
}
