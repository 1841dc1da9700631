// declare global env variable to define types
declare global {
  namespace NodeJS {
    interface ProcessEnv {
      AIRDROP_START_TIMESTAMP?: string;
      AIRDROP_VESTING_CATEGORY_ID?: string;
      DEPLOYER_ADDRESS?: string;
      ENV_FILENAME?: string;
      FEE_RECEIVER_ADDRESS?: string;
      LOCK_STAKING_BASIC_RATE_DIVIDER?: string;
      LOCK_STAKING_BONUS_RATE_PER_SECOND?: string;
      LOCK_STAKING_PENALTY_RATE?: string;
      LOCK_STAKING_START_TIMESTAMP?: string;
      LOCK_STAKING_VESTING_CATEGORY_ID?: string;
      LOCK_TOKEN_NAME?: string;
      LOCK_TOKEN_SYMBOL?: string;
      LOCK_TOKEN_TOTAL_SUPPLY?: string;
      LOG_LEVEL?: string;
      MANAGEMENT_ADDRESS?: string;
      MERKLE_ROOT?: string;
      NETWORK_ID?: string;
      OPERATOR_ADDRESS?: string;
      OWNER_ADDRESS?: string;
      VESTING_CATEGORIES?: string;
    }
  }
}

export { };
