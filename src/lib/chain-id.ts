export enum ChainId {
  Ethereum = 1,
  Polygon = 137,
  Sepolia = 11155111,
  Hardhat = 31337,
}

export function toChainId(networkId: number): ChainId {
  switch (networkId) {
    case ChainId.Ethereum:
      return ChainId.Ethereum;
    case ChainId.Polygon:
      return ChainId.Polygon;
    case ChainId.Sepolia:
      return ChainId.Sepolia;
    case ChainId.Hardhat:
      return ChainId.Hardhat;
    default:
      throw new Error(`Unsupported network ID: ${networkId}`);
  }
}
