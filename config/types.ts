export interface Config {
  readonly walletAddresses: WalletAddresses;
  readonly nebulaRegistry: NebulaRegistryConfig;
}

export interface WalletAddresses {
  // Admin of the registry and of every nebula
  readonly governanceMultisig: string;
}

export interface NebulaRegistryConfig {
  readonly address: string;
  readonly nebulas: NebulaConfig[];
}

export interface NebulaConfig {
  readonly name: string;
  readonly address: string;
  // The asset LP prices are expressed in (eg. USDC), and its USD feed
  readonly denominationToken: string;
  readonly denominationFeed: string;
  // Reject reads while the pool is mid-operation
  readonly contextGuard: boolean;
  readonly liquidityTokens: LiquidityTokenConfig[];
}

export interface LiquidityTokenConfig {
  readonly lpToken: string;
  // Feeds of token0 and token1, in pool order
  readonly priceFeeds: readonly [string, string];
}
