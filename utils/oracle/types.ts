/*
 * On-chain collaborators the oracle reads from, and the records it keeps.
 * Addresses are checksummed strings everywhere.
 */

export interface Erc20Like {
  readonly address: string;
  name(): Promise<string>;
  decimals(): Promise<number>;
}

export interface PoolReserves {
  readonly reserve0: bigint;
  readonly reserve1: bigint;
  readonly blockTimestampLast: number;
}

/**
 * A UniswapV2-style pair, which is also the liquidity token itself
 */
export interface Pool extends Erc20Like {
  getReserves(): Promise<PoolReserves>;
  // 18-decimal, never renormalized
  totalSupply(): Promise<bigint>;
  token0(): Promise<string>;
  token1(): Promise<string>;
  /**
   * Whether the pair's reentrancy lock is currently held, ie. we are being
   * called from inside one of its own operations
   */
  isLocked(): Promise<boolean>;
}

export interface RoundData {
  readonly roundId: bigint;
  // Signed, `decimals()` precision
  readonly answer: bigint;
  readonly startedAt: bigint;
  readonly updatedAt: bigint;
  readonly answeredInRound: bigint;
}

/**
 * AggregatorV3-shaped price feed
 */
export interface PriceFeed {
  readonly address: string;
  decimals(): Promise<number>;
  description(): Promise<string>;
  latestRoundData(): Promise<RoundData>;
}

/**
 * Resolves addresses to the collaborators above
 */
export interface ChainReader {
  getAsset(address: string): Erc20Like;
  getPool(address: string): Pool;
  getPriceFeed(address: string): PriceFeed;
}

export interface NebulaOracleRecord {
  readonly initialized: boolean;
  readonly oracleId: number;
  readonly name: string;
  readonly underlying: string;
  readonly poolTokens: readonly string[];
  readonly poolTokenDecimals: readonly number[];
  readonly priceFeeds: readonly string[];
  readonly priceFeedDecimals: readonly number[];
}

export interface NebulaDescriptor {
  readonly name: string;
  readonly nebulaAddress: string;
  readonly nebulaId: number;
  readonly totalOracles: number;
  // Unix seconds
  readonly createdAt: number;
}

/**
 * What the registry needs from a nebula
 */
export interface NebulaOracleLike {
  readonly name: string;
  readonly address: string;
  readonly decimals: number;
  registerLiquidityToken(
    caller: string,
    lpToken: string,
    priceFeeds: readonly string[],
  ): Promise<NebulaOracleRecord>;
  priceOf(lpToken: string): Promise<bigint>;
  assetPrices(lpToken: string): Promise<bigint[]>;
  getRecord(lpToken: string): NebulaOracleRecord | undefined;
}
