import { getAddress } from "ethers";

import {
  ChainReader,
  Erc20Like,
  Pool,
  PoolReserves,
  PriceFeed,
  RoundData,
} from "../../utils/oracle/types";

/**
 * Deterministic test address from a small integer
 *
 * @param n - The seed
 * @returns The checksummed address 0x00..0n
 */
export function fakeAddress(n: number): string {
  return getAddress(`0x${n.toString(16).padStart(40, "0")}`);
}

export class MockERC20 implements Erc20Like {
  readonly address: string;
  decimalsCalls = 0;

  constructor(
    address: string,
    private tokenName: string,
    private tokenDecimals: number,
  ) {
    this.address = getAddress(address);
  }

  async name(): Promise<string> {
    return this.tokenName;
  }

  async decimals(): Promise<number> {
    this.decimalsCalls++;
    return this.tokenDecimals;
  }

  setDecimals(decimals: number): void {
    this.tokenDecimals = decimals;
  }
}

/**
 * In-memory UniswapV2 pair: settable reserves, supply and reentrancy lock
 */
export class MockUniswapV2Pair extends MockERC20 implements Pool {
  getReservesCalls = 0;

  private reserve0 = 0n;
  private reserve1 = 0n;
  private supply = 0n;
  private locked = false;

  constructor(
    address: string,
    name: string,
    private readonly tokenA: string,
    private readonly tokenB: string,
  ) {
    super(address, name, 18);
  }

  setReserves(reserve0: bigint, reserve1: bigint): void {
    this.reserve0 = reserve0;
    this.reserve1 = reserve1;
  }

  setTotalSupply(supply: bigint): void {
    this.supply = supply;
  }

  setLocked(locked: boolean): void {
    this.locked = locked;
  }

  async getReserves(): Promise<PoolReserves> {
    this.getReservesCalls++;
    return {
      reserve0: this.reserve0,
      reserve1: this.reserve1,
      blockTimestampLast: 1_700_000_000,
    };
  }

  async totalSupply(): Promise<bigint> {
    return this.supply;
  }

  async token0(): Promise<string> {
    return this.tokenA;
  }

  async token1(): Promise<string> {
    return this.tokenB;
  }

  async isLocked(): Promise<boolean> {
    return this.locked;
  }
}

/**
 * In-memory AggregatorV3 feed
 */
export class MockAggregatorV3 implements PriceFeed {
  readonly address: string;
  decimalsCalls = 0;

  private answer: bigint;
  private updatedAt = 1_700_000_000n;
  private roundId = 1n;

  constructor(
    address: string,
    private readonly feedDecimals: number,
    answer: bigint,
    private readonly feedDescription = "TEST / USD",
  ) {
    this.address = getAddress(address);
    this.answer = answer;
  }

  setAnswer(answer: bigint, updatedAt?: bigint): void {
    this.answer = answer;
    this.roundId++;

    if (updatedAt !== undefined) {
      this.updatedAt = updatedAt;
    }
  }

  async decimals(): Promise<number> {
    this.decimalsCalls++;
    return this.feedDecimals;
  }

  async description(): Promise<string> {
    return this.feedDescription;
  }

  async latestRoundData(): Promise<RoundData> {
    return {
      roundId: this.roundId,
      answer: this.answer,
      startedAt: this.updatedAt,
      updatedAt: this.updatedAt,
      answeredInRound: this.roundId,
    };
  }
}

/**
 * ChainReader over the mocks above, keyed by checksummed address
 */
export class MockChainReader implements ChainReader {
  private readonly assets = new Map<string, Erc20Like>();
  private readonly pools = new Map<string, Pool>();
  private readonly feeds = new Map<string, PriceFeed>();

  addAsset<T extends Erc20Like>(asset: T): T {
    this.assets.set(asset.address, asset);
    return asset;
  }

  addPool<T extends Pool>(pool: T): T {
    this.pools.set(pool.address, pool);
    this.assets.set(pool.address, pool);
    return pool;
  }

  addPriceFeed<T extends PriceFeed>(feed: T): T {
    this.feeds.set(feed.address, feed);
    return feed;
  }

  getAsset(address: string): Erc20Like {
    return lookup(this.assets, address);
  }

  getPool(address: string): Pool {
    return lookup(this.pools, address);
  }

  getPriceFeed(address: string): PriceFeed {
    return lookup(this.feeds, address);
  }
}

function lookup<T>(entries: Map<string, T>, address: string): T {
  const entry = entries.get(getAddress(address));

  if (entry === undefined) {
    throw new Error(`No contract at ${address}`);
  }
  return entry;
}
