import { ZeroAddress } from "ethers";

import { toChecksumAddress } from "../address";
import { printLog } from "../log";
import {
  div,
  geometricMean,
  mul,
  mulInt,
  scaleDown,
} from "../math/fixed-point";
import { AsyncMutex } from "../mutex";
import { AdminChange, AdminControl, PendingAdminChange } from "./admin-control";
import { DecimalNormalizer, scalarFromDecimals } from "./decimal-normalizer";
import {
  AlreadyInContextError,
  InvalidPriceFeedsLengthError,
  MsgSenderNotRegistrarError,
  PairAlreadyInitializedError,
  PairNotInitializedError,
} from "./errors";
import { TypedEvents } from "./events";
import { NormalizedRound, PriceFeedReader } from "./price-feed-reader";
import { ChainReader, NebulaOracleLike, NebulaOracleRecord } from "./types";

// Constant-product pairs have exactly two assets
export const POOL_TOKENS_LENGTH = 2;

export interface NebulaOracleOptions {
  readonly name: string;
  // Identity of this nebula in the registry
  readonly address: string;
  // The asset prices are expressed in; its decimals are the output decimals
  readonly denominationToken: string;
  readonly denominationFeed: string;
  readonly admin: string;
  // Who may register liquidity tokens, defaults to the admin
  readonly registrar?: string;
  // Reject reads while the pool is mid-operation, defaults to true
  readonly contextGuard?: boolean;
}

export type NebulaOracleEvents = {
  LiquidityTokenRegistered: NebulaOracleRecord;
  LiquidityTokenDeleted: { lpToken: string; oracleId: number };
  NewPendingAdmin: PendingAdminChange;
  NewAdmin: AdminChange;
};

/**
 * Fair-price oracle for a family of constant-product liquidity tokens
 *
 * The price of one liquidity token is
 *
 *   2 * sqrt(reserve0 * reserve1) * sqrt(price0 * price1) / totalSupply
 *
 * which only depends on the reserves through their product, so moving the
 * pool's spot ratio inside a transaction does not move the price. The result
 * is divided by the denomination feed and expressed with the denomination
 * token's decimals.
 */
export class NebulaOracle implements NebulaOracleLike {
  readonly name: string;
  readonly address: string;
  readonly denominationToken: string;
  readonly denominationFeed: string;
  readonly contextGuard: boolean;

  private readonly adminControl: AdminControl;
  private readonly fixedRegistrar: string | undefined;
  private readonly feedReader: PriceFeedReader;
  private readonly mutex = new AsyncMutex();
  private readonly events: TypedEvents<NebulaOracleEvents>;

  // Arena indexed by oracleId; deleted entries stay as tombstones
  private readonly records: NebulaOracleRecord[] = [];
  private readonly oracleIds = new Map<string, number>();

  private constructor(
    private readonly chain: ChainReader,
    private readonly normalizer: DecimalNormalizer,
    options: NebulaOracleOptions,
    readonly decimals: number,
  ) {
    this.name = options.name;
    this.events = new TypedEvents<NebulaOracleEvents>(options.name);
    this.address = toChecksumAddress(options.address);
    this.denominationToken = toChecksumAddress(options.denominationToken);
    this.denominationFeed = toChecksumAddress(options.denominationFeed);
    this.adminControl = new AdminControl(options.admin);
    this.fixedRegistrar =
      options.registrar === undefined
        ? undefined
        : toChecksumAddress(options.registrar);
    this.contextGuard = options.contextGuard ?? true;
    this.feedReader = new PriceFeedReader(normalizer);
  }

  /**
   * Create a nebula: reads the denomination token decimals (the output
   * decimals) and caches the denomination feed scalar
   *
   * @param chain - Resolves the on-chain collaborators
   * @param options - The nebula options
   * @returns The nebula
   */
  static async create(
    chain: ChainReader,
    options: NebulaOracleOptions,
  ): Promise<NebulaOracle> {
    const denominationToken = chain.getAsset(
      toChecksumAddress(options.denominationToken),
    );
    const decimals = await denominationToken.decimals();

    // Output decimals obey the same bounds as any normalized asset
    scalarFromDecimals(denominationToken.address, decimals);

    const normalizer = new DecimalNormalizer();
    await normalizer.computeScalar(
      chain.getPriceFeed(toChecksumAddress(options.denominationFeed)),
    );

    printLog(
      options.name,
      `Created nebula at ${options.address} (${decimals} decimals)`,
    );
    return new NebulaOracle(chain, normalizer, options, decimals);
  }

  get admin(): string {
    return this.adminControl.admin;
  }

  get pendingAdmin(): string {
    return this.adminControl.pendingAdmin;
  }

  // Follows the admin when no registrar was configured
  get registrar(): string {
    return this.fixedRegistrar ?? this.adminControl.admin;
  }

  on<E extends keyof NebulaOracleEvents & string>(
    event: E,
    listener: (payload: NebulaOracleEvents[E]) => void,
  ): void {
    this.events.on(event, listener);
  }

  off<E extends keyof NebulaOracleEvents & string>(
    event: E,
    listener: (payload: NebulaOracleEvents[E]) => void,
  ): void {
    this.events.off(event, listener);
  }

  /* ---------- Registration ---------- */

  /**
   * Register a liquidity token with one price feed per pool token
   *
   * @param caller - Must be the registrar
   * @param lpToken - The pair address
   * @param priceFeeds - Feeds for token0 and token1, in that order
   * @returns The stored record
   */
  async registerLiquidityToken(
    caller: string,
    lpToken: string,
    priceFeeds: readonly string[],
  ): Promise<NebulaOracleRecord> {
    return this.mutex.runExclusive(async () => {
      if (toChecksumAddress(caller) !== this.registrar) {
        throw new MsgSenderNotRegistrarError(caller);
      }

      const underlying = toChecksumAddress(lpToken);

      if (priceFeeds.length !== POOL_TOKENS_LENGTH) {
        throw new InvalidPriceFeedsLengthError(
          POOL_TOKENS_LENGTH,
          priceFeeds.length,
        );
      }

      if (this.isInitialized(underlying)) {
        throw new PairAlreadyInitializedError(underlying);
      }

      const feeds = priceFeeds.map((feed) => toChecksumAddress(feed));
      const pool = this.chain.getPool(underlying);
      const [name, token0, token1] = await Promise.all([
        pool.name(),
        pool.token0(),
        pool.token1(),
      ]);
      const poolTokens = [toChecksumAddress(token0), toChecksumAddress(token1)];

      await Promise.all([
        ...poolTokens.map((token) =>
          this.normalizer.computeScalar(this.chain.getAsset(token)),
        ),
        ...feeds.map((feed) =>
          this.normalizer.computeScalar(this.chain.getPriceFeed(feed)),
        ),
      ]);

      // Everything below is synchronous: the record appears all at once
      const record: NebulaOracleRecord = {
        initialized: true,
        oracleId: this.records.length,
        name,
        underlying,
        poolTokens,
        poolTokenDecimals: poolTokens.map((token) =>
          this.snapshotDecimals(token),
        ),
        priceFeeds: feeds,
        priceFeedDecimals: feeds.map((feed) => this.snapshotDecimals(feed)),
      };

      this.records.push(record);
      this.oracleIds.set(underlying, record.oracleId);

      printLog(
        this.name,
        `Registered ${name} (${underlying}) as oracle #${record.oracleId}`,
      );
      this.events.emit("LiquidityTokenRegistered", record);
      return record;
    });
  }

  /**
   * Delete a registration. The id is not reused: the slot becomes a
   * tombstone and the next registration gets a fresh id.
   *
   * @param caller - Must be the admin
   * @param lpToken - The pair address
   */
  async deleteLiquidityToken(caller: string, lpToken: string): Promise<void> {
    return this.mutex.runExclusive(async () => {
      this.adminControl.assertAdmin(caller);
      const underlying = toChecksumAddress(lpToken);
      const oracleId = this.oracleIds.get(underlying);

      if (oracleId === undefined) {
        throw new PairNotInitializedError(underlying);
      }

      this.records[oracleId] = tombstone(oracleId);
      this.oracleIds.delete(underlying);

      printLog(this.name, `Deleted oracle #${oracleId} (${underlying})`);
      this.events.emit("LiquidityTokenDeleted", {
        lpToken: underlying,
        oracleId,
      });
    });
  }

  /* ---------- Prices ---------- */

  /**
   * Fair price of one liquidity token in the denomination asset
   * - Each step truncates, in this order; reordering changes the low digits
   *
   * @param lpToken - The pair address
   * @returns The price with `decimals` decimals
   */
  async priceOf(lpToken: string): Promise<bigint> {
    const record = this.requireRecord(lpToken);
    const pool = this.chain.getPool(record.underlying);

    if (this.contextGuard && (await pool.isLocked())) {
      throw new AlreadyInContextError(record.underlying);
    }

    const [token0, token1] = record.poolTokens;
    const { reserve0, reserve1 } = await pool.getReserves();
    const reserveProduct = geometricMean(
      this.normalizer.normalize(token0, reserve0),
      this.normalizer.normalize(token1, reserve1),
    );

    const [price0, price1] = await this.feedPrices(record);
    const priceProduct = geometricMean(price0, price1);

    const totalSupply = await pool.totalSupply();

    // 2 * sqrt(r0 * r1) * sqrt(p0 * p1) / totalSupply
    const rawUsdPrice = mulInt(
      div(mul(reserveProduct, priceProduct), totalSupply),
      2n,
    );

    const denominationPrice = await this.denominationPrice();
    return scaleDown(div(rawUsdPrice, denominationPrice), this.decimals);
  }

  /**
   * Alias of priceOf()
   *
   * @param lpToken - The pair address
   * @returns The price with `decimals` decimals
   */
  async lpTokenPriceUsd(lpToken: string): Promise<bigint> {
    return this.priceOf(lpToken);
  }

  /**
   * Price of each pool token in the denomination asset, in poolTokens order
   * - Does not read reserves
   *
   * @param lpToken - The pair address
   * @returns The prices with `decimals` decimals
   */
  async assetPrices(lpToken: string): Promise<bigint[]> {
    const record = this.requireRecord(lpToken);
    const [prices, denominationPrice] = await Promise.all([
      this.feedPrices(record),
      this.denominationPrice(),
    ]);

    return prices.map((price) =>
      scaleDown(div(price, denominationPrice), this.decimals),
    );
  }

  /**
   * @returns The denomination feed price with 18 decimals
   */
  async denominationPrice(): Promise<bigint> {
    const { price } = await this.denominationRound();
    return price;
  }

  /**
   * @returns The denomination feed price with 18 decimals and its update time
   */
  async denominationRound(): Promise<NormalizedRound> {
    return this.feedReader.latestRound(
      this.chain.getPriceFeed(this.denominationFeed),
    );
  }

  /* ---------- Views ---------- */

  isInitialized(lpToken: string): boolean {
    return this.oracleIds.has(toChecksumAddress(lpToken));
  }

  getRecord(lpToken: string): NebulaOracleRecord | undefined {
    const oracleId = this.oracleIds.get(toChecksumAddress(lpToken));
    return oracleId === undefined ? undefined : this.records[oracleId];
  }

  /**
   * @param oracleId - The id assigned at registration
   * @returns The record, a tombstone if deleted, undefined if never assigned
   */
  getRecordById(oracleId: number): NebulaOracleRecord | undefined {
    return this.records[oracleId];
  }

  /**
   * Every liquidity token ever registered, indexed by oracleId
   * - Deleted ones come back as ZeroAddress
   *
   * @returns The liquidity token addresses
   */
  allLiquidityTokens(): string[] {
    return this.records.map((record) => record.underlying);
  }

  allLiquidityTokensLength(): number {
    return this.records.length;
  }

  /* ---------- Admin ---------- */

  setPendingAdmin(caller: string, candidate: string): void {
    const change = this.adminControl.setPendingAdmin(caller, candidate);
    printLog(this.name, `Pending admin set to ${change.newPendingAdmin}`);
    this.events.emit("NewPendingAdmin", change);
  }

  acceptAdmin(caller: string): void {
    const change = this.adminControl.acceptAdmin(caller);
    printLog(this.name, `Admin changed to ${change.newAdmin}`);
    this.events.emit("NewAdmin", change);
  }

  /* ---------- Internals ---------- */

  private requireRecord(lpToken: string): NebulaOracleRecord {
    const record = this.getRecord(lpToken);

    if (!record || !record.initialized) {
      throw new PairNotInitializedError(toChecksumAddress(lpToken));
    }
    return record;
  }

  private async feedPrices(record: NebulaOracleRecord): Promise<bigint[]> {
    return Promise.all(
      record.priceFeeds.map((feed) =>
        this.feedReader.latestPrice(this.chain.getPriceFeed(feed)),
      ),
    );
  }

  private snapshotDecimals(asset: string): number {
    const decimals = this.normalizer.decimalsOf(asset);

    if (decimals === undefined) {
      throw new Error(`Decimals of ${asset} were not computed`);
    }
    return decimals;
  }
}

/**
 * Cleared record left in a deleted slot
 *
 * @param oracleId - The id of the slot
 * @returns The tombstone
 */
function tombstone(oracleId: number): NebulaOracleRecord {
  return {
    initialized: false,
    oracleId,
    name: "",
    underlying: ZeroAddress,
    poolTokens: [],
    poolTokenDecimals: [],
    priceFeeds: [],
    priceFeedDecimals: [],
  };
}
