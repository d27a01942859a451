import { ZeroAddress } from "ethers";

import { toChecksumAddress } from "../address";
import { printLog } from "../log";
import { AsyncMutex } from "../mutex";
import { AdminChange, AdminControl, PendingAdminChange } from "./admin-control";
import {
  NebulaNotFoundError,
  OracleAlreadyAddedError,
  PairNotInitializedError,
  PriceCantBeZeroError,
} from "./errors";
import { TypedEvents } from "./events";
import {
  NebulaDescriptor,
  NebulaOracleLike,
  NebulaOracleRecord,
} from "./types";

const LOG_SCOPE = "NebulaRegistry";

export interface NebulaRegistryOptions {
  // Identity the registry uses when it calls into its nebulas
  readonly address: string;
  readonly admin: string;
  // Unix seconds, defaults to the wall clock
  readonly clock?: () => number;
}

export type NebulaRegistryEvents = {
  NebulaCreated: NebulaDescriptor;
  LiquidityTokenRegistered: {
    nebulaId: number;
    lpToken: string;
    record: NebulaOracleRecord;
  };
  NewPendingAdmin: PendingAdminChange;
  NewAdmin: AdminChange;
};

/**
 * Directory of nebulas and of the liquidity tokens each one prices
 *
 * Nebulas must be created with the registry's address as their registrar, so
 * that liquidity tokens can only be added through registerLiquidityToken()
 * here and the index below stays in sync.
 */
export class NebulaRegistry {
  readonly address: string;

  private readonly adminControl: AdminControl;
  private readonly clock: () => number;
  private readonly mutex = new AsyncMutex();
  private readonly events: TypedEvents<NebulaRegistryEvents>;

  private readonly descriptors: NebulaDescriptor[] = [];
  private readonly nebulas: NebulaOracleLike[] = [];
  private readonly descriptorsByAddress = new Map<string, NebulaDescriptor>();
  private readonly nebulaOracleOf = new Map<string, string>();
  private readonly liquidityTokens: string[] = [];

  constructor(options: NebulaRegistryOptions) {
    this.address = toChecksumAddress(options.address);
    this.events = new TypedEvents<NebulaRegistryEvents>(LOG_SCOPE);
    this.adminControl = new AdminControl(options.admin);
    this.clock = options.clock ?? (() => Math.floor(Date.now() / 1000));
  }

  get admin(): string {
    return this.adminControl.admin;
  }

  get pendingAdmin(): string {
    return this.adminControl.pendingAdmin;
  }

  on<E extends keyof NebulaRegistryEvents & string>(
    event: E,
    listener: (payload: NebulaRegistryEvents[E]) => void,
  ): void {
    this.events.on(event, listener);
  }

  off<E extends keyof NebulaRegistryEvents & string>(
    event: E,
    listener: (payload: NebulaRegistryEvents[E]) => void,
  ): void {
    this.events.off(event, listener);
  }

  /**
   * Add a nebula to the registry
   *
   * @param caller - Must be the admin
   * @param nebula - The nebula, not yet added
   * @returns The new descriptor
   */
  createNebula(caller: string, nebula: NebulaOracleLike): NebulaDescriptor {
    this.adminControl.assertAdmin(caller);
    const nebulaAddress = toChecksumAddress(nebula.address);

    // Few nebulas ever exist, a scan is fine
    for (const descriptor of this.descriptors) {
      if (descriptor.nebulaAddress === nebulaAddress) {
        throw new OracleAlreadyAddedError(nebulaAddress);
      }
    }

    const descriptor: NebulaDescriptor = {
      name: nebula.name,
      nebulaAddress,
      nebulaId: this.descriptors.length,
      totalOracles: 0,
      createdAt: this.clock(),
    };

    this.descriptors.push(descriptor);
    this.nebulas.push(nebula);
    this.descriptorsByAddress.set(nebulaAddress, descriptor);

    printLog(
      LOG_SCOPE,
      `Created nebula #${descriptor.nebulaId} ${descriptor.name} (${nebulaAddress})`,
    );
    this.events.emit("NebulaCreated", descriptor);
    return { ...descriptor };
  }

  /**
   * Register a liquidity token in one of the nebulas
   *
   * @param caller - Must be the admin
   * @param nebulaId - The nebula pricing this liquidity token
   * @param lpToken - The pair address
   * @param priceFeeds - Feeds for token0 and token1, in that order
   * @returns The record stored by the nebula
   */
  async registerLiquidityToken(
    caller: string,
    nebulaId: number,
    lpToken: string,
    priceFeeds: readonly string[],
  ): Promise<NebulaOracleRecord> {
    return this.mutex.runExclusive(async () => {
      this.adminControl.assertAdmin(caller);
      const underlying = toChecksumAddress(lpToken);
      const descriptor = this.descriptors[nebulaId];
      const nebula = this.nebulas[nebulaId];

      if (descriptor === undefined || nebula === undefined) {
        throw new NebulaNotFoundError(nebulaId);
      }

      const record = await nebula.registerLiquidityToken(
        this.address,
        underlying,
        priceFeeds,
      );

      const updated: NebulaDescriptor = {
        ...descriptor,
        totalOracles: descriptor.totalOracles + 1,
      };
      this.descriptors[nebulaId] = updated;
      this.descriptorsByAddress.set(updated.nebulaAddress, updated);
      this.nebulaOracleOf.set(underlying, updated.nebulaAddress);

      if (!this.liquidityTokens.includes(underlying)) {
        this.liquidityTokens.push(underlying);
      }

      printLog(
        LOG_SCOPE,
        `Registered ${underlying} in nebula #${nebulaId} (${updated.totalOracles} oracles)`,
      );
      this.events.emit("LiquidityTokenRegistered", {
        nebulaId,
        lpToken: underlying,
        record,
      });
      return record;
    });
  }

  /**
   * Fair price of a liquidity token, from the nebula pricing it
   *
   * @param lpToken - The pair address
   * @returns The price with the nebula's decimals
   */
  async priceOf(lpToken: string): Promise<bigint> {
    const underlying = toChecksumAddress(lpToken);
    const price = await this.nebulaFor(underlying).priceOf(underlying);

    if (price === 0n) {
      throw new PriceCantBeZeroError(underlying);
    }
    return price;
  }

  /**
   * Alias of priceOf()
   *
   * @param lpToken - The pair address
   * @returns The price with the nebula's decimals
   */
  async getLiquidityTokenPriceUsd(lpToken: string): Promise<bigint> {
    return this.priceOf(lpToken);
  }

  /**
   * @param lpToken - The pair address
   * @returns The pool token prices with the nebula's decimals
   */
  async assetPrices(lpToken: string): Promise<bigint[]> {
    const underlying = toChecksumAddress(lpToken);
    return this.nebulaFor(underlying).assetPrices(underlying);
  }

  /* ---------- Views ---------- */

  getNebula(nebulaId: number): NebulaDescriptor | undefined {
    const descriptor = this.descriptors[nebulaId];
    return descriptor === undefined ? undefined : { ...descriptor };
  }

  getNebulaByAddress(nebulaAddress: string): NebulaDescriptor | undefined {
    const descriptor = this.descriptorsByAddress.get(
      toChecksumAddress(nebulaAddress),
    );
    return descriptor === undefined ? undefined : { ...descriptor };
  }

  /**
   * @param lpToken - The pair address
   * @returns The address of the nebula pricing it, ZeroAddress if none
   */
  getNebulaOracle(lpToken: string): string {
    return this.nebulaOracleOf.get(toChecksumAddress(lpToken)) ?? ZeroAddress;
  }

  getNebulaRecord(lpToken: string): NebulaOracleRecord | undefined {
    const underlying = toChecksumAddress(lpToken);
    return this.findNebula(underlying)?.getRecord(underlying);
  }

  allNebulas(): NebulaDescriptor[] {
    return this.descriptors.map((descriptor) => ({ ...descriptor }));
  }

  allNebulasLength(): number {
    return this.descriptors.length;
  }

  allLiquidityTokens(): string[] {
    return [...this.liquidityTokens];
  }

  totalNebulaOracles(): number {
    return this.descriptors.reduce(
      (total, descriptor) => total + descriptor.totalOracles,
      0,
    );
  }

  /* ---------- Admin ---------- */

  setPendingAdmin(caller: string, candidate: string): void {
    const change = this.adminControl.setPendingAdmin(caller, candidate);
    printLog(LOG_SCOPE, `Pending admin set to ${change.newPendingAdmin}`);
    this.events.emit("NewPendingAdmin", change);
  }

  acceptAdmin(caller: string): void {
    const change = this.adminControl.acceptAdmin(caller);
    printLog(LOG_SCOPE, `Admin changed to ${change.newAdmin}`);
    this.events.emit("NewAdmin", change);
  }

  /* ---------- Internals ---------- */

  /**
   * The lookup itself never fails; a liquidity token no nebula knows is
   * rejected the same way the nebulas reject it
   *
   * @param lpToken - The checksummed pair address
   * @returns The nebula pricing it
   */
  private nebulaFor(lpToken: string): NebulaOracleLike {
    const nebula = this.findNebula(lpToken);

    if (nebula === undefined) {
      throw new PairNotInitializedError(lpToken);
    }
    return nebula;
  }

  private findNebula(lpToken: string): NebulaOracleLike | undefined {
    const nebulaAddress = this.nebulaOracleOf.get(lpToken);
    const descriptor =
      nebulaAddress === undefined
        ? undefined
        : this.descriptorsByAddress.get(nebulaAddress);
    return descriptor === undefined
      ? undefined
      : this.nebulas[descriptor.nebulaId];
  }
}
