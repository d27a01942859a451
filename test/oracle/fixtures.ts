import { setLogEnabled } from "../../utils/log";
import { NebulaOracle } from "../../utils/oracle/nebula-oracle";
import { NebulaRegistry } from "../../utils/oracle/nebula-registry";
import {
  fakeAddress,
  MockAggregatorV3,
  MockChainReader,
  MockERC20,
  MockUniswapV2Pair,
} from "./mocks";

export const ADMIN = fakeAddress(0xad01);
export const NEW_ADMIN = fakeAddress(0xad02);
export const USER = fakeAddress(0xbeef);
export const REGISTRY_ADDRESS = fakeAddress(0x100);
export const NEBULA_ADDRESS = fakeAddress(0x101);
export const CREATED_AT = 1_700_000_000;

export interface PairSetup {
  readonly token0Decimals: number;
  readonly token1Decimals: number;
  readonly reserve0: bigint;
  readonly reserve1: bigint;
  readonly totalSupply: bigint;
  readonly feed0Decimals: number;
  readonly feed1Decimals: number;
  readonly feed0Answer: bigint;
  readonly feed1Answer: bigint;
}

export interface NebulaSetup {
  readonly denominationDecimals: number;
  readonly denominationFeedDecimals: number;
  readonly denominationAnswer: bigint;
  readonly contextGuard: boolean;
  readonly registrar?: string;
}

// 1000 A + 4000 B, A at $2 and B at $0.5, 100 LP tokens: each LP is worth $40
export const WORKED_EXAMPLE_PAIR: PairSetup = {
  token0Decimals: 18,
  token1Decimals: 18,
  reserve0: 1000n * 10n ** 18n,
  reserve1: 4000n * 10n ** 18n,
  totalSupply: 100n * 10n ** 18n,
  feed0Decimals: 8,
  feed1Decimals: 8,
  feed0Answer: 2n * 10n ** 8n,
  feed1Answer: 5n * 10n ** 7n,
};

export const USD_NEBULA: NebulaSetup = {
  denominationDecimals: 18,
  denominationFeedDecimals: 8,
  denominationAnswer: 10n ** 8n,
  contextGuard: true,
};

export interface PairFixture {
  readonly pair: MockUniswapV2Pair;
  readonly token0: MockERC20;
  readonly token1: MockERC20;
  readonly feed0: MockAggregatorV3;
  readonly feed1: MockAggregatorV3;
  readonly priceFeeds: [string, string];
}

/**
 * Add a pair, its two tokens and their feeds to the chain
 *
 * @param chain - The mock chain
 * @param seed - Distinguishes the addresses of several pairs
 * @param setup - The pair parameters
 * @returns The mocks
 */
export function addPair(
  chain: MockChainReader,
  seed: number,
  setup: PairSetup = WORKED_EXAMPLE_PAIR,
): PairFixture {
  const base = seed * 0x10;
  const token0 = chain.addAsset(
    new MockERC20(fakeAddress(base + 1), `Token ${seed}A`, setup.token0Decimals),
  );
  const token1 = chain.addAsset(
    new MockERC20(fakeAddress(base + 2), `Token ${seed}B`, setup.token1Decimals),
  );
  const feed0 = chain.addPriceFeed(
    new MockAggregatorV3(
      fakeAddress(base + 3),
      setup.feed0Decimals,
      setup.feed0Answer,
    ),
  );
  const feed1 = chain.addPriceFeed(
    new MockAggregatorV3(
      fakeAddress(base + 4),
      setup.feed1Decimals,
      setup.feed1Answer,
    ),
  );
  const pair = chain.addPool(
    new MockUniswapV2Pair(
      fakeAddress(base + 5),
      `Pair ${seed}`,
      token0.address,
      token1.address,
    ),
  );

  pair.setReserves(setup.reserve0, setup.reserve1);
  pair.setTotalSupply(setup.totalSupply);

  return {
    pair,
    token0,
    token1,
    feed0,
    feed1,
    priceFeeds: [feed0.address, feed1.address],
  };
}

export interface NebulaFixture extends PairFixture {
  readonly chain: MockChainReader;
  readonly nebula: NebulaOracle;
  readonly denominationToken: MockERC20;
  readonly denominationFeed: MockAggregatorV3;
}

/**
 * A nebula with one (unregistered) pair on a mock chain
 *
 * @param nebulaSetup - Denomination and guard parameters
 * @param pairSetup - The pair parameters
 * @returns The nebula and the mocks around it
 */
export async function nebulaFixture(
  nebulaSetup: NebulaSetup = USD_NEBULA,
  pairSetup: PairSetup = WORKED_EXAMPLE_PAIR,
): Promise<NebulaFixture> {
  setLogEnabled(false);

  const chain = new MockChainReader();
  const denominationToken = chain.addAsset(
    new MockERC20(
      fakeAddress(0x200),
      "USD Coin",
      nebulaSetup.denominationDecimals,
    ),
  );
  const denominationFeed = chain.addPriceFeed(
    new MockAggregatorV3(
      fakeAddress(0x201),
      nebulaSetup.denominationFeedDecimals,
      nebulaSetup.denominationAnswer,
      "USDC / USD",
    ),
  );
  const pairFixture = addPair(chain, 1, pairSetup);

  const nebula = await NebulaOracle.create(chain, {
    name: "Constant Product Nebula",
    address: NEBULA_ADDRESS,
    denominationToken: denominationToken.address,
    denominationFeed: denominationFeed.address,
    admin: ADMIN,
    registrar: nebulaSetup.registrar,
    contextGuard: nebulaSetup.contextGuard,
  });

  return {
    ...pairFixture,
    chain,
    nebula,
    denominationToken,
    denominationFeed,
  };
}

export interface RegistryFixture extends NebulaFixture {
  readonly registry: NebulaRegistry;
}

/**
 * A registry holding one nebula (id 0) whose registrar is the registry
 *
 * @param nebulaSetup - Denomination and guard parameters
 * @param pairSetup - The pair parameters
 * @returns The registry, the nebula and the mocks
 */
export async function registryFixture(
  nebulaSetup: NebulaSetup = USD_NEBULA,
  pairSetup: PairSetup = WORKED_EXAMPLE_PAIR,
): Promise<RegistryFixture> {
  const fixture = await nebulaFixture(
    { ...nebulaSetup, registrar: REGISTRY_ADDRESS },
    pairSetup,
  );
  const registry = new NebulaRegistry({
    address: REGISTRY_ADDRESS,
    admin: ADMIN,
    clock: () => CREATED_AT,
  });

  registry.createNebula(ADMIN, fixture.nebula);
  return { ...fixture, registry };
}
