import { Config } from "../../config/types";
import { printLog } from "../log";
import { NebulaOracle } from "./nebula-oracle";
import { NebulaRegistry } from "./nebula-registry";
import { ChainReader } from "./types";

export interface DeployNebulaRegistryResult {
  readonly registry: NebulaRegistry;
  readonly nebulas: NebulaOracle[];
}

/**
 * Build a registry from the network config: create every nebula with the
 * registry as its registrar, then register the configured liquidity tokens
 *
 * @param chain - Resolves the on-chain collaborators
 * @param config - The network configuration
 * @param clock - Optional clock for the nebula creation timestamps
 * @returns The registry and its nebulas, in nebulaId order
 */
export async function deployNebulaRegistry(
  chain: ChainReader,
  config: Config,
  clock?: () => number,
): Promise<DeployNebulaRegistryResult> {
  const admin = config.walletAddresses.governanceMultisig;
  const registry = new NebulaRegistry({
    address: config.nebulaRegistry.address,
    admin,
    clock,
  });
  const nebulas: NebulaOracle[] = [];

  for (const nebulaConfig of config.nebulaRegistry.nebulas) {
    const nebula = await NebulaOracle.create(chain, {
      name: nebulaConfig.name,
      address: nebulaConfig.address,
      denominationToken: nebulaConfig.denominationToken,
      denominationFeed: nebulaConfig.denominationFeed,
      admin,
      registrar: registry.address,
      contextGuard: nebulaConfig.contextGuard,
    });
    const { nebulaId } = registry.createNebula(admin, nebula);
    nebulas.push(nebula);

    for (const { lpToken, priceFeeds } of nebulaConfig.liquidityTokens) {
      await registry.registerLiquidityToken(
        admin,
        nebulaId,
        lpToken,
        priceFeeds,
      );
    }

    printLog(
      "deploy",
      `${nebulaConfig.name}: ${nebulaConfig.liquidityTokens.length} liquidity tokens registered`,
    );
  }

  return { registry, nebulas };
}
