import { getConfig as getAvalancheMainNetConfig } from "./networks/avalanche_mainnet";
import { getConfig as getLocalhostConfig } from "./networks/localhost";
import { Config } from "./types";

/**
 * Get the configuration for the network
 *
 * @param network - The network name
 * @returns The configuration for the network
 */
export async function getConfig(network: string): Promise<Config> {
  switch (network) {
    case "avalanche_mainnet":
      return getAvalancheMainNetConfig();
    case "localhost":
      return getLocalhostConfig();
    default:
      throw new Error(`Unknown network: ${network}`);
  }
}
