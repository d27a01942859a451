import { Config } from "../types";

/**
 * Get the configuration for the network
 *
 * @returns The configuration for the network
 */
export async function getConfig(): Promise<Config> {
  return {
    // Off-chain identities: the registry and nebulas run in this process
    walletAddresses: {
      governanceMultisig: "0x0000000000000000000000000000000000000001",
    },
    nebulaRegistry: {
      address: "0x0000000000000000000000000000000000000010",
      nebulas: [
        {
          name: "Constant Product Nebula",
          address: "0x0000000000000000000000000000000000000011",
          // USDC
          denominationToken: "0xB97EF9Ef8734C71904D8002F8b6Bc66Dd9c48a6E",
          // Chainlink USDC / USD
          denominationFeed: "0xF096872672F44d6EBA71458D74fe67F9a77a23B9",
          contextGuard: true,
          // TODO: add the pairs to price once their feeds are chosen
          liquidityTokens: [],
        },
      ],
    },
  };
}
