/* eslint-disable no-console */
import "dotenv/config";

import { formatUnits, JsonRpcProvider } from "ethers";
import { parse } from "ts-command-line-args";

import { getConfig } from "../../config/config";
import { getRpcUrl } from "../../utils/env";
import { deployNebulaRegistry } from "../../utils/oracle/deploy";
import { EthersChainReader } from "../../utils/oracle/ethers-chain-reader";

/**
 * Arguments for the script
 */
export const args = parse<{
  network: string;
  help?: boolean;
}>(
  {
    network: {
      type: String,
      description: "The network name (eg. avalanche_mainnet)",
    },
    help: {
      type: Boolean,
      optional: true,
      alias: "h",
      description: "Prints this usage guide",
    },
  },
  {
    helpArg: "help",
    headerContentSections: [
      {
        header: "Show LP Prices",
        content:
          "Builds the configured nebulas against the network and prints the fair price of every configured liquidity token.",
      },
    ],
  },
);

/**
 * Print the fair LP prices of a network
 *
 * Usage:
 *  npm run oracle:prices -- --network=localhost
 */
async function main(): Promise<void> {
  const config = await getConfig(args.network);
  const provider = new JsonRpcProvider(getRpcUrl(args.network));
  const chain = new EthersChainReader(provider);

  const { registry, nebulas } = await deployNebulaRegistry(chain, config);

  console.log(`\nFair LP prices on ${args.network}`);
  console.log("============================================================\n");

  for (const nebula of nebulas) {
    const denomination = await nebula.denominationRound();
    const updatedAt = new Date(Number(denomination.updatedAt) * 1000);

    console.log(`${nebula.name} @ ${nebula.address}`);
    console.log(
      `  denomination : ${formatUnits(denomination.price, 18)} (updated ${updatedAt.toISOString()})`,
    );

    for (const lpToken of nebula.allLiquidityTokens()) {
      const record = nebula.getRecord(lpToken);

      if (!record) {
        continue;
      }

      try {
        const [price, assetPrices] = await Promise.all([
          registry.priceOf(lpToken),
          registry.assetPrices(lpToken),
        ]);

        console.log(`  ${record.name} @ ${lpToken}`);
        console.log(`    price        : ${formatUnits(price, nebula.decimals)}`);
        record.poolTokens.forEach((token, i) => {
          console.log(
            `    token${i}       : ${token} = ${formatUnits(assetPrices[i], nebula.decimals)}`,
          );
        });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`  ${record.name} @ ${lpToken}: ${message}`);
      }
    }
    console.log("------------------------------------------------------------");
  }
}

main()
  .then(() => process.exit(0))
  .catch((error) => {
    console.error(error);
    process.exit(1);
  });
