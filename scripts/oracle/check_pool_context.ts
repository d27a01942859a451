/* eslint-disable no-console */
import "dotenv/config";

import { formatUnits, JsonRpcProvider } from "ethers";
import { parse } from "ts-command-line-args";

import { getRpcUrl } from "../../utils/env";
import { EthersChainReader } from "../../utils/oracle/ethers-chain-reader";

/**
 * Arguments for the script
 */
export const args = parse<{
  network: string;
  pool: string;
  help?: boolean;
}>(
  {
    network: {
      type: String,
      description: "The network name (eg. avalanche_mainnet)",
    },
    pool: {
      type: String,
      description: "The UniswapV2-style pair address",
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
        header: "Check Pool Context",
        content:
          "Checks the pair's reentrancy lock the way the nebula oracles do before pricing it, and prints its reserves.",
      },
    ],
  },
);

/**
 * Check whether a pair could be priced right now
 *
 * Usage:
 *  npm run oracle:context -- --network=localhost --pool=<pairAddress>
 */
async function main(): Promise<void> {
  const provider = new JsonRpcProvider(getRpcUrl(args.network));
  const chain = new EthersChainReader(provider);
  const pool = chain.getPool(args.pool);

  const [name, locked, reserves, totalSupply] = await Promise.all([
    pool.name(),
    pool.isLocked(),
    pool.getReserves(),
    pool.totalSupply(),
  ]);

  console.log(`${name} @ ${pool.address}`);
  console.log(`  locked       : ${locked}`);
  console.log(`  reserve0     : ${reserves.reserve0}`);
  console.log(`  reserve1     : ${reserves.reserve1}`);
  console.log(`  totalSupply  : ${formatUnits(totalSupply, 18)}`);
  console.log(
    `  lastUpdate   : ${new Date(reserves.blockTimestampLast * 1000).toISOString()}`,
  );
}

main()
  .then(() => process.exit(0))
  .catch((error) => {
    console.error(error);
    process.exit(1);
  });
