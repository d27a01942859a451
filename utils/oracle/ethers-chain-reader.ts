import { Contract, ContractRunner, isCallException, Result } from "ethers";

import { toChecksumAddress } from "../address";
import {
  AGGREGATOR_V3_ABI,
  ERC20_ABI,
  UNISWAP_V2_LOCKED_REASON,
  UNISWAP_V2_PAIR_ABI,
} from "./abi";
import {
  ChainReader,
  Erc20Like,
  Pool,
  PoolReserves,
  PriceFeed,
  RoundData,
} from "./types";

/**
 * Call a view function and return its raw decoded value
 *
 * @param contract - The contract
 * @param method - The function name
 * @returns The decoded return value
 */
async function view(contract: Contract, method: string): Promise<unknown> {
  return contract.getFunction(method).staticCall();
}

function asBigInt(value: unknown, label: string): bigint {
  if (typeof value !== "bigint") {
    throw new Error(`Unexpected ${label}: ${String(value)}`);
  }
  return value;
}

function asString(value: unknown, label: string): string {
  if (typeof value !== "string") {
    throw new Error(`Unexpected ${label}: ${String(value)}`);
  }
  return value;
}

function asResult(value: unknown, label: string): Result {
  if (!(value instanceof Result)) {
    throw new Error(`Unexpected ${label}: ${String(value)}`);
  }
  return value;
}

/**
 * ChainReader backed by ethers contracts
 */
export class EthersChainReader implements ChainReader {
  /**
   * @param runner - A provider (or a signer with one); only eth_call is used
   */
  constructor(private readonly runner: ContractRunner) {}

  getAsset(address: string): Erc20Like {
    const assetAddress = toChecksumAddress(address);
    const contract = new Contract(assetAddress, ERC20_ABI, this.runner);
    return erc20(assetAddress, contract);
  }

  getPool(address: string): Pool {
    const pairAddress = toChecksumAddress(address);
    const pair = new Contract(pairAddress, UNISWAP_V2_PAIR_ABI, this.runner);

    return {
      ...erc20(pairAddress, pair),
      getReserves: async (): Promise<PoolReserves> => {
        const result = asResult(await view(pair, "getReserves"), "reserves");
        return {
          reserve0: asBigInt(result[0], "reserve0"),
          reserve1: asBigInt(result[1], "reserve1"),
          blockTimestampLast: Number(
            asBigInt(result[2], "blockTimestampLast"),
          ),
        };
      },
      totalSupply: async (): Promise<bigint> =>
        asBigInt(await view(pair, "totalSupply"), "totalSupply"),
      token0: async (): Promise<string> =>
        toChecksumAddress(asString(await view(pair, "token0"), "token0")),
      token1: async (): Promise<string> =>
        toChecksumAddress(asString(await view(pair, "token1"), "token1")),
      isLocked: async (): Promise<boolean> => isPairLocked(pair),
    };
  }

  getPriceFeed(address: string): PriceFeed {
    const feedAddress = toChecksumAddress(address);
    const aggregator = new Contract(feedAddress, AGGREGATOR_V3_ABI, this.runner);

    return {
      address: feedAddress,
      decimals: async (): Promise<number> =>
        Number(asBigInt(await view(aggregator, "decimals"), "decimals")),
      description: async (): Promise<string> =>
        asString(await view(aggregator, "description"), "description"),
      latestRoundData: async (): Promise<RoundData> => {
        const result = asResult(
          await view(aggregator, "latestRoundData"),
          "round data",
        );
        return {
          roundId: asBigInt(result[0], "roundId"),
          answer: asBigInt(result[1], "answer"),
          startedAt: asBigInt(result[2], "startedAt"),
          updatedAt: asBigInt(result[3], "updatedAt"),
          answeredInRound: asBigInt(result[4], "answeredInRound"),
        };
      },
    };
  }
}

function erc20(address: string, contract: Contract): Erc20Like {
  return {
    address,
    name: async (): Promise<string> =>
      asString(await view(contract, "name"), "name"),
    decimals: async (): Promise<number> =>
      Number(asBigInt(await view(contract, "decimals"), "decimals")),
  };
}

/**
 * Check the pair's reentrancy lock by simulating `sync()`
 * - An idle pair lets the call through; a pair already inside one of its own
 *   operations reverts with its `LOCKED` reason
 *
 * @param pair - The pair contract
 * @returns Whether the lock is held
 */
async function isPairLocked(pair: Contract): Promise<boolean> {
  try {
    await pair.getFunction("sync").staticCall();
    return false;
  } catch (error) {
    if (
      isCallException(error) &&
      error.reason !== null &&
      error.reason.includes(UNISWAP_V2_LOCKED_REASON)
    ) {
      return true;
    }
    throw error;
  }
}
