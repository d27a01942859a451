// Minimal human-readable ABIs of the contracts the oracle reads

export const ERC20_ABI = [
  "function name() view returns (string)",
  "function decimals() view returns (uint8)",
];

export const UNISWAP_V2_PAIR_ABI = [
  ...ERC20_ABI,
  "function getReserves() view returns (uint112 reserve0, uint112 reserve1, uint32 blockTimestampLast)",
  "function totalSupply() view returns (uint256)",
  "function token0() view returns (address)",
  "function token1() view returns (address)",
  "function sync()",
];

export const AGGREGATOR_V3_ABI = [
  "function decimals() view returns (uint8)",
  "function description() view returns (string)",
  "function latestRoundData() view returns (uint80 roundId, int256 answer, uint256 startedAt, uint256 updatedAt, uint80 answeredInRound)",
];

// Revert reason of the UniswapV2 `lock` modifier
export const UNISWAP_V2_LOCKED_REASON = "UniswapV2: LOCKED";
