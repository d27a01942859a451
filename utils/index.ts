export * from "./address";
export * from "./log";
export * from "./math/errors";
export * as FixedPoint from "./math/fixed-point";
export * from "./oracle/admin-control";
export * from "./oracle/decimal-normalizer";
export * from "./oracle/deploy";
export * from "./oracle/errors";
export * from "./oracle/ethers-chain-reader";
export * from "./oracle/nebula-oracle";
export * from "./oracle/nebula-registry";
export * from "./oracle/price-feed-reader";
export * from "./oracle/types";
