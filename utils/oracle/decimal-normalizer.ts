import { toChecksumAddress } from "../address";
import { FIXED_POINT_DECIMALS } from "../math/fixed-point";
import {
  DecimalsTooLargeError,
  DecimalsZeroError,
  InvalidDecimalsError,
} from "./errors";

export interface ScalarEntry {
  readonly decimals: number;
  // 10^(18 - decimals)
  readonly scalar: bigint;
}

/**
 * Compute the scalar that lifts a `decimals`-precision value to 18 decimals
 *
 * @param asset - The asset address, only used in the error
 * @param decimals - The decimals reported by the asset
 * @returns 10^(18 - decimals)
 */
export function scalarFromDecimals(asset: string, decimals: number): bigint {
  if (!Number.isInteger(decimals) || decimals < 0) {
    throw new InvalidDecimalsError(asset, decimals);
  }

  if (decimals === 0) {
    throw new DecimalsZeroError(asset);
  }

  if (decimals > FIXED_POINT_DECIMALS) {
    throw new DecimalsTooLargeError(asset, decimals);
  }
  return 10n ** BigInt(FIXED_POINT_DECIMALS - decimals);
}

/**
 * Per-asset scalar cache. Tokens and feeds are both "assets" here: anything
 * reporting `decimals()`.
 */
export class DecimalNormalizer {
  private readonly entries = new Map<string, ScalarEntry>();

  /**
   * Read the asset's decimals, then compute and cache its scalar
   *
   * @param asset - Anything with an address and decimals()
   * @param asset.address - The asset address
   * @param asset.decimals - Reads the asset decimals
   * @returns The scalar
   */
  async computeScalar(asset: {
    readonly address: string;
    decimals(): Promise<number>;
  }): Promise<bigint> {
    const address = toChecksumAddress(asset.address);
    const decimals = await asset.decimals();
    const scalar = scalarFromDecimals(address, decimals);

    this.entries.set(address, { decimals, scalar });
    return scalar;
  }

  hasScalar(asset: string): boolean {
    return this.entries.has(toChecksumAddress(asset));
  }

  /**
   * @param asset - The asset address
   * @returns The cached scalar, 0 if computeScalar() never ran for it
   */
  scalarOf(asset: string): bigint {
    return this.entries.get(toChecksumAddress(asset))?.scalar ?? 0n;
  }

  /**
   * @param asset - The asset address
   * @returns The decimals seen by computeScalar(), undefined if never computed
   */
  decimalsOf(asset: string): number | undefined {
    return this.entries.get(toChecksumAddress(asset))?.decimals;
  }

  /**
   * Lift an amount to 18 decimals with the cached scalar
   * - Callers must have run computeScalar() for the asset, otherwise the
   *   scalar is 0 and so is the result
   *
   * @param asset - The asset address
   * @param amount - The amount in the asset's own decimals
   * @returns The amount with 18 decimals
   */
  normalize(asset: string, amount: bigint): bigint {
    const scalar = this.scalarOf(asset);

    if (scalar === 1n) {
      return amount;
    }
    return amount * scalar;
  }
}
