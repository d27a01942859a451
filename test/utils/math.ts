import { assert } from "chai";

/**
 * Assert that the given value is approximately equal to the expected value
 * - For `bigint` values, the tolerance is relative to |expectedValue|
 *
 * @param value - The value to check
 * @param expectedValue - The expected value
 * @param tolerance - The tolerance for rounding (default: 1e-15)
 */
export function assertBigIntEqualApproximately(
  value: bigint,
  expectedValue: bigint,
  tolerance: number = 1e-15,
): void {
  const magnitude = expectedValue < 0n ? -expectedValue : expectedValue;
  const toleranceBigInt = BigInt(Math.floor(Number(magnitude) * tolerance));

  assert(
    value >= expectedValue - toleranceBigInt &&
      value <= expectedValue + toleranceBigInt,
    `Value is not within tolerance. Expected: ${expectedValue}, Actual: ${value}, tolerance: ${toleranceBigInt}`,
  );
}
