import {
  ArithmeticOverflowError,
  DivisionByZeroError,
  InvalidDomainError,
} from "./errors";

/*
 * Unsigned 18-decimal fixed-point arithmetic on bigint.
 *
 * Values live in [0, MAX_UINT256]. Every division truncates, so the order in
 * which callers chain mul/div is part of the result.
 */

export const FIXED_POINT_DECIMALS = 18;
export const UNIT = 10n ** 18n;
export const HALF_UNIT = UNIT / 2n;
export const DOUBLE_UNIT = UNIT * 2n;
export const MAX_UINT256 = 2n ** 256n - 1n;

// log2(e) as an 18-decimal value
export const LOG2_E = 1_442695040888963407n;

// Largest input whose exponent still fits the unsigned 60.18 range
export const EXP_MAX_INPUT = 133_084258667509499440n;

// Below this input the exponent truncates to zero
export const EXP_MIN_INPUT = -41_446531673892822322n;

// exp() works at 36 decimals before truncating back to 18
const EXP_PRECISION = 10n ** 36n;
const LN2_36 = 693147180559945309417232121458176568n;

/**
 * Ensure the given value is inside the unsigned 256-bit range
 *
 * @param operation - The operation name used in the error
 * @param value - The value to check
 */
function assertUint(operation: string, value: bigint): void {
  if (value < 0n) {
    throw new InvalidDomainError(operation, value, "negative value");
  }

  if (value > MAX_UINT256) {
    throw new InvalidDomainError(operation, value, "exceeds uint256");
  }
}

/**
 * Ensure the result of an operation did not overflow
 *
 * @param operation - The operation name used in the error
 * @param result - The computed result
 * @param operands - The operands of the operation
 * @returns The result, unchanged
 */
function checkedResult(
  operation: string,
  result: bigint,
  operands: bigint[],
): bigint {
  if (result > MAX_UINT256) {
    throw new ArithmeticOverflowError(operation, operands);
  }
  return result;
}

/**
 * Multiply two fixed-point numbers: floor(x * y / 1e18)
 *
 * @param x - The first operand
 * @param y - The second operand
 * @returns The product as an 18-decimal value
 */
export function mul(x: bigint, y: bigint): bigint {
  assertUint("mul", x);
  assertUint("mul", y);
  return checkedResult("mul", (x * y) / UNIT, [x, y]);
}

/**
 * Divide two fixed-point numbers: floor(x * 1e18 / y)
 *
 * @param x - The dividend
 * @param y - The divisor
 * @returns The quotient as an 18-decimal value
 */
export function div(x: bigint, y: bigint): bigint {
  assertUint("div", x);
  assertUint("div", y);

  if (y === 0n) {
    throw new DivisionByZeroError("div", x);
  }
  return checkedResult("div", (x * UNIT) / y, [x, y]);
}

/**
 * Multiply a fixed-point number by a plain integer factor
 *
 * @param x - The fixed-point value
 * @param factor - The integer factor
 * @returns x * factor
 */
export function mulInt(x: bigint, factor: bigint): bigint {
  assertUint("mulInt", x);
  assertUint("mulInt", factor);
  return checkedResult("mulInt", x * factor, [x, factor]);
}

/**
 * Integer square root, rounded down
 *
 * @param x - A raw (unscaled) integer
 * @returns floor(sqrt(x))
 */
export function sqrt(x: bigint): bigint {
  if (x < 0n) {
    throw new InvalidDomainError("sqrt", x, "negative value");
  }

  if (x < 2n) {
    return x;
  }

  let z = x;
  let y = (x + 1n) / 2n;

  while (y < z) {
    z = y;
    y = (x / y + y) / 2n;
  }
  return z;
}

/**
 * Geometric mean of two fixed-point numbers: floor(sqrt(x * y))
 * - The product of two 18-decimal values has 36 decimals, its square root has 18 again
 *
 * @param x - The first operand
 * @param y - The second operand
 * @returns The geometric mean as an 18-decimal value
 */
export function geometricMean(x: bigint, y: bigint): bigint {
  assertUint("geometricMean", x);
  assertUint("geometricMean", y);

  if (x === 0n || y === 0n) {
    return 0n;
  }

  const xy = checkedResult("geometricMean", x * y, [x, y]);
  return sqrt(xy);
}

/**
 * Index of the most significant set bit
 *
 * @param x - A positive integer
 * @returns The zero-based bit index
 */
export function mostSignificantBit(x: bigint): number {
  if (x <= 0n) {
    throw new InvalidDomainError("mostSignificantBit", x, "must be positive");
  }
  return x.toString(2).length - 1;
}

/**
 * Binary logarithm using the iterative binary-digit method
 * - The result is signed: inputs below 1.0 yield a negative value
 *
 * @param x - A positive 18-decimal value
 * @returns log2(x) as a signed 18-decimal value
 */
export function log2(x: bigint): bigint {
  if (x <= 0n) {
    throw new InvalidDomainError("log2", x, "must be greater than zero");
  }
  assertUint("log2", x);

  let sign = 1n;
  let value = x;

  // log2(x) = -log2(1/x)
  if (value < UNIT) {
    sign = -1n;
    value = (UNIT * UNIT) / value;
  }

  const n = BigInt(mostSignificantBit(value / UNIT));
  let result = n * UNIT;
  let y = value >> n;

  if (y === UNIT) {
    return result * sign;
  }

  for (let delta = HALF_UNIT; delta > 0n; delta >>= 1n) {
    y = (y * y) / UNIT;

    if (y >= DOUBLE_UNIT) {
      result += delta;
      y >>= 1n;
    }
  }
  return result * sign;
}

/**
 * Natural logarithm: ln(x) = log2(x) / log2(e)
 *
 * @param x - A positive 18-decimal value
 * @returns ln(x) as a signed 18-decimal value
 */
export function ln(x: bigint): bigint {
  if (x <= 0n) {
    throw new InvalidDomainError("ln", x, "must be greater than zero");
  }
  return (log2(x) * UNIT) / LOG2_E;
}

/**
 * Natural exponent
 * - Reduces x to k * ln(2) + r with 0 <= r < ln(2), sums the Taylor series of
 *   e^r at 36 decimals, shifts by k and truncates to 18 decimals
 *
 * @param x - A signed 18-decimal value
 * @returns e^x as an 18-decimal value
 */
export function exp(x: bigint): bigint {
  if (x > EXP_MAX_INPUT) {
    throw new InvalidDomainError("exp", x, "result exceeds uint256");
  }

  if (x < EXP_MIN_INPUT) {
    return 0n;
  }

  const scaled = x * UNIT;
  let k = scaled / LN2_36;

  // bigint division truncates toward zero, the reduction needs floor
  if (scaled < 0n && k * LN2_36 !== scaled) {
    k -= 1n;
  }

  const r = scaled - k * LN2_36;
  let term = EXP_PRECISION;
  let sum = EXP_PRECISION;

  for (let i = 1n; term > 0n; i++) {
    term = (term * r) / (EXP_PRECISION * i);
    sum += term;
  }

  const shifted = k >= 0n ? sum << k : sum >> -k;
  return shifted / UNIT;
}

/**
 * Geometric mean computed as exp((ln(x) + ln(y)) / 2), refined to the floor
 * square root
 * - The log/exp estimate is off by a few units in the last places; Newton
 *   steps from it land on the same value geometricMean() returns
 *
 * @param x - The first operand
 * @param y - The second operand
 * @returns The geometric mean as an 18-decimal value
 */
export function geometricMeanLogExp(x: bigint, y: bigint): bigint {
  assertUint("geometricMeanLogExp", x);
  assertUint("geometricMeanLogExp", y);

  if (x === 0n || y === 0n) {
    return 0n;
  }

  const xy = checkedResult("geometricMeanLogExp", x * y, [x, y]);
  const estimate = exp((ln(x) + ln(y)) / 2n);

  // One step from any positive guess lands on or above the floor root
  let z = estimate > 0n ? estimate : 1n;
  z = (xy / z + z) / 2n;

  // From above, the iteration decreases until it reaches the floor root
  let next = (xy / z + z) / 2n;

  while (next < z) {
    z = next;
    next = (xy / z + z) / 2n;
  }
  return z;
}

/**
 * Rescale an 18-decimal value down to the given decimals (truncating)
 *
 * @param value - The 18-decimal value
 * @param decimals - Target decimals, at most 18
 * @returns The value expressed with `decimals` decimals
 */
export function scaleDown(value: bigint, decimals: number): bigint {
  if (
    !Number.isInteger(decimals) ||
    decimals < 0 ||
    decimals > FIXED_POINT_DECIMALS
  ) {
    throw new InvalidDomainError(
      "scaleDown",
      decimals,
      `decimals must be an integer in [0, ${FIXED_POINT_DECIMALS}]`,
    );
  }

  if (decimals === FIXED_POINT_DECIMALS) {
    return value;
  }
  return value / 10n ** BigInt(FIXED_POINT_DECIMALS - decimals);
}
