import { getAddress, isAddress, ZeroAddress } from "ethers";

import { InvalidAddressError } from "./oracle/errors";

/**
 * Check if two addresses are equal, regardless of their checksum casing
 *
 * @param a - address a
 * @param b - address b
 * @returns `true` if the addresses are equal, `false` otherwise
 */
export function isEqualAddress(a: string, b: string): boolean {
  return getAddress(a) === getAddress(b);
}

/**
 * Check if the given value is a valid, non-zero address
 *
 * @param value - The address to check
 * @returns `true` if the address is valid, `false` otherwise
 */
export function isValidAddress(value: string): boolean {
  return (
    !!value && isAddress(value) && getAddress(value) !== getAddress(ZeroAddress)
  );
}

/**
 * Check if the given value is the zero address
 *
 * @param value - The address to check
 * @returns `true` for the zero address
 */
export function isZeroAddress(value: string): boolean {
  return isAddress(value) && getAddress(value) === ZeroAddress;
}

/**
 * Convert an address to its checksummed form
 * - Every map in the oracle is keyed by this form
 *
 * @param value - The address to convert
 * @returns The checksummed address
 */
export function toChecksumAddress(value: string): string {
  if (!isAddress(value)) {
    throw new InvalidAddressError(value);
  }
  return getAddress(value);
}
