// ============================================================================
// @phasemint/engine — Address Helpers
// ============================================================================

import { ethers } from 'ethers';
import { ConfigError } from './errors.js';
import type { Address } from './types.js';

/**
 * Normalise an address to its checksummed form.
 *
 * @param value - Address in any case.
 * @param label - Field name used in the error message.
 * @throws {ConfigError} `InvalidAddress` if the value is not an address or
 *         is the zero address.
 */
export function toAddress(value: string, label: string): Address {
  if (!ethers.isAddress(value)) {
    throw new ConfigError('InvalidAddress', `${label} is not a valid address — got ${value}`);
  }
  const address = ethers.getAddress(value);
  if (address === ethers.ZeroAddress) {
    throw new ConfigError('InvalidAddress', `${label} must not be the zero address`);
  }
  return address;
}

/** Case-insensitive address equality. */
export function sameAddress(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
