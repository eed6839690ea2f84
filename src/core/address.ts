import { isAddress, zeroAddress } from "viem";
import type { Address } from "../types";
import { ensure } from "./errors";

/**
 * Lowercase form of an address. Ledgers and registries key on it, so a
 * checksummed spelling and its lowercase twin are the same account.
 */
export const canonicalAddress = (value: Address): Address =>
  `0x${value.slice(2).toLowerCase()}`;

/** Validates a caller-supplied address and returns its canonical form. */
export const toAddress = (value: string, label: string): Address => {
  // checksums are not enforced; only the 20 bytes matter
  ensure(isAddress(value, { strict: false }), "argument", `${label} must be a 20-byte address.`);
  const address = canonicalAddress(value);
  ensure(address !== zeroAddress, "argument", `${label} address must not be zero.`);
  return address;
};
