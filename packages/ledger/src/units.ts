/**
 * @swapescrow/ledger — Base-unit arithmetic.
 *
 * Quantities live on the ledger as bigint base units. Decimal strings
 * exist only at the edges (display, logs, configuration).
 *
 * Rules:
 * - No floating-point operations
 * - Every stored quantity fits in a u64
 * - Fractional digits beyond the asset's decimals are rejected, never rounded
 */

import { U64_MAX } from "@swapescrow/types";
import { LedgerError } from "./types.js";

/**
 * Parse a decimal string into base units.
 *
 * "1.5" with decimals=6 → 1500000n
 * "42" with decimals=0 → 42n
 */
export function parseUnits(amount: string, decimals: number): bigint {
  const trimmed = amount.trim();

  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${amount}"`);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but the asset allows ${String(decimals)}`,
    );
  }

  const units = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  assertU64(units);
  return units;
}

/**
 * Format base units as a decimal string with exactly `decimals` places.
 *
 * 1500000n with decimals=6 → "1.500000"
 */
export function formatUnits(units: bigint, decimals: number): string {
  if (decimals === 0) {
    return units.toString();
  }

  const str = units.toString().padStart(decimals + 1, "0");
  return `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;
}

/**
 * Assert a quantity is within [0, u64 max].
 */
export function assertU64(units: bigint): void {
  if (units < 0n || units > U64_MAX) {
    throw new LedgerError("INVALID_AMOUNT", `Quantity ${units.toString()} is outside the u64 range`);
  }
}

/**
 * Assert a transfer quantity is within (0, u64 max].
 */
export function assertTransferAmount(units: bigint): void {
  if (units <= 0n) {
    throw new LedgerError("INVALID_AMOUNT", `Transfer amount must be positive, got ${units.toString()}`);
  }
  assertU64(units);
}

/**
 * Add two quantities, failing instead of exceeding u64.
 */
export function checkedAdd(a: bigint, b: bigint): bigint {
  const sum = a + b;
  assertU64(sum);
  return sum;
}
