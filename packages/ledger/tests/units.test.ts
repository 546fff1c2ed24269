/**
 * Tests for base-unit arithmetic.
 */

import { describe, it, expect } from "vitest";
import { U64_MAX } from "@swapescrow/types";
import {
  parseUnits,
  formatUnits,
  assertTransferAmount,
  checkedAdd,
} from "../src/units.js";
import { LedgerError } from "../src/types.js";

describe("parseUnits", () => {
  it("scales decimal strings to base units", () => {
    expect(parseUnits("1.5", 6)).toBe(1_500_000n);
    expect(parseUnits("42", 0)).toBe(42n);
    expect(parseUnits("0.000001", 6)).toBe(1n);
    expect(parseUnits(" 7 ", 2)).toBe(700n);
  });

  it("rejects more fractional digits than the asset allows", () => {
    expect(() => parseUnits("1.0000001", 6)).toThrow(LedgerError);
    expect(() => parseUnits("1.0000001", 6)).toThrow(/decimal places/);
  });

  it("rejects malformed and negative input", () => {
    expect(() => parseUnits("", 6)).toThrow(/Invalid amount format/);
    expect(() => parseUnits("-1", 6)).toThrow(/Invalid amount format/);
    expect(() => parseUnits("1e6", 6)).toThrow(/Invalid amount format/);
  });

  it("rejects quantities beyond u64", () => {
    expect(() => parseUnits("18446744073709551616", 0)).toThrow(/u64/);
    expect(parseUnits("18446744073709551615", 0)).toBe(U64_MAX);
  });
});

describe("formatUnits", () => {
  it("formats with exactly `decimals` places", () => {
    expect(formatUnits(1_500_000n, 6)).toBe("1.500000");
    expect(formatUnits(1n, 6)).toBe("0.000001");
    expect(formatUnits(0n, 2)).toBe("0.00");
    expect(formatUnits(42n, 0)).toBe("42");
  });
});

describe("assertTransferAmount", () => {
  it("accepts (0, u64 max]", () => {
    expect(() => assertTransferAmount(1n)).not.toThrow();
    expect(() => assertTransferAmount(U64_MAX)).not.toThrow();
  });

  it("rejects zero, negative and overflowing amounts", () => {
    expect(() => assertTransferAmount(0n)).toThrow(/must be positive/);
    expect(() => assertTransferAmount(-5n)).toThrow(/must be positive/);
    expect(() => assertTransferAmount(U64_MAX + 1n)).toThrow(/u64/);
  });
});

describe("checkedAdd", () => {
  it("adds within range and fails past u64", () => {
    expect(checkedAdd(2n, 3n)).toBe(5n);
    expect(() => checkedAdd(U64_MAX, 1n)).toThrow(LedgerError);
  });
});
