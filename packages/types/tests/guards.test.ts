/**
 * Runtime type guard tests for @swapescrow/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isAddress,
  isU64,
  isAssetRef,
  isOffer,
  isEscrowEventType,
  isEventMetadata,
  isEscrowEvent,
} from "../src/guards.js";
import { U64_MAX } from "../src/asset.js";

const MINT_A = "So11111111111111111111111111111111111111112";
const MINT_B = "EPjFWdd5AufqSSqeM2qN1xzybapC8G4wEGGkZwyTDt1v";
const MAKER = "11111111111111111111111111111111";

// =============================================================================
// Asset guards
// =============================================================================

describe("isAddress", () => {
  it("accepts base58 addresses", () => {
    expect(isAddress(MINT_A)).toBe(true);
    expect(isAddress(MINT_B)).toBe(true);
    expect(isAddress(MAKER)).toBe(true);
  });

  it("rejects characters outside the base58 alphabet", () => {
    expect(isAddress("0OIl111111111111111111111111111111")).toBe(false);
  });

  it("rejects wrong lengths and non-strings", () => {
    expect(isAddress("abc")).toBe(false);
    expect(isAddress("1".repeat(45))).toBe(false);
    expect(isAddress(42)).toBe(false);
    expect(isAddress(null)).toBe(false);
  });
});

describe("isU64", () => {
  it("accepts the full u64 range", () => {
    expect(isU64(0n)).toBe(true);
    expect(isU64(U64_MAX)).toBe(true);
  });

  it("rejects out-of-range and non-bigint values", () => {
    expect(isU64(-1n)).toBe(false);
    expect(isU64(U64_MAX + 1n)).toBe(false);
    expect(isU64(1)).toBe(false);
    expect(isU64("1")).toBe(false);
  });
});

describe("isAssetRef", () => {
  it("accepts a mint with integer decimals", () => {
    expect(isAssetRef({ mint: MINT_A, decimals: 9 })).toBe(true);
    expect(isAssetRef({ mint: MINT_B, decimals: 0 })).toBe(true);
  });

  it("rejects fractional, negative or oversized decimals", () => {
    expect(isAssetRef({ mint: MINT_A, decimals: 1.5 })).toBe(false);
    expect(isAssetRef({ mint: MINT_A, decimals: -1 })).toBe(false);
    expect(isAssetRef({ mint: MINT_A, decimals: 256 })).toBe(false);
  });

  it("rejects a malformed mint", () => {
    expect(isAssetRef({ mint: "not-a-mint", decimals: 6 })).toBe(false);
    expect(isAssetRef(null)).toBe(false);
  });
});

// =============================================================================
// Offer guards
// =============================================================================

describe("isOffer", () => {
  const valid = {
    id: 1n,
    maker: MAKER,
    assetA: MINT_A,
    assetB: MINT_B,
    amountBWanted: 1_000_000n,
    bump: 254,
  };

  it("accepts a complete offer", () => {
    expect(isOffer(valid)).toBe(true);
  });

  it("rejects a numeric id", () => {
    expect(isOffer({ ...valid, id: 1 })).toBe(false);
  });

  it("rejects a bump outside one byte", () => {
    expect(isOffer({ ...valid, bump: 256 })).toBe(false);
    expect(isOffer({ ...valid, bump: -1 })).toBe(false);
  });

  it("rejects a missing field", () => {
    const { assetB: _omitted, ...rest } = valid;
    expect(isOffer(rest)).toBe(false);
  });
});

// =============================================================================
// Event guards
// =============================================================================

describe("event guards", () => {
  const metadata = {
    eventId: "evt-1",
    timestamp: "2025-01-01T00:00:00.000Z",
    actor: MAKER,
    correlationId: MINT_A,
  };

  it("recognises known event types only", () => {
    expect(isEscrowEventType("offer.made")).toBe(true);
    expect(isEscrowEventType("offer.taken")).toBe(true);
    expect(isEscrowEventType("offer.cancelled")).toBe(true);
    expect(isEscrowEventType("offer.updated")).toBe(false);
  });

  it("validates metadata", () => {
    expect(isEventMetadata(metadata)).toBe(true);
    expect(isEventMetadata({ ...metadata, actor: "nobody" })).toBe(false);
  });

  it("validates a whole event", () => {
    expect(isEscrowEvent({ type: "offer.cancelled", metadata, payload: {} })).toBe(true);
    expect(isEscrowEvent({ type: "offer.cancelled", metadata, payload: null })).toBe(false);
    expect(isEscrowEvent({ type: "unknown", metadata, payload: {} })).toBe(false);
  });
});
