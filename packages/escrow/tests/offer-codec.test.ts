/**
 * Tests for the Offer record codec and store.
 */

import { createHash } from "node:crypto";
import { describe, it, expect } from "vitest";
import type { Offer } from "@swapescrow/types";
import {
  OFFER_DISCRIMINATOR,
  OFFER_RECORD_SIZE,
  decodeOffer,
  encodeOffer,
} from "../src/offer-codec.js";
import { InMemoryOfferStore } from "../src/offer-store.js";
import { ASSET_A, ASSET_B, MAKER, TAKER, thrown } from "./fixtures.js";

const OFFER: Offer = {
  id: 0x0102030405060708n,
  maker: MAKER,
  assetA: ASSET_A.mint,
  assetB: ASSET_B.mint,
  amountBWanted: 1_000_000n,
  bump: 254,
};

describe("offer codec", () => {
  it("lays out the record in 122 little-endian bytes", () => {
    const data = encodeOffer(OFFER);

    expect(data.length).toBe(OFFER_RECORD_SIZE);
    expect([...data.subarray(0, 8)]).toEqual([
      ...createHash("sha256").update("account:Offer").digest().subarray(0, 8),
    ]);
    expect(data[8]).toBe(1);
    expect([...data.subarray(9, 17)]).toEqual([8, 7, 6, 5, 4, 3, 2, 1]);
    expect([...data.subarray(113, 121)]).toEqual([0x40, 0x42, 0x0f, 0, 0, 0, 0, 0]);
    expect(data[121]).toBe(254);
  });

  it("decodes what it encodes", () => {
    expect(decodeOffer(encodeOffer(OFFER))).toEqual(OFFER);
  });

  it("rejects records of the wrong length", () => {
    const data = encodeOffer(OFFER);
    expect(thrown(() => decodeOffer(data.subarray(0, 121)))).toMatchObject({ code: "MALFORMED_RECORD" });
    expect(thrown(() => decodeOffer(new Uint8Array(123)))).toMatchObject({ code: "MALFORMED_RECORD" });
  });

  it("rejects a foreign discriminator", () => {
    const data = encodeOffer(OFFER);
    data[0] = (OFFER_DISCRIMINATOR[0] ?? 0) ^ 0xff;
    expect(thrown(() => decodeOffer(data))).toMatchObject({ code: "MALFORMED_RECORD" });
  });

  it("rejects an unknown version", () => {
    const data = encodeOffer(OFFER);
    data[8] = 2;
    const err = thrown(() => decodeOffer(data));
    expect(err).toMatchObject({ code: "MALFORMED_RECORD" });
    expect(err).toHaveProperty("message", "Unsupported Offer record version 2");
  });

  it("refuses to encode out-of-range fields", () => {
    expect(thrown(() => encodeOffer({ ...OFFER, bump: 256 }))).toMatchObject({ code: "MALFORMED_RECORD" });
    expect(thrown(() => encodeOffer({ ...OFFER, amountBWanted: -1n }))).toMatchObject({ code: "MALFORMED_RECORD" });
  });
});

describe("InMemoryOfferStore", () => {
  it("creates, reads and consumes a record exactly once", () => {
    const store = new InMemoryOfferStore();
    store.create(TAKER, OFFER, 42n);

    expect(store.has(TAKER)).toBe(true);
    expect(store.get(TAKER)).toEqual(OFFER);
    expect(store.rawRecord(TAKER)).toEqual(encodeOffer(OFFER));
    expect(store.consume(TAKER)).toEqual({ offer: OFFER, deposit: 42n });
    expect(store.size).toBe(0);
    expect(thrown(() => store.consume(TAKER))).toMatchObject({ code: "OFFER_NOT_FOUND" });
  });

  it("refuses a second record at the same address", () => {
    const store = new InMemoryOfferStore();
    store.create(TAKER, OFFER, 42n);

    expect(thrown(() => store.create(TAKER, { ...OFFER, id: 2n }, 1n))).toMatchObject({
      code: "DUPLICATE_OFFER",
    });
    expect(store.get(TAKER)?.id).toBe(OFFER.id);
  });

  it("restores a checkpoint", () => {
    const store = new InMemoryOfferStore();
    store.create(TAKER, OFFER, 42n);
    const restore = store.checkpoint();

    store.consume(TAKER);
    store.create(MAKER, OFFER, 7n);
    restore();

    expect(store.has(TAKER)).toBe(true);
    expect(store.has(MAKER)).toBe(false);
  });
});
