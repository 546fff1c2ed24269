/**
 * Property-Based Tests for @swapescrow/escrow
 *
 * Random sequences of make / take / cancel against a simple model:
 *
 * 1. Conservation: supply of both assets is never created or destroyed
 * 2. Exclusivity: at most one live offer per (maker, id)
 * 3. Single consumption: a taken or cancelled offer is gone for good
 * 4. The vault always holds exactly what was escrowed
 * 5. Rejected operations change no balance
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { LedgerError } from "@swapescrow/ledger";
import { EscrowError } from "../src/errors.js";
import {
  ASSET_A,
  ASSET_B,
  MAKER,
  STARTING_TOKENS,
  TAKER,
  cancelOffer,
  createWorld,
  makeOffer,
  takeOffer,
} from "./fixtures.js";
import type { World } from "./fixtures.js";

// =============================================================================
// Arbitraries
// =============================================================================

const arbOp = fc.record({
  kind: fc.constantFrom("make", "take", "cancel"),
  id: fc.bigInt({ min: 1n, max: 3n }),
  amountA: fc.bigInt({ min: 1n, max: 2_000_000n }),
  amountB: fc.bigInt({ min: 1n, max: 3_000_000n }),
});

type Op = typeof arbOp extends fc.Arbitrary<infer T> ? T : never;

// =============================================================================
// Helpers
// =============================================================================

function apply(world: World, op: Op): void {
  const offer = world.program.offerAddress(MAKER, op.id);
  switch (op.kind) {
    case "make":
      makeOffer(world, op.id, op.amountA, op.amountB);
      return;
    case "take":
      takeOffer(world, offer);
      return;
    case "cancel":
      cancelOffer(world, offer);
      return;
  }
}

function snapshot(world: World): bigint[] {
  return [
    world.ledger.nativeBalanceOf(MAKER),
    world.ledger.nativeBalanceOf(TAKER),
    world.ledger.balanceOf(world.makerA),
    world.ledger.balanceOf(world.takerB),
  ];
}

// =============================================================================
// Properties
// =============================================================================

describe("escrow properties", () => {
  it("keeps the model, the ledger and the store in agreement", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 8 }), (ops) => {
        const world = createWorld();
        const escrowed = new Map<bigint, bigint>();

        for (const op of ops) {
          const before = snapshot(world);
          const live = escrowed.has(op.id);

          try {
            apply(world, op);
          } catch (err) {
            if (!(err instanceof EscrowError || err instanceof LedgerError)) {
              throw err;
            }
            if (op.kind === "make" && live) {
              expect(err.code).toBe("DUPLICATE_OFFER");
            }
            if (op.kind !== "make" && !live) {
              expect(err.code).toBe("OFFER_NOT_FOUND");
            }
            expect(snapshot(world)).toEqual(before);
            continue;
          }

          if (op.kind === "make") {
            expect(live).toBe(false);
            escrowed.set(op.id, op.amountA);
          } else {
            expect(live).toBe(true);
            escrowed.delete(op.id);
          }
        }

        for (const id of [1n, 2n, 3n]) {
          const offer = world.program.offerAddress(MAKER, id);
          const amount = escrowed.get(id);
          if (amount === undefined) {
            expect(world.program.getOffer(offer)).toBeUndefined();
            expect(world.ledger.hasAccount(world.program.vaultAddress(offer, ASSET_A.mint))).toBe(false);
          } else {
            expect(world.program.vaultBalance(offer)).toBe(amount);
          }
        }

        expect(world.ledger.totalHeld(ASSET_A.mint)).toBe(STARTING_TOKENS);
        expect(world.ledger.totalHeld(ASSET_B.mint)).toBe(STARTING_TOKENS);
      }),
      { numRuns: 25 },
    );
  });
});
