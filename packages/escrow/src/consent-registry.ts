/**
 * @swapescrow/escrow — Spent consent nonces.
 *
 * Each (identity, nonce) pair authorizes at most one committed
 * operation. The registry takes part in the atomic unit, so a nonce
 * spent by an operation that rolls back is spendable again.
 */

import type { Address } from "@swapescrow/types";
import { U64_MAX } from "@swapescrow/types";
import type { Checkpointable } from "@swapescrow/ledger";
import { EscrowError } from "./errors.js";

export class ConsentRegistry implements Checkpointable {
  private _spent = new Set<string>();

  isSpent(identity: Address, nonce: bigint): boolean {
    return this._spent.has(key(identity, nonce));
  }

  /**
   * Throws INVALID_NONCE outside u64, CONSENT_REUSED once spent.
   */
  assertUnspent(identity: Address, nonce: bigint): void {
    if (nonce < 0n || nonce > U64_MAX) {
      throw new EscrowError("INVALID_NONCE", `Nonce ${nonce.toString()} is outside u64`);
    }
    if (this.isSpent(identity, nonce)) {
      throw new EscrowError(
        "CONSENT_REUSED",
        `Nonce ${nonce.toString()} of ${identity} has already been used`,
      );
    }
  }

  spend(identity: Address, nonce: bigint): void {
    this.assertUnspent(identity, nonce);
    this._spent.add(key(identity, nonce));
  }

  get size(): number {
    return this._spent.size;
  }

  checkpoint(): () => void {
    const saved = new Set(this._spent);
    return () => {
      this._spent = saved;
    };
  }
}

function key(identity: Address, nonce: bigint): string {
  return `${identity}:${nonce.toString()}`;
}
