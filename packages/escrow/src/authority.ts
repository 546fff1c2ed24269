/**
 * @swapescrow/escrow — Program authority.
 *
 * A vault is owned by its offer's derived address. The escrow acts for
 * that address by presenting the seeds and bump that reproduce it; the
 * ledger then checks the reproduced address against the vault's owner.
 *
 * Makers and takers act through their signed escrow actions, which the
 * program verifies and hands to the ledger as a ConsentAuthorization.
 */

import type { PublicKey } from "@solana/web3.js";
import type { Address } from "@swapescrow/types";
import { LedgerError } from "@swapescrow/ledger";
import type { Authorizer, LedgerAction, UserAuthorization } from "@swapescrow/ledger";
import { createDerivedAddress } from "./addresses.js";
import type { SeedSet } from "./addresses.js";
import type { TransferAction } from "./consent.js";
import { EscrowError } from "./errors.js";

export class DerivedAuthorization implements Authorizer {
  readonly kind = "derived" as const;

  constructor(
    public readonly seeds: SeedSet,
    public readonly bump: number,
    private readonly _programId: PublicKey,
  ) {}

  /**
   * Resolves to the derived address; there is no signature to check.
   * Derived authority covers any action on an account the derived
   * address owns, so the action itself is not inspected.
   */
  authorize(): Address {
    const address = createDerivedAddress(this.seeds, this.bump, this._programId);
    if (address === undefined) {
      throw new EscrowError(
        "INVALID_AUTHORITY_PROOF",
        `Bump ${String(this.bump)} does not derive an off-curve address`,
      );
    }
    return address;
  }
}

/**
 * A party's verified escrow consent, presented to the ledger for the one
 * transfer that consent implies. Any other ledger action is refused.
 */
export class ConsentAuthorization implements Authorizer {
  readonly kind = "user" as const;

  constructor(
    public readonly identity: Address,
    private readonly _covers: TransferAction,
  ) {}

  authorize(action: LedgerAction): Address {
    const covered =
      action.kind === "transfer" &&
      action.from === this._covers.from &&
      action.to === this._covers.to &&
      action.mint === this._covers.mint &&
      action.amount === this._covers.amount;
    if (!covered) {
      throw new LedgerError(
        "INVALID_SIGNATURE",
        `Consent of ${this.identity} does not cover this ${action.kind} action`,
      );
    }
    return this.identity;
  }
}

export type EscrowAuthorizer = UserAuthorization | ConsentAuthorization | DerivedAuthorization;
