/**
 * Offer Types
 *
 * The Offer is the only persisted escrow entity. It is created together
 * with its vault and destroyed together with it; there is no update.
 *
 * Deliberately absent: the escrowed amount of asset A. The vault's live
 * balance is the only source of truth for it.
 */

import type { Address } from "./asset.js";

export interface Offer {
  /** Caller-chosen u64, unique per maker */
  readonly id: bigint;

  /** Identity that created the offer and deposited asset A */
  readonly maker: Address;

  /** Mint of the escrowed asset */
  readonly assetA: Address;

  /** Mint of the asset wanted in return */
  readonly assetB: Address;

  /** Quantity of asset B a taker must pay, in base units */
  readonly amountBWanted: bigint;

  /**
   * Authority proof: the derivation salt that, together with
   * ("offer", maker, id), reproduces the offer address.
   */
  readonly bump: number;
}
