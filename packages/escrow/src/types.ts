/**
 * @swapescrow/escrow — Operation requests and results.
 */

import type { Logger } from "pino";
import type { Address, AssetRef, Offer } from "@swapescrow/types";
import type { AssetLedger, UserAuthorization } from "@swapescrow/ledger";
import type { EscrowConfig } from "./config.js";
import type { ConsentRegistry } from "./consent-registry.js";
import type { EventJournal } from "./journal.js";
import type { OfferStore } from "./offer-store.js";

// =============================================================================
// Program
// =============================================================================

export interface EscrowProgramOptions {
  readonly ledger: AssetLedger;
  /** Defaults to an empty InMemoryOfferStore */
  readonly store?: OfferStore | undefined;
  /** Defaults to the schema defaults */
  readonly config?: EscrowConfig | undefined;
  /** Defaults to a silent logger */
  readonly logger?: Logger | undefined;
  readonly journal?: EventJournal | undefined;
  /** Defaults to an empty ConsentRegistry */
  readonly consents?: ConsentRegistry | undefined;
  readonly clock?: (() => Date) | undefined;
}

// =============================================================================
// Make
// =============================================================================

export interface MakeTerms {
  /** Caller-chosen u64, unique per maker */
  readonly id: bigint;
  readonly maker: Address;
  readonly assetA: AssetRef;
  readonly assetB: AssetRef;
  readonly amountAOffered: bigint;
  readonly amountBWanted: bigint;
  /** Defaults to the maker's associated account for asset A */
  readonly makerSource?: Address | undefined;
  /** Single-use u64 chosen by the maker */
  readonly nonce: bigint;
}

export interface MakeOfferRequest extends MakeTerms {
  /** Maker's signature over makeConsentAction(terms) */
  readonly makerConsent: UserAuthorization;
}

export interface MakeOfferResult {
  readonly offer: Address;
  readonly vault: Address;
  readonly record: Offer;
  readonly vaultDeposit: bigint;
  readonly offerDeposit: bigint;
}

// =============================================================================
// Take
// =============================================================================

export interface TakeTerms {
  readonly offer: Address;
  readonly taker: Address;
  /** The terms the taker believes it is accepting */
  readonly maker: Address;
  readonly assetA: AssetRef;
  readonly assetB: AssetRef;
  readonly amountBWanted: bigint;
  /** Least vault balance the taker accepts */
  readonly minAmountA: bigint;
  /** Single-use u64 chosen by the taker */
  readonly nonce: bigint;
  /** Defaults to the taker's associated account for asset B */
  readonly takerSource?: Address | undefined;
  /** Defaults to the taker's associated account for asset A */
  readonly takerDestination?: Address | undefined;
  /** Defaults to the maker's associated account for asset B */
  readonly makerDestination?: Address | undefined;
}

export interface TakeOfferRequest extends TakeTerms {
  /** Taker's signature over takeConsentAction(terms) */
  readonly takerConsent: UserAuthorization;
}

export interface TakeOfferResult {
  readonly offer: Address;
  readonly amountAReceived: bigint;
  readonly amountBPaid: bigint;
  /** Vault deposit, refunded to the taker */
  readonly vaultDepositRefunded: bigint;
  /** Record deposit, refunded to the maker */
  readonly offerDepositRefunded: bigint;
}

// =============================================================================
// Cancel
// =============================================================================

export interface CancelTerms {
  readonly offer: Address;
  readonly maker: Address;
  /** Single-use u64 chosen by the maker */
  readonly nonce: bigint;
}

export interface CancelOfferRequest extends CancelTerms {
  /** Maker's signature over cancelConsentAction(terms) */
  readonly makerConsent: UserAuthorization;
  /** Defaults to the maker's associated account for asset A */
  readonly makerDestination?: Address | undefined;
}

export interface CancelOfferResult {
  readonly offer: Address;
  readonly amountAReturned: bigint;
  readonly depositsRefunded: bigint;
}
