/**
 * Event Types
 *
 * Every committed escrow operation is captured as one EscrowEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Quantities are decimal strings of base units (JSON-safe)
 * - Events are emitted only for committed operations
 */

import type { Address } from "./asset.js";

/**
 * Metadata common to all escrow events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Identity that submitted the operation */
  readonly actor: Address;

  /** Offer address the event concerns */
  readonly correlationId: Address;
}

export interface OfferMadePayload {
  readonly offer: Address;
  readonly vault: Address;
  readonly id: string;
  readonly maker: Address;
  readonly assetA: Address;
  readonly assetB: Address;
  readonly amountAOffered: string;
  readonly amountBWanted: string;
}

export interface OfferTakenPayload {
  readonly offer: Address;
  readonly maker: Address;
  readonly taker: Address;
  readonly amountAReceived: string;
  readonly amountBPaid: string;
  readonly vaultDepositRefunded: string;
  readonly offerDepositRefunded: string;
}

export interface OfferCancelledPayload {
  readonly offer: Address;
  readonly maker: Address;
  readonly amountAReturned: string;
}

/**
 * An escrow domain event, discriminated by `type`.
 */
export type EscrowEvent =
  | { readonly type: "offer.made"; readonly metadata: EventMetadata; readonly payload: OfferMadePayload }
  | { readonly type: "offer.taken"; readonly metadata: EventMetadata; readonly payload: OfferTakenPayload }
  | { readonly type: "offer.cancelled"; readonly metadata: EventMetadata; readonly payload: OfferCancelledPayload };

export type EscrowEventType = EscrowEvent["type"];
