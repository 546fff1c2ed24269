/**
 * @swapescrow/types — Shared domain types for the escrow swap engine.
 *
 * Used across all packages:
 * - Asset primitives (addresses, asset references, u64 bound)
 * - The persisted Offer record
 * - Escrow domain events
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

// Asset types
export type { Address, AssetRef } from "./asset.js";
export { U64_MAX } from "./asset.js";

// Offer types
export type { Offer } from "./offer.js";

// Event types
export type {
  EventMetadata,
  EscrowEvent,
  EscrowEventType,
  OfferMadePayload,
  OfferTakenPayload,
  OfferCancelledPayload,
} from "./event.js";

// Runtime type guards
export {
  isAddress,
  isU64,
  isAssetRef,
  isOffer,
  isEscrowEventType,
  isEventMetadata,
  isEscrowEvent,
} from "./guards.js";
