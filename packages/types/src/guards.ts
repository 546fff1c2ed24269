/**
 * Runtime Type Guards
 *
 * Narrowing functions for escrow domain types.
 * These enable safe runtime validation at system boundaries
 * (caller inputs, deserialized records, external integrations).
 */

import type { Address, AssetRef } from "./asset.js";
import { U64_MAX } from "./asset.js";
import type { Offer } from "./offer.js";
import type { EscrowEvent, EscrowEventType, EventMetadata } from "./event.js";

// =============================================================================
// Asset guards
// =============================================================================

const BASE58_ADDRESS = /^[1-9A-HJ-NP-Za-km-z]{32,44}$/;

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && BASE58_ADDRESS.test(value);
}

export function isU64(value: unknown): value is bigint {
  return typeof value === "bigint" && value >= 0n && value <= U64_MAX;
}

export function isAssetRef(value: unknown): value is AssetRef {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isAddress(v.mint) &&
    typeof v.decimals === "number" &&
    Number.isInteger(v.decimals) &&
    v.decimals >= 0 &&
    v.decimals <= 255
  );
}

// =============================================================================
// Offer guards
// =============================================================================

export function isOffer(value: unknown): value is Offer {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isU64(v.id) &&
    isAddress(v.maker) &&
    isAddress(v.assetA) &&
    isAddress(v.assetB) &&
    isU64(v.amountBWanted) &&
    typeof v.bump === "number" &&
    Number.isInteger(v.bump) &&
    v.bump >= 0 &&
    v.bump <= 255
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_TYPES = new Set<string>(["offer.made", "offer.taken", "offer.cancelled"]);

export function isEscrowEventType(value: unknown): value is EscrowEventType {
  return typeof value === "string" && EVENT_TYPES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    isAddress(v.actor) &&
    isAddress(v.correlationId)
  );
}

export function isEscrowEvent(value: unknown): value is EscrowEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isEscrowEventType(v.type) &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}
