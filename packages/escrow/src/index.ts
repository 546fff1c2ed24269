/**
 * @swapescrow/escrow — Escrow-mediated two-party swaps.
 *
 * A maker locks asset A in a vault owned by a program-derived address
 * and names the amount of asset B it wants. A taker pays that amount and
 * receives the vault in one atomic unit; custody records are torn down
 * and their storage deposits refunded.
 *
 * Design rules:
 * - Offer and vault addresses are derived, never chosen
 * - The escrowed amount is the vault's live balance, never stored
 * - One operation, one atomic unit, one journal event
 */

// Program
export { EscrowProgram } from "./program.js";

// Addresses & authority
export {
  DerivedAddressResolver,
  createDerivedAddress,
  findDerivedAddress,
  offerIdSeed,
  MAX_BUMP,
} from "./addresses.js";
export type { DerivedAddress, SeedSet } from "./addresses.js";
export { ConsentAuthorization, DerivedAuthorization } from "./authority.js";
export type { EscrowAuthorizer } from "./authority.js";

// Records
export {
  encodeOffer,
  decodeOffer,
  OFFER_RECORD_SIZE,
  OFFER_RECORD_VERSION,
  OFFER_DISCRIMINATOR,
} from "./offer-codec.js";
export { InMemoryOfferStore } from "./offer-store.js";
export type { OfferStore, StoredOffer } from "./offer-store.js";

// Checks & atomicity
export {
  assertPositiveU64,
  assertAssetKnown,
  assertOfferAbsent,
  requireOffer,
  assertOfferMatches,
  assertAuthorityProof,
  assertAccountBinding,
  assertVaultHolds,
  assertDepositPolicy,
  assertConsentFrom,
  assertConsentSigned,
  assertCancelAuthorized,
} from "./invariants.js";
export type { ExpectedTerms } from "./invariants.js";
export { AtomicExecutor } from "./atomic.js";

// Consent
export { signEscrowConsent } from "./consent.js";
export type {
  TransferAction,
  MakeAction,
  TakeAction,
  CancelAction,
  EscrowAction,
} from "./consent.js";
export { ConsentRegistry } from "./consent-registry.js";

// Journal
export {
  EventJournal,
  SubscriberError,
  computeEntryHash,
  verifyJournal,
  GENESIS_HASH,
} from "./journal.js";
export type { JournalEntry, JournalHandler, IntegrityResult, IntegrityError } from "./journal.js";

// Configuration & logging
export {
  ConfigSchema,
  loadConfig,
  resolveSeeds,
  depositPolicy,
  DEFAULT_PROGRAM_ID,
} from "./config.js";
export type { EscrowConfig, SeedConfig } from "./config.js";
export { createLogger, silentLogger } from "./logger.js";

// Errors
export { EscrowError } from "./errors.js";
export type { EscrowErrorCode } from "./errors.js";

// Types
export type {
  EscrowProgramOptions,
  MakeTerms,
  MakeOfferRequest,
  MakeOfferResult,
  TakeTerms,
  TakeOfferRequest,
  TakeOfferResult,
  CancelTerms,
  CancelOfferRequest,
  CancelOfferResult,
} from "./types.js";
