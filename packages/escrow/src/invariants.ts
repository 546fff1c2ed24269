/**
 * @swapescrow/escrow — Authorization and invariant checks.
 *
 * Pure preconditions consulted before any state is touched. Each either
 * returns (possibly a narrowed value) or throws the error the operation
 * fails with.
 */

import type { Address, AssetRef, Offer } from "@swapescrow/types";
import { U64_MAX, isU64 } from "@swapescrow/types";
import { LedgerError, verifyConsent } from "@swapescrow/ledger";
import type { AssetLedger, DepositPolicy, TokenAccount, UserAuthorization } from "@swapescrow/ledger";
import type { DerivedAddressResolver } from "./addresses.js";
import type { CancelAction, EscrowAction } from "./consent.js";
import type { OfferStore } from "./offer-store.js";
import { EscrowError } from "./errors.js";

// =============================================================================
// Quantities & assets
// =============================================================================

export function assertPositiveU64(value: bigint, field: string): void {
  if (value <= 0n || !isU64(value)) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `${field} must be within (0, u64 max], got ${value.toString()}`,
    );
  }
}

/**
 * The asset's mint is registered and its declared precision matches.
 */
export function assertAssetKnown(ledger: AssetLedger, asset: AssetRef): void {
  const mint = ledger.getMint(asset.mint);
  if (mint === undefined) {
    throw new LedgerError("UNKNOWN_MINT", `Unknown mint: "${asset.mint}"`);
  }
  if (mint.decimals !== asset.decimals) {
    throw new LedgerError(
      "ASSET_MISMATCH",
      `Decimal mismatch for mint "${asset.mint}": declared ${asset.decimals}, recorded ${mint.decimals}`,
    );
  }
}

/**
 * The ledger charges deposits the way the configuration says it does.
 */
export function assertDepositPolicy(ledger: DepositPolicy, configured: DepositPolicy): void {
  if (ledger.lamportsPerByte !== configured.lamportsPerByte || ledger.overhead !== configured.overhead) {
    throw new EscrowError(
      "CONFIG_MISMATCH",
      `Ledger deposits are ${ledger.lamportsPerByte.toString()} lamports/byte over ${ledger.overhead} bytes, ` +
        `configured ${configured.lamportsPerByte.toString()} over ${configured.overhead}`,
    );
  }
}

// =============================================================================
// Offer records
// =============================================================================

export function assertOfferAbsent(store: OfferStore, address: Address): void {
  if (store.has(address)) {
    throw new EscrowError("DUPLICATE_OFFER", `An offer already exists at ${address}`);
  }
}

export function requireOffer(store: OfferStore, address: Address): Offer {
  const offer = store.get(address);
  if (offer === undefined) {
    throw new EscrowError("OFFER_NOT_FOUND", `No offer at ${address}`);
  }
  return offer;
}

export interface ExpectedTerms {
  readonly maker: Address;
  readonly assetA: Address;
  readonly assetB: Address;
  readonly amountBWanted: bigint;
}

/**
 * The terms the caller believes it is accepting are the stored ones.
 */
export function assertOfferMatches(offer: Offer, expected: ExpectedTerms): void {
  for (const field of ["maker", "assetA", "assetB", "amountBWanted"] as const) {
    if (offer[field] !== expected[field]) {
      throw new EscrowError(
        "OFFER_MISMATCH",
        `Offer ${field} is ${String(offer[field])}, caller supplied ${String(expected[field])}`,
      );
    }
  }
}

/**
 * The vault still holds at least what the taker signed for.
 */
export function assertVaultHolds(balance: bigint, minAmountA: bigint, vault: Address): void {
  if (minAmountA < 0n || minAmountA > U64_MAX) {
    throw new LedgerError("INVALID_AMOUNT", `minAmountA must be within [0, u64 max], got ${minAmountA.toString()}`);
  }
  if (balance < minAmountA) {
    throw new EscrowError(
      "OFFER_MISMATCH",
      `Vault ${vault} holds ${balance.toString()}, taker requires at least ${minAmountA.toString()}`,
    );
  }
}

/**
 * The record's (maker, id, bump) reproduces the address it lives at.
 */
export function assertAuthorityProof(
  resolver: DerivedAddressResolver,
  offer: Offer,
  address: Address,
): void {
  if (!resolver.verifyOfferAddress(offer, address)) {
    throw new EscrowError(
      "INVALID_AUTHORITY_PROOF",
      `Stored bump ${offer.bump} does not reproduce offer address ${address}`,
    );
  }
}

/**
 * A destination that already exists must belong to the intended party
 * and hold the intended asset. A missing one is opened later.
 */
export function assertAccountBinding(
  account: TokenAccount | undefined,
  owner: Address,
  mint: Address,
  role: string,
): void {
  if (account === undefined) {
    return;
  }
  if (account.owner !== owner || account.mint !== mint) {
    throw new EscrowError(
      "OFFER_MISMATCH",
      `${role} ${account.address} is not a ${mint} account owned by ${owner}`,
    );
  }
}

// =============================================================================
// Consent
// =============================================================================

/**
 * A user consent was produced by `party`.
 */
export function assertConsentFrom(consent: UserAuthorization, party: Address): void {
  if (consent.identity !== party) {
    throw new LedgerError(
      "UNAUTHORIZED_TRANSFER",
      `Consent is from ${consent.identity}, expected ${party}`,
    );
  }
}

/**
 * `party` signed exactly `action`. Any other term, offer or nonce fails
 * with INVALID_SIGNATURE.
 */
export function assertConsentSigned(
  consent: UserAuthorization,
  party: Address,
  action: EscrowAction,
): void {
  assertConsentFrom(consent, party);
  consent.assertConsent(action);
}

/**
 * Only the stored maker, with a proof over this exact cancellation.
 */
export function assertCancelAuthorized(
  offer: Offer,
  maker: Address,
  consent: UserAuthorization,
  action: CancelAction,
): void {
  const authorized =
    maker === offer.maker &&
    consent.identity === maker &&
    verifyConsent(consent.identity, consent.proof, action);
  if (!authorized) {
    throw new EscrowError(
      "UNAUTHORIZED_CANCEL",
      `${consent.identity} may not cancel offer ${action.offer}`,
    );
  }
}
