/**
 * @swapescrow/escrow — Derived-Address Resolver.
 *
 * Offer and vault addresses are program-derived: SHA-256 of the seeds, a
 * one-byte bump, the program id and a fixed marker, accepted only when the
 * result is off the ed25519 curve. No private key exists for such an
 * address, so only code that can reproduce the seeds acts as its authority.
 *
 *   offer = derive(["offer", maker, id u64 LE], bump)
 *   vault = derive(["vault", offer, mintA], bump)
 *
 * Rules:
 * - Bumps are searched from 255 down to 0; the first off-curve one wins
 * - An exhausted search is a hard failure, never retried
 * - Same seeds and program id, same address, on every machine
 */

import { PublicKey } from "@solana/web3.js";
import { isU64 } from "@swapescrow/types";
import type { Address, Offer } from "@swapescrow/types";
import { addressBytes } from "@swapescrow/ledger";
import type { SeedConfig } from "./config.js";
import { EscrowError } from "./errors.js";

export const MAX_BUMP = 255;

/** Seed material, excluding the bump. */
export type SeedSet = readonly Uint8Array[];

export interface DerivedAddress {
  readonly address: Address;
  readonly bump: number;
}

/**
 * The one candidate address for `seeds` and `bump`, or undefined when that
 * candidate lies on the curve (or the bump is not a byte).
 */
export function createDerivedAddress(
  seeds: SeedSet,
  bump: number,
  programId: PublicKey,
): Address | undefined {
  if (!Number.isInteger(bump) || bump < 0 || bump > MAX_BUMP) {
    return undefined;
  }
  try {
    return PublicKey.createProgramAddressSync(
      [...seeds, Uint8Array.of(bump)],
      programId,
    ).toBase58();
  } catch (err) {
    // Oversized seeds are a caller bug, not an on-curve candidate.
    if (err instanceof TypeError) {
      throw err;
    }
    return undefined;
  }
}

/**
 * Search bumps 255 → 0 for the first off-curve candidate.
 *
 * @param create - candidate function, replaceable for tests
 */
export function findDerivedAddress(
  seeds: SeedSet,
  programId: PublicKey,
  create: typeof createDerivedAddress = createDerivedAddress,
): DerivedAddress {
  for (let bump = MAX_BUMP; bump >= 0; bump--) {
    const address = create(seeds, bump, programId);
    if (address !== undefined) {
      return { address, bump };
    }
  }
  throw new EscrowError(
    "ADDRESS_DERIVATION_EXHAUSTED",
    `No off-curve address exists for these seeds under program ${programId.toBase58()}`,
  );
}

/**
 * Encode an offer id as the u64 little-endian seed.
 */
export function offerIdSeed(id: bigint): Uint8Array {
  if (!isU64(id)) {
    throw new EscrowError("INVALID_OFFER_ID", `Offer id ${String(id)} is outside the u64 range`);
  }
  const bytes = Buffer.alloc(8);
  bytes.writeBigUInt64LE(id);
  return bytes;
}

// =============================================================================
// Resolver
// =============================================================================

export class DerivedAddressResolver {
  private readonly _offerPrefix: Uint8Array;
  private readonly _vaultPrefix: Uint8Array;

  constructor(private readonly _seeds: SeedConfig) {
    this._offerPrefix = Buffer.from(_seeds.offerSeed, "utf8");
    this._vaultPrefix = Buffer.from(_seeds.vaultSeed, "utf8");
  }

  get programId(): PublicKey {
    return this._seeds.programId;
  }

  offerSeeds(maker: Address, id: bigint): SeedSet {
    return [this._offerPrefix, addressBytes(maker), offerIdSeed(id)];
  }

  vaultSeeds(offer: Address, assetA: Address): SeedSet {
    return [this._vaultPrefix, addressBytes(offer), addressBytes(assetA)];
  }

  deriveOfferAddress(maker: Address, id: bigint): DerivedAddress {
    return findDerivedAddress(this.offerSeeds(maker, id), this.programId);
  }

  deriveVaultAddress(offer: Address, assetA: Address): DerivedAddress {
    return findDerivedAddress(this.vaultSeeds(offer, assetA), this.programId);
  }

  /**
   * Whether the record's own (maker, id, bump) reproduces `address`.
   */
  verifyOfferAddress(offer: Offer, address: Address): boolean {
    return createDerivedAddress(this.offerSeeds(offer.maker, offer.id), offer.bump, this.programId) === address;
  }
}
