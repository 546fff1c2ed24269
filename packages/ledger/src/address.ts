/**
 * @swapescrow/ledger — Address helpers.
 *
 * Token accounts default to the associated-token-account address of
 * (owner, mint), derived exactly as the SPL associated token program does.
 */

import { PublicKey } from "@solana/web3.js";
import type { Address } from "@swapescrow/types";
import { LedgerError } from "./types.js";

/** SPL token program id; part of the associated-account seed set. */
export const TOKEN_PROGRAM_ID = new PublicKey("TokenkegQfeZyiNwAJbNbGKPFXCWuBvf9Ss623VQ5DA");

/** SPL associated token account program id. */
export const ASSOCIATED_TOKEN_PROGRAM_ID = new PublicKey("ATokenGPvbdGVxr1b2hvZbsiqW5xWH25efTNsLJA8knL");

/**
 * Parse a base58 address into a PublicKey.
 */
export function toPublicKey(address: Address): PublicKey {
  try {
    return new PublicKey(address);
  } catch (err) {
    throw new LedgerError(
      "INVALID_ADDRESS",
      `Invalid address "${address}": ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

/**
 * Raw 32 bytes of a base58 address.
 */
export function addressBytes(address: Address): Uint8Array {
  return toPublicKey(address).toBytes();
}

/**
 * Associated token account address for (owner, mint).
 */
export function associatedAddress(owner: Address, mint: Address): Address {
  const [address] = PublicKey.findProgramAddressSync(
    [toPublicKey(owner).toBuffer(), TOKEN_PROGRAM_ID.toBuffer(), toPublicKey(mint).toBuffer()],
    ASSOCIATED_TOKEN_PROGRAM_ID,
  );
  return address.toBase58();
}
