/**
 * Asset Types
 *
 * Primitives shared by the ledger and the escrow engine.
 *
 * Rules:
 * - Addresses are base58-encoded 32-byte public keys
 * - Quantities are bigint base units, bounded to u64
 * - An asset is identified by its mint; decimals travel with it so
 *   every transfer can be checked against the mint's recorded precision
 */

/**
 * Base58-encoded 32-byte account address.
 * Either an ed25519 public key or a program-derived (off-curve) address.
 */
export type Address = string;

/** Largest quantity any account, offer or transfer may carry. */
export const U64_MAX = 0xffff_ffff_ffff_ffffn;

/**
 * Reference to a fungible asset.
 */
export interface AssetRef {
  /** Mint address that identifies the asset */
  readonly mint: Address;

  /**
   * Declared precision of the asset.
   * A transfer whose declared decimals differ from the mint's is rejected.
   */
  readonly decimals: number;
}
