/**
 * @swapescrow/escrow — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * The result is frozen; seed prefixes and the program id are resolved
 * from it exactly once per program instance.
 */

import { PublicKey } from "@solana/web3.js";
import { z } from "zod";
import { isAddress } from "@swapescrow/types";
import type { DepositPolicy } from "@swapescrow/ledger";

// =============================================================================
// Schema
// =============================================================================

/** Placeholder program id used until a deployment id is configured. */
export const DEFAULT_PROGRAM_ID = "Fg6PaFpoGXkYsidMpWTK6W2BeZ7FEfcYkg476zPFsLnS";

/** A single derivation seed may not exceed 32 bytes. */
const MAX_SEED_BYTES = 32;

const seedPrefix = (fallback: string) =>
  z
    .string()
    .min(1)
    .refine((s) => Buffer.byteLength(s, "utf8") <= MAX_SEED_BYTES, {
      message: `Seed prefix must be at most ${MAX_SEED_BYTES} bytes`,
    })
    .default(fallback);

export const ConfigSchema = z
  .object({
    ESCROW_PROGRAM_ID: z
      .string()
      .refine(isAddress, { message: "ESCROW_PROGRAM_ID must be a base58 address" })
      .default(DEFAULT_PROGRAM_ID),
    OFFER_SEED: seedPrefix("offer"),
    VAULT_SEED: seedPrefix("vault"),

    // Storage deposits
    DEPOSIT_LAMPORTS_PER_BYTE: z.coerce.number().int().min(0).default(6960),
    ACCOUNT_STORAGE_OVERHEAD: z.coerce.number().int().min(0).default(128),

    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development"),
  })
  .refine((c) => c.OFFER_SEED !== c.VAULT_SEED, {
    message: "OFFER_SEED and VAULT_SEED must differ",
    path: ["VAULT_SEED"],
  });

export type EscrowConfig = Readonly<z.infer<typeof ConfigSchema>>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if an env var is present but invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): EscrowConfig {
  return Object.freeze(ConfigSchema.parse(env));
}

// =============================================================================
// Derived Settings
// =============================================================================

/**
 * Seed material shared by every derivation of one program instance.
 */
export interface SeedConfig {
  readonly programId: PublicKey;
  readonly offerSeed: string;
  readonly vaultSeed: string;
}

export function resolveSeeds(config: EscrowConfig): SeedConfig {
  return Object.freeze({
    programId: new PublicKey(config.ESCROW_PROGRAM_ID),
    offerSeed: config.OFFER_SEED,
    vaultSeed: config.VAULT_SEED,
  });
}

/**
 * Deposit policy for a ledger run under this configuration.
 */
export function depositPolicy(config: EscrowConfig): DepositPolicy {
  return Object.freeze({
    lamportsPerByte: BigInt(config.DEPOSIT_LAMPORTS_PER_BYTE),
    overhead: config.ACCOUNT_STORAGE_OVERHEAD,
  });
}
