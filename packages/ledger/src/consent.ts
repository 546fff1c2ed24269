/**
 * @swapescrow/ledger — User consent proofs.
 *
 * A human owner authorizes an action by signing its canonical form:
 * RFC 8785 (JCS) JSON of every field of the action, bigint quantities
 * written as decimal strings. The proof is the hex ed25519 signature.
 *
 * The same action always yields the same bytes, so a proof binds the
 * exact accounts, mint and quantity it was produced for.
 */

import { createPrivateKey, createPublicKey, sign, verify } from "node:crypto";
import type { Keypair } from "@solana/web3.js";
import { canonicalize } from "json-canonicalize";
import type { Address } from "@swapescrow/types";
import { addressBytes } from "./address.js";
import type { Authorizer, LedgerAction } from "./types.js";
import { LedgerError } from "./types.js";

// DER headers that wrap a raw 32-byte ed25519 key for node:crypto.
const ED25519_SPKI_PREFIX = Buffer.from("302a300506032b6570032100", "hex");
const ED25519_PKCS8_PREFIX = Buffer.from("302e020100300506032b657004220420", "hex");

/**
 * Anything a user can consent to. Ledger actions are one kind;
 * other packages define their own (e.g. cancelling an offer).
 */
export type ConsentPayload = { readonly kind: string } & {
  readonly [field: string]: string | number | bigint;
};

/**
 * Canonical bytes a consent proof signs.
 */
export function consentMessage(payload: ConsentPayload): Buffer {
  const plain: Record<string, string | number> = {};
  for (const [field, value] of Object.entries(payload)) {
    plain[field] = typeof value === "bigint" ? value.toString() : value;
  }
  return Buffer.from(canonicalize(plain), "utf8");
}

/**
 * Sign consent to `payload` with the signer's keypair.
 */
export function signConsent(signer: Keypair, payload: ConsentPayload): UserAuthorization {
  const privateKey = createPrivateKey({
    key: Buffer.concat([ED25519_PKCS8_PREFIX, Buffer.from(signer.secretKey.subarray(0, 32))]),
    format: "der",
    type: "pkcs8",
  });
  const signature = sign(null, consentMessage(payload), privateKey);
  return new UserAuthorization(signer.publicKey.toBase58(), signature.toString("hex"));
}

/**
 * Check a hex signature by `identity` over `payload`.
 */
export function verifyConsent(identity: Address, proof: string, payload: ConsentPayload): boolean {
  if (!/^[0-9a-f]{128}$/i.test(proof)) {
    return false;
  }

  const raw = addressBytes(identity);
  try {
    const publicKey = createPublicKey({
      key: Buffer.concat([ED25519_SPKI_PREFIX, Buffer.from(raw)]),
      format: "der",
      type: "spki",
    });
    return verify(null, consentMessage(payload), publicKey, Buffer.from(proof, "hex"));
  } catch {
    // Not a point on the curve: no signature can exist for it.
    return false;
  }
}

/**
 * Authorization by a human identity and its consent proof.
 */
export class UserAuthorization implements Authorizer {
  readonly kind = "user" as const;

  constructor(
    public readonly identity: Address,
    public readonly proof: string,
  ) {}

  authorize(action: LedgerAction): Address {
    this.assertConsent(action);
    return this.identity;
  }

  /**
   * Throws INVALID_SIGNATURE unless the proof signs exactly `payload`.
   */
  assertConsent(payload: ConsentPayload): void {
    if (!verifyConsent(this.identity, this.proof, payload)) {
      throw new LedgerError(
        "INVALID_SIGNATURE",
        `Consent proof from ${this.identity} does not sign this ${payload.kind} action`,
      );
    }
  }
}
