/**
 * @swapescrow/escrow — Offer record codec.
 *
 * Fixed 122-byte little-endian layout:
 *
 *   offset  size  field
 *   0       8     discriminator = sha256("account:Offer")[0..8]
 *   8       1     version (1)
 *   9       8     id (u64)
 *   17      32    maker
 *   49      32    assetA (mint)
 *   81      32    assetB (mint)
 *   113     8     amountBWanted (u64)
 *   121     1     bump
 *
 * Decoding checks length, discriminator and version before reading any
 * field. Anything else is MALFORMED_RECORD.
 */

import { createHash } from "node:crypto";
import { PublicKey } from "@solana/web3.js";
import { isOffer } from "@swapescrow/types";
import type { Offer } from "@swapescrow/types";
import { addressBytes } from "@swapescrow/ledger";
import { EscrowError } from "./errors.js";

export const OFFER_RECORD_SIZE = 122;
export const OFFER_RECORD_VERSION = 1;

export const OFFER_DISCRIMINATOR: Uint8Array = Uint8Array.from(
  createHash("sha256").update("account:Offer").digest().subarray(0, 8),
);

const VERSION_OFFSET = 8;
const ID_OFFSET = 9;
const MAKER_OFFSET = 17;
const ASSET_A_OFFSET = 49;
const ASSET_B_OFFSET = 81;
const AMOUNT_B_OFFSET = 113;
const BUMP_OFFSET = 121;

export function encodeOffer(offer: Offer): Uint8Array {
  if (!isOffer(offer)) {
    throw new EscrowError("MALFORMED_RECORD", "Offer fields are out of range and cannot be encoded");
  }

  const buf = Buffer.alloc(OFFER_RECORD_SIZE);
  buf.set(OFFER_DISCRIMINATOR, 0);
  buf.writeUInt8(OFFER_RECORD_VERSION, VERSION_OFFSET);
  buf.writeBigUInt64LE(offer.id, ID_OFFSET);
  buf.set(addressBytes(offer.maker), MAKER_OFFSET);
  buf.set(addressBytes(offer.assetA), ASSET_A_OFFSET);
  buf.set(addressBytes(offer.assetB), ASSET_B_OFFSET);
  buf.writeBigUInt64LE(offer.amountBWanted, AMOUNT_B_OFFSET);
  buf.writeUInt8(offer.bump, BUMP_OFFSET);
  return new Uint8Array(buf);
}

export function decodeOffer(data: Uint8Array): Offer {
  if (data.length !== OFFER_RECORD_SIZE) {
    throw new EscrowError(
      "MALFORMED_RECORD",
      `Offer record must be ${OFFER_RECORD_SIZE} bytes, got ${data.length}`,
    );
  }

  const buf = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  if (!buf.subarray(0, VERSION_OFFSET).equals(OFFER_DISCRIMINATOR)) {
    throw new EscrowError("MALFORMED_RECORD", "Record discriminator is not an Offer");
  }
  const version = buf.readUInt8(VERSION_OFFSET);
  if (version !== OFFER_RECORD_VERSION) {
    throw new EscrowError("MALFORMED_RECORD", `Unsupported Offer record version ${version}`);
  }

  return {
    id: buf.readBigUInt64LE(ID_OFFSET),
    maker: readAddress(buf, MAKER_OFFSET),
    assetA: readAddress(buf, ASSET_A_OFFSET),
    assetB: readAddress(buf, ASSET_B_OFFSET),
    amountBWanted: buf.readBigUInt64LE(AMOUNT_B_OFFSET),
    bump: buf.readUInt8(BUMP_OFFSET),
  };
}

function readAddress(buf: Buffer, offset: number): string {
  return new PublicKey(buf.subarray(offset, offset + 32)).toBase58();
}
