/**
 * @swapescrow/escrow — Offer record store.
 *
 * Holds encoded Offer records keyed by their derived address, each with
 * the storage deposit its creator paid.
 *
 * Rules:
 * - Create fails if the address is occupied
 * - Consume is read-and-delete; there is no update
 * - Records round-trip through the binary codec on every read
 */

import type { Address, Offer } from "@swapescrow/types";
import type { Checkpointable } from "@swapescrow/ledger";
import { decodeOffer, encodeOffer } from "./offer-codec.js";
import { EscrowError } from "./errors.js";

export interface StoredOffer {
  readonly offer: Offer;
  /** Native amount locked by the record, refunded when it is consumed */
  readonly deposit: bigint;
}

export interface OfferStore extends Checkpointable {
  create(address: Address, offer: Offer, deposit: bigint): void;
  consume(address: Address): StoredOffer;
  get(address: Address): Offer | undefined;
  has(address: Address): boolean;
  readonly size: number;
}

interface OfferSlot {
  readonly data: Uint8Array;
  readonly deposit: bigint;
}

export class InMemoryOfferStore implements OfferStore {
  private _slots = new Map<Address, OfferSlot>();

  create(address: Address, offer: Offer, deposit: bigint): void {
    if (this._slots.has(address)) {
      throw new EscrowError("DUPLICATE_OFFER", `An offer already exists at ${address}`);
    }
    this._slots.set(address, { data: encodeOffer(offer), deposit });
  }

  consume(address: Address): StoredOffer {
    const slot = this._slots.get(address);
    if (slot === undefined) {
      throw new EscrowError("OFFER_NOT_FOUND", `No offer at ${address}`);
    }
    const offer = decodeOffer(slot.data);
    this._slots.delete(address);
    return { offer, deposit: slot.deposit };
  }

  get(address: Address): Offer | undefined {
    const slot = this._slots.get(address);
    return slot === undefined ? undefined : decodeOffer(slot.data);
  }

  has(address: Address): boolean {
    return this._slots.has(address);
  }

  get size(): number {
    return this._slots.size;
  }

  /**
   * Raw record bytes at `address`, as persisted.
   */
  rawRecord(address: Address): Uint8Array | undefined {
    const slot = this._slots.get(address);
    return slot === undefined ? undefined : Uint8Array.from(slot.data);
  }

  checkpoint(): () => void {
    const slots = new Map(this._slots);
    return () => {
      this._slots = new Map(slots);
    };
  }
}
