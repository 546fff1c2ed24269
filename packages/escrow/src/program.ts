/**
 * EscrowProgram — two-party swap coordinator.
 *
 * Composes:
 * - DerivedAddressResolver (offer and vault addresses, authority proof)
 * - OfferStore (persisted offer records)
 * - AssetLedger (custody, transfers, deposits)
 * - ConsentRegistry (spent consent nonces)
 * - AtomicExecutor (all-or-nothing units over ledger, store and registry)
 * - EventJournal (hash-chained record of committed operations)
 *
 * Lifecycle: make → (take | cancel). An offer and its vault are created
 * together and destroyed together; nothing in between mutates them.
 *
 * Rules:
 * - Every precondition is checked before the first mutation
 * - The mutations of one operation commit together or not at all
 * - Only the offer's derived address moves or closes its vault
 * - A signed action authorizes one operation on its exact terms, once
 * - Events are appended after commit, never for a rejected operation;
 *   a failing subscriber does not turn a commit into a rejection
 */

import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import type { Address, AssetRef, EscrowEvent, Offer } from "@swapescrow/types";
import { LedgerError, formatUnits } from "@swapescrow/ledger";
import type { AssetLedger } from "@swapescrow/ledger";
import { DerivedAddressResolver } from "./addresses.js";
import { AtomicExecutor } from "./atomic.js";
import { ConsentAuthorization, DerivedAuthorization } from "./authority.js";
import type { EscrowAuthorizer } from "./authority.js";
import { depositPolicy, loadConfig, resolveSeeds } from "./config.js";
import type { EscrowConfig } from "./config.js";
import type { CancelAction, MakeAction, TakeAction } from "./consent.js";
import { ConsentRegistry } from "./consent-registry.js";
import { EscrowError } from "./errors.js";
import {
  assertAccountBinding,
  assertAssetKnown,
  assertAuthorityProof,
  assertCancelAuthorized,
  assertConsentSigned,
  assertDepositPolicy,
  assertOfferAbsent,
  assertOfferMatches,
  assertPositiveU64,
  assertVaultHolds,
  requireOffer,
} from "./invariants.js";
import { EventJournal, SubscriberError } from "./journal.js";
import { silentLogger } from "./logger.js";
import { OFFER_RECORD_SIZE } from "./offer-codec.js";
import { InMemoryOfferStore } from "./offer-store.js";
import type { OfferStore } from "./offer-store.js";
import type {
  CancelOfferRequest,
  CancelOfferResult,
  CancelTerms,
  EscrowProgramOptions,
  MakeOfferRequest,
  MakeOfferResult,
  MakeTerms,
  TakeOfferRequest,
  TakeOfferResult,
  TakeTerms,
} from "./types.js";

interface Release {
  readonly amount: bigint;
  readonly vaultDeposit: bigint;
  readonly offerDeposit: bigint;
}

/** A committed operation and the event it is journaled as. */
interface Committed<T> {
  readonly result: T;
  readonly event: EscrowEvent;
}

// =============================================================================
// EscrowProgram
// =============================================================================

export class EscrowProgram {
  readonly config: EscrowConfig;
  readonly journal: EventJournal;
  private readonly _ledger: AssetLedger;
  private readonly _store: OfferStore;
  private readonly _consents: ConsentRegistry;
  private readonly _resolver: DerivedAddressResolver;
  private readonly _atomic: AtomicExecutor;
  private readonly _logger: Logger;
  private readonly _clock: () => Date;

  /**
   * Throws CONFIG_MISMATCH when the ledger charges deposits under a
   * different policy than the configuration names.
   */
  constructor(options: EscrowProgramOptions) {
    this.config = options.config ?? loadConfig({});
    assertDepositPolicy(options.ledger.depositPolicy, depositPolicy(this.config));

    this.journal = options.journal ?? new EventJournal();
    this._ledger = options.ledger;
    this._store = options.store ?? new InMemoryOfferStore();
    this._consents = options.consents ?? new ConsentRegistry();
    this._resolver = new DerivedAddressResolver(resolveSeeds(this.config));
    this._atomic = new AtomicExecutor([this._ledger, this._store, this._consents]);
    this._logger = (options.logger ?? silentLogger()).child({
      component: "escrow",
      programId: this.config.ESCROW_PROGRAM_ID,
    });
    this._clock = options.clock ?? (() => new Date());
  }

  // ───────────────────────────────────────────────────────────────────────
  // Make
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Escrow `amountAOffered` of asset A in a new vault and publish the
   * amount of asset B wanted for it.
   */
  makeOffer(request: MakeOfferRequest): MakeOfferResult {
    const { id, maker, assetA, assetB, amountAOffered, amountBWanted, nonce, makerConsent } = request;

    const committed = this._observe("make", { maker, id: id.toString() }, (): Committed<MakeOfferResult> => {
      assertPositiveU64(amountAOffered, "amountAOffered");
      assertPositiveU64(amountBWanted, "amountBWanted");
      assertAssetKnown(this._ledger, assetA);
      assertAssetKnown(this._ledger, assetB);

      const offer = this._resolver.deriveOfferAddress(maker, id);
      assertOfferAbsent(this._store, offer.address);
      const action = this.makeConsentAction(request);
      assertConsentSigned(makerConsent, maker, action);
      this._consents.assertUnspent(maker, nonce);
      const vault = this._resolver.deriveVaultAddress(offer.address, assetA.mint);

      const record: Offer = {
        id,
        maker,
        assetA: assetA.mint,
        assetB: assetB.mint,
        amountBWanted,
        bump: offer.bump,
      };

      const deposits = this._atomic.run(() => {
        this._consents.spend(maker, nonce);
        const vaultAccount = this._ledger.openAccount({
          address: vault.address,
          owner: offer.address,
          mint: assetA.mint,
          payer: maker,
        });
        this._ledger.transfer({
          from: action.source,
          to: vault.address,
          amount: amountAOffered,
          asset: assetA,
          authorizer: new ConsentAuthorization(maker, {
            kind: "transfer",
            from: action.source,
            to: vault.address,
            mint: assetA.mint,
            amount: amountAOffered,
          }),
        });
        const offerDeposit = this._ledger.depositFor(OFFER_RECORD_SIZE);
        this._ledger.chargeDeposit(maker, offerDeposit);
        this._store.create(offer.address, record, offerDeposit);
        return { vaultDeposit: vaultAccount.deposit, offerDeposit };
      });

      this._logger.info(
        {
          offer: offer.address,
          vault: vault.address,
          amountAOffered: formatUnits(amountAOffered, assetA.decimals),
          amountBWanted: formatUnits(amountBWanted, assetB.decimals),
        },
        "offer made",
      );

      return {
        result: { offer: offer.address, vault: vault.address, record, ...deposits },
        event: {
          type: "offer.made",
          metadata: this._metadata(maker, offer.address),
          payload: {
            offer: offer.address,
            vault: vault.address,
            id: id.toString(),
            maker,
            assetA: assetA.mint,
            assetB: assetB.mint,
            amountAOffered: amountAOffered.toString(),
            amountBWanted: amountBWanted.toString(),
          },
        },
      };
    });

    this._emit(committed.event);
    return committed.result;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Take
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Pay the wanted amount of asset B to the maker and receive the whole
   * vault; vault and record are closed in the same unit.
   */
  takeOffer(request: TakeOfferRequest): TakeOfferResult {
    const { offer: address, taker, assetA, assetB, nonce, takerConsent } = request;

    const committed = this._observe("take", { offer: address, taker }, (): Committed<TakeOfferResult> => {
      const offer = requireOffer(this._store, address);
      assertOfferMatches(offer, {
        maker: request.maker,
        assetA: assetA.mint,
        assetB: assetB.mint,
        amountBWanted: request.amountBWanted,
      });
      assertAssetKnown(this._ledger, assetA);
      assertAssetKnown(this._ledger, assetB);

      const action = this.takeConsentAction(request);
      assertAccountBinding(
        this._ledger.getAccount(action.makerDestination),
        offer.maker,
        offer.assetB,
        "Maker destination",
      );
      assertAccountBinding(
        this._ledger.getAccount(action.takerDestination),
        taker,
        offer.assetA,
        "Taker destination",
      );
      assertAuthorityProof(this._resolver, offer, address);
      const vault = this.vaultAddress(address, offer.assetA);
      assertVaultHolds(this._ledger.balanceOf(vault), request.minAmountA, vault);
      assertConsentSigned(takerConsent, taker, action);
      this._consents.assertUnspent(taker, nonce);

      const released = this._atomic.run(() => {
        this._consents.spend(taker, nonce);
        this._ensureAccount(action.takerDestination, taker, offer.assetA, taker);
        this._ensureAccount(action.makerDestination, offer.maker, offer.assetB, taker);
        this._ledger.transfer({
          from: action.source,
          to: action.makerDestination,
          amount: offer.amountBWanted,
          asset: assetB,
          authorizer: new ConsentAuthorization(taker, {
            kind: "transfer",
            from: action.source,
            to: action.makerDestination,
            mint: offer.assetB,
            amount: offer.amountBWanted,
          }),
        });
        return this._release(offer, address, action.takerDestination, assetA, taker);
      });

      this._logger.info(
        {
          offer: address,
          taker,
          amountAReceived: formatUnits(released.amount, assetA.decimals),
          amountBPaid: formatUnits(offer.amountBWanted, assetB.decimals),
        },
        "offer taken",
      );

      return {
        result: {
          offer: address,
          amountAReceived: released.amount,
          amountBPaid: offer.amountBWanted,
          vaultDepositRefunded: released.vaultDeposit,
          offerDepositRefunded: released.offerDeposit,
        },
        event: {
          type: "offer.taken",
          metadata: this._metadata(taker, address),
          payload: {
            offer: address,
            maker: offer.maker,
            taker,
            amountAReceived: released.amount.toString(),
            amountBPaid: offer.amountBWanted.toString(),
            vaultDepositRefunded: released.vaultDeposit.toString(),
            offerDepositRefunded: released.offerDeposit.toString(),
          },
        },
      };
    });

    this._emit(committed.event);
    return committed.result;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Cancel
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Return the whole vault to the maker and close vault and record, both
   * deposits going back to the maker.
   */
  cancelOffer(request: CancelOfferRequest): CancelOfferResult {
    const { offer: address, maker, nonce, makerConsent } = request;

    const committed = this._observe("cancel", { offer: address, maker }, (): Committed<CancelOfferResult> => {
      const offer = requireOffer(this._store, address);
      assertCancelAuthorized(offer, maker, makerConsent, this.cancelConsentAction(request));
      this._consents.assertUnspent(maker, nonce);
      assertAuthorityProof(this._resolver, offer, address);

      const destination =
        request.makerDestination ?? this._ledger.associatedAddress(offer.maker, offer.assetA);
      assertAccountBinding(
        this._ledger.getAccount(destination),
        offer.maker,
        offer.assetA,
        "Maker destination",
      );
      const assetA = this._assetOf(offer.assetA);

      const released = this._atomic.run(() => {
        this._consents.spend(maker, nonce);
        this._ensureAccount(destination, offer.maker, offer.assetA, offer.maker);
        return this._release(offer, address, destination, assetA, offer.maker);
      });

      this._logger.info(
        { offer: address, amountAReturned: formatUnits(released.amount, assetA.decimals) },
        "offer cancelled",
      );

      return {
        result: {
          offer: address,
          amountAReturned: released.amount,
          depositsRefunded: released.vaultDeposit + released.offerDeposit,
        },
        event: {
          type: "offer.cancelled",
          metadata: this._metadata(maker, address),
          payload: {
            offer: address,
            maker,
            amountAReturned: released.amount.toString(),
          },
        },
      };
    });

    this._emit(committed.event);
    return committed.result;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getOffer(address: Address): Offer | undefined {
    return this._store.get(address);
  }

  offerAddress(maker: Address, id: bigint): Address {
    return this._resolver.deriveOfferAddress(maker, id).address;
  }

  vaultAddress(offer: Address, assetA: Address): Address {
    return this._resolver.deriveVaultAddress(offer, assetA).address;
  }

  /**
   * Live escrowed amount of asset A. This is the only record of it.
   */
  vaultBalance(offer: Address): bigint {
    const record = requireOffer(this._store, offer);
    return this._ledger.balanceOf(this.vaultAddress(offer, record.assetA));
  }

  consentSpent(identity: Address, nonce: bigint): boolean {
    return this._consents.isSpent(identity, nonce);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Signed actions
  // ───────────────────────────────────────────────────────────────────────

  /**
   * The action a maker signs to make an offer on `terms`.
   */
  makeConsentAction(terms: MakeTerms): MakeAction {
    return {
      kind: "make",
      program: this.config.ESCROW_PROGRAM_ID,
      offer: this.offerAddress(terms.maker, terms.id),
      id: terms.id,
      maker: terms.maker,
      assetA: terms.assetA.mint,
      decimalsA: terms.assetA.decimals,
      assetB: terms.assetB.mint,
      decimalsB: terms.assetB.decimals,
      amountAOffered: terms.amountAOffered,
      amountBWanted: terms.amountBWanted,
      source: terms.makerSource ?? this._ledger.associatedAddress(terms.maker, terms.assetA.mint),
      nonce: terms.nonce,
    };
  }

  /**
   * The action a taker signs to take the offer at `terms.offer`.
   */
  takeConsentAction(terms: TakeTerms): TakeAction {
    return {
      kind: "take",
      program: this.config.ESCROW_PROGRAM_ID,
      offer: terms.offer,
      taker: terms.taker,
      maker: terms.maker,
      assetA: terms.assetA.mint,
      decimalsA: terms.assetA.decimals,
      assetB: terms.assetB.mint,
      decimalsB: terms.assetB.decimals,
      minAmountA: terms.minAmountA,
      amountBWanted: terms.amountBWanted,
      source: terms.takerSource ?? this._ledger.associatedAddress(terms.taker, terms.assetB.mint),
      takerDestination:
        terms.takerDestination ?? this._ledger.associatedAddress(terms.taker, terms.assetA.mint),
      makerDestination:
        terms.makerDestination ?? this._ledger.associatedAddress(terms.maker, terms.assetB.mint),
      nonce: terms.nonce,
    };
  }

  cancelConsentAction(terms: CancelTerms): CancelAction {
    return {
      kind: "cancel",
      program: this.config.ESCROW_PROGRAM_ID,
      offer: terms.offer,
      maker: terms.maker,
      nonce: terms.nonce,
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Drain the vault to `destination` under the offer's derived authority,
   * close it, and consume the record. Runs inside an atomic unit.
   */
  private _release(
    offer: Offer,
    address: Address,
    destination: Address,
    assetA: AssetRef,
    vaultRefundTo: Address,
  ): Release {
    const vault = this._resolver.deriveVaultAddress(address, offer.assetA).address;
    const authority: EscrowAuthorizer = new DerivedAuthorization(
      this._resolver.offerSeeds(offer.maker, offer.id),
      offer.bump,
      this._resolver.programId,
    );

    const amount = this._ledger.balanceOf(vault);
    if (amount > 0n) {
      this._ledger.transfer({ from: vault, to: destination, amount, asset: assetA, authorizer: authority });
    }
    const vaultDeposit = this._ledger.closeAndRefund({
      account: vault,
      refundTo: vaultRefundTo,
      authorizer: authority,
    });
    const consumed = this._store.consume(address);
    this._ledger.refundDeposit(offer.maker, consumed.deposit);

    return { amount, vaultDeposit, offerDeposit: consumed.deposit };
  }

  private _ensureAccount(address: Address, owner: Address, mint: Address, payer: Address): void {
    if (!this._ledger.hasAccount(address)) {
      this._ledger.openAccount({ address, owner, mint, payer });
    }
  }

  private _assetOf(mint: Address): AssetRef {
    const record = this._ledger.getMint(mint);
    if (record === undefined) {
      throw new LedgerError("UNKNOWN_MINT", `Unknown mint: "${mint}"`);
    }
    return { mint, decimals: record.decimals };
  }

  private _metadata(actor: Address, offer: Address): EscrowEvent["metadata"] {
    return {
      eventId: randomUUID(),
      timestamp: this._clock().toISOString(),
      actor,
      correlationId: offer,
    };
  }

  /**
   * Journal a committed operation. Subscriber failures are logged; the
   * operation has already committed and still succeeds.
   */
  private _emit(event: EscrowEvent): void {
    try {
      const entry = this.journal.append(event);
      this._logger.debug({ position: entry.position, hash: entry.hash, type: event.type }, "event journaled");
    } catch (err) {
      if (!(err instanceof SubscriberError)) {
        throw err;
      }
      this._logger.error(
        { position: err.entry.position, type: event.type, failures: err.failures.length, err: err.failures[0] },
        "journal subscriber failed",
      );
    }
  }

  /**
   * Log a rejected operation with its error code, then rethrow it.
   */
  private _observe<T>(operation: string, context: Record<string, string>, body: () => T): T {
    try {
      return body();
    } catch (err) {
      this._logger.warn({ operation, ...context, code: errorCode(err), err }, `${operation} rejected`);
      throw err;
    }
  }
}

function errorCode(err: unknown): string {
  if (err instanceof EscrowError || err instanceof LedgerError) {
    return err.code;
  }
  return "UNEXPECTED";
}
