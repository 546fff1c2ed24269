/**
 * Shared world for escrow tests: two parties, two mints, funded accounts.
 */

import { Keypair } from "@solana/web3.js";
import type { AssetRef } from "@swapescrow/types";
import { TokenLedger } from "@swapescrow/ledger";
import { EscrowProgram } from "../src/program.js";
import { loadConfig } from "../src/config.js";
import { signEscrowConsent } from "../src/consent.js";
import type { OfferStore } from "../src/offer-store.js";
import type {
  CancelOfferResult,
  MakeOfferRequest,
  MakeOfferResult,
  TakeOfferRequest,
  TakeOfferResult,
} from "../src/types.js";

// =============================================================================
// Parties & assets
// =============================================================================

export const maker = Keypair.fromSeed(new Uint8Array(32).fill(1));
export const taker = Keypair.fromSeed(new Uint8Array(32).fill(2));
export const stranger = Keypair.fromSeed(new Uint8Array(32).fill(3));
export const MAKER = maker.publicKey.toBase58();
export const TAKER = taker.publicKey.toBase58();
export const STRANGER = stranger.publicKey.toBase58();

export const ASSET_A: AssetRef = {
  mint: Keypair.fromSeed(new Uint8Array(32).fill(10)).publicKey.toBase58(),
  decimals: 6,
};
export const ASSET_B: AssetRef = {
  mint: Keypair.fromSeed(new Uint8Array(32).fill(11)).publicKey.toBase58(),
  decimals: 9,
};

/** (165 + 128) * 6960 */
export const TOKEN_ACCOUNT_DEPOSIT = 2_039_280n;
/** (122 + 128) * 6960 */
export const OFFER_DEPOSIT = 1_740_000n;
export const AIRDROP = 100_000_000n;
export const STARTING_TOKENS = 5_000_000n;

// =============================================================================
// World
// =============================================================================

export interface World {
  readonly ledger: TokenLedger;
  readonly program: EscrowProgram;
  /** Maker's associated account for A */
  readonly makerA: string;
  /** Taker's associated account for B */
  readonly takerB: string;
}

export function createWorld(store?: OfferStore): World {
  const ledger = new TokenLedger();
  ledger.createMint(ASSET_A.mint, ASSET_A.decimals);
  ledger.createMint(ASSET_B.mint, ASSET_B.decimals);
  for (const party of [MAKER, TAKER, STRANGER]) {
    ledger.airdrop(party, AIRDROP);
  }

  const makerA = ledger.openAccount({ owner: MAKER, mint: ASSET_A.mint, payer: MAKER }).address;
  const takerB = ledger.openAccount({ owner: TAKER, mint: ASSET_B.mint, payer: TAKER }).address;
  ledger.mintTo(makerA, STARTING_TOKENS);
  ledger.mintTo(takerB, STARTING_TOKENS);

  const program = new EscrowProgram({
    ledger,
    store,
    config: loadConfig({ NODE_ENV: "test" }),
  });
  return { ledger, program, makerA, takerB };
}

let lastNonce = 0n;

/** A nonce no test has used yet. */
export function nextNonce(): bigint {
  lastNonce += 1n;
  return lastNonce;
}

/**
 * A make request signed by the maker over its own terms.
 */
export function makeRequest(
  world: World,
  id: bigint,
  amountAOffered: bigint,
  amountBWanted: bigint,
): MakeOfferRequest {
  const terms = {
    id,
    maker: MAKER,
    assetA: ASSET_A,
    assetB: ASSET_B,
    amountAOffered,
    amountBWanted,
    nonce: nextNonce(),
  };
  return { ...terms, makerConsent: signEscrowConsent(maker, world.program.makeConsentAction(terms)) };
}

export function makeOffer(
  world: World,
  id: bigint,
  amountAOffered: bigint,
  amountBWanted: bigint,
): MakeOfferResult {
  return world.program.makeOffer(makeRequest(world, id, amountAOffered, amountBWanted));
}

/**
 * A take request signed by the taker over the offer's current terms and
 * vault balance. A missing offer gets placeholder terms.
 */
export function takeRequest(world: World, offer: string): TakeOfferRequest {
  const record = world.program.getOffer(offer);
  const vault = world.program.vaultAddress(offer, ASSET_A.mint);
  const terms = {
    offer,
    taker: TAKER,
    maker: MAKER,
    assetA: ASSET_A,
    assetB: ASSET_B,
    amountBWanted: record?.amountBWanted ?? 1n,
    minAmountA: world.ledger.hasAccount(vault) ? world.ledger.balanceOf(vault) : 0n,
    nonce: nextNonce(),
  };
  return { ...terms, takerConsent: signEscrowConsent(taker, world.program.takeConsentAction(terms)) };
}

export function takeOffer(world: World, offer: string): TakeOfferResult {
  return world.program.takeOffer(takeRequest(world, offer));
}

export function cancelOffer(world: World, offer: string): CancelOfferResult {
  const terms = { offer, maker: MAKER, nonce: nextNonce() };
  return world.program.cancelOffer({
    ...terms,
    makerConsent: signEscrowConsent(maker, world.program.cancelConsentAction(terms)),
  });
}

export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected function to throw");
}
