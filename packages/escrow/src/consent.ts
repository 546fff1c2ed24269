/**
 * @swapescrow/escrow — Signed escrow actions.
 *
 * A maker or taker consents to a whole escrow operation, not to the
 * ledger transfer inside it. Each action names the program, the offer
 * address and every term the signer agrees to, plus a signer-chosen
 * nonce. A nonce is spent when the operation commits; see ConsentRegistry.
 *
 * Build actions with EscrowProgram.makeConsentAction / takeConsentAction /
 * cancelConsentAction, so that defaulted accounts match what the program
 * reconstructs.
 */

import type { Keypair } from "@solana/web3.js";
import type { Address } from "@swapescrow/types";
import { signConsent } from "@swapescrow/ledger";
import type { LedgerAction, UserAuthorization } from "@swapescrow/ledger";

export type TransferAction = Extract<LedgerAction, { kind: "transfer" }>;

/** Escrow `amountAOffered` of assetA for `amountBWanted` of assetB. */
export type MakeAction = {
  readonly kind: "make";
  readonly program: Address;
  readonly offer: Address;
  readonly id: bigint;
  readonly maker: Address;
  readonly assetA: Address;
  readonly decimalsA: number;
  readonly assetB: Address;
  readonly decimalsB: number;
  readonly amountAOffered: bigint;
  readonly amountBWanted: bigint;
  readonly source: Address;
  readonly nonce: bigint;
};

/** Pay `amountBWanted` for the vault at `offer`, holding at least `minAmountA`. */
export type TakeAction = {
  readonly kind: "take";
  readonly program: Address;
  readonly offer: Address;
  readonly taker: Address;
  readonly maker: Address;
  readonly assetA: Address;
  readonly decimalsA: number;
  readonly assetB: Address;
  readonly decimalsB: number;
  readonly minAmountA: bigint;
  readonly amountBWanted: bigint;
  readonly source: Address;
  readonly takerDestination: Address;
  readonly makerDestination: Address;
  readonly nonce: bigint;
};

export type CancelAction = {
  readonly kind: "cancel";
  readonly program: Address;
  readonly offer: Address;
  readonly maker: Address;
  readonly nonce: bigint;
};

export type EscrowAction = MakeAction | TakeAction | CancelAction;

export function signEscrowConsent(signer: Keypair, action: EscrowAction): UserAuthorization {
  return signConsent(signer, action);
}
