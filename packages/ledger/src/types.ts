/**
 * @swapescrow/ledger — Types for the token ledger and its adapter contract.
 *
 * Rules:
 * - All records are readonly; a mutation replaces the record
 * - Quantities are bigint base units bounded to u64
 * - Fail-closed: invalid requests throw, never silently succeed
 */

import type { Address, AssetRef } from "@swapescrow/types";

// ─── Ledger Records ──────────────────────────────────────────────────────

/**
 * A registered mint and its declared precision.
 */
export interface MintRecord {
  readonly address: Address;
  readonly decimals: number;
  /** Total base units in circulation */
  readonly supply: bigint;
}

/**
 * A token account: one owner, one mint, one balance.
 * `deposit` is the native amount locked while the account exists.
 */
export interface TokenAccount {
  readonly address: Address;
  readonly mint: Address;
  /** Authority allowed to move funds out of or close this account */
  readonly owner: Address;
  readonly amount: bigint;
  readonly deposit: bigint;
}

/**
 * One committed movement of tokens between two accounts.
 */
export interface TransferRecord {
  /** 1-based position in the transfer journal */
  readonly sequence: number;
  readonly from: Address;
  readonly to: Address;
  readonly mint: Address;
  readonly amount: bigint;
  /** Address that authorized the movement */
  readonly authority: Address;
}

// ─── Authorization ───────────────────────────────────────────────────────

/**
 * An action that requires the consent of an account's owner.
 * Consent proofs are computed over the canonical form of the action.
 */
export type LedgerAction =
  | {
      readonly kind: "transfer";
      readonly from: Address;
      readonly to: Address;
      readonly mint: Address;
      readonly amount: bigint;
    }
  | {
      readonly kind: "close";
      readonly account: Address;
      readonly refundTo: Address;
    };

/**
 * Anything able to act as an account's authority.
 *
 * `authorize` returns the address on whose behalf the action runs, or
 * throws when the authorizer's proof does not hold for that action. The
 * ledger then compares the address with the account's recorded owner.
 */
export interface Authorizer {
  readonly kind: "user" | "derived";
  authorize(action: LedgerAction): Address;
}

// ─── Requests ────────────────────────────────────────────────────────────

export interface TransferRequest {
  readonly from: Address;
  readonly to: Address;
  readonly amount: bigint;
  /** Declared asset; checked against both accounts and the mint record */
  readonly asset: AssetRef;
  readonly authorizer: Authorizer;
}

export interface CloseRequest {
  readonly account: Address;
  /** Receives the account's storage deposit */
  readonly refundTo: Address;
  readonly authorizer: Authorizer;
}

export interface OpenAccountRequest {
  /** Defaults to the associated address of (owner, mint) */
  readonly address?: Address | undefined;
  readonly owner: Address;
  readonly mint: Address;
  /** Pays the account's storage deposit */
  readonly payer: Address;
}

/**
 * Storage deposit model: `(dataLength + overhead) * lamportsPerByte`.
 */
export interface DepositPolicy {
  readonly lamportsPerByte: bigint;
  readonly overhead: number;
}

// ─── Adapter Contract ────────────────────────────────────────────────────

/**
 * Anything that can capture its state and later put it back.
 * `checkpoint()` returns the function that restores the captured state.
 */
export interface Checkpointable {
  checkpoint(): () => void;
}

/**
 * The asset-transfer primitive as seen by the escrow engine.
 */
export interface AssetLedger extends Checkpointable {
  readonly depositPolicy: DepositPolicy;
  transfer(request: TransferRequest): TransferRecord;
  closeAndRefund(request: CloseRequest): bigint;
  openAccount(request: OpenAccountRequest): TokenAccount;
  associatedAddress(owner: Address, mint: Address): Address;
  getAccount(address: Address): TokenAccount | undefined;
  hasAccount(address: Address): boolean;
  getMint(address: Address): MintRecord | undefined;
  balanceOf(address: Address): bigint;
  depositFor(dataLength: number): bigint;
  chargeDeposit(payer: Address, amount: bigint): void;
  refundDeposit(to: Address, amount: bigint): void;
}

// ─── Errors ──────────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "ASSET_MISMATCH"
  | "ACCOUNT_NOT_EMPTY"
  | "UNAUTHORIZED_CLOSE"
  | "UNAUTHORIZED_TRANSFER"
  | "INSUFFICIENT_BALANCE"
  | "INVALID_AMOUNT"
  | "INVALID_SIGNATURE"
  | "INVALID_ADDRESS"
  | "UNKNOWN_ACCOUNT"
  | "UNKNOWN_MINT"
  | "ACCOUNT_EXISTS"
  | "MINT_EXISTS";

/**
 * Structured error from the ledger.
 * Always thrown, never returned as a value.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
