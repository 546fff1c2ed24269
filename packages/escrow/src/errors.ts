/**
 * @swapescrow/escrow — Errors.
 *
 * Every rejected escrow operation throws an EscrowError (or, for
 * ledger-level failures, the LedgerError raised by the ledger). Errors
 * are never wrapped, retried or returned as values.
 */

export type EscrowErrorCode =
  | "DUPLICATE_OFFER"
  | "OFFER_NOT_FOUND"
  | "OFFER_MISMATCH"
  | "INVALID_AUTHORITY_PROOF"
  | "ADDRESS_DERIVATION_EXHAUSTED"
  | "MALFORMED_RECORD"
  | "UNAUTHORIZED_CANCEL"
  | "INVALID_OFFER_ID"
  | "INVALID_NONCE"
  | "CONSENT_REUSED"
  | "CONFIG_MISMATCH";

export class EscrowError extends Error {
  public readonly code: EscrowErrorCode;

  constructor(code: EscrowErrorCode, message: string) {
    super(message);
    this.name = "EscrowError";
    this.code = code;
  }
}
