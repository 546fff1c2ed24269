/**
 * @swapescrow/ledger — Token ledger behind the escrow engine.
 *
 * Provides the asset-transfer primitive as an in-process ledger:
 * - Checked transfers (declared precision must match the mint)
 * - Close-and-refund of empty accounts
 * - Storage deposits paid and refunded in native currency
 * - User consent proofs (ed25519 over canonical JSON)
 * - Checkpoint/restore so callers can run all-or-nothing units
 *
 * Design rules:
 * - All records are readonly
 * - All arithmetic uses bigint, bounded to u64
 * - Fail-closed: invalid requests throw, never silently succeed
 */

// Core ledger
export { TokenLedger, TOKEN_ACCOUNT_SIZE, DEFAULT_DEPOSIT_POLICY } from "./token-ledger.js";

// Addresses
export {
  associatedAddress,
  addressBytes,
  toPublicKey,
  TOKEN_PROGRAM_ID,
  ASSOCIATED_TOKEN_PROGRAM_ID,
} from "./address.js";

// Consent
export { UserAuthorization, signConsent, verifyConsent, consentMessage } from "./consent.js";
export type { ConsentPayload } from "./consent.js";

// Units
export { parseUnits, formatUnits, assertU64, assertTransferAmount, checkedAdd } from "./units.js";

// Types
export type {
  MintRecord,
  TokenAccount,
  TransferRecord,
  LedgerAction,
  Authorizer,
  TransferRequest,
  CloseRequest,
  OpenAccountRequest,
  DepositPolicy,
  Checkpointable,
  AssetLedger,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError } from "./types.js";
