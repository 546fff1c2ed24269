/**
 * @swapescrow/ledger — In-process token ledger.
 *
 * Fronts the asset-transfer primitive the escrow engine delegates to:
 * mints, token accounts, native balances for storage deposits, and an
 * append-only journal of committed transfers.
 *
 * API surface:
 * - createMint() / mintTo() / airdrop() — Provisioning
 * - openAccount() — Create a token account, charging its deposit
 * - transfer() — Checked, authorized movement between accounts
 * - closeAndRefund() — Delete an empty account, refunding its deposit
 * - chargeDeposit() / refundDeposit() — Deposits for non-token records
 * - checkpoint() — Capture state; the returned function restores it
 *
 * Every write validates first and mutates last, replacing readonly
 * records rather than editing them.
 */

import type { Address } from "@swapescrow/types";
import { associatedAddress, toPublicKey } from "./address.js";
import { assertTransferAmount, assertU64, checkedAdd } from "./units.js";
import type {
  AssetLedger,
  CloseRequest,
  DepositPolicy,
  MintRecord,
  OpenAccountRequest,
  TokenAccount,
  TransferRecord,
  TransferRequest,
} from "./types.js";
import { LedgerError } from "./types.js";

/** Data length of an SPL token account. */
export const TOKEN_ACCOUNT_SIZE = 165;

/** Solana's rent-exemption model: 3480 lamports per byte-year, two years. */
export const DEFAULT_DEPOSIT_POLICY: DepositPolicy = {
  lamportsPerByte: 6960n,
  overhead: 128,
};

export class TokenLedger implements AssetLedger {
  private _mints = new Map<Address, MintRecord>();
  private _accounts = new Map<Address, TokenAccount>();
  private _native = new Map<Address, bigint>();
  private readonly _transfers: TransferRecord[] = [];
  private readonly _policy: DepositPolicy;

  constructor(policy: DepositPolicy = DEFAULT_DEPOSIT_POLICY) {
    this._policy = policy;
  }

  // ─── Provisioning ────────────────────────────────────────────────────

  /**
   * Register a mint with its declared precision.
   */
  createMint(address: Address, decimals: number): MintRecord {
    toPublicKey(address);
    if (this._mints.has(address)) {
      throw new LedgerError("MINT_EXISTS", `Mint already exists: "${address}"`);
    }
    if (!Number.isInteger(decimals) || decimals < 0 || decimals > 255) {
      throw new LedgerError("ASSET_MISMATCH", `Mint decimals must be an integer in [0, 255], got ${String(decimals)}`);
    }

    const mint: MintRecord = { address, decimals, supply: 0n };
    this._mints.set(address, mint);
    return mint;
  }

  /**
   * Issue new units of a mint into an account.
   */
  mintTo(account: Address, amount: bigint): TokenAccount {
    assertTransferAmount(amount);
    const target = this._requireAccount(account);
    const mint = this._requireMint(target.mint);

    const supply = checkedAdd(mint.supply, amount);
    const updated: TokenAccount = { ...target, amount: checkedAdd(target.amount, amount) };

    this._mints.set(mint.address, { ...mint, supply });
    this._accounts.set(account, updated);
    return updated;
  }

  /**
   * Credit native currency (used to pay storage deposits).
   */
  airdrop(address: Address, lamports: bigint): bigint {
    assertTransferAmount(lamports);
    toPublicKey(address);
    const balance = checkedAdd(this.nativeBalanceOf(address), lamports);
    this._native.set(address, balance);
    return balance;
  }

  /**
   * Open a token account, charging its deposit to the payer.
   */
  openAccount(request: OpenAccountRequest): TokenAccount {
    this._requireMint(request.mint);
    toPublicKey(request.owner);
    const address = request.address ?? associatedAddress(request.owner, request.mint);
    toPublicKey(address);

    if (this._accounts.has(address)) {
      throw new LedgerError("ACCOUNT_EXISTS", `Account already exists: "${address}"`);
    }

    const deposit = this.depositFor(TOKEN_ACCOUNT_SIZE);
    this.chargeDeposit(request.payer, deposit);

    const account: TokenAccount = {
      address,
      mint: request.mint,
      owner: request.owner,
      amount: 0n,
      deposit,
    };
    this._accounts.set(address, account);
    return account;
  }

  associatedAddress(owner: Address, mint: Address): Address {
    return associatedAddress(owner, mint);
  }

  // ─── Transfers ───────────────────────────────────────────────────────

  /**
   * Move tokens between two accounts of the same mint.
   *
   * Validation rules (fail-closed, all must pass):
   * 1. Amount is within (0, u64 max]
   * 2. Both accounts exist
   * 3. Declared asset matches both accounts' mint and the mint's decimals
   * 4. The authorizer resolves to the source account's owner
   * 5. The source holds at least `amount`
   * 6. The destination balance stays within u64
   */
  transfer(request: TransferRequest): TransferRecord {
    const { from, to, amount, asset, authorizer } = request;

    assertTransferAmount(amount);
    const source = this._requireAccount(from);
    const destination = this._requireAccount(to);
    const mint = this._requireMint(asset.mint);

    if (source.mint !== asset.mint || destination.mint !== asset.mint) {
      throw new LedgerError(
        "ASSET_MISMATCH",
        `Transfer of "${asset.mint}" between accounts holding "${source.mint}" and "${destination.mint}"`,
      );
    }
    if (asset.decimals !== mint.decimals) {
      throw new LedgerError(
        "ASSET_MISMATCH",
        `Decimal mismatch for mint "${asset.mint}": declared ${String(asset.decimals)}, recorded ${String(mint.decimals)}`,
      );
    }

    const authority = authorizer.authorize({ kind: "transfer", from, to, mint: asset.mint, amount });
    if (authority !== source.owner) {
      throw new LedgerError(
        "UNAUTHORIZED_TRANSFER",
        `"${authority}" is not the owner of account "${from}"`,
      );
    }

    if (source.amount < amount) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Account "${from}" holds ${source.amount.toString()}, needs ${amount.toString()}`,
      );
    }

    if (from !== to) {
      const credited = checkedAdd(destination.amount, amount);
      this._accounts.set(from, { ...source, amount: source.amount - amount });
      this._accounts.set(to, { ...destination, amount: credited });
    }

    const record: TransferRecord = {
      sequence: this._transfers.length + 1,
      from,
      to,
      mint: asset.mint,
      amount,
      authority,
    };
    this._transfers.push(record);
    return record;
  }

  /**
   * Delete an empty token account and credit its deposit to `refundTo`.
   * Returns the refunded deposit.
   */
  closeAndRefund(request: CloseRequest): bigint {
    const { account, refundTo, authorizer } = request;
    const target = this._requireAccount(account);
    toPublicKey(refundTo);

    const authority = authorizer.authorize({ kind: "close", account, refundTo });
    if (authority !== target.owner) {
      throw new LedgerError(
        "UNAUTHORIZED_CLOSE",
        `"${authority}" is not the owner of account "${account}"`,
      );
    }

    if (target.amount > 0n) {
      throw new LedgerError(
        "ACCOUNT_NOT_EMPTY",
        `Account "${account}" still holds ${target.amount.toString()}`,
      );
    }

    this._accounts.delete(account);
    this.refundDeposit(refundTo, target.deposit);
    return target.deposit;
  }

  // ─── Deposits ────────────────────────────────────────────────────────

  get depositPolicy(): DepositPolicy {
    return this._policy;
  }

  /**
   * Deposit required to persist `dataLength` bytes.
   */
  depositFor(dataLength: number): bigint {
    return BigInt(dataLength + this._policy.overhead) * this._policy.lamportsPerByte;
  }

  chargeDeposit(payer: Address, amount: bigint): void {
    assertU64(amount);
    const balance = this.nativeBalanceOf(payer);
    if (balance < amount) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `"${payer}" holds ${balance.toString()} lamports, deposit needs ${amount.toString()}`,
      );
    }
    this._native.set(payer, balance - amount);
  }

  refundDeposit(to: Address, amount: bigint): void {
    assertU64(amount);
    this._native.set(to, checkedAdd(this.nativeBalanceOf(to), amount));
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  getAccount(address: Address): TokenAccount | undefined {
    return this._accounts.get(address);
  }

  hasAccount(address: Address): boolean {
    return this._accounts.has(address);
  }

  getMint(address: Address): MintRecord | undefined {
    return this._mints.get(address);
  }

  /**
   * Live token balance of an account. Unknown accounts throw.
   */
  balanceOf(address: Address): bigint {
    return this._requireAccount(address).amount;
  }

  nativeBalanceOf(address: Address): bigint {
    return this._native.get(address) ?? 0n;
  }

  /**
   * Sum of all account balances for a mint.
   * Always equals the mint's supply.
   */
  totalHeld(mint: Address): bigint {
    let total = 0n;
    for (const account of this._accounts.values()) {
      if (account.mint === mint) {
        total += account.amount;
      }
    }
    return total;
  }

  getTransfers(): readonly TransferRecord[] {
    return [...this._transfers];
  }

  get transferCount(): number {
    return this._transfers.length;
  }

  // ─── Checkpoint ──────────────────────────────────────────────────────

  /**
   * Capture the ledger's state. Records are immutable, so copying the
   * maps and the journal length is a full capture.
   */
  checkpoint(): () => void {
    const mints = new Map(this._mints);
    const accounts = new Map(this._accounts);
    const native = new Map(this._native);
    const transferCount = this._transfers.length;

    return () => {
      this._mints = new Map(mints);
      this._accounts = new Map(accounts);
      this._native = new Map(native);
      this._transfers.length = transferCount;
    };
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _requireAccount(address: Address): TokenAccount {
    const account = this._accounts.get(address);
    if (account === undefined) {
      throw new LedgerError("UNKNOWN_ACCOUNT", `Unknown account: "${address}"`);
    }
    return account;
  }

  private _requireMint(address: Address): MintRecord {
    const mint = this._mints.get(address);
    if (mint === undefined) {
      throw new LedgerError("UNKNOWN_MINT", `Unknown mint: "${address}"`);
    }
    return mint;
  }
}
