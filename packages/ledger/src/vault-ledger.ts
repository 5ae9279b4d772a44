/**
 * @stakeflow/ledger — Vault ledger.
 *
 * Applies deposits and withdrawals to the account book and moves the
 * deposit asset in or out of vault custody.
 *
 * API surface:
 * - convertDeposit() / convertMint() / convertWithdraw() / convertRedeem()
 * - applyDeposit() — validate, credit, pull the asset from the caller
 * - applyWithdraw() — validate, debit, push the asset to the receiver
 * - transferShares() — always fails; shares are not transferable
 *
 * Validation runs before any mutation. A failing transfer after the
 * mutation leaves the book changed; the caller's transaction scope is
 * responsible for rolling it back.
 */

import type { Address, Amount, FungibleAsset } from "@stakeflow/types";
import type { AccountBook } from "./accounts.js";
import type { ShareConverter } from "./share-converter.js";
import { assertAmount } from "./fixed-point.js";
import type { AccountState, DepositRecord, LedgerTotals, WithdrawalRecord } from "./types.js";
import { LedgerError } from "./types.js";

export interface VaultLedgerOptions {
  /** Address that holds the vault's custody balance */
  readonly custodian: Address;
  readonly depositAsset: FungibleAsset;
  readonly book: AccountBook;
  readonly converter: ShareConverter;
}

export class VaultLedger {
  readonly custodian: Address;
  readonly depositAsset: FungibleAsset;
  private readonly book: AccountBook;
  private readonly converter: ShareConverter;

  constructor(options: VaultLedgerOptions) {
    this.custodian = options.custodian;
    this.depositAsset = options.depositAsset;
    this.book = options.book;
    this.converter = options.converter;
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  account(address: Address): AccountState {
    return this.book.get(address);
  }

  get totals(): LedgerTotals {
    return this.book.totals;
  }

  // ─── Conversions ─────────────────────────────────────────────────────

  convertDeposit(assets: Amount, account: Address): Amount {
    assertAmount(assets, "assets");
    return this.converter.convertDeposit(assets, account);
  }

  convertMint(shares: Amount, account: Address): Amount {
    assertAmount(shares, "shares");
    return this.converter.convertMint(shares, account);
  }

  convertWithdraw(assets: Amount, account: Address): Amount {
    assertAmount(assets, "assets");
    return this.converter.convertWithdraw(assets, account);
  }

  convertRedeem(shares: Amount, account: Address): Amount {
    assertAmount(shares, "shares");
    return this.converter.convertRedeem(shares, account);
  }

  // ─── Mutations ───────────────────────────────────────────────────────

  /**
   * Credit `receiver` and pull `assets` from the caller into custody.
   *
   * Throws ZERO_AMOUNT when assets is zero, RECEIVER_MISMATCH unless the
   * receiver is the caller.
   */
  applyDeposit(
    caller: Address,
    assets: Amount,
    shares: Amount,
    receiver: Address,
  ): DepositRecord {
    assertAmount(assets, "assets");
    assertAmount(shares, "shares");

    if (assets === 0n) {
      throw new LedgerError("ZERO_AMOUNT", "Cannot deposit zero assets");
    }
    if (receiver !== caller) {
      throw new LedgerError(
        "RECEIVER_MISMATCH",
        `Receiver "${receiver}" must be the caller "${caller}"`,
      );
    }

    this.book.credit(receiver, assets, shares);
    this.depositAsset.transferFrom(this.custodian, caller, this.custodian, assets);

    return { caller, receiver, assets, shares, totals: this.book.totals };
  }

  /**
   * Debit `owner` and push `assets` from custody to `receiver`.
   *
   * Throws ZERO_AMOUNT when assets is zero, NOT_OWNER unless the caller is
   * the owner, INSUFFICIENT_BALANCE when the owner holds fewer assets or
   * shares than requested.
   */
  applyWithdraw(
    caller: Address,
    assets: Amount,
    shares: Amount,
    receiver: Address,
    owner: Address,
  ): WithdrawalRecord {
    assertAmount(assets, "assets");
    assertAmount(shares, "shares");

    if (assets === 0n) {
      throw new LedgerError("ZERO_AMOUNT", "Cannot withdraw zero assets");
    }
    if (caller !== owner) {
      throw new LedgerError(
        "NOT_OWNER",
        `Caller "${caller}" is not the owner "${owner}"`,
      );
    }

    const position = this.book.get(owner);
    if (position.assetBalance < assets) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Owner "${owner}" has ${position.assetBalance.toString()} assets, requested ${assets.toString()}`,
      );
    }
    if (position.shareBalance < shares) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Owner "${owner}" has ${position.shareBalance.toString()} shares, requested ${shares.toString()}`,
      );
    }

    this.book.debit(owner, assets, shares);
    this.depositAsset.transfer(this.custodian, receiver, assets);

    return { caller, receiver, owner, assets, shares, totals: this.book.totals };
  }

  /**
   * Shares are internal accounting units and never move between accounts.
   */
  transferShares(from: Address, to: Address, shares: Amount): never {
    throw new LedgerError(
      "SHARES_NON_TRANSFERABLE",
      `Shares are not transferable (${shares.toString()} from "${from}" to "${to}")`,
    );
  }
}
