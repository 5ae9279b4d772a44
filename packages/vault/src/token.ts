/**
 * In-memory fungible token.
 *
 * Reference adapter for the FungibleAsset port: balances, allowances and
 * an optional hook that runs after every transfer. Takes part in vault
 * transactions, so a rolled-back operation also restores balances.
 */

import { assertAmount } from "@stakeflow/ledger";
import type { Address, Amount, FungibleAsset, Rollback, Transactional } from "@stakeflow/types";

export type TokenErrorCode = "INSUFFICIENT_FUNDS" | "INSUFFICIENT_ALLOWANCE";

export class TokenError extends Error {
  public readonly code: TokenErrorCode;
  constructor(code: TokenErrorCode, message: string) {
    super(message);
    this.name = "TokenError";
    this.code = code;
  }
}

export interface TransferRecord {
  readonly token: string;
  readonly from: Address;
  readonly to: Address;
  readonly amount: Amount;
}

/** Runs synchronously after a transfer settles. A throw aborts the transfer's caller. */
export type TransferHook = (transfer: TransferRecord) => void;

interface TokenState {
  readonly balances: Map<Address, Amount>;
  readonly allowances: Map<string, Amount>;
  readonly totalSupply: Amount;
}

export interface InMemoryTokenOptions {
  readonly id: string;
  readonly symbol: string;
  readonly decimals?: number;
}

export class InMemoryToken implements FungibleAsset, Transactional {
  readonly id: string;
  readonly symbol: string;
  readonly decimals: number;
  private balances = new Map<Address, Amount>();
  private allowances = new Map<string, Amount>();
  private supply: Amount = 0n;
  private hook: TransferHook | undefined;

  constructor(options: InMemoryTokenOptions) {
    this.id = options.id;
    this.symbol = options.symbol;
    this.decimals = options.decimals ?? 18;
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  balanceOf(holder: Address): Amount {
    return this.balances.get(holder) ?? 0n;
  }

  allowance(owner: Address, spender: Address): Amount {
    return this.allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  get totalSupply(): Amount {
    return this.supply;
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  mint(to: Address, amount: Amount): void {
    assertAmount(amount, "amount");
    this.balances.set(to, this.balanceOf(to) + amount);
    this.supply += amount;
  }

  approve(owner: Address, spender: Address, amount: Amount): void {
    assertAmount(amount, "amount");
    this.allowances.set(allowanceKey(owner, spender), amount);
  }

  transfer(from: Address, to: Address, amount: Amount): void {
    assertAmount(amount, "amount");
    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw new TokenError(
        "INSUFFICIENT_FUNDS",
        `${this.symbol}: "${from}" holds ${balance.toString()}, needs ${amount.toString()}`,
      );
    }

    this.balances.set(from, balance - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
    this.hook?.({ token: this.id, from, to, amount });
  }

  transferFrom(spender: Address, from: Address, to: Address, amount: Amount): void {
    assertAmount(amount, "amount");
    const allowed = this.allowance(from, spender);
    if (allowed < amount) {
      throw new TokenError(
        "INSUFFICIENT_ALLOWANCE",
        `${this.symbol}: "${spender}" may spend ${allowed.toString()} of "${from}", needs ${amount.toString()}`,
      );
    }

    this.allowances.set(allowanceKey(from, spender), allowed - amount);
    this.transfer(from, to, amount);
  }

  /** Install (or with `undefined`, remove) the post-transfer hook. */
  onTransfer(hook: TransferHook | undefined): void {
    this.hook = hook;
  }

  // ─── Rollback ────────────────────────────────────────────────────────

  begin(): Rollback {
    const saved: TokenState = {
      balances: new Map(this.balances),
      allowances: new Map(this.allowances),
      totalSupply: this.supply,
    };
    return {
      rollback: () => {
        this.balances = new Map(saved.balances);
        this.allowances = new Map(saved.allowances);
        this.supply = saved.totalSupply;
      },
    };
  }
}

function allowanceKey(owner: Address, spender: Address): string {
  return `${owner}->${spender}`;
}
