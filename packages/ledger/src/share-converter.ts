/**
 * @stakeflow/ledger — Asset/share conversion.
 *
 * Deposit direction (deposit, mint) uses the boost multiplier queried
 * fresh from the oracle, and only when the account's principal share of
 * the pool is at least its locked principal.
 *
 * Withdraw direction (withdraw, redeem) uses the account's own average
 * ratio, shareBalance / assetBalance, never the oracle.
 *
 * The two directions are deliberately asymmetric; multiplier drift
 * between deposit and withdrawal is not corrected. All division floors.
 */

import type { Address, Amount, MultiplierOracle, ReserveReport } from "@stakeflow/types";
import type { AccountBook } from "./accounts.js";
import { divFloor, mulDiv } from "./fixed-point.js";

/**
 * Inputs that decided whether a deposit-direction conversion was boosted.
 */
export interface BoostDecision {
  readonly principalShare: Amount;
  readonly lockedPrincipal: Amount;
  readonly multiplier: bigint;
  readonly boosted: boolean;
}

export class ShareConverter {
  private readonly book: AccountBook;
  private readonly reserves: ReserveReport;
  private readonly oracle: MultiplierOracle;

  constructor(book: AccountBook, reserves: ReserveReport, oracle: MultiplierOracle) {
    this.book = book;
    this.reserves = reserves;
    this.oracle = oracle;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Boost
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Principal-side exposure of the account's staked LP position:
   * assetBalance * principalReserve / lpTotalSupply.
   */
  principalShareOf(account: Address): Amount {
    const { assetBalance } = this.book.get(account);
    const { principalReserve } = this.reserves.getReserves();
    return mulDiv(assetBalance, principalReserve, this.reserves.totalSupply());
  }

  boostDecision(account: Address): BoostDecision {
    const principalShare = this.principalShareOf(account);
    const lockedPrincipal = this.oracle.lockedPrincipal(account);
    const boosted = principalShare >= lockedPrincipal;
    return {
      principalShare,
      lockedPrincipal,
      multiplier: boosted ? this.oracle.boostMultiplier(account) : 1n,
      boosted,
    };
  }

  /**
   * The account's historical share-to-asset ratio (floor). Zero for an
   * account with no principal. Flooring means a full withdraw from a
   * mixed-multiplier position can leave shares with no principal behind;
   * exit, taken before that, burns the whole share balance.
   */
  averageMultiplier(account: Address): bigint {
    const { assetBalance, shareBalance } = this.book.get(account);
    return divFloor(shareBalance, assetBalance);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Conversions
  // ───────────────────────────────────────────────────────────────────────

  convertDeposit(assets: Amount, account: Address): Amount {
    const { boosted, multiplier } = this.boostDecision(account);
    return boosted ? assets * multiplier : assets;
  }

  convertMint(shares: Amount, account: Address): Amount {
    const { boosted, multiplier } = this.boostDecision(account);
    return boosted ? divFloor(shares, multiplier) : shares;
  }

  convertWithdraw(assets: Amount, account: Address): Amount {
    return assets * this.averageMultiplier(account);
  }

  convertRedeem(shares: Amount, account: Address): Amount {
    return divFloor(shares, this.averageMultiplier(account));
  }
}
