/**
 * Tests for VaultLedger — deposit/withdraw conservation and
 * custody transfers.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { AccountBook } from "../src/accounts.js";
import { ShareConverter } from "../src/share-converter.js";
import { VaultLedger } from "../src/vault-ledger.js";
import { LedgerError } from "../src/types.js";
import { FixedOracle, FixedReserves, RecordingAsset, thrown } from "./helpers.js";

describe("VaultLedger", () => {
  let book: AccountBook;
  let asset: RecordingAsset;
  let ledger: VaultLedger;

  beforeEach(() => {
    book = new AccountBook();
    asset = new RecordingAsset();
    ledger = new VaultLedger({
      custodian: "vault",
      depositAsset: asset,
      book,
      converter: new ShareConverter(book, new FixedReserves(), new FixedOracle(2n)),
    });
  });

  // ─── applyDeposit ───────────────────────────────────────────────────

  describe("applyDeposit", () => {
    it("credits the receiver and pulls assets into custody", () => {
      const record = ledger.applyDeposit("alice", 100n, 300n, "alice");

      expect(record).toEqual({
        caller: "alice",
        receiver: "alice",
        assets: 100n,
        shares: 300n,
        totals: { totalManagedAssets: 100n, totalShares: 300n },
      });
      expect(asset.calls).toEqual([
        { kind: "transferFrom", from: "alice", to: "vault", amount: 100n },
      ]);
      expect(ledger.account("alice").shareBalance).toBe(300n);
    });

    it("rejects zero assets before touching anything", () => {
      const err = thrown(() => ledger.applyDeposit("alice", 0n, 0n, "alice"));
      expect(err).toBeInstanceOf(LedgerError);
      expect(err).toMatchObject({ code: "ZERO_AMOUNT" });
      expect(asset.calls).toHaveLength(0);
      expect(book.count).toBe(0);
    });

    it("rejects a receiver other than the caller", () => {
      const err = thrown(() => ledger.applyDeposit("alice", 10n, 10n, "bob"));
      expect(err).toMatchObject({ code: "RECEIVER_MISMATCH" });
      expect(book.has("bob")).toBe(false);
    });

    it("rejects negative amounts", () => {
      const err = thrown(() => ledger.applyDeposit("alice", -1n, 0n, "alice"));
      expect(err).toMatchObject({ code: "INVALID_AMOUNT" });
    });

    it("leaves rollback to the transaction scope when the transfer fails", () => {
      const tx = book.begin();
      asset.failNext = true;

      expect(() => ledger.applyDeposit("alice", 10n, 20n, "alice")).toThrow(
        "transfer rejected",
      );
      expect(ledger.totals.totalManagedAssets).toBe(10n);

      tx.rollback();
      expect(ledger.totals).toEqual({ totalManagedAssets: 0n, totalShares: 0n });
    });
  });

  // ─── applyWithdraw ──────────────────────────────────────────────────

  describe("applyWithdraw", () => {
    beforeEach(() => {
      ledger.applyDeposit("alice", 100n, 300n, "alice");
    });

    it("debits the owner and pushes assets to the receiver", () => {
      const record = ledger.applyWithdraw("alice", 40n, 120n, "bob", "alice");

      expect(record.totals).toEqual({ totalManagedAssets: 60n, totalShares: 180n });
      expect(record.receiver).toBe("bob");
      expect(asset.calls[1]).toEqual({
        kind: "transfer",
        from: "vault",
        to: "bob",
        amount: 40n,
      });
    });

    it("checks zero amount before ownership", () => {
      const err = thrown(() => ledger.applyWithdraw("bob", 0n, 0n, "bob", "alice"));
      expect(err).toMatchObject({ code: "ZERO_AMOUNT" });
    });

    it("rejects a caller that is not the owner", () => {
      const err = thrown(() => ledger.applyWithdraw("bob", 10n, 30n, "bob", "alice"));
      expect(err).toMatchObject({ code: "NOT_OWNER" });
    });

    it("rejects withdrawing more assets than deposited", () => {
      const err = thrown(() => ledger.applyWithdraw("alice", 101n, 0n, "alice", "alice"));
      expect(err).toMatchObject({ code: "INSUFFICIENT_BALANCE" });
    });

    it("rejects burning more shares than held", () => {
      const err = thrown(() => ledger.applyWithdraw("alice", 10n, 301n, "alice", "alice"));
      expect(err).toMatchObject({ code: "INSUFFICIENT_BALANCE" });
      expect(ledger.totals).toEqual({ totalManagedAssets: 100n, totalShares: 300n });
    });
  });

  // ─── Conversions ────────────────────────────────────────────────────

  describe("conversions", () => {
    it("delegates to the converter", () => {
      ledger.applyDeposit("alice", 10n, 20n, "alice");
      expect(ledger.convertDeposit(5n, "alice")).toBe(10n);
      expect(ledger.convertMint(10n, "alice")).toBe(5n);
      expect(ledger.convertWithdraw(5n, "alice")).toBe(10n);
      expect(ledger.convertRedeem(10n, "alice")).toBe(5n);
    });

    it("rejects negative inputs", () => {
      expect(() => ledger.convertDeposit(-1n, "alice")).toThrow(LedgerError);
      expect(() => ledger.convertRedeem(-1n, "alice")).toThrow(LedgerError);
    });
  });

  // ─── Shares ─────────────────────────────────────────────────────────

  describe("transferShares", () => {
    it("always fails", () => {
      const err = thrown(() => ledger.transferShares("alice", "bob", 1n));
      expect(err).toMatchObject({ code: "SHARES_NON_TRANSFERABLE" });
    });
  });
});
