/**
 * Property-Based Tests for StakingVault
 *
 * For any sequence of staking, reward and time operations:
 *
 * 1. totalShares == Σ shareBalance and totalAssets == Σ assetBalance
 * 2. The vault's LP custody equals totalAssets
 * 3. rewardPerShare never decreases
 * 4. Reward custody plus rewards paid equals rewards funded
 * 5. A failed operation changes nothing and emits nothing
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { createHarness, DISTRIBUTOR, VAULT } from "./helpers.js";

const ACCOUNTS = ["alice", "bob", "carol"] as const;
const arbAccount = fc.constantFrom(...ACCOUNTS);
const arbAmount = fc.bigInt({ min: 0n, max: 1_000n });

type Command =
  | { readonly kind: "deposit"; readonly who: string; readonly amount: bigint; readonly multiplier: bigint }
  | { readonly kind: "withdraw"; readonly who: string; readonly amount: bigint }
  | { readonly kind: "redeem"; readonly who: string; readonly amount: bigint }
  | { readonly kind: "exit"; readonly who: string }
  | { readonly kind: "claim"; readonly who: string }
  | { readonly kind: "notify"; readonly amount: bigint }
  | { readonly kind: "wait"; readonly seconds: bigint };

const arbCommand: fc.Arbitrary<Command> = fc.oneof(
  fc.record({
    kind: fc.constant("deposit" as const),
    who: arbAccount,
    amount: arbAmount,
    multiplier: fc.bigInt({ min: 0n, max: 4n }),
  }),
  fc.record({ kind: fc.constant("withdraw" as const), who: arbAccount, amount: arbAmount }),
  fc.record({ kind: fc.constant("redeem" as const), who: arbAccount, amount: fc.bigInt({ min: 0n, max: 4_000n }) }),
  fc.record({ kind: fc.constant("exit" as const), who: arbAccount }),
  fc.record({ kind: fc.constant("claim" as const), who: arbAccount }),
  fc.record({ kind: fc.constant("notify" as const), amount: fc.bigInt({ min: 0n, max: 100_000n }) }),
  fc.record({ kind: fc.constant("wait" as const), seconds: fc.bigInt({ min: 0n, max: 150n }) }),
);

describe("vault properties", () => {
  it("conserves balances, custody and rewards across any operation sequence", () => {
    fc.assert(
      fc.property(fc.array(arbCommand, { maxLength: 40 }), (commands) => {
        const h = createHarness();
        let funded = 0n;

        for (const command of commands) {
          const rpsBefore = h.vault.rewardPerShare();
          const positionBefore = h.store.globalPosition();
          const sharesBefore = h.vault.totalShares();
          let failed = false;

          try {
            switch (command.kind) {
              case "deposit":
                h.oracle.setPosition(command.who, { multiplier: command.multiplier, lockedPrincipal: 0n });
                h.fund(command.who, command.amount);
                h.vault.deposit(command.who, command.amount, command.who);
                break;
              case "withdraw":
                h.vault.withdraw(command.who, command.amount, command.who, command.who);
                break;
              case "redeem":
                h.vault.redeem(command.who, command.amount, command.who, command.who);
                break;
              case "exit":
                h.vault.exit(command.who);
                break;
              case "claim":
                h.vault.claimReward(command.who);
                break;
              case "notify":
                h.reward.mint(VAULT, command.amount);
                funded += command.amount;
                h.vault.notifyReward(DISTRIBUTOR, command.amount);
                break;
              case "wait":
                h.clock.advance(command.seconds);
                break;
            }
          } catch (err) {
            if (!(err instanceof Error) || !("code" in err)) throw err;
            failed = true;
          }

          if (failed) {
            expect(h.store.globalPosition()).toBe(positionBefore);
            expect(h.vault.totalShares()).toBe(sharesBefore);
          }

          expect(h.vault.reconcile().balanced).toBe(true);
          expect(h.lp.balanceOf(VAULT)).toBe(h.vault.totalAssets());
          expect(h.vault.rewardPerShare() >= rpsBefore).toBe(true);
          expect(h.reward.balanceOf(VAULT) + h.vault.totalRewardsDistributed()).toBe(funded);
        }
      }),
    );
  });
});
