import { describe, it, expect, vi } from "vitest";
import type { Rollback, Transactional } from "@stakeflow/types";
import { ExclusivityLock, openTransaction, requireNotPaused, requireRole } from "../src/guards.js";
import { EventRecorder } from "../src/events.js";
import { VaultError } from "../src/types.js";
import { thrown } from "./helpers.js";

describe("ExclusivityLock", () => {
  it("refuses a second holder until released", () => {
    const lock = new ExclusivityLock();
    lock.acquire("deposit");

    const err = thrown(() => lock.acquire("claimReward"));

    expect(err).toBeInstanceOf(VaultError);
    expect(err).toMatchObject({
      code: "REENTRANCY_BLOCKED",
      message: "Cannot run claimReward while deposit is in progress",
    });
    expect(lock.held).toBe(true);

    lock.release();
    lock.acquire("claimReward");
    expect(lock.held).toBe(true);
  });
});

describe("requireRole", () => {
  it("passes the role holder", () => {
    expect(() => requireRole("setPaused", "owner", "owner", "owner")).not.toThrow();
  });

  it("rejects anyone else", () => {
    expect(thrown(() => requireRole("notifyReward", "alice", "rewardsDistributor", "distributor"))).toMatchObject({
      code: "UNAUTHORIZED",
      message: 'notifyReward requires the rewardsDistributor role; "alice" does not hold it',
    });
  });
});

describe("requireNotPaused", () => {
  it("only fails while paused", () => {
    expect(() => requireNotPaused("deposit", false)).not.toThrow();
    expect(thrown(() => requireNotPaused("deposit", true))).toMatchObject({ code: "PAUSED" });
  });
});

describe("openTransaction", () => {
  function participant(log: string[], name: string): Transactional {
    return {
      begin: (): Rollback => {
        log.push(`begin ${name}`);
        return { rollback: () => log.push(`rollback ${name}`) };
      },
    };
  }

  it("rolls participants back in reverse order", () => {
    const log: string[] = [];
    const tx = openTransaction([participant(log, "a"), participant(log, "b")]);
    tx.rollback();
    expect(log).toEqual(["begin a", "begin b", "rollback b", "rollback a"]);
  });

  it("begins a repeated participant once", () => {
    const log: string[] = [];
    const shared = participant(log, "token");
    openTransaction([shared, shared]).rollback();
    expect(log).toEqual(["begin token", "rollback token"]);
  });
});

describe("EventRecorder", () => {
  it("stamps metadata and chains causation", () => {
    const ids = vi.fn<() => string>().mockReturnValueOnce("e1").mockReturnValueOnce("e2");
    const recorder = new EventRecorder({ actor: "alice", correlationId: "c1", time: 60n }, ids);

    recorder.record("vault.paused", { account: "alice" });
    recorder.record("vault.unpaused", { account: "alice" });

    const [first, second] = recorder.events;
    expect(first?.metadata).toEqual({
      eventId: "e1",
      timestamp: "1970-01-01T00:01:00.000Z",
      actor: "alice",
      correlationId: "c1",
      source: "vault",
    });
    expect(second?.metadata.causationId).toBe("e1");
  });
});
