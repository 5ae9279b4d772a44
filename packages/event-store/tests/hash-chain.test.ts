/**
 * Tests for the event hash chain — tamper-evident event log.
 */

import { describe, it, expect } from "vitest";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { computeEventHash, verifyHashChain, GENESIS_HASH } from "../src/hash-chain.js";
import type { HashedStoredEvent, StoredEvent } from "../src/types.js";
import { FIXED_DATE, makeEvent } from "./helpers.js";

function storedEvent(payload: Record<string, unknown> = {}): StoredEvent {
  return {
    event: {
      type: "test",
      metadata: {
        eventId: "evt-1",
        timestamp: "t",
        actor: "tester",
        correlationId: "c",
        source: "vault",
      },
      payload,
    },
    streamId: "s",
    version: 1,
    globalPosition: 1,
    appendedAt: "2025-01-01T00:00:00Z",
  };
}

function chain(count: number): HashedStoredEvent[] {
  const store = new InMemoryEventStore({ now: () => FIXED_DATE });
  for (let i = 0; i < count; i++) {
    store.append("vault:v", [makeEvent("vault.deposited", { assets: String(i + 1) })]);
  }
  return [...store.readAll()];
}

// =============================================================================
// computeEventHash
// =============================================================================

describe("computeEventHash", () => {
  it("produces a 64-char hex string", () => {
    expect(computeEventHash(storedEvent(), GENESIS_HASH)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("is deterministic for the same input", () => {
    const event = storedEvent({ x: "1" });
    expect(computeEventHash(event, GENESIS_HASH)).toBe(computeEventHash(event, GENESIS_HASH));
  });

  it("ignores payload key order", () => {
    const a = storedEvent({ assets: "1", shares: "2" });
    const b = storedEvent({ shares: "2", assets: "1" });
    expect(computeEventHash(a, GENESIS_HASH)).toBe(computeEventHash(b, GENESIS_HASH));
  });

  it("changes when the payload changes", () => {
    expect(computeEventHash(storedEvent({ x: "1" }), GENESIS_HASH)).not.toBe(
      computeEventHash(storedEvent({ x: "2" }), GENESIS_HASH),
    );
  });

  it("changes when the previous hash changes", () => {
    const event = storedEvent();
    expect(computeEventHash(event, GENESIS_HASH)).not.toBe(computeEventHash(event, "other"));
  });
});

// =============================================================================
// verifyHashChain
// =============================================================================

describe("verifyHashChain", () => {
  it("accepts an empty chain", () => {
    expect(verifyHashChain([])).toEqual({ valid: true, lastVerifiedPosition: 0, errors: [] });
  });

  it("accepts an untouched chain", () => {
    const result = verifyHashChain(chain(3));
    expect(result).toEqual({ valid: true, lastVerifiedPosition: 3, errors: [] });
  });

  it("detects a modified payload", () => {
    const events = chain(3);
    const second = events[1];
    if (second === undefined) throw new Error("missing event");
    events[1] = {
      ...second,
      event: { ...second.event, payload: { assets: "999" } },
    };

    const result = verifyHashChain(events);

    expect(result.valid).toBe(false);
    expect(result.lastVerifiedPosition).toBe(1);
    expect(result.errors.map((e) => e.position)).toEqual([2]);
    expect(result.errors[0]?.reason).toMatch(/^Hash mismatch at position 2/);
  });

  it("detects a removed event", () => {
    const events = chain(3);
    events.splice(1, 1);

    const result = verifyHashChain(events);

    expect(result.valid).toBe(false);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]?.position).toBe(3);
    expect(result.errors[0]?.reason).toMatch(/^previousHash mismatch at position 3/);
  });

  it("is what the store's verifyIntegrity reports", () => {
    const store = new InMemoryEventStore();
    store.append("a", [makeEvent("x"), makeEvent("y")]);
    expect(store.verifyIntegrity()).toEqual({ valid: true, lastVerifiedPosition: 2, errors: [] });
  });
});
