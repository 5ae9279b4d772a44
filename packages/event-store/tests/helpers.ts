import type { DomainEvent } from "@stakeflow/types";

let sequence = 0;

export function makeEvent(
  type: string,
  payload: Record<string, unknown> = {},
): DomainEvent {
  sequence += 1;
  return {
    type,
    metadata: {
      eventId: `evt-${sequence}`,
      timestamp: "2025-01-01T00:00:00.000Z",
      actor: "tester",
      correlationId: `corr-${sequence}`,
      source: "vault",
    },
    payload,
  };
}

export function makeEvents(count: number, prefix = "event"): DomainEvent[] {
  return Array.from({ length: count }, (_, i) => makeEvent(`${prefix}.${i + 1}`));
}

export const FIXED_DATE = new Date("2025-01-01T00:00:00.000Z");
