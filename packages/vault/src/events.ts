/**
 * Event recorder — collects the events of one operation.
 *
 * Events are held until the operation succeeds; a failed operation
 * discards its recorder and nothing is emitted. Events of one operation
 * share a correlation id and each names the previous one as its cause.
 */

import type { VaultEventPayloads, VaultEventType } from "@stakeflow/event-store";
import type { Address, DomainEvent, Timestamp } from "@stakeflow/types";

export interface OperationContext {
  readonly actor: Address;
  readonly correlationId: string;
  /** Unix seconds the operation ran at */
  readonly time: Timestamp;
}

export class EventRecorder {
  private readonly pending: DomainEvent[] = [];
  private readonly timestamp: string;

  constructor(
    private readonly context: OperationContext,
    private readonly generateId: () => string,
  ) {
    this.timestamp = new Date(Number(context.time) * 1000).toISOString();
  }

  record<T extends VaultEventType>(type: T, payload: VaultEventPayloads[T]): void {
    const cause = this.pending[this.pending.length - 1];
    this.pending.push({
      type,
      metadata: {
        eventId: this.generateId(),
        timestamp: this.timestamp,
        actor: this.context.actor,
        correlationId: this.context.correlationId,
        source: "vault",
        ...(cause !== undefined ? { causationId: cause.metadata.eventId } : {}),
      },
      payload,
    });
  }

  get events(): readonly DomainEvent[] {
    return this.pending;
  }
}
