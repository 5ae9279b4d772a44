/**
 * Event Types
 *
 * Append-only event architecture.
 * Every completed vault operation is captured as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, why)
 * - Payload amounts are decimal strings (events are JSON-canonicalized)
 * - Failed operations emit nothing
 */

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Who or what caused this event */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** ID for grouping the events of one operation */
  readonly correlationId: string;

  /** Which subsystem emitted this event */
  readonly source: EventSource;
}

export type EventSource = "vault" | "rewards" | "ledger" | "operator";

/**
 * A domain event. Discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "vault.deposited", "vault.reward_added") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the store, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
