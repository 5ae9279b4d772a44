/**
 * @stakeflow/event-store — Core types.
 *
 * Defines the interfaces and types for append-only event persistence.
 *
 * Design principles:
 * - Events are immutable after creation
 * - Streams are append-only (no UPDATE, no DELETE)
 * - Every event has a monotonically increasing version within its stream
 * - Every stored event is linked into one SHA-256 hash chain
 */

import type { DomainEvent } from "@stakeflow/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * An event as persisted in the store.
 *
 * Wraps a DomainEvent with store-level metadata:
 * - streamId: which stream this event belongs to
 * - version: monotonically increasing position within the stream
 * - globalPosition: monotonically increasing position across all streams
 */
export interface StoredEvent {
  readonly event: DomainEvent;

  readonly streamId: string;

  /** Position within this stream (1-based) */
  readonly version: number;

  /** Position across all streams (1-based) */
  readonly globalPosition: number;

  /** When this event was persisted (store-level, not domain-level) */
  readonly appendedAt: string;
}

/**
 * A stored event linked into the store's hash chain.
 */
export interface HashedStoredEvent extends StoredEvent {
  /** SHA-256 over the canonical event content and `previousHash` */
  readonly hash: string;
  /** Hash of the preceding event, or GENESIS_HASH for the first */
  readonly previousHash: string;
}

// =============================================================================
// Append / Read Options
// =============================================================================

export interface AppendResult {
  readonly streamId: string;
  /** Version of the first event appended */
  readonly fromVersion: number;
  /** Version of the last event appended (current stream head) */
  readonly toVersion: number;
  readonly count: number;
}

export interface ReadAllOptions {
  /** Start reading from this global position (inclusive). Default: 1 */
  readonly fromPosition?: number;
  /** Maximum number of events to read. Default: unlimited */
  readonly maxCount?: number;
  /** Only events of these types */
  readonly types?: readonly string[];
}

// =============================================================================
// Subscription
// =============================================================================

/**
 * Called synchronously for each appended event, after the whole batch
 * has been stored. A handler that throws does not undo the append.
 */
export type EventHandler = (event: HashedStoredEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;
  /** Global position of the last event whose hash checked out */
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only event store.
 *
 * Invariants:
 * - Events are immutable once appended
 * - Stream versions are contiguous (1, 2, 3, ...) with no gaps
 * - Global positions are monotonically increasing with no gaps
 * - Subscribers see events in append order
 */
export interface EventStore {
  /**
   * Append one or more events to a stream.
   *
   * @throws EventStoreError if the stream id is empty or no events are given
   */
  append(streamId: string, events: readonly DomainEvent[]): AppendResult;

  /**
   * Read events across all streams in global order.
   */
  readAll(options?: ReadAllOptions): readonly HashedStoredEvent[];

  subscribeAll(handler: EventHandler): Subscription;

  /** Position of the last event in the store, or 0 */
  globalPosition(): number;

  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode = "INVALID_STREAM_ID" | "EMPTY_APPEND";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
