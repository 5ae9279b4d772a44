/**
 * @stakeflow/event-store — In-memory EventStore implementation.
 *
 * Stores events in plain arrays. All state is lost on process exit.
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) read (where n = number of events returned)
 * - Synchronous subscription dispatch
 */

import type { DomainEvent } from "@stakeflow/types";
import type {
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  HashedStoredEvent,
  ReadAllOptions,
  StoredEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

/** Receives whatever a subscriber threw, with the event it was handling. */
export type SubscriberErrorReporter = (error: unknown, event: HashedStoredEvent) => void;

export interface InMemoryEventStoreOptions {
  /** Source of `appendedAt`. Defaults to the wall clock. */
  readonly now?: () => Date;
  /** Defaults to console.error */
  readonly onSubscriberError?: SubscriberErrorReporter;
}

/**
 * In-memory event store.
 *
 * One global array holds every event in append order; it backs readAll,
 * subscriptions and the hash chain. Streams only number their events.
 *
 * An append is complete once its events are stored. Subscribers run
 * afterwards and their failures go to `onSubscriberError`, never to the
 * appender.
 */
export class InMemoryEventStore implements EventStore {
  private readonly _streamVersions = new Map<string, number>();
  private readonly _globalLog: HashedStoredEvent[] = [];
  private readonly _globalSubscribers = new Set<EventHandler>();
  private readonly _now: () => Date;
  private readonly _onSubscriberError: SubscriberErrorReporter;
  private _nextGlobalPosition = 1;
  private _lastHash: string = GENESIS_HASH;

  constructor(options: InMemoryEventStoreOptions = {}) {
    this._now = options.now ?? (() => new Date());
    this._onSubscriberError =
      options.onSubscriberError ??
      ((error, event) => {
        console.error(`Event subscriber failed at position ${event.globalPosition}:`, error);
      });
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(streamId: string, events: readonly DomainEvent[]): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const fromVersion = (this._streamVersions.get(streamId) ?? 0) + 1;
    const appendedAt = this._now().toISOString();
    const stored: HashedStoredEvent[] = [];

    events.forEach((event, i) => {
      const base: StoredEvent = {
        event: {
          type: event.type,
          metadata: event.metadata,
          payload: event.payload,
        },
        streamId,
        version: fromVersion + i,
        globalPosition: this._nextGlobalPosition++,
        appendedAt,
      };

      const previousHash = this._lastHash;
      const hashed: HashedStoredEvent = {
        ...base,
        hash: computeEventHash(base, previousHash),
        previousHash,
      };
      this._lastHash = hashed.hash;

      this._globalLog.push(hashed);
      stored.push(hashed);
    });
    this._streamVersions.set(streamId, fromVersion + events.length - 1);

    this._dispatch(stored);

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  readAll(options?: ReadAllOptions): readonly HashedStoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;
    const types = options?.types;

    let result = this._globalLog.filter((e) => e.globalPosition >= fromPosition);

    if (types !== undefined) {
      result = result.filter((e) => types.includes(e.event.type));
    }

    return limit(result, options?.maxCount);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribeAll(handler: EventHandler): Subscription {
    this._globalSubscribers.add(handler);

    return {
      unsubscribe: () => {
        this._globalSubscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  globalPosition(): number {
    return this._nextGlobalPosition - 1;
  }

  // ─── Integrity ──────────────────────────────────────────────────────

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }

  private _dispatch(events: readonly HashedStoredEvent[]): void {
    for (const handler of [...this._globalSubscribers]) {
      for (const event of events) {
        try {
          handler(event);
        } catch (err) {
          this._onSubscriberError(err, event);
        }
      }
    }
  }
}

function limit<T>(events: T[], maxCount: number | undefined): T[] {
  return maxCount !== undefined && maxCount >= 0 ? events.slice(0, maxCount) : events;
}
