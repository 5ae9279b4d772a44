/**
 * @stakeflow/event-store — Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore, hash-chained with SHA-256 over RFC 8785 JSON
 * - Vault domain event definitions
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  HashedStoredEvent,
  AppendResult,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementation
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions, SubscriberErrorReporter } from "./in-memory-store.js";

// Vault events
export { VAULT_EVENTS, isVaultEventType, vaultStreamId } from "./vault-events.js";
export type {
  VaultEventType,
  VaultEvent,
  VaultEventPayloads,
  DepositedPayload,
  WithdrawnPayload,
  RewardPaidPayload,
  RewardAddedPayload,
  RewardsDurationUpdatedPayload,
  ForeignAssetRecoveredPayload,
  PauseChangedPayload,
  RewardsDistributorUpdatedPayload,
} from "./vault-events.js";
