/**
 * @stakeflow/types — Shared domain types for the Stakeflow vault.
 *
 * These types are used across all Stakeflow packages:
 * - Accounting primitives (addresses, base-unit amounts, timestamps)
 * - Collaborator ports (fungible assets, reserve and boost oracles, clock)
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Primitives
export type {
  Address,
  Amount,
  AmountString,
  Timestamp,
  PoolReserves,
} from "./primitives.js";

// Ports
export type {
  FungibleAsset,
  ReserveReport,
  MultiplierOracle,
  Clock,
  Rollback,
  Transactional,
} from "./ports.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Runtime type guards
export {
  isAddress,
  isUintString,
  isPoolReserves,
  isTransactional,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
