/**
 * Runtime Type Guards
 *
 * Narrowing functions for Stakeflow domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, deserialized events, injected adapters).
 */

import type { DomainEvent, EventMetadata, EventSource } from "./event.js";
import type { PoolReserves } from "./primitives.js";
import type { Transactional } from "./ports.js";

// =============================================================================
// Primitive guards
// =============================================================================

const UINT_PATTERN = /^(0|[1-9]\d*)$/;

/**
 * A non-empty address without surrounding whitespace.
 */
export function isAddress(value: unknown): value is string {
  return typeof value === "string" && value.length > 0 && value.trim() === value;
}

/**
 * A base-unit amount serialized as a canonical unsigned decimal string.
 */
export function isUintString(value: unknown): value is string {
  return typeof value === "string" && UINT_PATTERN.test(value);
}

export function isPoolReserves(value: unknown): value is PoolReserves {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.principalReserve === "bigint" &&
    v.principalReserve >= 0n &&
    typeof v.pairedReserve === "bigint" &&
    v.pairedReserve >= 0n
  );
}

// =============================================================================
// Port guards
// =============================================================================

/**
 * Whether an injected adapter can take part in an all-or-nothing operation.
 */
export function isTransactional(value: unknown): value is Transactional {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return typeof v.begin === "function";
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["vault", "rewards", "ledger", "operator"]);

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    (v.causationId === undefined || typeof v.causationId === "string") &&
    isEventSource(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    v.type.length > 0 &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object" &&
    !Array.isArray(v.payload)
  );
}
