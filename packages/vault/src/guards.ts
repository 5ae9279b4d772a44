/**
 * Guard pipeline — the ordered pre-conditions every facade operation runs.
 *
 *   1. exclusivity  REENTRANCY_BLOCKED while another operation is running
 *   2. role         UNAUTHORIZED unless the caller holds the role
 *   3. pause        PAUSED for pausable operations while paused
 *   4. transaction  snapshot of every participant, rolled back on failure
 *
 * Each guard is a plain function so the facade composes them explicitly.
 */

import type { Address, Rollback, Transactional } from "@stakeflow/types";
import type { VaultOperation, VaultRole } from "./types.js";
import { VaultError } from "./types.js";

// =============================================================================
// Exclusivity
// =============================================================================

export class ExclusivityLock {
  private holder: VaultOperation | null = null;

  get held(): boolean {
    return this.holder !== null;
  }

  acquire(operation: VaultOperation): void {
    if (this.holder !== null) {
      throw new VaultError(
        "REENTRANCY_BLOCKED",
        `Cannot run ${operation} while ${this.holder} is in progress`,
      );
    }
    this.holder = operation;
  }

  release(): void {
    this.holder = null;
  }
}

// =============================================================================
// Access
// =============================================================================

export function requireRole(
  operation: VaultOperation,
  caller: Address,
  role: VaultRole,
  holder: Address,
): void {
  if (caller !== holder) {
    throw new VaultError(
      "UNAUTHORIZED",
      `${operation} requires the ${role} role; "${caller}" does not hold it`,
    );
  }
}

export function requireNotPaused(operation: VaultOperation, paused: boolean): void {
  if (paused) {
    throw new VaultError("PAUSED", `${operation} is unavailable while the vault is paused`);
  }
}

// =============================================================================
// Transaction scope
// =============================================================================

/**
 * Begin every participant; the returned handle rolls them back in
 * reverse order. A participant listed twice is only snapshotted once.
 */
export function openTransaction(participants: readonly Transactional[]): Rollback {
  const handles = [...new Set(participants)].map((p) => p.begin());
  return {
    rollback: () => {
      for (const handle of handles.reverse()) {
        handle.rollback();
      }
    },
  };
}
