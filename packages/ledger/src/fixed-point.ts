/**
 * @stakeflow/ledger — Deterministic fixed-point arithmetic.
 *
 * All arithmetic uses bigint. Every division floors toward zero and the
 * remainder is dropped; callers must not expect rounding correction.
 *
 * Rules:
 * - No floating-point operations
 * - Amounts are never negative once they enter the ledger
 * - Human-readable amounts are converted to/from base units via decimal scaling
 */

import type { Amount, AmountString } from "@stakeflow/types";
import { LedgerError } from "./types.js";

/** Fixed-point scale for the reward-per-share accumulator (1e18). */
export const SCALE = 10n ** 18n;

const UINT_PATTERN = /^(0|[1-9]\d*)$/;
const DECIMAL_PATTERN = /^\d+(\.\d+)?$/;

// ─── Parsing & Formatting ────────────────────────────────────────────────

/**
 * Parse a human-readable decimal string into base units.
 *
 * "1.5" with decimals=18 → 1500000000000000000n
 * "100" with decimals=6  → 100000000n
 */
export function parseUnits(amount: string, decimals: number): Amount {
  const trimmed = amount.trim();

  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but the asset allows ${String(decimals)}`,
    );
  }

  return BigInt(intPart + fracPart.padEnd(decimals, "0"));
}

/**
 * Render base units as a decimal string.
 *
 * 1500000000000000000n with decimals=18 → "1.500000000000000000"
 */
export function formatUnits(value: Amount, decimals: number): string {
  assertAmount(value, "value");
  if (decimals === 0) {
    return value.toString();
  }

  const str = value.toString().padStart(decimals + 1, "0");
  return `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;
}

/**
 * Parse a base-unit amount serialized as a canonical decimal string.
 */
export function parseAmountString(value: AmountString): Amount {
  if (!UINT_PATTERN.test(value)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid base-unit amount: "${value}"`);
  }
  return BigInt(value);
}

export function toAmountString(value: Amount): AmountString {
  assertAmount(value, "value");
  return value.toString();
}

// ─── Arithmetic ──────────────────────────────────────────────────────────

/**
 * Throw INVALID_AMOUNT unless `value` is a non-negative bigint.
 */
export function assertAmount(value: bigint, label: string): void {
  if (value < 0n) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `${label} must not be negative, got ${value.toString()}`,
    );
  }
}

/**
 * floor(a * b / d). Returns 0n when `d` is zero.
 */
export function mulDiv(a: bigint, b: bigint, d: bigint): bigint {
  if (d === 0n) return 0n;
  return (a * b) / d;
}

/**
 * floor(a / d). Returns 0n when `d` is zero.
 */
export function divFloor(a: bigint, d: bigint): bigint {
  if (d === 0n) return 0n;
  return a / d;
}

export function minOf(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}
