import { MAX_PRECISION } from "../constants.js";
import { ContractViolationError } from "../errors.js";
import { roundTicks } from "./rounding.js";

export interface FormatOptions {
  /** Prefix non-negative values with `+`. */
  signed?: boolean;
  /** Render the raw tick integer instead of millimeters. */
  alternate?: boolean;
}

/**
 * Fewest fraction digits (1..4) that show `ticks` without loss.
 */
export function autoPrecision(ticks: bigint): number {
  if (ticks % 1000n === 0n) return 1;
  if (ticks % 100n === 0n) return 2;
  if (ticks % 10n === 0n) return 3;
  return MAX_PRECISION;
}

/**
 * Resolves a requested precision: `undefined` picks {@link autoPrecision},
 * anything above {@link MAX_PRECISION} is clamped.
 */
export function resolvePrecision(ticks: bigint, precision?: number): number {
  if (precision === undefined) return autoPrecision(ticks);
  if (!Number.isInteger(precision) || precision < 0) {
    throw new ContractViolationError(`Precision must be a non-negative integer, got ${precision}`);
  }
  return Math.min(precision, MAX_PRECISION);
}

/**
 * Renders ticks as millimeters, e.g. `12455n` → `"1.2455"`, `-455n` at
 * precision 3 → `"-0.046"`. Values are rounded half away from zero.
 */
export function formatTicks(ticks: bigint, precision?: number, options: FormatOptions = {}): string {
  const plus = options.signed && ticks >= 0n ? "+" : "";
  if (options.alternate) {
    return `${plus}${ticks}`;
  }

  const p = resolvePrecision(ticks, precision);
  const rounded = roundTicks(ticks, 10n ** BigInt(MAX_PRECISION - p));
  const negative = rounded < 0n;
  const digits = (negative ? -rounded : rounded).toString().padStart(MAX_PRECISION + 1, "0");
  const whole = digits.slice(0, digits.length - MAX_PRECISION);
  const fraction = digits.slice(digits.length - MAX_PRECISION, digits.length - MAX_PRECISION + p);
  const sign = negative ? "-" : options.signed ? "+" : "";
  return p > 0 ? `${sign}${whole}.${fraction}` : `${sign}${whole}`;
}
