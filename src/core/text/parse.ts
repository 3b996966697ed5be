import { MAX_PRECISION, TICKS_PER_MM, TOLERANCE_SEPARATORS } from "../constants.js";
import { ParseError } from "../errors.js";

function assertDigits(digits: string, typeName: string): void {
  for (const c of digits) {
    if (c < "0" || c > "9") {
      throw new ParseError(
        `Found '${c}' (a non-numerical literal) in input, can't parse input into a ${typeName}!`
      );
    }
  }
}

/**
 * Parses a millimeter decimal such as `"-12.5"`, `"+.04"` or `"18"` into ticks.
 *
 * Fraction digits beyond the fourth are truncated. The result is not range
 * checked; callers fit it into their width.
 */
export function parseTicks(text: string, typeName: string): bigint {
  const value = text.trim();
  if (value.length === 0) {
    throw new ParseError(`Cannot parse an empty string into a ${typeName}!`);
  }

  const dot = value.indexOf(".");
  let base = dot < 0 ? value : value.slice(0, dot);
  const fraction = dot < 0 ? "" : value.slice(dot + 1);

  let negative = false;
  if (base.startsWith("-") || base.startsWith("+")) {
    negative = base.startsWith("-");
    base = base.slice(1);
  }
  if (base.length === 0 && fraction.length === 0) {
    throw new ParseError(`Found no digits in '${value}', can't parse input into a ${typeName}!`);
  }

  assertDigits(base, typeName);
  assertDigits(fraction, typeName);

  const whole = base.length === 0 ? 0n : BigInt(base);
  const scaled = BigInt(fraction.padEnd(MAX_PRECISION, "0").slice(0, MAX_PRECISION));
  const ticks = whole * TICKS_PER_MM + scaled;
  return negative ? -ticks : ticks;
}

/**
 * Splits a tolerance text into its numeric tokens.
 */
export function splitToleranceText(text: string): string[] {
  let normalized = text;
  for (const separator of TOLERANCE_SEPARATORS) {
    normalized = normalized.split(separator).join(" ");
  }
  return normalized.split(/\s+/).filter((token) => token.length > 0);
}
