/**
 * Centralized numerical constants for lengths and tolerances.
 *
 * All lengths are stored in ticks of 1/10 μ.
 */

/**
 * Ticks in one millimeter.
 */
export const TICKS_PER_MM = 10_000n;

/**
 * Number of fractional millimeter digits a tick can express.
 * Formatting clamps any requested precision to this value.
 */
export const MAX_PRECISION = 4;

/**
 * Literal separators of the tolerance text form, replaced by a blank before
 * splitting on whitespace. Order matters: `+/-` must go before `/`.
 */
export const TOLERANCE_SEPARATORS = ["+/-", "+-", "/", ";"] as const;

/**
 * A tolerance text holds at most value, plus and minus.
 */
export const MAX_TOLERANCE_TOKENS = 3;
