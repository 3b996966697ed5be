/**
 * Decoding of lengths and tolerances from loosely typed wire data
 * (parsed JSON, config objects). Hand-written guards, no schema library.
 */

import { ParseError } from "../errors.js";
import { toTicks, type LengthClass } from "../length/fixedLength.js";
import type { Width } from "../length/width.js";
import { buildTolerance, parseTolerance, type ToleranceClass } from "../tolerance/tolerance.js";

/**
 * How a JSON `number` is read: raw ticks (the form `toJSON` writes) or
 * millimeters (the float forms). Strings are always millimeter text and
 * bigints always ticks.
 */
export type NumberMode = "ticks" | "mm";

export interface DecodeOptions {
  /** Defaults to `"ticks"`. */
  numbers?: NumberMode;
}

const FIELD_ALIASES = {
  value: ["value", "v"],
  plus: ["plus", "p"],
  minus: ["minus", "m"]
} as const;

function isRecord(input: unknown): input is Record<string, unknown> {
  return typeof input === "object" && input !== null && !Array.isArray(input);
}

function describeInput(input: unknown): string {
  if (typeof input === "string") return `string "${input}"`;
  if (typeof input === "bigint") return `bigint ${input}`;
  if (Array.isArray(input)) return `array of ${input.length}`;
  return input === null ? "null" : typeof input;
}

/**
 * Ticks for a single wire length. A `number` is read according to `numbers`:
 * in `"ticks"` mode it must be a safe integer, since larger values have
 * already lost precision in `JSON.parse`.
 */
export function decodeTicks(width: Width, input: unknown, numbers: NumberMode = "ticks"): bigint {
  if (typeof input === "bigint" || typeof input === "string") {
    return toTicks(width, input);
  }
  if (typeof input === "number") {
    if (numbers === "mm") return toTicks(width, input);
    if (!Number.isSafeInteger(input)) {
      throw new ParseError(
        `Expected a safe integer tick count for a ${width.name}, got ${input}; ` +
          `pass a string or bigint, or decode with numbers: "mm"`
      );
    }
    return toTicks(width, BigInt(input));
  }
  throw new ParseError(`Expected a number, string or bigint for a ${width.name}, got ${describeInput(input)}`);
}

export function decodeLength<L>(cls: LengthClass<L>, input: unknown, options: DecodeOptions = {}): L {
  return new cls(decodeTicks(cls.WIDTH, input, options.numbers));
}

function pickField(record: Record<string, unknown>, names: readonly string[]): unknown {
  for (const name of names) {
    if (record[name] !== undefined) return record[name];
  }
  return undefined;
}

function decodeRecord<T>(cls: ToleranceClass<T>, record: Record<string, unknown>, numbers: NumberMode): T {
  const { name, value: valueClass, deviation } = cls.KIND;
  const value = pickField(record, FIELD_ALIASES.value);
  const plus = pickField(record, FIELD_ALIASES.plus);
  const minus = pickField(record, FIELD_ALIASES.minus);

  const errors: string[] = [];
  if (value === undefined) errors.push("value is missing");
  if (plus === undefined && minus !== undefined) errors.push("minus is given without plus");
  if (errors.length > 0) {
    throw new ParseError(`${name} not parsable from object: ${errors.join("; ")}`);
  }

  return buildTolerance(
    cls,
    "object",
    decodeTicks(valueClass.WIDTH, value, numbers),
    plus === undefined ? undefined : decodeTicks(deviation.WIDTH, plus, numbers),
    minus === undefined ? undefined : decodeTicks(deviation.WIDTH, minus, numbers)
  );
}

function decodeSequence<T>(cls: ToleranceClass<T>, items: unknown[], numbers: NumberMode): T {
  const { name, value, deviation } = cls.KIND;
  if (items.length < 1 || items.length > 3) {
    throw new ParseError(`${name} not parsable from an array of ${items.length}, expected 1 to 3 elements`);
  }
  return buildTolerance(
    cls,
    "array",
    decodeTicks(value.WIDTH, items[0], numbers),
    items.length > 1 ? decodeTicks(deviation.WIDTH, items[1], numbers) : undefined,
    items.length > 2 ? decodeTicks(deviation.WIDTH, items[2], numbers) : undefined
  );
}

/**
 * Decodes a tolerance, trying in order:
 *
 * 1. an object with `value`/`v`, `plus`/`p`, `minus`/`m`
 *    (missing minus is `-plus`, missing plus and minus are zero)
 * 2. an array `[value]`, `[value, tol]` or `[value, plus, minus]`
 * 3. a tolerance string, see `Tolerance.parse`
 * 4. a single number or bigint as value without tolerance
 *
 * Every number in the input is read the same way, see {@link NumberMode}.
 */
export function decodeTolerance<T>(cls: ToleranceClass<T>, input: unknown, options: DecodeOptions = {}): T {
  const { name, value } = cls.KIND;
  const numbers = options.numbers ?? "ticks";
  if (isRecord(input)) return decodeRecord(cls, input, numbers);
  if (Array.isArray(input)) return decodeSequence(cls, input, numbers);
  if (typeof input === "string") return parseTolerance(cls, input);
  if (typeof input === "number" || typeof input === "bigint") {
    return new cls(decodeTicks(value.WIDTH, input, numbers));
  }
  throw new ParseError(`${name} not parsable from ${describeInput(input)}`);
}

/**
 * Like {@link decodeTolerance}, but `null` and `undefined` decode to `undefined`.
 */
export function decodeOptionalTolerance<T>(
  cls: ToleranceClass<T>,
  input: unknown,
  options: DecodeOptions = {}
): T | undefined {
  if (input === null || input === undefined) return undefined;
  return decodeTolerance(cls, input, options);
}

/**
 * Reads `{ value, plus, minus }` in millimeters, the form `encodeFloatStruct` writes.
 */
export function decodeFloatStruct<T>(cls: ToleranceClass<T>, input: unknown): T {
  if (!isRecord(input)) {
    throw new ParseError(`${cls.KIND.name} float struct expected an object, got ${describeInput(input)}`);
  }
  return decodeRecord(cls, input, "mm");
}

/**
 * Reads `[value, plus, minus]` in millimeters, the form `encodeFloatSeq` writes.
 */
export function decodeFloatSeq<T>(cls: ToleranceClass<T>, input: unknown): T {
  if (!Array.isArray(input)) {
    throw new ParseError(`${cls.KIND.name} float sequence expected an array, got ${describeInput(input)}`);
  }
  return decodeSequence(cls, input, "mm");
}

/**
 * Empty-string policy "blank means zero": a blank text decodes to `ZERO`.
 */
export function toleranceFromStringOrZero<T>(cls: ToleranceClass<T>, text: string): T {
  if (text.trim().length === 0) return new cls(0n);
  return parseTolerance(cls, text);
}

/**
 * Empty-string policy "blank means absent": a blank text decodes to `undefined`.
 */
export function toleranceFromStringOrAbsent<T>(cls: ToleranceClass<T>, text: string): T | undefined {
  if (text.trim().length === 0) return undefined;
  return parseTolerance(cls, text);
}
