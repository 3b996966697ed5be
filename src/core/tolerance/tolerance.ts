import { MAX_PRECISION, MAX_TOLERANCE_TOKENS } from "../constants.js";
import { ContractViolationError, ParseError } from "../errors.js";
import { concatBytes, ticksFromBytes, type Endian } from "../length/bytes.js";
import {
  toTicks,
  type FixedLength,
  type LengthClass,
  type LengthInput,
  type Ticked
} from "../length/fixedLength.js";
import { formatTicks, resolvePrecision } from "../text/format.js";
import { parseTicks, splitToleranceText } from "../text/parse.js";
import { roundTicks } from "../text/rounding.js";
import type { FloatStruct, FloatTuple, HasToleranceString, ToleranceJson } from "../types.js";
import { toIntegerFactor } from "../unit.js";

/**
 * The length types a tolerance is built from.
 */
export interface ToleranceKind<V, D> {
  readonly name: string;
  readonly value: LengthClass<V>;
  readonly deviation: LengthClass<D>;
}

export interface ToleranceClass<T> {
  new (value: LengthInput, plus?: LengthInput, minus?: LengthInput): T;
  readonly KIND: ToleranceKind<unknown, unknown>;
}

/**
 * Builds a tolerance from external input, reporting `plus < minus` as a
 * `ParseError` instead of a contract violation.
 */
export function buildTolerance<T>(
  cls: ToleranceClass<T>,
  source: string,
  value: LengthInput,
  plus?: LengthInput,
  minus?: LengthInput
): T {
  const { name } = cls.KIND;
  if (plus !== undefined) {
    const p = toTicks(cls.KIND.deviation.WIDTH, plus);
    const m = minus === undefined ? -p : toTicks(cls.KIND.deviation.WIDTH, minus);
    if (p < m) {
      throw new ParseError(
        `${name} not parsable from '${source}': plus ${formatTicks(p)} is below minus ${formatTicks(m)}`
      );
    }
  }
  return new cls(value, plus, minus);
}

export function parseTolerance<T>(cls: ToleranceClass<T>, text: string): T {
  const { name } = cls.KIND;
  const tokens = splitToleranceText(text);
  if (tokens.length === 0) {
    throw new ParseError(`Cannot parse an empty string into a ${name}!`);
  }
  if (tokens.length > MAX_TOLERANCE_TOKENS) {
    throw new ParseError(`${name} not parsable from '${text}': expected at most 3 parts, got ${tokens.length}`);
  }
  const ticks = tokens.map((token) => parseTicks(token, name));
  return buildTolerance(cls, text, ticks[0], ticks[1], ticks[2]);
}

/**
 * A nominal length with an upper (`plus`) and lower (`minus`) deviation.
 *
 * `plus >= minus` always holds. The deviations use a type of half the
 * width of the value. Instances are immutable.
 *
 * ```ts
 * const width = new WideTolerance(100.0, 0.05, -0.2);
 * width.format(2);        // "100.00 +0.05/-0.20"
 * width.toDebugString();  // "WideTolerance(100.0000 +0.0500 -0.2000)"
 * ```
 */
export abstract class Tolerance<
  T extends Tolerance<T, V, D>,
  V extends FixedLength<V, D>,
  D extends FixedLength<D, Ticked>
> implements HasToleranceString {
  readonly value: V;
  readonly plus: D;
  readonly minus: D;
  private readonly kind: ToleranceKind<V, D>;

  /**
   * Without `minus` the tolerance is symmetric around `value`; without
   * `plus` both deviations are zero.
   */
  protected constructor(kind: ToleranceKind<V, D>, value: LengthInput, plus?: LengthInput, minus?: LengthInput) {
    const v = new kind.value(toTicks(kind.value.WIDTH, value));
    const p = new kind.deviation(toTicks(kind.deviation.WIDTH, plus ?? 0n));
    const m = minus === undefined ? p.neg() : new kind.deviation(toTicks(kind.deviation.WIDTH, minus));
    if (p.lt(m)) {
      const range = `${p.format(undefined, { signed: true })}/${m.format(undefined, { signed: true })}`;
      throw new ContractViolationError(`Plus has to be bigger than minus in a ${kind.name}, got ${range}`);
    }
    this.kind = kind;
    this.value = v;
    this.plus = p;
    this.minus = m;
  }

  /**
   * Symmetric tolerance, same as `new T(value, tol, -tol)`.
   */
  static withSym<L>(this: ToleranceClass<L>, value: LengthInput, tol: LengthInput): L {
    return new this(value, tol);
  }

  /**
   * Parses text such as `"12 .4 -1"`, `"12/.4/-1"`, `"12;0.4; -1"`,
   * `"12.0 +/-0.4"` or `"12.0"`.
   *
   * 3 parts are value, plus and minus; 2 parts value and a symmetric
   * tolerance; 1 part a value without tolerance.
   */
  static parse<L>(this: ToleranceClass<L>, text: string): L {
    return parseTolerance(this, text);
  }

  /**
   * Reads value, plus and minus in that order.
   */
  static fromBytes<L>(this: ToleranceClass<L>, bytes: Uint8Array, endian: Endian = "big"): L {
    const { name, value, deviation } = this.KIND;
    const size = value.WIDTH.bytes + 2 * deviation.WIDTH.bytes;
    if (bytes.length !== size) {
      throw new ParseError(`Expected ${size} bytes for a ${name}, got ${bytes.length}`);
    }
    const v = ticksFromBytes(bytes, 0, value.WIDTH, endian);
    const p = ticksFromBytes(bytes, value.WIDTH.bytes, deviation.WIDTH, endian);
    const m = ticksFromBytes(bytes, value.WIDTH.bytes + deviation.WIDTH.bytes, deviation.WIDTH, endian);
    return buildTolerance(this, `${bytes.length} bytes`, v, p, m);
  }

  static sum<L extends { add(other: L): L }>(this: ToleranceClass<L>, items: Iterable<L>): L {
    let total = new this(0n);
    for (const item of items) total = total.add(item);
    return total;
  }

  static compare<L extends { compare(other: L): -1 | 0 | 1 }>(a: L, b: L): -1 | 0 | 1 {
    return a.compare(b);
  }

  protected abstract create(value: LengthInput, plus?: LengthInput, minus?: LengthInput): T;

  /** Same value, new deviations. */
  narrow(plus: LengthInput, minus: LengthInput): T {
    return this.create(this.value, plus, minus);
  }

  narrowSym(tol: LengthInput): T {
    return this.create(this.value, tol);
  }

  /** Largest allowed value, `value + plus`. */
  upperLimit(): V {
    return this.value.add(this.plus);
  }

  /** Smallest allowed value, `value + minus`. */
  lowerLimit(): V {
    return this.value.add(this.minus);
  }

  /**
   * `true` if this range lies within `other`'s range.
   */
  isInsideOf(other: T): boolean {
    return this.lowerLimit().ge(other.lowerLimit()) && this.upperLimit().le(other.upperLimit());
  }

  /**
   * `true` if this range covers `other`'s range.
   */
  enfolds(other: T): boolean {
    return this.lowerLimit().le(other.lowerLimit()) && this.upperLimit().ge(other.upperLimit());
  }

  /**
   * Measures in the opposite direction: negates the value and swaps the
   * negated deviations.
   */
  invert(): T {
    return this.create(this.value.neg(), this.minus.neg(), this.plus.neg());
  }

  /** Stacks two tolerances; deviations accumulate. */
  add(other: T): T {
    return this.create(this.value.add(other.value), this.plus.add(other.plus), this.minus.add(other.minus));
  }

  /**
   * Subtracting a range widens by its opposite deviations:
   * `plus - other.minus` and `minus - other.plus`.
   */
  sub(other: T): T {
    return this.create(this.value.sub(other.value), this.plus.sub(other.minus), this.minus.sub(other.plus));
  }

  /** Shifts the nominal value, deviations unchanged. */
  addValue(offset: V): T {
    return this.create(this.value.add(offset), this.plus, this.minus);
  }

  subValue(offset: V): T {
    return this.create(this.value.sub(offset), this.plus, this.minus);
  }

  /**
   * Scales all fields. A negative factor swaps the scaled deviations so the
   * range stays ordered.
   */
  mul(factor: number | bigint): T {
    const k = toIntegerFactor(factor);
    const plus = this.plus.mul(k);
    const minus = this.minus.mul(k);
    return k < 0n ? this.create(this.value.mul(k), minus, plus) : this.create(this.value.mul(k), plus, minus);
  }

  /**
   * Orders by value, then minus, then plus.
   */
  compare(other: T): -1 | 0 | 1 {
    return this.value.compare(other.value) || this.minus.compare(other.minus) || this.plus.compare(other.plus);
  }

  equals(other: T): boolean {
    return this.compare(other) === 0;
  }

  /**
   * Renders `value +plus/-minus`, or `value +/-plus` when symmetric.
   *
   * Without a precision every field shows the fewest digits that keep it
   * exact; with one, every field is rounded to it. `alternate` prints raw
   * ticks and always uses the asymmetric form.
   */
  format(precision?: number, options: { alternate?: boolean } = {}): string {
    const alternate = options.alternate ?? false;
    const p = precision === undefined ? undefined : resolvePrecision(0n, precision);
    const step = p === undefined || alternate ? 0n : 10n ** BigInt(MAX_PRECISION - p);
    const plus = roundTicks(this.plus.ticks, step);
    const minus = roundTicks(this.minus.ticks, step);
    const value = formatTicks(this.value.ticks, p, { alternate });

    if (!alternate && plus === -minus && plus >= 0n) {
      return `${value} +/-${formatTicks(plus, p)}`;
    }
    const plusText = formatTicks(plus, p, { signed: true, alternate });
    const minusText = minus === 0n
      ? `-${formatTicks(minus, p, { alternate })}`
      : formatTicks(minus, p, { signed: true, alternate });
    return `${value} ${plusText}/${minusText}`;
  }

  toString(): string {
    return this.format();
  }

  toToleranceString(): string {
    return this.format();
  }

  toDebugString(): string {
    const v = formatTicks(this.value.ticks, MAX_PRECISION);
    const p = formatTicks(this.plus.ticks, MAX_PRECISION, { signed: true });
    const m = formatTicks(this.minus.ticks, MAX_PRECISION, { signed: true });
    return `${this.kind.name}(${v} ${p} ${m})`;
  }

  toBytes(endian: Endian = "big"): Uint8Array {
    return concatBytes([this.value.toBytes(endian), this.plus.toBytes(endian), this.minus.toBytes(endian)]);
  }

  toFloatStruct(): FloatStruct {
    return {
      value: this.value.toMillimeters(),
      plus: this.plus.toMillimeters(),
      minus: this.minus.toMillimeters()
    };
  }

  toFloatTuple(): FloatTuple {
    return [this.value.toMillimeters(), this.plus.toMillimeters(), this.minus.toMillimeters()];
  }

  toJSON(): ToleranceJson {
    return { value: this.value.toJSON(), plus: this.plus.toJSON(), minus: this.minus.toJSON() };
  }
}
