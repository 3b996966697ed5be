import { TICKS_PER_MM } from "../constants.js";
import { ContractViolationError, OverflowError, ParseError } from "../errors.js";
import { formatTicks, type FormatOptions } from "../text/format.js";
import { parseTicks } from "../text/parse.js";
import { floorTicks, roundTicks } from "../text/rounding.js";
import { toIntegerFactor, Unit } from "../unit.js";
import { ticksFromBytes, ticksToBytes, type Endian } from "./bytes.js";
import { fits, type Width } from "./width.js";

/**
 * Anything that carries a tick count of a known width.
 */
export interface Ticked {
  readonly ticks: bigint;
  readonly width: Width;
}

/**
 * Accepted wherever a length is converted from a loose input:
 *
 * - `number`: millimeters, digits past the 4th decimal truncated
 * - `bigint`: raw ticks
 * - `string`: millimeter text, see {@link parseTicks}
 * - `Unit`: the unit's tick count
 * - another length: widened, or narrowed with a range check
 */
export type LengthInput = number | bigint | string | Unit | Ticked;

export interface LengthClass<T> {
  new (ticks: bigint): T;
  readonly WIDTH: Width;
}

/**
 * Converts a loose input into ticks that fit `width`.
 * Throws `ParseError` for bad text or `NaN` and `OverflowError` for
 * out-of-range values.
 */
export function toTicks(width: Width, input: LengthInput): bigint {
  let ticks: bigint;
  if (typeof input === "number") {
    if (Number.isNaN(input)) {
      throw new ParseError(`NaN is not a length, can't convert it into a ${width.name}!`);
    }
    if (!Number.isFinite(input)) {
      throw new OverflowError(`${input} is beyond the limits of a ${width.name}`, width.name);
    }
    ticks = millimetersToTicks(input, width.name);
    if (!fits(width, ticks)) {
      throw new OverflowError(`The number ${input} is beyond the limits of a ${width.name}`, width.name);
    }
    return ticks;
  }
  if (typeof input === "string") {
    ticks = parseTicks(input, width.name);
    if (!fits(width, ticks)) {
      throw new OverflowError(`${input.trim()} is too big for a ${width.name}`, width.name);
    }
    return ticks;
  }
  ticks = typeof input === "bigint" ? input : input.ticks;
  if (!fits(width, ticks)) {
    throw new OverflowError(`${ticks} ticks are out of range for a ${width.name}`, width.name);
  }
  return ticks;
}

/**
 * Reads a float through its shortest decimal text, so `ticks / 10_000`
 * converts back to exactly `ticks`. Exponent forms fall back to scaling.
 */
function millimetersToTicks(mm: number, typeName: string): bigint {
  const text = String(mm);
  if (/e/i.test(text)) return BigInt(Math.trunc(mm * Number(TICKS_PER_MM)));
  return parseTicks(text, typeName);
}

/** Same-width or narrower lengths, or integer ticks. */
function ticksOf(operand: Ticked | number | bigint): bigint {
  if (typeof operand === "object") return operand.ticks;
  return toIntegerFactor(operand);
}

/**
 * An exact length stored as a signed integer count of ticks (1/10 μ).
 *
 * `T` is the concrete type, `N` the union of narrower types that `add` and
 * `sub` widen implicitly. Instances are immutable; every operation returns a
 * new value. Arithmetic that leaves the width throws a
 * `ContractViolationError`, conversions throw an `OverflowError`.
 */
export abstract class FixedLength<T extends FixedLength<T, N>, N extends Ticked = never> implements Ticked {
  readonly ticks: bigint;
  readonly width: Width;

  protected constructor(ticks: bigint, width: Width) {
    if (!fits(width, ticks)) {
      throw new OverflowError(`${ticks} ticks are out of range for a ${width.name}`, width.name);
    }
    this.ticks = ticks;
    this.width = width;
  }

  static from<L>(this: LengthClass<L>, input: LengthInput): L {
    return new this(toTicks(this.WIDTH, input));
  }

  /**
   * Parses millimeter text like `"12.5"`, `"-.044"` or `" +2.07"`.
   */
  static parse<L>(this: LengthClass<L>, text: string): L {
    return new this(toTicks(this.WIDTH, text));
  }

  static fromBytes<L>(this: LengthClass<L>, bytes: Uint8Array, endian: Endian = "big"): L {
    if (bytes.length !== this.WIDTH.bytes) {
      throw new ParseError(`Expected ${this.WIDTH.bytes} bytes for a ${this.WIDTH.name}, got ${bytes.length}`);
    }
    return new this(ticksFromBytes(bytes, 0, this.WIDTH, endian));
  }

  static sum<L extends FixedLength<L, Ticked>>(this: LengthClass<L>, items: Iterable<L>): L {
    let total = new this(0n);
    for (const item of items) total = total.add(item);
    return total;
  }

  static compare<L extends FixedLength<L, Ticked>>(a: L, b: L): -1 | 0 | 1 {
    return a.compare(b);
  }

  protected abstract create(ticks: bigint): T;

  private checked(ticks: bigint, operation: string): T {
    if (!fits(this.width, ticks)) {
      throw new ContractViolationError(`${this.width.name} overflow in ${operation}`);
    }
    return this.create(ticks);
  }

  /**
   * A plain `number` or `bigint` operand is integer ticks, like the
   * factor of {@link mul}; a fractional number is a contract violation.
   */
  add(other: T | N | number | bigint): T {
    return this.checked(this.ticks + ticksOf(other), "addition");
  }

  sub(other: T | N | number | bigint): T {
    return this.checked(this.ticks - ticksOf(other), "subtraction");
  }

  mul(factor: number | bigint): T {
    return this.checked(this.ticks * toIntegerFactor(factor), "multiplication");
  }

  /** Truncates toward zero. */
  div(divisor: number | bigint): T {
    const d = toIntegerFactor(divisor);
    if (d === 0n) {
      throw new ContractViolationError(`${this.width.name} division by zero`);
    }
    return this.checked(this.ticks / d, "division");
  }

  neg(): T {
    return this.checked(-this.ticks, "negation");
  }

  abs(): T {
    return this.ticks < 0n ? this.neg() : this.create(this.ticks);
  }

  absDiff(other: T): T {
    const diff = this.ticks - other.ticks;
    return this.checked(diff < 0n ? -diff : diff, "absolute difference");
  }

  signum(): -1 | 0 | 1 {
    if (this.ticks < 0n) return -1;
    return this.ticks > 0n ? 1 : 0;
  }

  isNegative(): boolean {
    return this.ticks < 0n;
  }

  isPositive(): boolean {
    return this.ticks > 0n;
  }

  isZero(): boolean {
    return this.ticks === 0n;
  }

  /**
   * Rounds to the nearest multiple of `unit`, ties away from zero.
   */
  round(unit: Unit): T {
    return this.checked(roundTicks(this.ticks, unit.ticks), "rounding");
  }

  /**
   * Nearest multiple of `unit` less than or equal to this value.
   */
  floor(unit: Unit): T {
    return this.checked(floorTicks(this.ticks, unit.ticks), "floor");
  }

  compare(other: T): -1 | 0 | 1 {
    if (this.ticks === other.ticks) return 0;
    return this.ticks < other.ticks ? -1 : 1;
  }

  equals(other: T): boolean {
    return this.ticks === other.ticks;
  }

  lt(other: T): boolean {
    return this.ticks < other.ticks;
  }

  le(other: T): boolean {
    return this.ticks <= other.ticks;
  }

  gt(other: T): boolean {
    return this.ticks > other.ticks;
  }

  ge(other: T): boolean {
    return this.ticks >= other.ticks;
  }

  /** Millimeters as a float. */
  toMillimeters(): number {
    return Number(this.ticks) / Number(TICKS_PER_MM);
  }

  inUnit(unit: Unit): number {
    if (unit.ticks === 0n) {
      throw new ContractViolationError("Cannot express a length in a zero unit");
    }
    return Number(this.ticks) / Number(unit.ticks);
  }

  toBigInt(): bigint {
    return this.ticks;
  }

  toBytes(endian: Endian = "big"): Uint8Array {
    return ticksToBytes(this.ticks, this.width, endian);
  }

  /**
   * Millimeters with `precision` fraction digits (at most 4). Without a
   * precision the fewest digits that keep the value exact are used.
   */
  format(precision?: number, options?: FormatOptions): string {
    return formatTicks(this.ticks, precision, options);
  }

  toString(): string {
    return this.format();
  }

  toDebugString(): string {
    return `${this.width.name}(${formatTicks(this.ticks, 4)})`;
  }

  /**
   * Ticks as a number when that is exact, otherwise the 4-digit millimeter text.
   */
  toJSON(): number | string {
    const n = Number(this.ticks);
    return Number.isSafeInteger(n) ? n : formatTicks(this.ticks, 4);
  }
}
