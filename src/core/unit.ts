import { ContractViolationError } from "./errors.js";

/**
 * A length unit expressed as a multiple of the base tick (1/10 μ).
 *
 * Used to round, floor and convert lengths into other units.
 */
export class Unit {
  /** Micrometer, `potency(1)`. */
  static readonly MICROMETER = new Unit(10n);
  /** Millimeter, `1 mm = 1000 μ`, `potency(4)`. */
  static readonly MILLIMETER = new Unit(1_000n * Unit.MICROMETER.ticks);
  /** Centimeter, `potency(5)`. */
  static readonly CENTIMETER = new Unit(10n * Unit.MILLIMETER.ticks);
  /** Inch, `1 in = 25.4 mm`. */
  static readonly INCH = new Unit(25_400n * Unit.MICROMETER.ticks);
  /** Foot, `1 ft = 12 in = 304.8 mm`. */
  static readonly FOOT = new Unit(12n * Unit.INCH.ticks);
  /** Yard, `1 yd = 3 ft = 914.4 mm`. */
  static readonly YARD = new Unit(3n * Unit.FOOT.ticks);
  /** Meter, `potency(7)`. */
  static readonly METER = new Unit(1_000n * Unit.MILLIMETER.ticks);
  /** Kilometer, `potency(10)`. */
  static readonly KILOMETER = new Unit(1_000n * Unit.METER.ticks);
  /** Mile, `1 mi = 1760 yd = 1609.344 m`. */
  static readonly MILE = new Unit(1_760n * Unit.YARD.ticks);

  /** Ticks per unit. */
  readonly ticks: bigint;

  constructor(ticks: bigint) {
    if (ticks < 0n) {
      throw new ContractViolationError(`A unit cannot be negative, got ${ticks} ticks`);
    }
    this.ticks = ticks;
  }

  /**
   * Ten to the power of `p` ticks.
   */
  static potency(p: number): Unit {
    if (!Number.isSafeInteger(p) || p < 0) {
      throw new ContractViolationError(`Unit potency must be a non-negative integer, got ${p}`);
    }
    return new Unit(10n ** BigInt(p));
  }

  times(factor: number | bigint): Unit {
    return new Unit(this.ticks * toIntegerFactor(factor));
  }

  equals(other: Unit): boolean {
    return this.ticks === other.ticks;
  }

  compare(other: Unit): -1 | 0 | 1 {
    if (this.ticks === other.ticks) return 0;
    return this.ticks < other.ticks ? -1 : 1;
  }

  toString(): string {
    return `Unit(${this.ticks})`;
  }
}

/**
 * Accepts a safe integer `number` or a `bigint` as an integer scalar.
 */
export function toIntegerFactor(factor: number | bigint): bigint {
  if (typeof factor === "bigint") return factor;
  if (!Number.isSafeInteger(factor)) {
    throw new ContractViolationError(`Expected an integer factor, got ${factor}`);
  }
  return BigInt(factor);
}
