import { FixedLength } from "./fixedLength.js";
import { WIDTH_16, WIDTH_32, WIDTH_64 } from "./width.js";

/**
 * # 16bit length
 *
 * Holds at most ±3.2767 mm. Meant for deviations of a {@link NarrowTolerance}.
 *
 * ```ts
 * const dev = Length16.from(1.5);
 * dev.format();     // "1.5"
 * dev.format(4);    // "1.5000"
 * dev.format(0, { alternate: true }); // "15000"
 * ```
 */
export class Length16 extends FixedLength<Length16> {
  static readonly WIDTH = WIDTH_16;
  static readonly ONE = new Length16(10_000n);
  static readonly ZERO = new Length16(0n);
  static readonly MIN = new Length16(WIDTH_16.min);
  static readonly MAX = new Length16(WIDTH_16.max);

  constructor(ticks: bigint) {
    super(ticks, WIDTH_16);
  }

  protected create(ticks: bigint): Length16 {
    return new Length16(ticks);
  }
}

/**
 * # 32bit length
 *
 * Holds at most ±214.7483647 m.
 */
export class Length32 extends FixedLength<Length32, Length16> {
  static readonly WIDTH = WIDTH_32;
  static readonly ONE = new Length32(10_000n);
  static readonly ZERO = new Length32(0n);
  static readonly MIN = new Length32(WIDTH_32.min);
  static readonly MAX = new Length32(WIDTH_32.max);

  constructor(ticks: bigint) {
    super(ticks, WIDTH_32);
  }

  protected create(ticks: bigint): Length32 {
    return new Length32(ticks);
  }
}

/**
 * # 64bit length
 *
 * `10` ticks are 1 μ, `10_000` are 1 mm and `10_000_000` are 1 m.
 *
 * ```ts
 * const len = Length64.from(12.5);
 * len.format(4);                        // "12.5000"
 * len.format(2);                        // "12.50"
 * len.format(undefined, { alternate: true }); // "125000"
 * ```
 */
export class Length64 extends FixedLength<Length64, Length32 | Length16> {
  static readonly WIDTH = WIDTH_64;
  static readonly ONE = new Length64(10_000n);
  static readonly ZERO = new Length64(0n);
  static readonly MIN = new Length64(WIDTH_64.min);
  static readonly MAX = new Length64(WIDTH_64.max);

  constructor(ticks: bigint) {
    super(ticks, WIDTH_64);
  }

  protected create(ticks: bigint): Length64 {
    return new Length64(ticks);
  }
}
