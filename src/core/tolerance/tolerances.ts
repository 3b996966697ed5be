import type { LengthInput } from "../length/fixedLength.js";
import { Length16, Length32, Length64 } from "../length/lengths.js";
import { Tolerance, type ToleranceKind } from "./tolerance.js";

const NARROW_KIND: ToleranceKind<Length32, Length16> = {
  name: "NarrowTolerance",
  value: Length32,
  deviation: Length16
};

const WIDE_KIND: ToleranceKind<Length64, Length32> = {
  name: "WideTolerance",
  value: Length64,
  deviation: Length32
};

/**
 * # 64bit tolerance
 *
 * A {@link Length32} value with {@link Length16} deviations (at most ±3.2767 mm).
 */
export class NarrowTolerance extends Tolerance<NarrowTolerance, Length32, Length16> {
  static readonly KIND = NARROW_KIND;
  static readonly ZERO = new NarrowTolerance(0n);

  constructor(value: LengthInput, plus?: LengthInput, minus?: LengthInput) {
    super(NARROW_KIND, value, plus, minus);
  }

  protected create(value: LengthInput, plus?: LengthInput, minus?: LengthInput): NarrowTolerance {
    return new NarrowTolerance(value, plus, minus);
  }
}

/**
 * # 128bit tolerance
 *
 * A {@link Length64} value with {@link Length32} deviations.
 *
 * ```ts
 * WideTolerance.parse("12 .4 -1");   // value 12, plus 0.4, minus -1
 * WideTolerance.parse("12.0 +-0.4"); // symmetric
 * WideTolerance.parse("12.0");       // no tolerance
 * ```
 */
export class WideTolerance extends Tolerance<WideTolerance, Length64, Length32> {
  static readonly KIND = WIDE_KIND;
  static readonly ZERO = new WideTolerance(0n);

  constructor(value: LengthInput, plus?: LengthInput, minus?: LengthInput) {
    super(WIDE_KIND, value, plus, minus);
  }

  protected create(value: LengthInput, plus?: LengthInput, minus?: LengthInput): WideTolerance {
    return new WideTolerance(value, plus, minus);
  }
}
