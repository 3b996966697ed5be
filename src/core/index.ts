export { Unit } from "./unit.js";
export { FixedLength, toTicks } from "./length/fixedLength.js";
export { Length16, Length32, Length64 } from "./length/lengths.js";
export { WIDTH_16, WIDTH_32, WIDTH_64 } from "./length/width.js";
export { Tolerance, buildTolerance, parseTolerance } from "./tolerance/tolerance.js";
export { NarrowTolerance, WideTolerance } from "./tolerance/tolerances.js";
export { autoPrecision, formatTicks } from "./text/format.js";
export { parseTicks, splitToleranceText } from "./text/parse.js";
export { floorTicks, roundTicks } from "./text/rounding.js";
export {
  decodeFloatSeq,
  decodeFloatStruct,
  decodeLength,
  decodeOptionalTolerance,
  decodeTicks,
  decodeTolerance,
  toleranceFromStringOrAbsent,
  toleranceFromStringOrZero
} from "./wire/decode.js";
export { encodeFloatSeq, encodeFloatStruct, encodeStruct, encodeToleranceString } from "./wire/encode.js";
export {
  ContractViolationError,
  OverflowError,
  ParseError,
  ToleranceError
} from "./errors.js";
export { MAX_PRECISION, TICKS_PER_MM } from "./constants.js";
export type {
  Endian,
  FloatStruct,
  FloatTuple,
  FormatOptions,
  HasToleranceString,
  LengthClass,
  LengthInput,
  LengthJson,
  Ticked,
  ToleranceJson,
  Width
} from "./types.js";
export type { ToleranceErrorKind } from "./errors.js";
export type { ToleranceClass, ToleranceKind } from "./tolerance/tolerance.js";
export type { DecodeOptions, NumberMode } from "./wire/decode.js";
