export type { Endian } from "./length/bytes.js";
export type { Width } from "./length/width.js";
export type { FormatOptions } from "./text/format.js";
export type { LengthClass, LengthInput, Ticked } from "./length/fixedLength.js";

/**
 * Implemented by every tolerance type; the single-string wire form.
 */
export interface HasToleranceString {
  toToleranceString(): string;
}

/** Tolerance fields in millimeters, for consumers without fixed-point support. */
export interface FloatStruct {
  value: number;
  plus: number;
  minus: number;
}

export type FloatTuple = [value: number, plus: number, minus: number];

/**
 * A length on the wire: ticks as an integer, millimeters as a fractional
 * number, or millimeter text.
 */
export type LengthJson = number | string;

export interface ToleranceJson {
  value: LengthJson;
  plus: LengthJson;
  minus: LengthJson;
}
