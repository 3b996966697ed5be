import type { FloatStruct, FloatTuple, HasToleranceString, ToleranceJson } from "../types.js";

interface ToleranceFields {
  toJSON(): ToleranceJson;
  toFloatStruct(): FloatStruct;
  toFloatTuple(): FloatTuple;
}

/**
 * Single-string form, e.g. `"10.0 +/-0.1"`. An absent tolerance encodes as `null`.
 */
export function encodeToleranceString(tolerance: HasToleranceString | undefined): string | null {
  return tolerance === undefined ? null : tolerance.toToleranceString();
}

/** Default structured form: ticks per field. */
export function encodeStruct(tolerance: ToleranceFields): ToleranceJson {
  return tolerance.toJSON();
}

/** `{ value, plus, minus }` in millimeters. */
export function encodeFloatStruct(tolerance: ToleranceFields): FloatStruct {
  return tolerance.toFloatStruct();
}

/** `[value, plus, minus]` in millimeters. */
export function encodeFloatSeq(tolerance: ToleranceFields): FloatTuple {
  return tolerance.toFloatTuple();
}
