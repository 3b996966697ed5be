import assert from "node:assert/strict";
import { describe, it } from "vitest";
import { OverflowError, ParseError } from "../core/errors.js";
import { Length32, Length64 } from "../core/length/lengths.js";
import { NarrowTolerance, WideTolerance } from "../core/tolerance/tolerances.js";
import {
  decodeFloatSeq,
  decodeFloatStruct,
  decodeLength,
  decodeOptionalTolerance,
  decodeTolerance,
  toleranceFromStringOrAbsent,
  toleranceFromStringOrZero
} from "../core/wire/decode.js";
import { encodeFloatSeq, encodeFloatStruct, encodeStruct, encodeToleranceString } from "../core/wire/encode.js";

function ticksOf(t: WideTolerance | NarrowTolerance): [bigint, bigint, bigint] {
  return [t.value.ticks, t.plus.ticks, t.minus.ticks];
}

describe("decodeLength", () => {
  it("reads strings as millimeters", () => {
    assert.equal(decodeLength(Length64, "23.004").ticks, 230_040n);
    assert.equal(decodeLength(Length64, ".04").ticks, 400n);
  });

  it("reads numbers as ticks by default", () => {
    assert.equal(decodeLength(Length64, 4_000).ticks, 4_000n);
    assert.equal(decodeLength(Length64, 7n).ticks, 7n);
  });

  it("reads every number as millimeters in mm mode", () => {
    assert.equal(decodeLength(Length64, 0.25, { numbers: "mm" }).ticks, 2_500n);
    assert.equal(decodeLength(Length64, 12.5, { numbers: "mm" }).ticks, 125_000n);
    assert.equal(decodeLength(Length64, 10, { numbers: "mm" }).ticks, 100_000n);
    assert.equal(decodeLength(Length64, 7n, { numbers: "mm" }).ticks, 7n);
  });

  it("rejects tick numbers that are fractional or beyond 2^53", () => {
    assert.throws(
      () => decodeLength(Length64, 0.25),
      (err: ParseError) =>
        err.message ===
        'Expected a safe integer tick count for a Length64, got 0.25; pass a string or bigint, or decode with numbers: "mm"'
    );
    assert.throws(() => decodeLength(Length64, 2 ** 53), ParseError);
    assert.equal(decodeLength(Length64, 2 ** 53 - 1).ticks, 9_007_199_254_740_991n);
    assert.equal(decodeLength(Length64, 9_007_199_254_740_993n).ticks, 9_007_199_254_740_993n);
  });

  it("rejects other inputs", () => {
    assert.throws(() => decodeLength(Length64, "nonumber"), ParseError);
    assert.throws(
      () => decodeLength(Length64, true),
      (err: ParseError) => err.message === "Expected a number, string or bigint for a Length64, got boolean"
    );
    assert.throws(
      () => decodeLength(Length32, null),
      (err: ParseError) => err.message === "Expected a number, string or bigint for a Length32, got null"
    );
  });

  it("range checks the result", () => {
    assert.throws(() => decodeLength(Length32, "300000"), OverflowError);
  });
});

describe("decodeTolerance", () => {
  it("reads objects with long or short field names", () => {
    assert.deepEqual(
      ticksOf(decodeTolerance(WideTolerance, { value: 125_000, plus: 3_000, minus: -2_000 })),
      [125_000n, 3_000n, -2_000n]
    );
    assert.deepEqual(
      ticksOf(decodeTolerance(WideTolerance, { v: "12.5", p: "0.3", m: "-0.2" })),
      [125_000n, 3_000n, -2_000n]
    );
  });

  it("fills in missing deviations", () => {
    assert.deepEqual(
      ticksOf(decodeTolerance(WideTolerance, { value: "12.5", plus: "0.3" })),
      [125_000n, 3_000n, -3_000n]
    );
    assert.deepEqual(ticksOf(decodeTolerance(WideTolerance, { value: 10 })), [10n, 0n, 0n]);
  });

  it("rejects incomplete objects", () => {
    assert.throws(
      () => decodeTolerance(WideTolerance, { plus: 1 }),
      (err: ParseError) => err.message === "WideTolerance not parsable from object: value is missing"
    );
    assert.throws(
      () => decodeTolerance(WideTolerance, { value: 1, minus: -1 }),
      (err: ParseError) => err.message === "WideTolerance not parsable from object: minus is given without plus"
    );
  });

  it("reports an unordered range as a parse error", () => {
    assert.throws(
      () => decodeTolerance(WideTolerance, { value: 1, plus: 1, minus: 2 }),
      (err: ParseError) =>
        err.message === "WideTolerance not parsable from 'object': plus 0.0001 is below minus 0.0002"
    );
  });

  it("reads arrays of 1 to 3 elements", () => {
    assert.deepEqual(ticksOf(decodeTolerance(WideTolerance, [125_000])), [125_000n, 0n, 0n]);
    assert.deepEqual(ticksOf(decodeTolerance(WideTolerance, [125_000, 3_000])), [125_000n, 3_000n, -3_000n]);
    assert.deepEqual(
      ticksOf(decodeTolerance(WideTolerance, [12.5, 0.25, -0.5], { numbers: "mm" })),
      [125_000n, 2_500n, -5_000n]
    );
    assert.throws(() => decodeTolerance(WideTolerance, []), ParseError);
    assert.throws(() => decodeTolerance(WideTolerance, [1, 2, 3, 4]), ParseError);
  });

  it("reads tolerance text", () => {
    assert.deepEqual(
      ticksOf(decodeTolerance(WideTolerance, "12.5 +0.3/-0.2")),
      [125_000n, 3_000n, -2_000n]
    );
  });

  it("reads a single number as the value", () => {
    assert.deepEqual(ticksOf(decodeTolerance(WideTolerance, 125_000)), [125_000n, 0n, 0n]);
    assert.deepEqual(ticksOf(decodeTolerance(WideTolerance, 12.5, { numbers: "mm" })), [125_000n, 0n, 0n]);
    assert.throws(() => decodeTolerance(WideTolerance, 12.5), ParseError);
  });

  it("rejects null and booleans", () => {
    assert.throws(
      () => decodeTolerance(WideTolerance, null),
      (err: ParseError) => err.message === "WideTolerance not parsable from null"
    );
    assert.throws(() => decodeTolerance(NarrowTolerance, false), ParseError);
  });

  it("reads one record with a single number mode", () => {
    assert.deepEqual(ticksOf(decodeTolerance(WideTolerance, [10, 1_000])), [10n, 1_000n, -1_000n]);
    assert.throws(() => decodeTolerance(WideTolerance, [10, 0.1]), ParseError);
    assert.deepEqual(
      ticksOf(decodeTolerance(WideTolerance, [10, 0.1], { numbers: "mm" })),
      [100_000n, 1_000n, -1_000n]
    );
  });

  it("rejects integers that lost precision in JSON", () => {
    const input: unknown = JSON.parse('{"value": 9007199254740993, "plus": 1}');
    assert.throws(() => decodeTolerance(WideTolerance, input), ParseError);
    assert.deepEqual(
      ticksOf(decodeTolerance(WideTolerance, { value: "900719925474.0993", plus: 1 })),
      [9_007_199_254_740_993n, 1n, -1n]
    );
  });

  it("range checks deviations", () => {
    assert.throws(() => decodeTolerance(NarrowTolerance, [0, 40_000]), OverflowError);
  });
});

describe("optional and blank inputs", () => {
  it("decodes null and undefined to undefined", () => {
    assert.equal(decodeOptionalTolerance(WideTolerance, null), undefined);
    assert.equal(decodeOptionalTolerance(WideTolerance, undefined), undefined);
    assert.equal(decodeOptionalTolerance(WideTolerance, "1")?.value.ticks, 10_000n);
  });

  it("treats blank text as zero or absent", () => {
    assert.ok(toleranceFromStringOrZero(WideTolerance, "  ").equals(WideTolerance.ZERO));
    assert.equal(toleranceFromStringOrAbsent(WideTolerance, ""), undefined);
    assert.equal(toleranceFromStringOrZero(NarrowTolerance, "1 0.1").plus.ticks, 1_000n);
    assert.equal(toleranceFromStringOrAbsent(NarrowTolerance, "1 0.1")?.minus.ticks, -1_000n);
  });
});

describe("encoders", () => {
  const t = new WideTolerance(125_000n, 1_000n, -2_500n);

  it("encodes the text form", () => {
    assert.equal(encodeToleranceString(WideTolerance.withSym(100_000n, 1_000n)), "10.0 +/-0.1");
    assert.equal(encodeToleranceString(undefined), null);
  });

  it("encodes structured forms", () => {
    assert.deepEqual(encodeStruct(t), { value: 125_000, plus: 1_000, minus: -2_500 });
    assert.deepEqual(encodeFloatStruct(t), { value: 12.5, plus: 0.1, minus: -0.25 });
    assert.deepEqual(encodeFloatSeq(t), [12.5, 0.1, -0.25]);
  });

  it("decodes what it encodes", () => {
    const roundTrip = (input: unknown): unknown => JSON.parse(JSON.stringify(input));
    const huge = new WideTolerance(Length64.MAX, 1n, -1n);
    const narrow = new NarrowTolerance(-5n, 2n, 0n);

    assert.deepEqual(roundTrip(huge), { value: "922337203685477.5807", plus: 1, minus: -1 });
    assert.ok(decodeTolerance(WideTolerance, roundTrip(t)).equals(t));
    assert.ok(decodeTolerance(WideTolerance, roundTrip(huge)).equals(huge));
    assert.ok(decodeTolerance(NarrowTolerance, roundTrip(narrow)).equals(narrow));
    assert.ok(decodeTolerance(WideTolerance, encodeToleranceString(t)).equals(t));
  });

  it("decodes the float forms it encodes", () => {
    const roundTrip = (input: unknown): unknown => JSON.parse(JSON.stringify(input));
    const samples = [
      t,
      WideTolerance.withSym(10, 0.1),
      new WideTolerance(-3_500n, 7n, -1_403n),
      new WideTolerance(123_456_789n, 0n, -3n)
    ];
    for (const sample of samples) {
      assert.ok(decodeFloatStruct(WideTolerance, roundTrip(encodeFloatStruct(sample))).equals(sample));
      assert.ok(decodeFloatSeq(WideTolerance, roundTrip(encodeFloatSeq(sample))).equals(sample));
    }
    const narrow = new NarrowTolerance(20_000n, 50n, -50n);
    assert.ok(decodeFloatSeq(NarrowTolerance, roundTrip(encodeFloatSeq(narrow))).equals(narrow));
  });

  it("reads a symmetric tolerance from its float struct", () => {
    const decoded = decodeFloatStruct(WideTolerance, { value: 10, plus: 0.1, minus: -0.1 });
    assert.equal(decoded.toDebugString(), "WideTolerance(10.0000 +0.1000 -0.1000)");
  });

  it("checks the shape of the float forms", () => {
    assert.throws(() => decodeFloatStruct(WideTolerance, [10, 0.1]), ParseError);
    assert.throws(() => decodeFloatSeq(WideTolerance, { value: 10 }), ParseError);
  });
});
