import { describe, it, expect } from "vitest";

import {
  noneVal,
  boolVal,
  intVal,
  floatVal,
  strVal,
  listVal,
  setVal,
  mapVal,
  sequenceVal,
  truthy,
  isHashable,
  iterateValue,
  valuesEqual,
  valuesIdentical,
  formatValue,
  reprValue,
  toNative,
  toJSON,
  fromNative,
  EvaluationError,
} from "../src/index";
import { formatFloat } from "../src/value";

describe("formatFloat", () => {
  it("keeps a fractional part on integral floats", () => {
    expect(formatFloat(1)).toBe("1.0");
    expect(formatFloat(100)).toBe("100.0");
    expect(formatFloat(150000000)).toBe("150000000.0");
  });

  it("uses the shortest round-trip digits", () => {
    expect(formatFloat(1234.5)).toBe("1234.5");
    expect(formatFloat(0.1)).toBe("0.1");
    expect(formatFloat(-2.5)).toBe("-2.5");
    expect(formatFloat(0.0001)).toBe("0.0001");
  });

  it("switches to scientific notation outside the fixed range", () => {
    expect(formatFloat(1e16)).toBe("1e+16");
    expect(formatFloat(1.5e-5)).toBe("1.5e-05");
    expect(formatFloat(-2.5e20)).toBe("-2.5e+20");
  });

  it("spells out special values", () => {
    expect(formatFloat(NaN)).toBe("nan");
    expect(formatFloat(Infinity)).toBe("inf");
    expect(formatFloat(-Infinity)).toBe("-inf");
    expect(formatFloat(-0)).toBe("-0.0");
    expect(formatFloat(0)).toBe("0.0");
  });
});

describe("reprValue and formatValue", () => {
  it("renders scalars", () => {
    expect(reprValue(noneVal)).toBe("None");
    expect(reprValue(boolVal(true))).toBe("True");
    expect(reprValue(intVal(-3))).toBe("-3");
    expect(reprValue(floatVal(2))).toBe("2.0");
  });

  it("quotes strings", () => {
    expect(reprValue(strVal("x"))).toBe("'x'");
    expect(reprValue(strVal("it's"))).toBe(`"it's"`);
    expect(reprValue(strVal(`a'b"c`))).toBe(`'a\\'b"c'`);
    expect(reprValue(strVal("a\nb\\"))).toBe("'a\\nb\\\\'");
  });

  it("renders collections", () => {
    expect(reprValue(listVal([intVal(1), strVal("a")]))).toBe("[1, 'a']");
    expect(reprValue(setVal([]))).toBe("set()");
    expect(reprValue(setVal([intVal(2), intVal(1)]))).toBe("{2, 1}");
    expect(reprValue(mapVal([[strVal("a"), floatVal(1)]]))).toBe("{'a': 1.0}");
  });

  it("leaves top-level strings unquoted for display", () => {
    expect(formatValue(strVal("custom"))).toBe("custom");
    expect(formatValue(listVal([strVal("custom")]))).toBe("['custom']");
  });
});

describe("Equality and identity", () => {
  it("compares numbers across tags", () => {
    expect(valuesEqual(intVal(1), floatVal(1))).toBe(true);
    expect(valuesEqual(boolVal(true), intVal(1))).toBe(true);
    expect(valuesEqual(intVal(1), floatVal(1.5))).toBe(false);
    expect(valuesEqual(floatVal(NaN), floatVal(NaN))).toBe(false);
  });

  it("compares collections structurally", () => {
    expect(valuesEqual(listVal([intVal(1)]), listVal([floatVal(1)]))).toBe(true);
    expect(valuesEqual(setVal([intVal(1), intVal(2)]), setVal([intVal(2), intVal(1)]))).toBe(true);
    expect(valuesEqual(listVal([]), setVal([]))).toBe(false);
    expect(
      valuesEqual(mapVal([[strVal("a"), intVal(1)]]), mapVal([[strVal("a"), intVal(2)]]))
    ).toBe(false);
  });

  it("treats sequences as equal only to themselves", () => {
    const seq = sequenceVal([intVal(1)]);
    expect(valuesEqual(seq, seq)).toBe(true);
    expect(valuesEqual(seq, sequenceVal([intVal(1)]))).toBe(false);
  });

  it("identifies scalars by tag and value", () => {
    expect(valuesIdentical(intVal(5), intVal(5))).toBe(true);
    expect(valuesIdentical(intVal(1), floatVal(1))).toBe(false);
    expect(valuesIdentical(floatVal(NaN), floatVal(NaN))).toBe(true);
    expect(valuesIdentical(listVal([]), listVal([]))).toBe(false);
  });
});

describe("Truthiness and iteration", () => {
  it("follows emptiness and zero", () => {
    expect(truthy(noneVal)).toBe(false);
    expect(truthy(intVal(0))).toBe(false);
    expect(truthy(floatVal(0.5))).toBe(true);
    expect(truthy(strVal(""))).toBe(false);
    expect(truthy(mapVal([]))).toBe(false);
    expect(truthy(sequenceVal([]))).toBe(true);
  });

  it("marks only scalars and sequences hashable", () => {
    expect(isHashable(strVal("a"))).toBe(true);
    expect(isHashable(listVal([]))).toBe(false);
    expect(() => setVal([listVal([])])).toThrow("Unhashable type: 'list'");
  });

  it("iterates strings and map keys", () => {
    expect(Array.from(iterateValue(strVal("ab")))).toEqual([strVal("a"), strVal("b")]);
    expect(Array.from(iterateValue(mapVal([[intVal(1), intVal(2)]])))).toEqual([intVal(1)]);
    expect(() => iterateValue(intVal(1))).toThrow("'int' object is not iterable");
  });

  it("keeps the first key position when a map key repeats", () => {
    const map = mapVal([
      [strVal("a"), intVal(1)],
      [strVal("b"), intVal(2)],
      [strVal("a"), intVal(3)],
    ]);
    expect(map.entries).toEqual([
      [strVal("a"), intVal(3)],
      [strVal("b"), intVal(2)],
    ]);
  });
});

describe("Conversion", () => {
  it("converts to native values", () => {
    expect(toNative(intVal(5))).toBe(5);
    expect(toNative(intVal(2n ** 60n))).toBe(2n ** 60n);
    expect(toNative(listVal([noneVal, strVal("a")]))).toEqual([null, "a"]);
    expect(toNative(setVal([intVal(1)]))).toEqual(new Set([1]));
    expect(toNative(mapVal([[strVal("k"), floatVal(1.5)]]))).toEqual(new Map([["k", 1.5]]));
  });

  it("converts sequences lazily", () => {
    const seq = sequenceVal([intVal(1), intVal(2)]);
    expect(toNative(seq)).not.toBeInstanceOf(Array);
    expect(Array.from(iterateValue(seq))).toEqual([intVal(1), intVal(2)]);
  });

  it("converts to JSON-safe values", () => {
    expect(toJSON(intVal(2n ** 60n))).toBe("1152921504606846976");
    expect(toJSON(floatVal(Infinity))).toBe("inf");
    expect(toJSON(setVal([intVal(1)]))).toEqual([1]);
    expect(toJSON(mapVal([[intVal(1), strVal("x")]]))).toEqual({ "1": "x" });
    expect(toJSON(sequenceVal([]))).toBe("<sequence>");
  });

  it("converts from native values", () => {
    expect(fromNative(3)).toEqual(intVal(3));
    expect(fromNative(2.5)).toEqual(floatVal(2.5));
    expect(fromNative(undefined)).toEqual(noneVal);
    expect(fromNative({ a: [1, "b"] })).toEqual(mapVal([[strVal("a"), listVal([intVal(1), strVal("b")])]]));
    expect(fromNative(new Set([1, 1.0]))).toEqual(setVal([intVal(1)]));
  });

  it("rejects values with no counterpart", () => {
    expect(() => fromNative(Symbol("s"))).toThrow(EvaluationError);
    expect(() => fromNative(Symbol("s"))).toThrow("Cannot convert symbol to a value");
  });
});
