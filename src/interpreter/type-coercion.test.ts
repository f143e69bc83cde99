import { describe, expect, it } from "vitest";
import {
  formatValue,
  toBoolean,
  toNumber,
  toText,
  valuesEqual,
} from "./type-coercion.js";
import { Values } from "./types.js";

describe("toNumber", () => {
  it("should pass numbers through and map booleans to 1 / 0", () => {
    expect(toNumber(Values.number(2.5))).toEqual({ ok: true, value: 2.5 });
    expect(toNumber(Values.boolean(true))).toEqual({ ok: true, value: 1 });
    expect(toNumber(Values.boolean(false))).toEqual({ ok: true, value: 0 });
  });

  it("should parse decimal text", () => {
    expect(toNumber(Values.text("42"))).toEqual({ ok: true, value: 42 });
    expect(toNumber(Values.text(" -1.5 "))).toEqual({ ok: true, value: -1.5 });
    expect(toNumber(Values.text(".5"))).toEqual({ ok: true, value: 0.5 });
    expect(toNumber(Values.text("1e3"))).toEqual({ ok: true, value: 1000 });
  });

  it("should reject text that is not a number", () => {
    for (const text of ["", "abc", "1.2.3", "0x10", "Infinity"]) {
      const result = toNumber(Values.text(text));
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe("invalid-conversion");
        expect(result.error.message).toBe(
          `Cannot convert text "${text}" to a number`,
        );
      }
    }
  });
});

describe("toBoolean", () => {
  it("should treat non-zero numbers as true", () => {
    expect(toBoolean(Values.number(0))).toEqual({ ok: true, value: false });
    expect(toBoolean(Values.number(-2))).toEqual({ ok: true, value: true });
    expect(toBoolean(Values.number(Number.NaN))).toEqual({
      ok: true,
      value: true,
    });
  });

  it("should accept true and false text in any case", () => {
    expect(toBoolean(Values.text("TRUE"))).toEqual({ ok: true, value: true });
    expect(toBoolean(Values.text("False"))).toEqual({ ok: true, value: false });
  });

  it("should read back the rendered form of a boolean", () => {
    expect(toBoolean(Values.text(toText(Values.boolean(true))))).toEqual({
      ok: true,
      value: true,
    });
    expect(toBoolean(Values.text(toText(Values.boolean(false))))).toEqual({
      ok: true,
      value: false,
    });
  });

  it("should reject other text", () => {
    const result = toBoolean(Values.text("yes"));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Cannot convert text "yes" to a boolean');
    }
  });
});

describe("toText / formatValue", () => {
  it("should render numbers in their shortest form", () => {
    expect(toText(Values.number(7))).toBe("7");
    expect(toText(Values.number(0.1 + 0.2))).toBe("0.30000000000000004");
    expect(toText(Values.number(-0))).toBe("0");
    expect(formatValue(Values.number(1 / 0))).toBe("Infinity");
    expect(formatValue(Values.number(0 / 0))).toBe("NaN");
  });

  it("should render booleans and text", () => {
    expect(formatValue(Values.boolean(true))).toBe("True");
    expect(formatValue(Values.boolean(false))).toBe("False");
    expect(formatValue(Values.text("a b"))).toBe("a b");
  });
});

describe("valuesEqual", () => {
  it("should compare tag and payload", () => {
    expect(valuesEqual(Values.number(1), Values.number(1))).toBe(true);
    expect(valuesEqual(Values.number(1), Values.boolean(true))).toBe(false);
    expect(valuesEqual(Values.text("1"), Values.number(1))).toBe(false);
    expect(valuesEqual(Values.number(Number.NaN), Values.number(Number.NaN))).toBe(
      true,
    );
  });
});
