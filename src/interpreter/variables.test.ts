import { describe, expect, it } from "vitest";
import { Values } from "./types.js";
import { VariableStore } from "./variables.js";

describe("VariableStore", () => {
  it("should report an undefined variable", () => {
    const store = new VariableStore();
    const result = store.get("x");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("undefined-variable");
      expect(result.error.message).toBe("Variable 'x' is not defined");
    }
    expect(store.has("x")).toBe(false);
  });

  it("should insert and overwrite bindings", () => {
    const store = new VariableStore();
    store.set("x", Values.number(1));
    store.set("x", Values.text("one"));
    expect(store.get("x")).toEqual({ ok: true, value: Values.text("one") });
    expect(store.size).toBe(1);
  });

  it("should list bindings in first-assignment order", () => {
    const store = new VariableStore();
    store.set("b", Values.number(2));
    store.set("a", Values.boolean(true));
    store.set("b", Values.number(3));
    expect(store.entries()).toEqual([
      ["b", Values.number(3)],
      ["a", Values.boolean(true)],
    ]);
  });

  it("should treat Object.prototype names as ordinary variables", () => {
    const store = new VariableStore();
    expect(store.get("constructor").ok).toBe(false);
    expect(store.get("toString").ok).toBe(false);
    store.set("constructor", Values.number(5));
    expect(store.get("constructor")).toEqual({
      ok: true,
      value: Values.number(5),
    });
  });

  it("should hand out a snapshot of its entries", () => {
    const store = new VariableStore();
    store.set("x", Values.number(1));
    const snapshot = store.entries();
    store.set("y", Values.number(2));
    expect(snapshot).toHaveLength(1);
  });
});
