import { describe, expect, it } from "vitest";
import {
  andThen,
  err,
  isErr,
  isOk,
  map,
  match,
  ok,
  type Result,
  unwrapOr,
} from "./result.js";

const half = (n: number): Result<number, string> =>
  n % 2 === 0 ? ok(n / 2) : err(`${n} is odd`);

describe("Result", () => {
  it("should narrow with isOk / isErr", () => {
    expect(isOk(ok(1))).toBe(true);
    expect(isErr(ok(1))).toBe(false);
    expect(isErr(err("no"))).toBe(true);
  });

  it("should map only the success value", () => {
    expect(map(ok(2), (n: number) => n + 1)).toEqual({ ok: true, value: 3 });
    expect(map(err("no"), (n: number) => n + 1)).toEqual({
      ok: false,
      error: "no",
    });
  });

  it("should chain fallible steps and stop at the first error", () => {
    expect(andThen(half(8), half)).toEqual({ ok: true, value: 2 });
    expect(andThen(half(6), half)).toEqual({ ok: false, error: "3 is odd" });
    expect(andThen(half(5), half)).toEqual({ ok: false, error: "5 is odd" });
  });

  it("should fall back or match on either arm", () => {
    expect(unwrapOr(half(3), 0)).toBe(0);
    expect(unwrapOr(half(4), 0)).toBe(2);
    const render = (r: Result<number, string>) =>
      match(r, { ok: (n) => `ok ${n}`, err: (e) => `err ${e}` });
    expect(render(half(4))).toBe("ok 2");
    expect(render(half(1))).toBe("err 1 is odd");
  });
});
