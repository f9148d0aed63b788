import {describe, it, expect} from "vitest";
import {Err, isErr, Result} from "../../src/err.js";

describe("Result", () => {
  function half(n: number): Result<number, string> {
    if (n % 2 !== 0) return Err("odd");
    return n / 2;
  }

  it("isErr is false for plain values", () => {
    expect(isErr(half(4))).toBe(false);
    expect(isErr<null, string>(null)).toBe(false);
    expect(isErr<{error: string}, string>({error: "not wrapped"})).toBe(false);
    expect(isErr<void, string>(undefined)).toBe(false);
  });

  it("isErr is true for Err and exposes the error", () => {
    const res = half(3);
    if (!isErr(res)) throw Error("expected an Err");
    expect(res.error).toBe("odd");
  });
});
