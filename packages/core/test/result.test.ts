import { describe, it, expect } from "vitest";
import { Ok, Err, map, mapErr, andThen, unwrapOr, tryCatch, type Result } from "../src/result.js";

describe("Result", () => {
  describe("Ok and Err", () => {
    it("creates a successful result", () => {
      const result = Ok(42);
      expect(result).toEqual({ ok: true, value: 42 });
    });

    it("creates an error result", () => {
      const result = Err("failed");
      expect(result).toEqual({ ok: false, error: "failed" });
    });
  });

  describe("map", () => {
    it("transforms the success value", () => {
      expect(map(Ok(2), (n) => n * 3)).toEqual(Ok(6));
    });

    it("leaves errors untouched", () => {
      const result: Result<number, string> = Err("nope");
      expect(map(result, (n) => n * 3)).toEqual(Err("nope"));
    });
  });

  describe("mapErr", () => {
    it("transforms the error", () => {
      const result: Result<number, string> = Err("nope");
      expect(mapErr(result, (e) => e.length)).toEqual(Err(4));
    });

    it("leaves success untouched", () => {
      const result: Result<number, string> = Ok(1);
      expect(mapErr(result, (e) => e.length)).toEqual(Ok(1));
    });
  });

  describe("andThen", () => {
    const half = (n: number): Result<number, string> => (n % 2 === 0 ? Ok(n / 2) : Err(`${n} is odd`));

    it("chains successes", () => {
      expect(andThen(Ok(8), half)).toEqual(Ok(4));
    });

    it("stops at the first error", () => {
      expect(andThen(andThen(Ok(6), half), half)).toEqual(Err("3 is odd"));
    });
  });

  describe("unwrapOr", () => {
    it("returns the value or the default", () => {
      expect(unwrapOr(Ok(1), 0)).toBe(1);
      expect(unwrapOr(Err("x"), 0)).toBe(0);
    });
  });

  describe("tryCatch", () => {
    it("wraps a return value", () => {
      expect(tryCatch(() => "fine")).toEqual(Ok("fine"));
    });

    it("wraps a thrown Error", () => {
      const result = tryCatch(() => {
        throw new Error("boom");
      });
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe("boom");
    });

    it("converts non-Error throws", () => {
      const result = tryCatch(() => {
        throw "plain";
      });
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(Error);
      expect(result.error.message).toBe("plain");
    });
  });
});
