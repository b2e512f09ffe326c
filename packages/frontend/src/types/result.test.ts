/**
 * Tests for Result type
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { ok, error, map, flatMap, attempt } from "./result.js";

describe("Result", () => {
  describe("ok and error constructors", () => {
    it("should create ok result", () => {
      const result = ok<number, string>(42);
      expect(result).to.deep.equal({ ok: true, value: 42 });
    });

    it("should create error result", () => {
      const result = error<number, string>("Something went wrong");
      expect(result).to.deep.equal({ ok: false, error: "Something went wrong" });
    });
  });

  describe("map", () => {
    it("should map ok value", () => {
      const mapped = map(ok<number, string>(5), (x) => x * 2);
      expect(mapped).to.deep.equal({ ok: true, value: 10 });
    });

    it("should pass through error", () => {
      const mapped = map(error<number, string>("Error"), (x) => x * 2);
      expect(mapped).to.deep.equal({ ok: false, error: "Error" });
    });
  });

  describe("flatMap", () => {
    const half = (x: number) =>
      x % 2 === 0 ? ok<number, string>(x / 2) : error<number, string>("odd");

    it("should chain ok values", () => {
      expect(flatMap(ok<number, string>(8), half)).to.deep.equal({
        ok: true,
        value: 4,
      });
    });

    it("should return the inner error", () => {
      expect(flatMap(ok<number, string>(3), half)).to.deep.equal({
        ok: false,
        error: "odd",
      });
    });
  });

  describe("attempt", () => {
    it("should capture the return value", () => {
      expect(attempt(() => "read")).to.deep.equal({ ok: true, value: "read" });
    });

    it("should capture a thrown error's message", () => {
      const result = attempt((): string => {
        throw new Error("EACCES: permission denied");
      });
      expect(result).to.deep.equal({
        ok: false,
        error: "EACCES: permission denied",
      });
    });

    it("should stringify thrown non-errors", () => {
      const result = attempt((): number => {
        throw 7;
      });
      expect(result).to.deep.equal({ ok: false, error: "7" });
    });
  });
});
