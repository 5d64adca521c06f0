import { describe, it, expect } from "vitest";
import { Ok, Err, toError } from "../src/result.js";

describe("Result", () => {
  it("Ok carries a value", () => {
    const result = Ok("App\\Models\\User");
    expect(result).toEqual({ ok: true, value: "App\\Models\\User" });
  });

  it("Err carries an error", () => {
    const result = Err(new Error("Class not found"));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("Class not found");
    }
  });

  describe("toError", () => {
    it("keeps Error instances", () => {
      const error = new TypeError("bad token");
      expect(toError(error)).toBe(error);
    });

    it("wraps other thrown values", () => {
      expect(toError("boom").message).toBe("boom");
    });
  });
});
