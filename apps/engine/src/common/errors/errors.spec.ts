/**
 * Engine Errors Tests
 */

import {
  ConfidenceFactorUndefinedError,
  InvalidInputError,
  NationNotFoundError,
  SliceComputationError,
  err,
  isErr,
  ok,
  unwrap,
  type Result,
} from "./errors";

describe("Engine Errors", () => {
  describe("error types", () => {
    it("should carry a code and context", () => {
      const error = new NationNotFoundError("MC", "1v1");

      expect(error.name).toBe("NationNotFoundError");
      expect(error.code).toBe("NATION_NOT_FOUND");
      expect(error.message).toBe('Nation MC has no recorded games in game mode "1v1"');
      expect(error.context).toEqual({ countryCode: "MC", gameMode: "1v1" });
    });

    it("should serialize to JSON", () => {
      const error = new InvalidInputError("bad code", "countryCode");

      expect(error.toJSON()).toMatchObject({
        name: "InvalidInputError",
        code: "INVALID_INPUT",
        message: "bad code",
        context: { field: "countryCode" },
      });
      expect(error.toJSON()).not.toHaveProperty("statusCode");
    });

    it("should wrap non-Error causes", () => {
      const error = new SliceComputationError("2v2", "timeout");

      expect(error.message).toBe('Computation failed for game mode "2v2": timeout');
      expect(error.gameMode).toBe("2v2");
    });
  });

  describe("Result helpers", () => {
    const success: Result<number> = ok(42);
    const failure: Result<number> = err(new ConfidenceFactorUndefinedError("1v1"));

    it("should narrow results", () => {
      expect(isErr(success)).toBe(false);
      expect(isErr(failure)).toBe(true);
    });

    it("should unwrap data or throw the error", () => {
      expect(unwrap(success)).toBe(42);
      expect(() => unwrap(failure)).toThrow(ConfidenceFactorUndefinedError);
    });
  });
});
