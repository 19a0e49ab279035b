/**
 * Time Window Tests
 */

import { isWithinWindow, resolveTimeWindow } from "./ingestion.config";

describe("Time windows", () => {
  const asOf = new Date("2026-03-15T12:00:00.000Z");

  describe("resolveTimeWindow", () => {
    it("should resolve rolling windows against the reference time", () => {
      expect(resolveTimeWindow("last_7d", asOf)).toEqual({
        key: "last_7d",
        from: "2026-03-08T12:00:00.000Z",
        to: "2026-03-15T12:00:00.000Z",
      });
    });

    it("should leave all time unbounded", () => {
      expect(resolveTimeWindow("all_time", asOf)).toEqual({
        key: "all_time",
        from: null,
        to: null,
      });
    });

    it("should pass explicit ranges through", () => {
      expect(
        resolveTimeWindow({ from: new Date("2026-01-01T00:00:00.000Z"), to: null }, asOf),
      ).toEqual({ key: "custom", from: "2026-01-01T00:00:00.000Z", to: null });
    });
  });

  describe("isWithinWindow", () => {
    const window = resolveTimeWindow("last_7d", asOf);

    it("should include both bounds", () => {
      expect(isWithinWindow(new Date("2026-03-08T12:00:00.000Z"), window)).toBe(true);
      expect(isWithinWindow(asOf, window)).toBe(true);
    });

    it("should exclude timestamps outside the bounds", () => {
      expect(isWithinWindow(new Date("2026-03-08T11:59:59.999Z"), window)).toBe(false);
      expect(isWithinWindow(new Date("2026-03-15T12:00:00.001Z"), window)).toBe(false);
    });
  });
});
