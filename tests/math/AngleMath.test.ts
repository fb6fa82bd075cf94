import { AngleMath } from "@/math/AngleMath";
import { describe, expect, it } from "vitest";

describe("AngleMath", () => {
  describe("toRadians", () => {
    it("should convert 180 degrees to pi", () => {
      expect(AngleMath.toRadians(180)).toBeCloseTo(Math.PI, 15);
    });
  });

  describe("clampRevolution", () => {
    it("should clamp below zero and above 360", () => {
      expect(AngleMath.clampRevolution(-5)).toBe(0);
      expect(AngleMath.clampRevolution(400)).toBe(360);
      expect(AngleMath.clampRevolution(42)).toBe(42);
    });
  });

  describe("wrapIndex", () => {
    it("should wrap negative and overflowing indices", () => {
      expect(AngleMath.wrapIndex(-1, 10)).toBe(9);
      expect(AngleMath.wrapIndex(10, 10)).toBe(0);
      expect(AngleMath.wrapIndex(23, 10)).toBe(3);
    });
  });

  describe("unwrapDelta", () => {
    it("should map differences onto [-180, 180]", () => {
      expect(AngleMath.unwrapDelta(-358)).toBe(2);
      expect(AngleMath.unwrapDelta(350)).toBe(-10);
      expect(AngleMath.unwrapDelta(180)).toBe(180);
    });
  });

  describe("mean and maxAbs", () => {
    it("should return 0 for empty lists", () => {
      expect(AngleMath.mean([])).toBe(0);
      expect(AngleMath.maxAbs([])).toBe(0);
    });

    it("should compute the mean and the largest magnitude", () => {
      expect(AngleMath.mean([1, 2, 6])).toBe(3);
      expect(AngleMath.maxAbs([1, -7, 3])).toBe(7);
    });
  });

  describe("wrapRatio", () => {
    it("should return the gap to 360 over the last step", () => {
      expect(AngleMath.wrapRatio(350, 340)).toBe(1);
      expect(AngleMath.wrapRatio(355, 350)).toBe(1);
      expect(AngleMath.wrapRatio(340, 330)).toBe(2);
    });

    it("should return 1 for a zero step", () => {
      expect(AngleMath.wrapRatio(100, 100)).toBe(1);
    });
  });

  describe("extrapolate", () => {
    it("should extend the last step linearly", () => {
      expect(AngleMath.extrapolate(4, 2, 1)).toBe(6);
      expect(AngleMath.extrapolate(4, 2, 0.5)).toBe(5);
    });
  });
});
