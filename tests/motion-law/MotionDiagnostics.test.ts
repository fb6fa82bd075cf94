import {
  checkAccelerationLimit,
  computeMotionDiagnostics,
  jerkAt,
} from "@/motion-law/MotionDiagnostics";
import { describe, expect, it } from "vitest";
import { motionFrom } from "@test/helpers/paramHelpers";

describe("MotionDiagnostics", () => {
  it("should return zeros for an empty table", () => {
    expect(computeMotionDiagnostics({ stepDeg: 1, samples: [] })).toEqual({
      displacementRangeMm: 0,
      velocityMaxAbsPerOmega: 0,
      accelMaxAbsPerOmega2: 0,
      jerkMaxAbsPerOmega3: 0,
    });
  });

  it("should compute peaks and circular jerk", () => {
    const table = motionFrom(90, {
      x: [0, 1, 3, 1],
      v: [1, -2, 3, 4],
      a: [0, 1, 0, -1],
    });
    const diagnostics = computeMotionDiagnostics(table);
    expect(diagnostics.displacementRangeMm).toBe(3);
    expect(diagnostics.velocityMaxAbsPerOmega).toBe(4);
    expect(diagnostics.accelMaxAbsPerOmega2).toBe(1);
    // (a[1] - a[3]) / (2 · π/2)
    expect(diagnostics.jerkMaxAbsPerOmega3).toBeCloseTo(2 / Math.PI, 12);
  });

  describe("jerkAt", () => {
    const table = motionFrom(90, { x: [0, 0, 0, 0], a: [0, 1, 0, -1] });

    it("should take the signed centred difference with wrapped neighbours", () => {
      expect(jerkAt(table, 0)).toBeCloseTo(2 / Math.PI, 12);
      expect(jerkAt(table, 1)).toBe(0);
      expect(jerkAt(table, 2)).toBeCloseTo(-2 / Math.PI, 12);
      expect(jerkAt(table, 3)).toBe(0);
    });

    it("should be zero for tables of fewer than three samples", () => {
      expect(jerkAt(motionFrom(90, { x: [0, 0], a: [1, 2] }), 0)).toBe(0);
    });
  });

  describe("checkAccelerationLimit", () => {
    const diagnostics = {
      displacementRangeMm: 0,
      velocityMaxAbsPerOmega: 0,
      accelMaxAbsPerOmega2: 1,
      jerkMaxAbsPerOmega3: 0,
    };

    it("should pass without a limit", () => {
      expect(checkAccelerationLimit(diagnostics, undefined)).toEqual({ ok: true });
    });

    it("should pass at the limit", () => {
      expect(checkAccelerationLimit(diagnostics, 1)).toEqual({ ok: true });
    });

    it("should fail above the limit", () => {
      expect(checkAccelerationLimit(diagnostics, 0.5)).toEqual({
        ok: false,
        message: "Acceleration limit exceeded: 1 > 0.5",
      });
    });
  });
});
