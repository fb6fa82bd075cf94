import { synthesizeMotionLaw } from "@/motion-law/MotionLawSynthesizer";
import {
  WRAP_TOLERANCES,
  computeWrapMismatch,
  formatPreflightReport,
  validateMotionLaw,
  wrapTolerance,
} from "@/motion-law/PreflightValidator";
import type { MotionLawSamples, PreflightReport } from "@/types";
import { describe, expect, it } from "vitest";
import { motionFrom, symmetricParams } from "@test/helpers/paramHelpers";

function item(report: PreflightReport, name: string) {
  const found = report.items.find((i) => i.name === name);
  if (!found) throw new Error(`No preflight item ${name}`);
  return found;
}

describe("PreflightValidator", () => {
  const motion = synthesizeMotionLaw(symmetricParams());

  it("should report a single failed item for a missing table", () => {
    const report = validateMotionLaw(null);
    expect(report.passed).toBe(false);
    expect(report.items).toEqual([
      { name: "samples_present", passed: false, detail: "No motion-law samples available" },
    ]);
  });

  it("should run every check in order on a synthesized table", () => {
    const report = validateMotionLaw(motion);
    expect(report.items.map((i) => i.name)).toEqual([
      "count>=3",
      "theta_monotonic",
      "theta_last<=360",
      "grid_integral",
      "no_nan_inf",
      "wrap_continuity",
    ]);
    expect(report.passed).toBe(true);
  });

  it("should fail tables with fewer than three samples", () => {
    const report = validateMotionLaw(motionFrom(180, { x: [0, 0] }));
    expect(item(report, "count>=3")).toEqual({ name: "count>=3", passed: false, detail: "n=2" });
  });

  it("should fail a decreasing angle", () => {
    const table: MotionLawSamples = {
      stepDeg: 90,
      samples: [0, 180, 90, 270].map((thetaDeg) => ({
        thetaDeg,
        xMm: 0,
        vMmPerOmega: 0,
        aMmPerOmega2: 0,
      })),
    };
    expect(item(validateMotionLaw(table), "theta_monotonic").passed).toBe(false);
  });

  it("should fail a step that does not divide 360", () => {
    const report = validateMotionLaw({ ...motion, stepDeg: 7 });
    expect(item(report, "grid_integral").passed).toBe(false);
    expect(report.passed).toBe(false);
  });

  it("should fail non-finite values", () => {
    const samples = motion.samples.slice();
    samples[10] = { ...samples[10], vMmPerOmega: Number.NaN };
    expect(item(validateMotionLaw({ ...motion, samples }), "no_nan_inf").passed).toBe(false);
  });

  it("should fail a broken wrap", () => {
    const samples = motion.samples.slice();
    const last = samples.length - 1;
    samples[last] = { ...samples[last], xMm: samples[last].xMm + 1 };
    const wrap = item(validateMotionLaw({ ...motion, samples }), "wrap_continuity");
    expect(wrap.passed).toBe(false);
    expect(wrap.detail.startsWith("dx=")).toBe(true);
  });

  describe("computeWrapMismatch", () => {
    it("should return null for fewer than two samples", () => {
      expect(computeWrapMismatch(motionFrom(360, { x: [0] }))).toBeNull();
    });

    it("should compare the extrapolated channels with sample 0", () => {
      const table = motionFrom(120, { x: [1, 0, 2], v: [0, 1, 1], a: [0, 0, 5] });
      // r = (360 - 240)/120 = 1
      expect(computeWrapMismatch(table)).toEqual({ dx: 3, dv: 1, da: 10 });
    });
  });

  describe("wrapTolerance", () => {
    it("should floor the magnitude at 1", () => {
      expect(wrapTolerance([0.5], WRAP_TOLERANCES.x)).toBe(1e-9);
    });

    it("should scale with the largest magnitude", () => {
      expect(wrapTolerance([-1000, 3], WRAP_TOLERANCES.a)).toBeCloseTo(1e-5, 18);
    });
  });

  describe("formatPreflightReport", () => {
    it("should render one line per item and a verdict", () => {
      const text = formatPreflightReport({
        items: [
          { name: "count>=3", passed: true, detail: "" },
          { name: "wrap_continuity", passed: false, detail: "dx=1, dv=0, da=0" },
        ],
        passed: false,
      });
      expect(text).toBe(
        "PASS count>=3\nFAIL wrap_continuity (dx=1, dv=0, da=0)\nPreflight FAILED"
      );
    });
  });
});
