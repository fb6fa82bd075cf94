import { createUserParams } from "@/config/motionConfig";
import {
  computeAngleBudget,
  computeSegmentBoundaries,
  internalBoundaryList,
  locateSegment,
  safeUnit,
} from "@/motion-law/SegmentBoundaries";
import { describe, expect, it } from "vitest";
import { compressionBiasedParams } from "@test/helpers/paramHelpers";

describe("SegmentBoundaries", () => {
  describe("computeAngleBudget", () => {
    it("should split the free angle by upFraction", () => {
      const budget = computeAngleBudget(compressionBiasedParams());
      expect(budget.fixedDeg).toBe(120);
      expect(budget.freeDeg).toBe(240);
      expect(budget.upCvDeg).toBe(192);
      expect(budget.dnCvDeg).toBe(48);
    });

    it("should floor the free angle at 0 when fixed durations exceed 360", () => {
      const budget = computeAngleBudget(
        createUserParams({ dwellTdcDeg: 200, dwellBdcDeg: 200 })
      );
      expect(budget.fixedDeg).toBe(440);
      expect(budget.freeDeg).toBe(0);
      expect(budget.upCvDeg).toBe(0);
      expect(budget.dnCvDeg).toBe(0);
    });
  });

  describe("computeSegmentBoundaries", () => {
    it("should chain durations for the default parameters", () => {
      expect(computeSegmentBoundaries(createUserParams())).toEqual({
        dwellTdcEnd: 20,
        rampAfterTdcEnd: 30,
        rampBeforeBdcStart: 170,
        bdcStart: 180,
        bdcEnd: 200,
        rampAfterBdcEnd: 210,
        rampBeforeTdcStart: 350,
      });
    });

    it("should clamp every boundary into [0, 360]", () => {
      const b = computeSegmentBoundaries(createUserParams({ dwellTdcDeg: 200, dwellBdcDeg: 200 }));
      expect(internalBoundaryList(b)).toEqual([200, 210, 210, 220, 360, 360, 360]);
    });
  });

  describe("locateSegment", () => {
    const b = computeSegmentBoundaries(createUserParams());

    it("should place 0 in the TDC dwell", () => {
      expect(locateSegment(0, b)).toEqual({ kind: "dwell-tdc", startDeg: 0, spanDeg: 20, u: 0 });
    });

    it("should treat segments as half-open", () => {
      expect(locateSegment(20, b).kind).toBe("ramp-up-accel");
      expect(locateSegment(20, b).u).toBe(0);
      expect(locateSegment(180, b).kind).toBe("dwell-bdc");
    });

    it("should report progress within a ramp", () => {
      expect(locateSegment(25, b)).toEqual({
        kind: "ramp-up-accel",
        startDeg: 20,
        spanDeg: 10,
        u: 0.5,
      });
      expect(locateSegment(175, b).kind).toBe("ramp-up-decel");
      expect(locateSegment(175, b).u).toBe(0.5);
    });

    it("should end with the decel ramp into TDC", () => {
      expect(locateSegment(355, b)).toEqual({
        kind: "ramp-down-decel",
        startDeg: 350,
        spanDeg: 10,
        u: 0.5,
      });
    });

    it("should find the CV segments", () => {
      expect(locateSegment(100, b).kind).toBe("cv-compression");
      expect(locateSegment(300, b).kind).toBe("cv-expansion");
      expect(locateSegment(205, b).kind).toBe("ramp-down-accel");
    });
  });

  describe("safeUnit", () => {
    it("should return 0 for a degenerate span", () => {
      expect(safeUnit(1, 0)).toBe(0);
    });

    it("should clamp progress into [0, 1]", () => {
      expect(safeUnit(5, 10)).toBe(0.5);
      expect(safeUnit(15, 10)).toBe(1);
      expect(safeUnit(-1, 10)).toBe(0);
    });
  });
});
