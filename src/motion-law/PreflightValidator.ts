/**
 * PreflightValidator - Structural and numerical checks on a motion-law table
 *
 * Stateless. Returns named pass/fail items; callers decide which failures are
 * fatal.
 */

import type { MotionLawSamples, PreflightItem, PreflightReport } from "@/types";
import { AngleMath } from "@/math/AngleMath";

/** Tolerance on 360/step being an integer */
const GRID_TOLERANCE = 1e-9;

/**
 * Wrap tolerance per channel: max(absFloor, rel · max(1, maxAbs(channel))).
 */
export const WRAP_TOLERANCES = {
  x: { absFloor: 1e-11, rel: 1e-9 },
  v: { absFloor: 1e-10, rel: 1e-9 },
  a: { absFloor: 1e-9, rel: 1e-8 },
} as const;

/**
 * Wrap mismatch of each channel: |extrapolated value at 360° − sample 0|.
 */
export interface WrapMismatch {
  readonly dx: number;
  readonly dv: number;
  readonly da: number;
}

/**
 * Extrapolate x, v, a to 360° from the last two samples and compare with
 * sample 0. Returns null when there are fewer than two samples or the last
 * step is not positive.
 */
export function computeWrapMismatch(motion: MotionLawSamples): WrapMismatch | null {
  const s = motion.samples;
  const n = s.length;
  if (n < 2) return null;

  const last = s[n - 1];
  const prev = s[n - 2];
  const step = last.thetaDeg - prev.thetaDeg;
  if (!(step > 0)) return null;

  const r = (360 - last.thetaDeg) / step;
  const first = s[0];
  return {
    dx: Math.abs(first.xMm - AngleMath.extrapolate(last.xMm, prev.xMm, r)),
    dv: Math.abs(first.vMmPerOmega - AngleMath.extrapolate(last.vMmPerOmega, prev.vMmPerOmega, r)),
    da: Math.abs(
      first.aMmPerOmega2 - AngleMath.extrapolate(last.aMmPerOmega2, prev.aMmPerOmega2, r)
    ),
  };
}

/**
 * Tolerance for one channel given all its values.
 */
export function wrapTolerance(
  values: readonly number[],
  tol: { readonly absFloor: number; readonly rel: number }
): number {
  return Math.max(tol.absFloor, tol.rel * Math.max(1, AngleMath.maxAbs(values)));
}

/**
 * Validate a motion-law table.
 */
export function validateMotionLaw(motion: MotionLawSamples | null): PreflightReport {
  if (motion === null) {
    return report([
      { name: "samples_present", passed: false, detail: "No motion-law samples available" },
    ]);
  }

  const items: PreflightItem[] = [];
  const s = motion.samples;
  const n = s.length;

  items.push({ name: "count>=3", passed: n >= 3, detail: `n=${n}` });

  // Monotonic theta and last <= 360
  let monotonic = true;
  let lastTheta = Number.NEGATIVE_INFINITY;
  for (const sample of s) {
    if (!(sample.thetaDeg >= lastTheta)) {
      monotonic = false;
      break;
    }
    lastTheta = sample.thetaDeg;
  }
  items.push({ name: "theta_monotonic", passed: monotonic, detail: "" });
  items.push({
    name: "theta_last<=360",
    passed: lastTheta <= 360 + GRID_TOLERANCE,
    detail: `last=${lastTheta}`,
  });

  // Integer 360/stepDeg
  const steps = 360 / motion.stepDeg;
  const gridOk =
    motion.stepDeg > 0 && Math.abs(steps - Math.round(steps)) <= GRID_TOLERANCE;
  items.push({ name: "grid_integral", passed: gridOk, detail: `360/step=${steps}` });

  const finite = s.every(
    (x) =>
      Number.isFinite(x.thetaDeg) &&
      Number.isFinite(x.xMm) &&
      Number.isFinite(x.vMmPerOmega) &&
      Number.isFinite(x.aMmPerOmega2)
  );
  items.push({ name: "no_nan_inf", passed: finite, detail: "" });

  items.push(wrapItem(motion));

  return report(items);
}

function wrapItem(motion: MotionLawSamples): PreflightItem {
  const mismatch = computeWrapMismatch(motion);
  if (mismatch === null) {
    return { name: "wrap_continuity", passed: true, detail: "dx=0, dv=0, da=0" };
  }

  const s = motion.samples;
  const tx = wrapTolerance(s.map((x) => x.xMm), WRAP_TOLERANCES.x);
  const tv = wrapTolerance(s.map((x) => x.vMmPerOmega), WRAP_TOLERANCES.v);
  const ta = wrapTolerance(s.map((x) => x.aMmPerOmega2), WRAP_TOLERANCES.a);

  const passed = mismatch.dx <= tx && mismatch.dv <= tv && mismatch.da <= ta;
  return {
    name: "wrap_continuity",
    passed,
    detail: `dx=${mismatch.dx}, dv=${mismatch.dv}, da=${mismatch.da}`,
  };
}

function report(items: readonly PreflightItem[]): PreflightReport {
  return { items, passed: items.every((item) => item.passed) };
}

/**
 * Render a report as plain text, one line per item.
 */
export function formatPreflightReport(preflight: PreflightReport): string {
  const lines = preflight.items.map(
    (item) => `${item.passed ? "PASS" : "FAIL"} ${item.name}${item.detail ? ` (${item.detail})` : ""}`
  );
  lines.push(preflight.passed ? "Preflight passed" : "Preflight FAILED");
  return lines.join("\n");
}
