/**
 * TransmissionRatioEstimator - Instantaneous transmission ratio i(θ)
 *
 * Geometry estimate:
 *   dψ/dα ≈ −v / (R·sin((θ + β) − γ)),   i = 1 + dψ/dα
 * with the denominator floored at 0.15·R in magnitude (sign kept), then a
 * ±5-sample circular moving average.
 *
 * Every returned curve satisfies: i > 0, i[last] = i[0], mean(i) = 1.
 *
 * When a reference curve φ(θ) is supplied, its centred angular rate replaces
 * the geometry estimate. A reference that cannot produce a usable rate is
 * skipped and the geometry curve is kept.
 */

import type { MotionLawSamples, RatioGeometry, ReferenceCurve } from "@/types";
import { AngleMath } from "@/math/AngleMath";

/** Denominator floor, relative to R */
export const SINGULARITY_FLOOR = 0.15;

/** Half-width of the circular smoothing window */
export const SMOOTHING_HALF_WINDOW = 5;

/** Positive floor applied before normalization */
export const MIN_RATIO = 1e-3;

/** Smallest journal radius used in the estimate */
const MIN_JOURNAL_RADIUS = 1e-6;

/** Minimum number of reference points for calibration */
const MIN_REFERENCE_POINTS = 4;

/** What happened to the optional calibration */
export type CalibrationOutcome =
  | { readonly kind: "applied"; readonly points: number }
  | { readonly kind: "skipped"; readonly reason: string };

/**
 * Ratio curve parallel to the motion samples.
 */
export interface RatioEstimate {
  readonly ratios: readonly number[];
  readonly source: "geometry" | "reference";
  readonly calibration: CalibrationOutcome;
}

/** Result of deriving a rate curve from a reference */
export type ReferenceRateResult =
  | { readonly ok: true; readonly rates: readonly number[] }
  | { readonly ok: false; readonly reason: string };

/**
 * Raw geometry estimate, one value per sample.
 */
export function geometryRatioCurve(
  motion: MotionLawSamples,
  geometry: RatioGeometry
): number[] {
  const gamma = AngleMath.toRadians(geometry.sliderAxisDeg);
  const beta = AngleMath.toRadians(geometry.journalPhaseBetaDeg);
  const r = Math.max(MIN_JOURNAL_RADIUS, geometry.journalRadius);
  const floor = SINGULARITY_FLOOR * r;

  return motion.samples.map((sample) => {
    const alpha = AngleMath.toRadians(sample.thetaDeg);
    const denom = r * Math.sin(alpha + beta - gamma);
    const safe = Math.abs(denom) < floor ? (denom >= 0 ? floor : -floor) : denom;
    return 1 + -sample.vMmPerOmega / safe;
  });
}

/**
 * Centred circular moving average over ±halfWindow samples.
 */
export function smoothCircular(values: readonly number[], halfWindow: number): number[] {
  const n = values.length;
  const count = 2 * halfWindow + 1;
  return values.map((_, k) => {
    let sum = 0;
    for (let d = -halfWindow; d <= halfWindow; d++) {
      sum += values[AngleMath.wrapIndex(k + d, n)];
    }
    return sum / count;
  });
}

/**
 * Replace non-finite values by 1, clamp to MIN_RATIO, copy the first value
 * onto the last, and divide by the mean.
 */
export function normalizePeriodic(values: readonly number[]): number[] {
  const out = values.map((v) => (Number.isFinite(v) ? Math.max(MIN_RATIO, v) : 1));
  if (out.length === 0) return out;

  out[out.length - 1] = out[0];
  const mean = AngleMath.mean(out);
  const divisor = Number.isFinite(mean) && mean !== 0 ? mean : 1;
  return out.map((v) => v / divisor);
}

/**
 * Per-sample angular rate of a reference curve, mean-normalized, resampled to
 * n samples by index (sample i takes rate[i mod m]).
 *
 * The centred difference wraps φ jumps across ±180°.
 */
export function referenceRateCurve(
  reference: ReferenceCurve,
  n: number,
  stepDeg: number
): ReferenceRateResult {
  const grid = reference.angleGridDeg;
  const phi = reference.phiDeg;
  const m = Math.min(n, grid.length, phi.length);
  if (m < MIN_REFERENCE_POINTS) {
    return { ok: false, reason: `reference has ${m} usable points` };
  }

  const gridStep = grid.length > 1 ? grid[1] - grid[0] : stepDeg;
  if (!Number.isFinite(gridStep) || gridStep === 0) {
    return { ok: false, reason: "reference grid step is zero or not finite" };
  }
  const denom = 2 * gridStep;

  const rates: number[] = [];
  for (let i = 0; i < m; i++) {
    const prev = phi[AngleMath.wrapIndex(i - 1, m)];
    const next = phi[AngleMath.wrapIndex(i + 1, m)];
    rates.push(AngleMath.unwrapDelta(next - prev) / denom);
  }

  const mean = AngleMath.mean(rates);
  if (!Number.isFinite(mean) || mean === 0) {
    return { ok: false, reason: "reference rate has no usable mean" };
  }
  const normalized = rates.map((rate) => rate / mean);
  // i(θ) must stay > 0 everywhere. A single reversed or stalled reference
  // rate cannot be patched per sample, so the whole reference is dropped and
  // the geometry curve stands.
  if (normalized.some((rate) => !(rate > 0) || !Number.isFinite(rate))) {
    return { ok: false, reason: "reference rate is not strictly positive" };
  }

  const resampled: number[] = [];
  for (let i = 0; i < n; i++) {
    resampled.push(normalized[i % m]);
  }
  return { ok: true, rates: resampled };
}

/**
 * Estimate i(θ) from the velocity channel and geometry, calibrated against
 * a reference curve when one is given.
 */
export function estimateTransmissionRatio(
  motion: MotionLawSamples,
  geometry: RatioGeometry,
  reference: ReferenceCurve | null = null
): RatioEstimate {
  const raw = geometryRatioCurve(motion, geometry);
  const geometric = normalizePeriodic(smoothCircular(raw, SMOOTHING_HALF_WINDOW));

  if (reference === null) {
    return {
      ratios: geometric,
      source: "geometry",
      calibration: { kind: "skipped", reason: "no reference curve" },
    };
  }

  const calibrated = referenceRateCurve(reference, motion.samples.length, motion.stepDeg);
  if (!calibrated.ok) {
    return {
      ratios: geometric,
      source: "geometry",
      calibration: { kind: "skipped", reason: calibrated.reason },
    };
  }

  return {
    ratios: normalizePeriodic(calibrated.rates),
    source: "reference",
    calibration: {
      kind: "applied",
      points: Math.min(
        motion.samples.length,
        reference.angleGridDeg.length,
        reference.phiDeg.length
      ),
    },
  };
}

/**
 * RMS difference between the normalized cumulative arc-length curves of a
 * uniform cam increment and the ratio-weighted ring increment.
 */
export function arcLengthResidualRms(ratios: readonly number[], stepDeg: number): number {
  const n = ratios.length;
  if (n === 0) return 0;

  const stepRad = AngleMath.toRadians(stepDeg);
  const camCum: number[] = [];
  const ringCum: number[] = [];
  let cam = 0;
  let ring = 0;
  for (let k = 0; k < n; k++) {
    cam += stepRad;
    ring += ratios[k] * stepRad;
    camCum.push(cam);
    ringCum.push(ring);
  }

  const camTotal = cam > 0 ? cam : 1;
  const ringTotal = ring > 0 ? ring : 1;
  let errSum = 0;
  for (let k = 0; k < n; k++) {
    const d = ringCum[k] / ringTotal - camCum[k] / camTotal;
    errSum += d * d;
  }
  return Math.sqrt(errSum / n);
}
