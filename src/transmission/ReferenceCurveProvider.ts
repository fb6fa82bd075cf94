/**
 * ReferenceCurveProvider - Optional calibration source for the ratio curve
 *
 * A provider returns the reference angular curve φ(θ) for a parameter set, or
 * null when it has none. Absence is never an error.
 *
 * Fallback policy: resolveReferenceCurve is the only place that guards a
 * provider call. A provider that throws is treated exactly like one that
 * returned null.
 */

import { readFileSync } from "node:fs";
import { join } from "node:path";
import type { ReferenceCurve, UserParams } from "@/types";
import { computeParameterSignature } from "@/config/parameterSignature";
import { MotionLawDebugLogger } from "@/debug/MotionLawDebugLogger";

/**
 * Calibration source interface.
 */
export interface ReferenceCurveProvider {
  getReferenceCurve(params: UserParams): ReferenceCurve | null;
}

/** Result of looking up a reference curve */
export type ReferenceLookup =
  | { readonly kind: "found"; readonly curve: ReferenceCurve }
  | { readonly kind: "unavailable"; readonly reason: string };

/** Result of parsing a kinematics table */
export type ReferenceParseResult =
  | { readonly ok: true; readonly curve: ReferenceCurve }
  | { readonly ok: false; readonly reason: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((x) => typeof x === "number");
}

function isReferenceCurve(value: unknown): value is ReferenceCurve {
  return (
    isRecord(value) && isNumberArray(value["angleGridDeg"]) && isNumberArray(value["phiDeg"])
  );
}

/**
 * Ask a provider for a curve. Never throws.
 *
 * Providers are not trusted to honour their return type: anything that is not
 * a curve of number arrays is reported as unavailable.
 */
export function resolveReferenceCurve(
  provider: ReferenceCurveProvider | undefined,
  params: UserParams
): ReferenceLookup {
  if (!provider) {
    return { kind: "unavailable", reason: "no reference provider" };
  }
  let curve: unknown;
  try {
    curve = provider.getReferenceCurve(params);
  } catch (err) {
    return { kind: "unavailable", reason: `provider failed: ${errorMessage(err)}` };
  }
  if (curve === null || curve === undefined) {
    return { kind: "unavailable", reason: "provider returned no curve" };
  }
  if (!isReferenceCurve(curve)) {
    return { kind: "unavailable", reason: "provider returned a malformed curve" };
  }
  return { kind: "found", curve };
}

// =============================================================================
// TABLE PARSING
// =============================================================================

/**
 * Parse a kinematics table:
 *
 * {
 *   "alphaDeg": number[],
 *   "curves"?: { "phiOfTheta": number[] },
 *   "planets"?: [{ "spinPsiDeg": number[] }, ...]
 * }
 *
 * φ comes from curves.phiOfTheta, else from the first planet's spin angle.
 */
export function parseReferenceTable(json: unknown): ReferenceParseResult {
  if (!isRecord(json)) {
    return { ok: false, reason: "table is not an object" };
  }
  const alpha = json["alphaDeg"];
  if (!isNumberArray(alpha)) {
    return { ok: false, reason: "alphaDeg must be a number array" };
  }

  const curves = json["curves"];
  if (isRecord(curves) && isNumberArray(curves["phiOfTheta"])) {
    return { ok: true, curve: { angleGridDeg: alpha, phiDeg: curves["phiOfTheta"] } };
  }

  const planets = json["planets"];
  if (Array.isArray(planets) && planets.length > 0) {
    const first: unknown = planets[0];
    if (isRecord(first) && isNumberArray(first["spinPsiDeg"])) {
      return { ok: true, curve: { angleGridDeg: alpha, phiDeg: first["spinPsiDeg"] } };
    }
  }

  return { ok: false, reason: "no phiOfTheta curve or planet spin angles" };
}

// =============================================================================
// PROVIDERS
// =============================================================================

export interface FileReferenceCurveProviderOptions {
  /** Directory holding `<signature>.json` tables */
  readonly directory: string;
  /** File-name key for a parameter set (default: computeParameterSignature) */
  readonly keyFor?: (params: UserParams) => string;
}

/**
 * Provider reading `<directory>/<key>.json` synchronously.
 * Missing, unreadable or malformed tables yield null.
 */
export function createFileReferenceCurveProvider(
  options: FileReferenceCurveProviderOptions
): ReferenceCurveProvider {
  const keyFor = options.keyFor ?? computeParameterSignature;

  return {
    getReferenceCurve(params: UserParams): ReferenceCurve | null {
      const file = join(options.directory, `${keyFor(params)}.json`);

      let json: unknown;
      try {
        json = JSON.parse(readFileSync(file, "utf8"));
      } catch (err) {
        MotionLawDebugLogger.logCalibration({
          kind: "skipped",
          reason: `cannot load ${file}: ${errorMessage(err)}`,
        });
        return null;
      }

      const parsed = parseReferenceTable(json);
      if (!parsed.ok) {
        MotionLawDebugLogger.logCalibration({
          kind: "skipped",
          reason: `malformed ${file}: ${parsed.reason}`,
        });
        return null;
      }
      return parsed.curve;
    },
  };
}

/**
 * Provider returning a fixed curve (or nothing) for every parameter set.
 */
export function createStaticReferenceCurveProvider(
  curve: ReferenceCurve | null
): ReferenceCurveProvider {
  return {
    getReferenceCurve(): ReferenceCurve | null {
      return curve;
    },
  };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
