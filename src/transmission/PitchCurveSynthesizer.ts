/**
 * PitchCurveSynthesizer - Prototype planet and ring pitch curves
 *
 * Both curves are linear in the normalized position s ∈ [0, 1]. The ring curve
 * always keeps PITCH_CLEARANCE above the planet curve.
 */

import type { PitchGeometry, PitchPoint } from "@/types";

/** Points per curve (s = j/100) */
export const PITCH_POINTS = 101;

/** Minimum radial gap between ring and planet */
export const PITCH_CLEARANCE = 0.5;

/** Smallest planet radius */
const MIN_PLANET_RADIUS = 1e-6;

export interface PitchCurves {
  readonly pitchPlanet: readonly PitchPoint[];
  readonly pitchRing: readonly PitchPoint[];
}

export function synthesizePitchCurves(geometry: PitchGeometry): PitchCurves {
  const pitchPlanet: PitchPoint[] = [];
  const pitchRing: PitchPoint[] = [];

  for (let j = 0; j < PITCH_POINTS; j++) {
    const s = j / (PITCH_POINTS - 1);
    const planet = Math.max(MIN_PLANET_RADIUS, geometry.camR0 + geometry.camKPerUnit * s);
    const ring = Math.max(
      planet + PITCH_CLEARANCE,
      geometry.centerDistanceBias + geometry.centerDistanceScale * s
    );
    pitchPlanet.push([s, planet]);
    pitchRing.push([s, ring]);
  }

  return { pitchPlanet, pitchRing };
}
