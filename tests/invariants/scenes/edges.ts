/**
 * Edge Scenes for Invariant Tests
 *
 * Long dwells, uneven ramps and an offset journal.
 */

import type { Scene } from "../types";

export const longDwellsScene: Scene = {
  name: "long-dwells",
  description: "60° and 90° dwells, uneven ramps, 30% of the free angle on compression",
  params: {
    strokeLengthMm: 50,
    dwellTdcDeg: 60,
    dwellBdcDeg: 90,
    rampAfterTdcDeg: 20,
    rampBeforeBdcDeg: 25,
    rampAfterBdcDeg: 15,
    rampBeforeTdcDeg: 40,
    upFraction: 0.3,
  },
};

export const offsetGeometryScene: Scene = {
  name: "offset-geometry",
  description: "Default motion with a tilted slider axis and a phased journal",
  params: {
    sliderAxisDeg: 15,
    journalPhaseBetaDeg: 30,
    journalRadius: 8,
  },
};

export const EDGE_SCENES: Scene[] = [longDwellsScene, offsetGeometryScene];
