/**
 * MotionLawEngine - Main implementation of IMotionLawEngine
 *
 * Manages calculation caching and invalidation.
 * Uses dirty flags to track what needs recalculation.
 */

import type {
  MotionLawSamples,
  PreflightReport,
  TransmissionAndPitch,
  UserParams,
} from "@/types";
import { DEFAULT_USER_PARAMS, assertValidUserParams } from "@/config/motionConfig";
import { computeParameterSignature } from "@/config/parameterSignature";
import { AngleMath } from "@/math/AngleMath";
import {
  type MotionDiagnostics,
  checkAccelerationLimit,
  computeMotionDiagnostics,
  jerkAt,
} from "@/motion-law/MotionDiagnostics";
import {
  type MotionLawSynthesis,
  synthesizeMotionLawDetailed,
} from "@/motion-law/MotionLawSynthesizer";
import { validateMotionLaw } from "@/motion-law/PreflightValidator";
import type { ReferenceCurveProvider } from "@/transmission/ReferenceCurveProvider";
import {
  type TransmissionSynthesis,
  computeTransmissionDetailed,
} from "@/transmission/TransmissionSynthesis";
import type { IMotionLawEngine } from "./IMotionLawEngine";
import type {
  MotionLawPoint,
  MotionLawResults,
  MotionLawResultsCallback,
  Unsubscribe,
} from "./types";

export interface MotionLawEngineOptions {
  readonly params?: UserParams;
  readonly referenceProvider?: ReferenceCurveProvider;
}

/**
 * Dirty flags for cache invalidation.
 */
interface DirtyFlags {
  synthesis: boolean;
  transmission: boolean;
  preflight: boolean;
  diagnostics: boolean;
}

/**
 * Cached calculation results.
 */
interface CachedResults {
  synthesis: MotionLawSynthesis | null;
  transmission: TransmissionSynthesis | null;
  preflight: PreflightReport | null;
  diagnostics: MotionDiagnostics | null;
}

const ALL_DIRTY: DirtyFlags = {
  synthesis: true,
  transmission: true,
  preflight: true,
  diagnostics: true,
};

const EMPTY_CACHE: CachedResults = {
  synthesis: null,
  transmission: null,
  preflight: null,
  diagnostics: null,
};

export class MotionLawEngine implements IMotionLawEngine {
  // Input state
  private params: UserParams;
  private signature: string;
  private referenceProvider: ReferenceCurveProvider | undefined;

  // Cache management
  private dirty: DirtyFlags = { ...ALL_DIRTY };
  private cache: CachedResults = { ...EMPTY_CACHE };

  // Event subscribers
  private subscribers: Set<MotionLawResultsCallback> = new Set();

  constructor(options: MotionLawEngineOptions = {}) {
    const params = options.params ?? DEFAULT_USER_PARAMS;
    assertValidUserParams(params);
    this.params = params;
    this.signature = computeParameterSignature(params);
    this.referenceProvider = options.referenceProvider;
  }

  // =========================================================================
  // INPUT SETTERS
  // =========================================================================

  setParams(params: UserParams): void {
    assertValidUserParams(params);
    const signature = computeParameterSignature(params);
    if (signature === this.signature) {
      return; // No change
    }
    this.params = params;
    this.signature = signature;
    this.dirty = { ...ALL_DIRTY };
    this.notifySubscribers();
  }

  setReferenceProvider(provider: ReferenceCurveProvider | undefined): void {
    if (this.referenceProvider === provider) {
      return;
    }
    this.referenceProvider = provider;
    this.dirty.transmission = true;
    this.notifySubscribers();
  }

  getParams(): UserParams {
    return this.params;
  }

  // =========================================================================
  // CACHED GETTERS
  // =========================================================================

  private getSynthesis(): MotionLawSynthesis {
    if (this.dirty.synthesis || !this.cache.synthesis) {
      const synthesis = synthesizeMotionLawDetailed(this.params);
      Object.freeze(synthesis.motion.samples);
      this.cache.synthesis = synthesis;
      this.dirty.synthesis = false;
    }
    return this.cache.synthesis;
  }

  getMotion(): MotionLawSamples {
    return this.getSynthesis().motion;
  }

  private getTransmissionSynthesis(): TransmissionSynthesis {
    if (this.dirty.transmission || !this.cache.transmission) {
      const result = computeTransmissionDetailed(
        this.getMotion(),
        this.params,
        this.referenceProvider
      );
      Object.freeze(result.transmission.iOfTheta);
      this.cache.transmission = result;
      this.dirty.transmission = false;
    }
    return this.cache.transmission;
  }

  getTransmission(): TransmissionAndPitch {
    return this.getTransmissionSynthesis().transmission;
  }

  getPreflight(): PreflightReport {
    if (this.dirty.preflight || !this.cache.preflight) {
      this.cache.preflight = validateMotionLaw(this.getMotion());
      this.dirty.preflight = false;
    }
    return this.cache.preflight;
  }

  getDiagnostics(): MotionDiagnostics {
    if (this.dirty.diagnostics || !this.cache.diagnostics) {
      this.cache.diagnostics = computeMotionDiagnostics(this.getMotion());
      this.dirty.diagnostics = false;
    }
    return this.cache.diagnostics;
  }

  getResults(): MotionLawResults {
    const transmission = this.getTransmissionSynthesis();
    const diagnostics = this.getDiagnostics();
    return {
      params: this.params,
      signature: this.signature,
      motion: this.getMotion(),
      transmission: transmission.transmission,
      ratioSource: transmission.source,
      calibration: transmission.calibration,
      preflight: this.getPreflight(),
      diagnostics,
      feasibility: checkAccelerationLimit(diagnostics, this.params.accelLimitPerOmega2),
    };
  }

  // =========================================================================
  // QUERIES
  // =========================================================================

  sampleAt(angleDeg: number): MotionLawPoint {
    if (!Number.isFinite(angleDeg)) {
      throw new RangeError(`Angle must be finite, got ${angleDeg}`);
    }
    const motion = this.getMotion();
    const { stepDeg, samples } = motion;
    const n = samples.length;
    const theta = ((angleDeg % 360) + 360) % 360;

    const index = Math.floor(theta / stepDeg);
    const t = theta / stepDeg - index;
    const i = AngleMath.wrapIndex(index, n);
    const j = AngleMath.wrapIndex(index + 1, n);
    const a = samples[i];
    const b = samples[j];
    const ja = jerkAt(motion, i);
    const jb = jerkAt(motion, j);

    return {
      thetaDeg: theta,
      xMm: a.xMm + t * (b.xMm - a.xMm),
      vMmPerOmega: a.vMmPerOmega + t * (b.vMmPerOmega - a.vMmPerOmega),
      aMmPerOmega2: a.aMmPerOmega2 + t * (b.aMmPerOmega2 - a.aMmPerOmega2),
      jMmPerOmega3: ja + t * (jb - ja),
    };
  }

  // =========================================================================
  // EVENTS
  // =========================================================================

  onResultsChanged(callback: MotionLawResultsCallback): Unsubscribe {
    this.subscribers.add(callback);
    return () => {
      this.subscribers.delete(callback);
    };
  }

  private notifySubscribers(): void {
    if (this.subscribers.size === 0) return;
    const results = this.getResults();
    for (const callback of this.subscribers) {
      callback(results);
    }
  }

  // =========================================================================
  // LIFECYCLE
  // =========================================================================

  invalidateAll(): void {
    this.dirty = { ...ALL_DIRTY };
    this.notifySubscribers();
  }

  dispose(): void {
    this.subscribers.clear();
    this.cache = { ...EMPTY_CACHE };
  }
}
