/**
 * MotionLawDebugLogger - Logging for debugging synthesis issues
 *
 * Disabled by default. Enable it to capture the parameters and intermediate
 * quantities of each synthesis call; the last capture can be exported as a
 * test fixture. Warnings are always printed.
 */

import type { UserParams } from "@/types";
import type { CorrectionReport } from "@/motion-law/ContinuityCorrector";
import type { CalibrationOutcome } from "@/transmission/TransmissionRatioEstimator";

/**
 * Debug log entry for a single synthesis call.
 */
export interface MotionLawDebugLog {
  timestamp: number;
  params: UserParams;
  synthesis: SynthesisDebugInfo;
  corrections?: CorrectionReport;
  calibration?: CalibrationOutcome;
  transmission?: TransmissionDebugInfo;
  warnings: string[];
}

export interface SynthesisDebugInfo {
  n: number;
  stepDeg: number;
  vUp: number;
  vDn: number;
}

export interface TransmissionDebugInfo {
  meanRatio: number;
  minRatio: number;
  maxRatio: number;
  residualArcLenRms: number;
  fallback: boolean;
}

class MotionLawDebugLoggerImpl {
  private enabled = false;
  private logs: MotionLawDebugLog[] = [];
  private maxLogs = 100;
  private lastLog: MotionLawDebugLog | null = null;

  /**
   * Enable debug logging.
   */
  enable(): void {
    this.enabled = true;
    console.log(
      "[MOTION-LAW DEBUG] Logging enabled. Use MotionLawDebugLogger.dump() to see logs."
    );
  }

  /**
   * Disable debug logging.
   */
  disable(): void {
    this.enabled = false;
    console.log("[MOTION-LAW DEBUG] Logging disabled.");
  }

  toggle(): void {
    if (this.enabled) {
      this.disable();
    } else {
      this.enable();
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Start a new entry for a synthesis call.
   */
  logSynthesis(params: UserParams, info: SynthesisDebugInfo): void {
    if (!this.enabled) return;

    const log: MotionLawDebugLog = {
      timestamp: Date.now(),
      params: { ...params },
      synthesis: { ...info },
      warnings: [],
    };

    this.lastLog = log;
    this.logs.push(log);

    // Keep only the last N logs
    if (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }

    console.log(
      `[MOTION-LAW DEBUG] Synthesized #${this.logs.length} - n=${info.n} stepDeg=${info.stepDeg.toFixed(6)} vUp=${info.vUp.toFixed(4)} vDn=${info.vDn.toFixed(4)} profile=${params.rampProfile}`
    );
  }

  logCorrections(report: CorrectionReport): void {
    if (!this.enabled || !this.lastLog) return;
    this.lastLog.corrections = { ...report };
  }

  logCalibration(outcome: CalibrationOutcome): void {
    if (!this.enabled) return;
    if (this.lastLog) {
      this.lastLog.calibration = outcome;
    }
    if (outcome.kind === "skipped") {
      console.log(`[MOTION-LAW DEBUG] Calibration skipped: ${outcome.reason}`);
    }
  }

  logTransmission(info: TransmissionDebugInfo): void {
    if (!this.enabled) return;
    if (this.lastLog) {
      this.lastLog.transmission = { ...info };
    }
    console.log(
      `[MOTION-LAW DEBUG] Transmission: meanI=${info.meanRatio.toFixed(6)} residual=${info.residualArcLenRms.toFixed(6)}${info.fallback ? " (fallback)" : ""}`
    );
  }

  /**
   * Record and print a warning. Printed even when logging is disabled.
   */
  warn(message: string): void {
    console.warn(`[MOTION-LAW] ${message}`);
    if (this.enabled && this.lastLog) {
      this.lastLog.warnings.push(message);
    }
  }

  /**
   * Dump all logs to console.
   */
  dump(): void {
    console.log("[MOTION-LAW DEBUG] Dumping logs...");
    console.log("Total logs:", this.logs.length);

    for (const log of this.logs) {
      console.group(`Log @ ${new Date(log.timestamp).toISOString()}`);
      console.log("Params:", log.params);
      console.log("Synthesis:", log.synthesis);
      if (log.corrections) {
        console.log("Corrections:", log.corrections);
      }
      if (log.calibration) {
        console.log("Calibration:", log.calibration);
      }
      if (log.transmission) {
        console.log("Transmission:", log.transmission);
      }
      if (log.warnings.length > 0) {
        console.log("Warnings:", log.warnings);
      }
      console.groupEnd();
    }
  }

  getLastLog(): MotionLawDebugLog | null {
    return this.lastLog;
  }

  getAllLogs(): readonly MotionLawDebugLog[] {
    return this.logs;
  }

  /**
   * Clear all logs.
   */
  clear(): void {
    this.logs = [];
    this.lastLog = null;
  }

  /**
   * Export the last captured parameters as a test fixture.
   */
  exportAsTestSetup(): string {
    if (!this.lastLog) {
      return "// No log available";
    }

    const log = this.lastLog;
    const fields = Object.entries(log.params)
      .map(([key, value]) => `  ${key}: ${JSON.stringify(value)},`)
      .join("\n");

    return `/**
 * Generated from debug log
 * Timestamp: ${new Date(log.timestamp).toISOString()}
 * n=${log.synthesis.n} vUp=${log.synthesis.vUp} vDn=${log.synthesis.vDn}
 */
export const capturedParams = createUserParams({
${fields}
});`;
  }
}

/**
 * Global debug logger instance.
 */
export const MotionLawDebugLogger = new MotionLawDebugLoggerImpl();
