/**
 * Transmission Layer Exports
 */
export * from "./TransmissionRatioEstimator";
export * from "./PitchCurveSynthesizer";
export * from "./ReferenceCurveProvider";
export * from "./TransmissionSynthesis";
