export {
  FrameProcessor,
  GAZE_HISTORY_CAPACITY,
  type FrameProcessorOptions,
} from "./engine/processing/frame-processor";
export {
  EngineStageError,
  type EngineStage,
  type StageResult,
} from "./engine/processing/stage-result";
export {
  DEFAULT_ENGINE_CONFIG,
  createEnvOverrides,
  resolveEngineConfig,
  type EngineConfig,
  type EngineConfigOverrides,
} from "./engine/config/engine-config";
export { PupilLocator } from "./engine/pupil/pupil-locator";
export { computeEar } from "./engine/blink/ear";
export { estimateGaze, averageGaze } from "./engine/gaze/gaze-estimator";
export {
  describeGazeDirection,
  isGazeCentered,
} from "./engine/gaze/describe-direction";
export type { CalibrationReference } from "./engine/gaze/calibration-store";
export {
  computeAttentionScore,
  getAttentionZone,
} from "./engine/scoring/attention-scorer";
export { classifyEyeStatus } from "./engine/session/eye-status";
export { initEngineSentry } from "./engine/sentry";
export { RingBuffer } from "./shared/buffers/ring-buffer";
export { loadEnvFile } from "./shared/env";
export { getLogger, type Logger } from "./shared/logger";
export { parseFaceDetection } from "./shared/validation/landmarks";
export type * from "./shared/types/engine-output";
export type * from "./shared/types/frame";
export type * from "./shared/types/geometry";
export type * from "./shared/types/landmarks";
export type {
  AlertState,
  AttentionStatistics,
  EyeStatus,
  SessionReport,
  SessionSummary,
  ViolationCount,
  ViolationEntry,
  ViolationType,
} from "./shared/types/session";
