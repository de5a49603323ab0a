import type { FrameFlags } from "./engine-output";
import type { Vector2 } from "./geometry";

export const VIOLATION_TYPES = [
  "LOOKING_AWAY",
  "EXCESSIVE_BLINKING",
  "SUSPICIOUS_MOVEMENT",
  "LOW_ATTENTION",
  "NO_FACE",
] as const;

export type ViolationType = (typeof VIOLATION_TYPES)[number];

export type ViolationEntry = {
  timestamp: number;
  frameId: number;
  violations: ViolationType[];
  attentionScore: number;
  gazeDirection: Vector2;
};

export type ViolationCount = {
  type: ViolationType;
  count: number;
};

export type EyeStatus =
  | { kind: "EYES_NOT_DETECTED" }
  | { kind: "PUPIL_MISSING" }
  | { kind: "LOOKING_AWAY" }
  | { kind: "FOCUSED" }
  | { kind: "LOOKING"; direction: string };

export type AlertState = {
  activeViolations: ViolationType[];
  consecutiveViolations: number;
  critical: boolean;
};

export type SessionSummary = {
  totalBlinks: number;
  /** Mean of the EAR history; 0 before the first sample. */
  averageEar: number;
  recentMovementSamples: number[];
  recentGazeSamples: Vector2[];
  currentFlags: FrameFlags;
};

export type AttentionStatistics = {
  samples: number;
  average: number;
  max: number;
  min: number;
  /** Population variance. */
  variance: number;
};

export type SessionReport = {
  sessionDurationMs: number;
  totalFramesProcessed: number;
  /** Percent of frames that carried a face. */
  faceDetectionRate: number;
  /** Percent of frames where both eyes and pupils were found and on screen. */
  eyeDetectionRate: number;
  totalViolations: number;
  recentViolations: ViolationEntry[];
  attention: AttentionStatistics;
  mostCommonViolations: ViolationCount[];
};
