import type { PixelPoint, Vector2 } from "./geometry";

export type EyeSide = "left" | "right";

export type PupilMethod = "hough" | "contour";

export type PupilEstimate =
  | { found: true; center: PixelPoint; method: PupilMethod }
  | { found: false };

export type EyeMetrics = {
  ear: number;
  gazeDirection: Vector2;
  pupil: PupilEstimate;
  /**
   * Pupil position in frame pixels, or `(0, 0)` when no pupil was found.
   * The sentinel is ambiguous: an eye box clipped at the frame corner can
   * yield a real pupil at `(0, 0)`. Read `pupil.found` to tell them apart.
   */
  pupilCenter: PixelPoint;
  blinkDetected: boolean;
};

export type BlinkData = {
  blinkDetected: boolean;
  ear: number;
  blinkRate: number;
  excessiveBlinking: boolean;
};

export type MovementData = {
  movementMagnitude: number;
  suspicious: boolean;
};

export type FrameFlags = {
  lookingAway: boolean;
  excessiveBlinking: boolean;
  suspiciousMovement: boolean;
};

export type AttentionZone = "GREEN" | "YELLOW" | "RED";

export type FrameStatus = "ok" | "no-face" | "faulted";

export type FrameFault = {
  stage: string;
  message: string;
};

export type FrameResult = {
  frameId: number;
  timestamp: number;
  status: FrameStatus;
  leftEye: EyeMetrics | null;
  rightEye: EyeMetrics | null;
  blinkData: BlinkData;
  gazeDirection: Vector2;
  movementData: MovementData;
  attentionScore: number;
  attentionZone: AttentionZone;
  flags: FrameFlags;
  fault?: FrameFault;
};
