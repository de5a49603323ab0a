import type {
  EyeMetrics,
  FrameFault,
  FrameFlags,
  FrameResult,
  FrameStatus,
  PupilEstimate,
} from "../../shared/types/engine-output";
import type { PixelPoint, Vector2 } from "../../shared/types/geometry";
import { getAttentionZone } from "../scoring/attention-scorer";

export const PUPIL_NOT_FOUND_SENTINEL: Readonly<PixelPoint> = Object.freeze({
  x: 0,
  y: 0,
});

const NO_FLAGS: Readonly<FrameFlags> = Object.freeze({
  lookingAway: false,
  excessiveBlinking: false,
  suspiciousMovement: false,
});

export const toPupilCenter = (pupil: PupilEstimate): PixelPoint => {
  return pupil.found ? { ...pupil.center } : { ...PUPIL_NOT_FOUND_SENTINEL };
};

export const buildEyeMetrics = (input: {
  ear: number;
  gazeDirection: Vector2;
  pupil: PupilEstimate;
  blinkDetected: boolean;
}): EyeMetrics => {
  return Object.freeze({
    ear: input.ear,
    gazeDirection: { ...input.gazeDirection },
    pupil: input.pupil,
    pupilCenter: toPupilCenter(input.pupil),
    blinkDetected: input.blinkDetected,
  });
};

/**
 * Zeroed result for frames without a face or whose processing faulted: no eye
 * metrics, zero score, every flag cleared.
 */
export const buildEmptyFrameResult = (
  frameId: number,
  timestamp: number,
  status: Exclude<FrameStatus, "ok">,
  fault?: FrameFault,
): FrameResult => {
  const result: FrameResult = {
    frameId,
    timestamp,
    status,
    leftEye: null,
    rightEye: null,
    blinkData: {
      blinkDetected: false,
      ear: 0,
      blinkRate: 0,
      excessiveBlinking: false,
    },
    gazeDirection: { x: 0, y: 0 },
    movementData: { movementMagnitude: 0, suspicious: false },
    attentionScore: 0,
    attentionZone: getAttentionZone(0),
    flags: { ...NO_FLAGS },
  };
  if (fault) {
    result.fault = fault;
  }
  return Object.freeze(result);
};
