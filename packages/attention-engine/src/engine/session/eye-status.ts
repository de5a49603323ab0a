import type { FrameResult } from "../../shared/types/engine-output";
import type { EyeStatus } from "../../shared/types/session";
import {
  FOCUS_THRESHOLD,
  describeGazeDirection,
  isGazeCentered,
} from "../gaze/describe-direction";

/**
 * Operator-facing eye status for a processed frame. Both eyes must be present
 * and both pupils found before the gaze is interpreted.
 */
export const classifyEyeStatus = (result: FrameResult): EyeStatus => {
  const { leftEye, rightEye } = result;
  if (result.status !== "ok" || !leftEye || !rightEye) {
    return { kind: "EYES_NOT_DETECTED" };
  }
  if (!leftEye.pupil.found || !rightEye.pupil.found) {
    return { kind: "PUPIL_MISSING" };
  }
  if (result.flags.lookingAway) {
    return { kind: "LOOKING_AWAY" };
  }
  if (isGazeCentered(result.gazeDirection, FOCUS_THRESHOLD)) {
    return { kind: "FOCUSED" };
  }
  return {
    kind: "LOOKING",
    direction: describeGazeDirection(result.gazeDirection, FOCUS_THRESHOLD),
  };
};

export const countsAsEyeDetection = (status: EyeStatus): boolean => {
  return status.kind === "FOCUSED" || status.kind === "LOOKING";
};
