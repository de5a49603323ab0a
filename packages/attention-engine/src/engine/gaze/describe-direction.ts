import type { Vector2 } from "../../shared/types/geometry";

export const FOCUS_THRESHOLD = 20;

export const isGazeCentered = (
  gaze: Vector2,
  threshold = FOCUS_THRESHOLD,
): boolean => {
  return Math.abs(gaze.x) < threshold && Math.abs(gaze.y) < threshold;
};

/** "Center", or the vertical then horizontal direction, e.g. "Up Left". */
export const describeGazeDirection = (
  gaze: Vector2,
  threshold = FOCUS_THRESHOLD,
): string => {
  if (isGazeCentered(gaze, threshold)) {
    return "Center";
  }

  const parts: string[] = [];
  if (gaze.y < -threshold) {
    parts.push("Up");
  } else if (gaze.y > threshold) {
    parts.push("Down");
  }

  if (gaze.x < -threshold) {
    parts.push("Left");
  } else if (gaze.x > threshold) {
    parts.push("Right");
  }

  return parts.length > 0 ? parts.join(" ") : "Center";
};
