import type { PupilEstimate } from "../../shared/types/engine-output";
import {
  type PixelPoint,
  type Vector2,
  ZERO_VECTOR,
} from "../../shared/types/geometry";

const GAZE_SCALE = 100;

/**
 * Pupil offset from the mean of the eye landmarks, divided by the landmark
 * extent on each axis and scaled by 100. Zero when there is no pupil, no
 * landmarks, or the eye has no width or height.
 */
export const estimateGaze = (
  eyeLandmarks: readonly PixelPoint[],
  pupil: PupilEstimate,
): Vector2 => {
  if (!pupil.found || eyeLandmarks.length === 0) {
    return { ...ZERO_VECTOR };
  }

  let sumX = 0;
  let sumY = 0;
  let minX = Number.POSITIVE_INFINITY;
  let maxX = Number.NEGATIVE_INFINITY;
  let minY = Number.POSITIVE_INFINITY;
  let maxY = Number.NEGATIVE_INFINITY;

  eyeLandmarks.forEach((point) => {
    sumX += point.x;
    sumY += point.y;
    minX = Math.min(minX, point.x);
    maxX = Math.max(maxX, point.x);
    minY = Math.min(minY, point.y);
    maxY = Math.max(maxY, point.y);
  });

  const width = maxX - minX;
  const height = maxY - minY;
  if (width <= 0 || height <= 0) {
    return { ...ZERO_VECTOR };
  }

  const centerX = sumX / eyeLandmarks.length;
  const centerY = sumY / eyeLandmarks.length;

  return {
    x: ((pupil.center.x - centerX) / width) * GAZE_SCALE,
    y: ((pupil.center.y - centerY) / height) * GAZE_SCALE,
  };
};

/** Component-wise mean; `(0, 0)` for an empty list. */
export const averageGaze = (vectors: readonly Vector2[]): Vector2 => {
  if (vectors.length === 0) {
    return { ...ZERO_VECTOR };
  }
  const sum = vectors.reduce(
    (accumulator, vector) => ({
      x: accumulator.x + vector.x,
      y: accumulator.y + vector.y,
    }),
    { x: 0, y: 0 },
  );
  return { x: sum.x / vectors.length, y: sum.y / vectors.length };
};
