import type { EyeSide } from "../../shared/types/engine-output";
import { type PixelPoint, distance } from "../../shared/types/geometry";
import type { LandmarkSet } from "../../shared/types/landmarks";
import { EYE_EAR_INDICES } from "../regions/eye-landmarks";
import {
  type FrameDimensions,
  projectLandmarks,
} from "../regions/eye-region-extractor";

/**
 * Eye Aspect Ratio over the six-point eye model:
 * `(|p1 - p5| + |p2 - p4|) / (2 |p0 - p3|)`. Returns 0 when fewer than six
 * points are available or the eye has no width.
 */
export const computeEar = (points: readonly PixelPoint[]): number => {
  if (points.length < 6) {
    return 0;
  }

  const [outer, upperA, upperB, inner, lowerB, lowerA] = points;
  const vertical1 = distance(upperA, lowerA);
  const vertical2 = distance(upperB, lowerB);
  const horizontal = distance(outer, inner);

  if (horizontal <= 0) {
    return 0;
  }
  return (vertical1 + vertical2) / (2 * horizontal);
};

export const computeEyeEar = (
  eye: EyeSide,
  landmarks: LandmarkSet,
  dimensions: FrameDimensions,
): number => {
  const points = projectLandmarks(landmarks, EYE_EAR_INDICES[eye], dimensions);
  return computeEar(points);
};

export type FrameEar = {
  left: number;
  right: number;
  average: number;
};

export const computeFrameEar = (
  landmarks: LandmarkSet,
  dimensions: FrameDimensions,
): FrameEar => {
  const left = computeEyeEar("left", landmarks, dimensions);
  const right = computeEyeEar("right", landmarks, dimensions);
  return { left, right, average: (left + right) / 2 };
};
