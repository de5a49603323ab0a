import type {
  FaceDetection,
  LandmarkPoint,
  NormalizedBoundingBox,
} from "../types/landmarks";

export const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === "object" && value !== null;
};

export const isFiniteNumber = (value: unknown): value is number => {
  return typeof value === "number" && Number.isFinite(value);
};

export const isLandmarkPoint = (value: unknown): value is LandmarkPoint => {
  if (!isRecord(value)) {
    return false;
  }
  const { x, y, z } = value;
  if (!isFiniteNumber(x) || !isFiniteNumber(y)) {
    return false;
  }
  return z === undefined || isFiniteNumber(z);
};

export const isNormalizedBoundingBox = (
  value: unknown,
): value is NormalizedBoundingBox => {
  if (!isRecord(value)) {
    return false;
  }
  const { xMin, yMin, width, height } = value;
  return (
    isFiniteNumber(xMin) &&
    isFiniteNumber(yMin) &&
    isFiniteNumber(width) &&
    isFiniteNumber(height) &&
    width >= 0 &&
    height >= 0
  );
};

export type FaceDetectionIssue =
  | "not-an-object"
  | "missing-landmarks"
  | "invalid-landmark"
  | "invalid-bounding-box";

export type FaceDetectionParseResult =
  | { ok: true; detection: FaceDetection }
  | { ok: false; issue: FaceDetectionIssue; index?: number };

/**
 * Validates a landmark provider payload once, at the engine boundary. Stages
 * downstream rely on every point carrying finite `x` and `y`.
 */
export const parseFaceDetection = (
  value: unknown,
): FaceDetectionParseResult => {
  if (!isRecord(value)) {
    return { ok: false, issue: "not-an-object" };
  }

  const { landmarks, boundingBox } = value;
  if (!Array.isArray(landmarks) || landmarks.length === 0) {
    return { ok: false, issue: "missing-landmarks" };
  }

  const points: LandmarkPoint[] = [];
  for (let index = 0; index < landmarks.length; index += 1) {
    const candidate: unknown = landmarks[index];
    if (!isLandmarkPoint(candidate)) {
      return { ok: false, issue: "invalid-landmark", index };
    }
    points.push(
      candidate.z === undefined
        ? { x: candidate.x, y: candidate.y }
        : { x: candidate.x, y: candidate.y, z: candidate.z },
    );
  }

  if (boundingBox === undefined || boundingBox === null) {
    return { ok: true, detection: { landmarks: points, boundingBox: null } };
  }

  if (!isNormalizedBoundingBox(boundingBox)) {
    return { ok: false, issue: "invalid-bounding-box" };
  }

  return {
    ok: true,
    detection: {
      landmarks: points,
      boundingBox: {
        xMin: boundingBox.xMin,
        yMin: boundingBox.yMin,
        width: boundingBox.width,
        height: boundingBox.height,
      },
    },
  };
};
