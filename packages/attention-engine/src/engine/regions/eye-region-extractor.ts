import type { EyeSide } from "../../shared/types/engine-output";
import type { FrameImage, GrayImage } from "../../shared/types/frame";
import type { BoundingBox, PixelPoint } from "../../shared/types/geometry";
import type { LandmarkSet } from "../../shared/types/landmarks";
import { equalizeHistogram, gaussianBlur5 } from "../cv/filters";
import { cropToGray } from "../cv/image";
import { EYE_CONTOUR_INDICES, EYE_SIDES } from "./eye-landmarks";

export type EyeRegion = {
  eye: EyeSide;
  image: GrayImage;
  boundingBox: BoundingBox;
  landmarks: PixelPoint[];
};

export type EyeRegions = Partial<Record<EyeSide, EyeRegion>>;

export type FrameDimensions = {
  width: number;
  height: number;
};

const MIN_EYE_POINTS = 6;
const PADDING_X = 10;
const PADDING_Y = 5;

/** Truncates like an integer cast; landmarks never sit at negative pixels. */
export const toPixelPoint = (
  point: { x: number; y: number },
  dimensions: FrameDimensions,
): PixelPoint => ({
  x: Math.trunc(point.x * dimensions.width),
  y: Math.trunc(point.y * dimensions.height),
});

export const projectLandmarks = (
  landmarks: LandmarkSet,
  indices: readonly number[],
  dimensions: FrameDimensions,
): PixelPoint[] => {
  const points: PixelPoint[] = [];
  indices.forEach((index) => {
    const landmark = landmarks[index];
    if (landmark) {
      points.push(toPixelPoint(landmark, dimensions));
    }
  });
  return points;
};

export const computeEyeBoundingBox = (
  points: readonly PixelPoint[],
  dimensions: FrameDimensions,
): BoundingBox | null => {
  if (points.length === 0) {
    return null;
  }

  const xs = points.map((point) => point.x);
  const ys = points.map((point) => point.y);

  const box: BoundingBox = {
    xMin: Math.max(0, Math.min(...xs) - PADDING_X),
    yMin: Math.max(0, Math.min(...ys) - PADDING_Y),
    xMax: Math.min(dimensions.width, Math.max(...xs) + PADDING_X),
    yMax: Math.min(dimensions.height, Math.max(...ys) + PADDING_Y),
  };

  if (box.xMax <= box.xMin || box.yMax <= box.yMin) {
    return null;
  }
  return box;
};

/** Grayscale, 5x5 Gaussian, histogram equalisation. */
export const preprocessEyeImage = (
  frame: FrameImage,
  box: BoundingBox,
): GrayImage => {
  return equalizeHistogram(gaussianBlur5(cropToGray(frame, box)));
};

export const extractEyeRegion = (
  eye: EyeSide,
  landmarks: LandmarkSet,
  frame: FrameImage,
): EyeRegion | null => {
  const points = projectLandmarks(landmarks, EYE_CONTOUR_INDICES[eye], frame);
  if (points.length < MIN_EYE_POINTS) {
    return null;
  }

  const boundingBox = computeEyeBoundingBox(points, frame);
  if (!boundingBox) {
    return null;
  }

  return {
    eye,
    image: preprocessEyeImage(frame, boundingBox),
    boundingBox,
    landmarks: points,
  };
};

export const extractEyeRegions = (
  landmarks: LandmarkSet,
  frame: FrameImage,
): EyeRegions => {
  const regions: EyeRegions = {};
  EYE_SIDES.forEach((eye) => {
    const region = extractEyeRegion(eye, landmarks, frame);
    if (region) {
      regions[eye] = region;
    }
  });
  return regions;
};
