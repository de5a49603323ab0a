import type { PupilEstimate } from "../../shared/types/engine-output";
import type { GrayImage } from "../../shared/types/frame";
import type { BoundingBox, PixelPoint } from "../../shared/types/geometry";
import { findBlobs } from "../cv/blobs";
import {
  DEFAULT_HOUGH_OPTIONS,
  type HoughCircle,
  type HoughCircleOptions,
  findHoughCircles,
} from "../cv/hough-circles";
import { binarize, otsuThreshold } from "../cv/threshold";

export type PupilLocatorOptions = {
  hough?: Partial<HoughCircleOptions>;
  /**
   * Blobs must be strictly larger than this many pixels. Area is the pixel
   * count, which runs above a traced outline's polygon area: a 5x5 blob
   * counts 25 and passes the default cut-off, where its outline encloses 16.
   */
  minContourArea?: number;
};

export const NOT_FOUND: PupilEstimate = Object.freeze({ found: false });

const DEFAULT_MIN_CONTOUR_AREA = 20;

export const pickMostCentralCircle = (
  circles: readonly HoughCircle[],
  image: GrayImage,
): HoughCircle | null => {
  const centerX = Math.floor(image.width / 2);
  const centerY = Math.floor(image.height / 2);

  let best: HoughCircle | null = null;
  let bestDistance = Number.POSITIVE_INFINITY;
  for (const circle of circles) {
    const distance = Math.hypot(circle.x - centerX, circle.y - centerY);
    if (distance < bestDistance) {
      best = circle;
      bestDistance = distance;
    }
  }
  return best;
};

/**
 * Otsu threshold, inverted so the dark pupil is foreground, then the centroid
 * of the largest blob. Coordinates are local to `image`.
 */
export const locateByContour = (
  image: GrayImage,
  minArea = DEFAULT_MIN_CONTOUR_AREA,
): PixelPoint | null => {
  const mask = binarize(image, otsuThreshold(image), true);
  const blobs = findBlobs(mask);
  if (blobs.length === 0) {
    return null;
  }

  const largest = blobs.reduce((current, blob) =>
    blob.area > current.area ? blob : current,
  );
  if (largest.area <= minArea) {
    return null;
  }

  return {
    x: Math.trunc(largest.centroidX),
    y: Math.trunc(largest.centroidY),
  };
};

export class PupilLocator {
  private readonly hough: HoughCircleOptions;

  private readonly minContourArea: number;

  constructor(options: PupilLocatorOptions = {}) {
    this.hough = { ...DEFAULT_HOUGH_OPTIONS, ...(options.hough ?? {}) };
    this.minContourArea = options.minContourArea ?? DEFAULT_MIN_CONTOUR_AREA;
  }

  /** Finds the pupil in an eye image and returns it in frame coordinates. */
  locate(image: GrayImage, boundingBox: BoundingBox): PupilEstimate {
    if (image.width === 0 || image.height === 0) {
      return NOT_FOUND;
    }

    const circle = pickMostCentralCircle(
      findHoughCircles(image, this.hough),
      image,
    );
    if (circle) {
      return {
        found: true,
        center: {
          x: boundingBox.xMin + circle.x,
          y: boundingBox.yMin + circle.y,
        },
        method: "hough",
      };
    }

    const local = locateByContour(image, this.minContourArea);
    if (!local) {
      return NOT_FOUND;
    }

    return {
      found: true,
      center: { x: boundingBox.xMin + local.x, y: boundingBox.yMin + local.y },
      method: "contour",
    };
  }
}
