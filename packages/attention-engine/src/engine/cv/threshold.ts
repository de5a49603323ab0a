import type { GrayImage } from "../../shared/types/frame";
import { computeHistogram } from "./filters";
import { createGrayImage } from "./image";

/**
 * Otsu's method: the level that maximises between-class variance, where the
 * lower class holds every pixel `<= level`. Returns 0 for single-level images.
 */
export const otsuThreshold = (image: GrayImage): number => {
  const histogram = computeHistogram(image);
  const total = image.data.length;

  let weightedTotal = 0;
  for (let level = 0; level < 256; level += 1) {
    weightedTotal += level * histogram[level];
  }

  let best = 0;
  let bestVariance = -1;
  let lowerCount = 0;
  let lowerSum = 0;

  for (let level = 0; level < 256; level += 1) {
    lowerCount += histogram[level];
    lowerSum += level * histogram[level];
    const upperCount = total - lowerCount;
    if (lowerCount === 0 || upperCount === 0) {
      continue;
    }
    const lowerMean = lowerSum / lowerCount;
    const upperMean = (weightedTotal - lowerSum) / upperCount;
    const variance = lowerCount * upperCount * (lowerMean - upperMean) ** 2;
    if (variance > bestVariance) {
      bestVariance = variance;
      best = level;
    }
  }

  return best;
};

/** Pixels above `threshold` become 255, the rest 0; `invert` swaps the two. */
export const binarize = (
  image: GrayImage,
  threshold: number,
  invert = false,
): GrayImage => {
  const output = createGrayImage(image.width, image.height);
  const high = invert ? 0 : 255;
  const low = invert ? 255 : 0;
  for (let i = 0; i < image.data.length; i += 1) {
    output.data[i] = image.data[i] > threshold ? high : low;
  }
  return output;
};
