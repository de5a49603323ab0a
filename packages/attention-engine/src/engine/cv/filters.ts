import type { GrayImage } from "../../shared/types/frame";
import { createGrayImage, reflectIndex } from "./image";

// Fixed 5-tap binomial kernel, what a 5x5 Gaussian with sigma 0 resolves to.
const GAUSSIAN_5 = [1 / 16, 4 / 16, 6 / 16, 4 / 16, 1 / 16] as const;

export const gaussianBlur5 = (image: GrayImage): GrayImage => {
  const { width, height, data } = image;
  const horizontal = new Float32Array(width * height);

  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      let sum = 0;
      for (let k = -2; k <= 2; k += 1) {
        const column = reflectIndex(x + k, width);
        sum += GAUSSIAN_5[k + 2] * data[y * width + column];
      }
      horizontal[y * width + x] = sum;
    }
  }

  const output = createGrayImage(width, height);
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      let sum = 0;
      for (let k = -2; k <= 2; k += 1) {
        const row = reflectIndex(y + k, height);
        sum += GAUSSIAN_5[k + 2] * horizontal[row * width + x];
      }
      output.data[y * width + x] = Math.round(sum);
    }
  }

  return output;
};

export const computeHistogram = (image: GrayImage): Uint32Array => {
  const histogram = new Uint32Array(256);
  for (let i = 0; i < image.data.length; i += 1) {
    histogram[image.data[i]] += 1;
  }
  return histogram;
};

/**
 * Spreads the cumulative histogram over 0..255. The darkest populated level
 * maps to 0; an image with a single level is returned unchanged.
 */
export const equalizeHistogram = (image: GrayImage): GrayImage => {
  const total = image.data.length;
  const output = createGrayImage(image.width, image.height);
  if (total === 0) {
    return output;
  }

  const histogram = computeHistogram(image);
  let first = 0;
  while (histogram[first] === 0) {
    first += 1;
  }

  if (histogram[first] === total) {
    output.data.set(image.data);
    return output;
  }

  const scale = 255 / (total - histogram[first]);
  const lut = new Uint8ClampedArray(256);
  let cumulative = histogram[first];
  lut[first] = 0;
  for (let level = first + 1; level < 256; level += 1) {
    cumulative += histogram[level];
    lut[level] = Math.round((cumulative - histogram[first]) * scale);
  }

  for (let i = 0; i < total; i += 1) {
    output.data[i] = lut[image.data[i]];
  }
  return output;
};
