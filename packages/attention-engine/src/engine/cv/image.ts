import type { FrameImage, GrayImage } from "../../shared/types/frame";
import type { BoundingBox } from "../../shared/types/geometry";

export const createGrayImage = (
  width: number,
  height: number,
  fill = 0,
): GrayImage => {
  const data = new Uint8ClampedArray(width * height);
  if (fill !== 0) {
    data.fill(fill);
  }
  return { width, height, data };
};

/** BORDER_REFLECT_101: `dcb|abcd|cba`. */
export const reflectIndex = (index: number, length: number): number => {
  if (length <= 1) {
    return 0;
  }
  let resolved = index;
  while (resolved < 0 || resolved >= length) {
    resolved = resolved < 0 ? -resolved : 2 * length - 2 - resolved;
  }
  return resolved;
};

const toLuma = (r: number, g: number, b: number): number => {
  return Math.round(0.299 * r + 0.587 * g + 0.114 * b);
};

/**
 * Crops `box` out of `frame` and converts it to grayscale with BT.601 weights.
 * The box must already be clipped to the frame.
 */
export const cropToGray = (frame: FrameImage, box: BoundingBox): GrayImage => {
  const width = box.xMax - box.xMin;
  const height = box.yMax - box.yMin;
  const output = createGrayImage(width, height);
  const { channels, data } = frame;

  for (let y = 0; y < height; y += 1) {
    const sourceRow = (box.yMin + y) * frame.width;
    for (let x = 0; x < width; x += 1) {
      const offset = (sourceRow + box.xMin + x) * channels;
      output.data[y * width + x] =
        channels === 1
          ? data[offset]
          : toLuma(data[offset], data[offset + 1], data[offset + 2]);
    }
  }

  return output;
};
