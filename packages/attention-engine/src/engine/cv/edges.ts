import type { GrayImage } from "../../shared/types/frame";
import { reflectIndex } from "./image";

export type GradientField = {
  width: number;
  height: number;
  dx: Int32Array;
  dy: Int32Array;
};

export const sobel = (image: GrayImage): GradientField => {
  const { width, height, data } = image;
  const dx = new Int32Array(width * height);
  const dy = new Int32Array(width * height);

  const at = (x: number, y: number): number => {
    return data[reflectIndex(y, height) * width + reflectIndex(x, width)];
  };

  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      const topLeft = at(x - 1, y - 1);
      const top = at(x, y - 1);
      const topRight = at(x + 1, y - 1);
      const left = at(x - 1, y);
      const right = at(x + 1, y);
      const bottomLeft = at(x - 1, y + 1);
      const bottom = at(x, y + 1);
      const bottomRight = at(x + 1, y + 1);

      dx[y * width + x] =
        topRight + 2 * right + bottomRight - (topLeft + 2 * left + bottomLeft);
      dy[y * width + x] =
        bottomLeft + 2 * bottom + bottomRight - (topLeft + 2 * top + topRight);
    }
  }

  return { width, height, dx, dy };
};

const TAN_22_5 = Math.tan(Math.PI / 8);
const TAN_67_5 = Math.tan((3 * Math.PI) / 8);

/**
 * Canny edge map over an existing gradient field, with L1 magnitude,
 * non-maximum suppression and hysteresis between `lowThreshold` and
 * `highThreshold`. Edge pixels are 1, everything else 0.
 */
export const canny = (
  gradient: GradientField,
  lowThreshold: number,
  highThreshold: number,
): Uint8Array => {
  const { width, height, dx, dy } = gradient;
  const magnitude = new Float32Array(width * height);
  for (let i = 0; i < magnitude.length; i += 1) {
    magnitude[i] = Math.abs(dx[i]) + Math.abs(dy[i]);
  }

  // 0: suppressed, 1: weak candidate, 2: strong
  const marks = new Uint8Array(width * height);
  for (let y = 1; y < height - 1; y += 1) {
    for (let x = 1; x < width - 1; x += 1) {
      const index = y * width + x;
      const value = magnitude[index];
      if (value <= lowThreshold) {
        continue;
      }

      const gx = dx[index];
      const gy = dy[index];
      const ax = Math.abs(gx);
      const ay = Math.abs(gy);

      let before: number;
      let after: number;
      if (ay <= TAN_22_5 * ax) {
        before = magnitude[index - 1];
        after = magnitude[index + 1];
      } else if (ay > TAN_67_5 * ax) {
        before = magnitude[index - width];
        after = magnitude[index + width];
      } else if ((gx > 0) === (gy > 0)) {
        before = magnitude[index - width - 1];
        after = magnitude[index + width + 1];
      } else {
        before = magnitude[index - width + 1];
        after = magnitude[index + width - 1];
      }

      if (value > before && value >= after) {
        marks[index] = value > highThreshold ? 2 : 1;
      }
    }
  }

  const edges = new Uint8Array(width * height);
  const stack: number[] = [];
  for (let i = 0; i < marks.length; i += 1) {
    if (marks[i] === 2) {
      edges[i] = 1;
      stack.push(i);
    }
  }

  while (stack.length > 0) {
    const index = stack.pop();
    if (index === undefined) {
      break;
    }
    const x = index % width;
    const y = (index - x) / width;
    for (let ny = y - 1; ny <= y + 1; ny += 1) {
      for (let nx = x - 1; nx <= x + 1; nx += 1) {
        if (nx < 0 || ny < 0 || nx >= width || ny >= height) {
          continue;
        }
        const neighbour = ny * width + nx;
        if (marks[neighbour] === 1 && edges[neighbour] === 0) {
          edges[neighbour] = 1;
          stack.push(neighbour);
        }
      }
    }
  }

  return edges;
};
