import type { GrayImage } from "../../shared/types/frame";

export type Blob = {
  /** Pixel count. */
  area: number;
  centroidX: number;
  centroidY: number;
};

/**
 * Connected components (8-neighbourhood) of the non-zero pixels of a
 * binary image, in scan order of their first pixel.
 */
export const findBlobs = (image: GrayImage): Blob[] => {
  const { width, height, data } = image;
  const visited = new Uint8Array(width * height);
  const blobs: Blob[] = [];
  const stack: number[] = [];

  for (let start = 0; start < data.length; start += 1) {
    if (data[start] === 0 || visited[start] === 1) {
      continue;
    }

    let area = 0;
    let sumX = 0;
    let sumY = 0;
    visited[start] = 1;
    stack.push(start);

    while (stack.length > 0) {
      const index = stack.pop();
      if (index === undefined) {
        break;
      }
      const x = index % width;
      const y = (index - x) / width;
      area += 1;
      sumX += x;
      sumY += y;

      for (let ny = y - 1; ny <= y + 1; ny += 1) {
        for (let nx = x - 1; nx <= x + 1; nx += 1) {
          if (nx < 0 || ny < 0 || nx >= width || ny >= height) {
            continue;
          }
          const neighbour = ny * width + nx;
          if (data[neighbour] !== 0 && visited[neighbour] === 0) {
            visited[neighbour] = 1;
            stack.push(neighbour);
          }
        }
      }
    }

    blobs.push({ area, centroidX: sumX / area, centroidY: sumY / area });
  }

  return blobs;
};
