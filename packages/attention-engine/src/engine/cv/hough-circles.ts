import type { GrayImage } from "../../shared/types/frame";
import { canny, sobel } from "./edges";

export type HoughCircle = {
  x: number;
  y: number;
  radius: number;
  votes: number;
};

export type HoughCircleOptions = {
  minRadius: number;
  maxRadius: number;
  /** Minimum distance between accepted centres. */
  minDistance: number;
  /** Upper Canny threshold; the lower one is half of it. */
  cannyThreshold: number;
  /** Votes a centre needs, counted over its 3x3 neighbourhood. */
  accumulatorThreshold: number;
};

export const DEFAULT_HOUGH_OPTIONS: Readonly<HoughCircleOptions> =
  Object.freeze({
    minRadius: 5,
    maxRadius: 25,
    minDistance: 20,
    cannyThreshold: 50,
    accumulatorThreshold: 30,
  });

type EdgePoint = {
  x: number;
  y: number;
};

const collectEdgePoints = (edges: Uint8Array, width: number): EdgePoint[] => {
  const points: EdgePoint[] = [];
  for (let i = 0; i < edges.length; i += 1) {
    if (edges[i] === 1) {
      const x = i % width;
      points.push({ x, y: (i - x) / width });
    }
  }
  return points;
};

const neighbourhoodSum = (
  accumulator: Int32Array,
  width: number,
  height: number,
): Int32Array => {
  const support = new Int32Array(accumulator.length);
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      let sum = 0;
      const top = Math.max(0, y - 1);
      const bottom = Math.min(height - 1, y + 1);
      const left = Math.max(0, x - 1);
      const right = Math.min(width - 1, x + 1);
      for (let ny = top; ny <= bottom; ny += 1) {
        for (let nx = left; nx <= right; nx += 1) {
          sum += accumulator[ny * width + nx];
        }
      }
      support[y * width + x] = sum;
    }
  }
  return support;
};

const isLocalMaximum = (
  support: Int32Array,
  width: number,
  height: number,
  x: number,
  y: number,
): boolean => {
  const value = support[y * width + x];
  for (let ny = y - 1; ny <= y + 1; ny += 1) {
    for (let nx = x - 1; nx <= x + 1; nx += 1) {
      if (nx < 0 || ny < 0 || nx >= width || ny >= height) {
        continue;
      }
      if ((nx !== x || ny !== y) && support[ny * width + nx] > value) {
        return false;
      }
    }
  }
  return true;
};

const estimateRadius = (
  center: EdgePoint,
  edgePoints: EdgePoint[],
  minRadius: number,
  maxRadius: number,
): { radius: number; support: number } => {
  const counts = new Uint32Array(maxRadius + 1);
  edgePoints.forEach((point) => {
    const r = Math.round(Math.hypot(point.x - center.x, point.y - center.y));
    if (r >= minRadius && r <= maxRadius) {
      counts[r] += 1;
    }
  });

  let radius = minRadius;
  let support = 0;
  for (let r = minRadius; r <= maxRadius; r += 1) {
    if (counts[r] > support) {
      support = counts[r];
      radius = r;
    }
  }
  return { radius, support };
};

/**
 * Hough gradient circle search: every edge pixel votes along its gradient
 * direction, both ways, at each radius in range. Centres are local maxima of
 * the vote map, strongest first, at least `minDistance` apart.
 */
export const findHoughCircles = (
  image: GrayImage,
  options: Partial<HoughCircleOptions> = {},
): HoughCircle[] => {
  const settings = { ...DEFAULT_HOUGH_OPTIONS, ...options };
  const { width, height } = image;
  if (width < 3 || height < 3) {
    return [];
  }

  const gradient = sobel(image);
  const edges = canny(
    gradient,
    settings.cannyThreshold / 2,
    settings.cannyThreshold,
  );
  const edgePoints = collectEdgePoints(edges, width);
  if (edgePoints.length === 0) {
    return [];
  }

  const accumulator = new Int32Array(width * height);
  edgePoints.forEach(({ x, y }) => {
    const index = y * width + x;
    const gx = gradient.dx[index];
    const gy = gradient.dy[index];
    const magnitude = Math.hypot(gx, gy);
    if (magnitude === 0) {
      return;
    }
    const ux = gx / magnitude;
    const uy = gy / magnitude;
    for (let r = settings.minRadius; r <= settings.maxRadius; r += 1) {
      for (const sign of [-1, 1]) {
        const cx = Math.round(x + sign * r * ux);
        const cy = Math.round(y + sign * r * uy);
        if (cx >= 0 && cy >= 0 && cx < width && cy < height) {
          accumulator[cy * width + cx] += 1;
        }
      }
    }
  });

  const support = neighbourhoodSum(accumulator, width, height);
  const candidates: HoughCircle[] = [];
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      const votes = support[y * width + x];
      if (
        votes >= settings.accumulatorThreshold &&
        isLocalMaximum(support, width, height, x, y)
      ) {
        candidates.push({ x, y, radius: 0, votes });
      }
    }
  }

  candidates.sort((a, b) => b.votes - a.votes);

  const accepted: HoughCircle[] = [];
  candidates.forEach((candidate) => {
    const tooClose = accepted.some((circle) => {
      return (
        Math.hypot(circle.x - candidate.x, circle.y - candidate.y) <
        settings.minDistance
      );
    });
    if (tooClose) {
      return;
    }
    const { radius, support: radiusSupport } = estimateRadius(
      candidate,
      edgePoints,
      settings.minRadius,
      settings.maxRadius,
    );
    if (radiusSupport === 0) {
      return;
    }
    accepted.push({ ...candidate, radius });
  });

  return accepted;
};
