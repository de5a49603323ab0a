export type PixelPoint = {
  x: number;
  y: number;
};

export type Vector2 = {
  x: number;
  y: number;
};

/** Pixel-space box; `xMax` and `yMax` are exclusive. */
export type BoundingBox = {
  xMin: number;
  yMin: number;
  xMax: number;
  yMax: number;
};

export const ZERO_VECTOR: Readonly<Vector2> = Object.freeze({ x: 0, y: 0 });

export const distance = (a: PixelPoint, b: PixelPoint): number => {
  return Math.hypot(a.x - b.x, a.y - b.y);
};
