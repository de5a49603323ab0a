import { describe, expect, it } from "vitest";
import {
  CLOSED_LID,
  createFace,
  createFrame,
} from "../../__tests__/synthetic-face";
import {
  computeEyeBoundingBox,
  extractEyeRegion,
  extractEyeRegions,
  toPixelPoint,
} from "../eye-region-extractor";

describe("toPixelPoint", () => {
  it("truncates like an integer cast", () => {
    const point = toPixelPoint({ x: 0.999, y: 0.5 }, { width: 10, height: 3 });

    expect(point).toEqual({ x: 9, y: 1 });
  });
});

describe("computeEyeBoundingBox", () => {
  it("pads the landmark extent and clips to the frame", () => {
    const box = computeEyeBoundingBox(
      [
        { x: 4, y: 2 },
        { x: 30, y: 12 },
      ],
      { width: 32, height: 40 },
    );

    expect(box).toEqual({ xMin: 0, yMin: 0, xMax: 32, yMax: 17 });
  });

  it("returns null when nothing of the eye is inside the frame", () => {
    expect(
      computeEyeBoundingBox([{ x: 300, y: 10 }], { width: 256, height: 256 }),
    ).toBeNull();
    expect(computeEyeBoundingBox([], { width: 256, height: 256 })).toBeNull();
  });
});

describe("extractEyeRegion", () => {
  it("crops the padded eye box", () => {
    const region = extractEyeRegion(
      "left",
      createFace().landmarks,
      createFrame(),
    );

    expect(region?.boundingBox).toEqual({
      xMin: 50,
      yMin: 91,
      xMax: 90,
      yMax: 109,
    });
    expect(region?.image.width).toBe(40);
    expect(region?.image.height).toBe(18);
    expect(region?.landmarks).toHaveLength(16);
  });

  it("follows the lids as the eye closes", () => {
    const region = extractEyeRegion(
      "right",
      createFace(CLOSED_LID).landmarks,
      createFrame(),
    );

    expect(region?.boundingBox).toEqual({
      xMin: 160,
      yMin: 94,
      xMax: 200,
      yMax: 106,
    });
  });

  it("skips an eye whose landmarks are missing", () => {
    const landmarks = createFace().landmarks.slice(0, 300);

    expect(extractEyeRegion("right", landmarks, createFrame())).toBeNull();
    expect(
      Object.keys(extractEyeRegions(landmarks, createFrame())),
    ).toEqual(["left"]);
  });
});
