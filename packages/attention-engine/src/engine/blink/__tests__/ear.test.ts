import { describe, expect, it } from "vitest";
import type { LandmarkPoint } from "../../../shared/types/landmarks";
import { computeEar, computeFrameEar } from "../ear";

describe("computeEar", () => {
  it("matches the closed form on a known eye", () => {
    const points = [
      { x: 0, y: 0 },
      { x: 5, y: -2 },
      { x: 15, y: -2 },
      { x: 20, y: 0 },
      { x: 15, y: 2 },
      { x: 5, y: 2 },
    ];

    // (4 + 4) / (2 * 20)
    expect(computeEar(points)).toBeCloseTo(0.2, 10);
  });

  it("returns 0 with fewer than six points", () => {
    expect(computeEar([{ x: 0, y: 0 }])).toBe(0);
  });

  it("returns 0 when the eye has no width", () => {
    const points = Array.from({ length: 6 }, () => ({ x: 3, y: 3 }));

    expect(computeEar(points)).toBe(0);
  });
});

describe("computeFrameEar", () => {
  it("averages both eyes from projected face mesh points", () => {
    const landmarks: LandmarkPoint[] = Array.from({ length: 478 }, () => ({
      x: 0,
      y: 0,
    }));
    const place = (index: number, x: number, y: number) => {
      landmarks[index] = { x: x / 256, y: y / 256 };
    };
    // Left eye: EAR 0.2
    place(33, 0, 50);
    place(160, 5, 48);
    place(158, 15, 48);
    place(133, 20, 50);
    place(153, 15, 52);
    place(144, 5, 52);
    // Right eye: EAR 0.4
    place(362, 60, 50);
    place(385, 65, 46);
    place(387, 75, 46);
    place(263, 80, 50);
    place(373, 75, 54);
    place(380, 65, 54);

    const ear = computeFrameEar(landmarks, { width: 256, height: 256 });

    expect(ear.left).toBeCloseTo(0.2, 10);
    expect(ear.right).toBeCloseTo(0.4, 10);
    expect(ear.average).toBeCloseTo(0.3, 10);
  });
});
