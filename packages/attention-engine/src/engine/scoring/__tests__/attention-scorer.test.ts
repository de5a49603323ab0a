import { describe, expect, it } from "vitest";
import {
  type AttentionInput,
  computeAttentionScore,
  getAttentionZone,
} from "../attention-scorer";

const calm: AttentionInput = {
  lookingAway: false,
  excessiveBlinking: false,
  suspiciousMovement: false,
  blinkRate: 15,
};

describe("computeAttentionScore", () => {
  it("scores an attentive candidate at 100", () => {
    expect(computeAttentionScore(calm)).toBe(100);
  });

  it("penalises a rate below the normal range, as on a fresh session", () => {
    expect(computeAttentionScore({ ...calm, blinkRate: 0 })).toBe(85);
  });

  it("sums the applicable penalties", () => {
    expect(
      computeAttentionScore({
        ...calm,
        lookingAway: true,
        excessiveBlinking: true,
      }),
    ).toBe(50);
    expect(
      computeAttentionScore({
        lookingAway: true,
        excessiveBlinking: true,
        suspiciousMovement: true,
        blinkRate: 45,
      }),
    ).toBe(10);
  });

  it("treats the range bounds as normal", () => {
    expect(computeAttentionScore({ ...calm, blinkRate: 5 })).toBe(100);
    expect(computeAttentionScore({ ...calm, blinkRate: 30 })).toBe(100);
    expect(computeAttentionScore({ ...calm, blinkRate: 30.5 })).toBe(85);
  });
});

describe("getAttentionZone", () => {
  it("maps scores to zones", () => {
    expect(getAttentionZone(100)).toBe("GREEN");
    expect(getAttentionZone(81)).toBe("GREEN");
    expect(getAttentionZone(80)).toBe("YELLOW");
    expect(getAttentionZone(61)).toBe("YELLOW");
    expect(getAttentionZone(60)).toBe("RED");
    expect(getAttentionZone(Number.NaN)).toBe("RED");
  });
});
