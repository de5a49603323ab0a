import type { AttentionZone } from "../../shared/types/engine-output";

export type AttentionInput = {
  lookingAway: boolean;
  excessiveBlinking: boolean;
  suspiciousMovement: boolean;
  /** Blinks per minute. */
  blinkRate: number;
};

export const ATTENTION_PENALTIES = Object.freeze({
  lookingAway: 30,
  excessiveBlinking: 20,
  suspiciousMovement: 25,
  abnormalBlinkRate: 15,
});

export const NORMAL_BLINK_RATE = Object.freeze({ min: 5, max: 30 });

/** 100 minus every applicable penalty, floored at 0. */
export const computeAttentionScore = (input: AttentionInput): number => {
  let score = 100;

  if (input.lookingAway) {
    score -= ATTENTION_PENALTIES.lookingAway;
  }
  if (input.excessiveBlinking) {
    score -= ATTENTION_PENALTIES.excessiveBlinking;
  }
  if (input.suspiciousMovement) {
    score -= ATTENTION_PENALTIES.suspiciousMovement;
  }
  if (
    input.blinkRate > NORMAL_BLINK_RATE.max ||
    input.blinkRate < NORMAL_BLINK_RATE.min
  ) {
    score -= ATTENTION_PENALTIES.abnormalBlinkRate;
  }

  return Math.max(0, score);
};

export const getAttentionZone = (score: number): AttentionZone => {
  if (!Number.isFinite(score)) return "RED";
  if (score > 80) return "GREEN";
  if (score > 60) return "YELLOW";
  return "RED";
};
