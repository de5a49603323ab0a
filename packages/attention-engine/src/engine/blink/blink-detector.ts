import { RingBuffer } from "../../shared/buffers/ring-buffer";
import { MS_PER_MINUTE } from "../../shared/time";
import type { BlinkData } from "../../shared/types/engine-output";

export const EAR_HISTORY_CAPACITY = 30;

/**
 * `OPEN` -> `CLOSING` on the first sample below threshold; every further low
 * sample extends the run. The first sample at or above threshold returns to
 * `OPEN` and counts a blink only if the run reached `blinkFrames`.
 */
export type BlinkPhase = "OPEN" | "CLOSING";

export type BlinkState = {
  readonly phase: BlinkPhase;
  readonly consecutiveLowFrames: number;
  readonly totalBlinks: number;
  readonly earHistory: RingBuffer<number>;
  readonly lastBlinkAt: number;
  readonly excessiveBlinking: boolean;
};

export type BlinkDetectorOptions = {
  earThreshold: number;
  blinkFrames: number;
};

export type BlinkStep = {
  state: BlinkState;
  output: BlinkData;
};

export class BlinkDetector {
  private readonly earThreshold: number;

  private readonly blinkFrames: number;

  constructor(options: BlinkDetectorOptions) {
    this.earThreshold = options.earThreshold;
    this.blinkFrames = options.blinkFrames;
  }

  createInitialState(now: number): BlinkState {
    return {
      phase: "OPEN",
      consecutiveLowFrames: 0,
      totalBlinks: 0,
      earHistory: RingBuffer.create<number>(EAR_HISTORY_CAPACITY),
      lastBlinkAt: now,
      excessiveBlinking: false,
    };
  }

  step(state: BlinkState, ear: number, now: number): BlinkStep {
    const earHistory = state.earHistory.append(ear);
    const closed = ear < this.earThreshold;

    let phase: BlinkPhase = state.phase;
    let consecutiveLowFrames = state.consecutiveLowFrames;
    let totalBlinks = state.totalBlinks;
    let lastBlinkAt = state.lastBlinkAt;
    let blinkDetected = false;

    if (closed) {
      phase = "CLOSING";
      consecutiveLowFrames += 1;
    } else {
      if (consecutiveLowFrames >= this.blinkFrames) {
        totalBlinks += 1;
        lastBlinkAt = now;
        blinkDetected = true;
      }
      phase = "OPEN";
      consecutiveLowFrames = 0;
    }

    // Until the window fills, the previous decision stands.
    let { excessiveBlinking } = state;
    if (earHistory.size >= EAR_HISTORY_CAPACITY) {
      const lowSamples = earHistory
        .last(EAR_HISTORY_CAPACITY)
        .filter((sample) => sample < this.earThreshold).length;
      excessiveBlinking = lowSamples > EAR_HISTORY_CAPACITY / 2;
    }

    const next: BlinkState = {
      phase,
      consecutiveLowFrames,
      totalBlinks,
      earHistory,
      lastBlinkAt,
      excessiveBlinking,
    };

    return {
      state: next,
      output: {
        blinkDetected,
        ear,
        blinkRate: computeBlinkRate(next, now),
        excessiveBlinking,
      },
    };
  }
}

/**
 * Total blinks over the minutes since the most recent blink, with the
 * denominator floored at one minute.
 */
export const computeBlinkRate = (state: BlinkState, now: number): number => {
  const minutesSinceLastBlink = (now - state.lastBlinkAt) / MS_PER_MINUTE;
  return state.totalBlinks / Math.max(1, minutesSinceLastBlink);
};
