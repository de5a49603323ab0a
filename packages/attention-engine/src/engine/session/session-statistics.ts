import type { FrameResult } from "../../shared/types/engine-output";
import type {
  AttentionStatistics,
  EyeStatus,
} from "../../shared/types/session";
import { countsAsEyeDetection } from "./eye-status";
import type { DetectionRates } from "./violation-tracker";

/** Welford's running mean and variance; constant memory per session. */
export class RunningStatistics {
  private count = 0;

  private mean = 0;

  private m2 = 0;

  private minimum = Number.POSITIVE_INFINITY;

  private maximum = Number.NEGATIVE_INFINITY;

  push(value: number): void {
    this.count += 1;
    const delta = value - this.mean;
    this.mean += delta / this.count;
    this.m2 += delta * (value - this.mean);
    this.minimum = Math.min(this.minimum, value);
    this.maximum = Math.max(this.maximum, value);
  }

  snapshot(): AttentionStatistics {
    if (this.count === 0) {
      return { samples: 0, average: 0, max: 0, min: 0, variance: 0 };
    }
    return {
      samples: this.count,
      average: this.mean,
      max: this.maximum,
      min: this.minimum,
      variance: this.m2 / this.count,
    };
  }
}

const toPercent = (count: number, total: number): number => {
  return total > 0 ? (count / total) * 100 : 0;
};

export class SessionStatistics {
  readonly startedAt: number;

  private totalFrames = 0;

  private faceFrames = 0;

  private eyeFrames = 0;

  private faultedFrames = 0;

  private readonly attention = new RunningStatistics();

  constructor(startedAt: number) {
    this.startedAt = startedAt;
  }

  /**
   * Faulted frames still carried a face; only successful frames feed the
   * attention statistics.
   */
  record(result: FrameResult, eyeStatus: EyeStatus): void {
    this.totalFrames += 1;

    if (result.status === "no-face") {
      return;
    }

    this.faceFrames += 1;
    if (result.status === "faulted") {
      this.faultedFrames += 1;
      return;
    }

    if (countsAsEyeDetection(eyeStatus)) {
      this.eyeFrames += 1;
    }
    this.attention.push(result.attentionScore);
  }

  get framesProcessed(): number {
    return this.totalFrames;
  }

  get framesFaulted(): number {
    return this.faultedFrames;
  }

  getDetectionRates(): DetectionRates {
    return {
      faceDetectionRate: toPercent(this.faceFrames, this.totalFrames),
      eyeDetectionRate: toPercent(this.eyeFrames, this.totalFrames),
    };
  }

  getAttentionStatistics(): AttentionStatistics {
    return this.attention.snapshot();
  }
}
