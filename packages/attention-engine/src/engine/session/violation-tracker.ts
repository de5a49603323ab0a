import { RingBuffer } from "../../shared/buffers/ring-buffer";
import type { FrameResult } from "../../shared/types/engine-output";
import {
  type AlertState,
  VIOLATION_TYPES,
  type ViolationCount,
  type ViolationEntry,
  type ViolationType,
} from "../../shared/types/session";

export const CRITICAL_DETECTION_RATE = 80;

export type DetectionRates = {
  faceDetectionRate: number;
  eyeDetectionRate: number;
};

export type ViolationTrackerOptions = {
  alertThreshold: number;
  maxConsecutiveViolations: number;
  logCapacity: number;
};

/** Indicators raised by a single frame. Faulted frames raise none. */
export const collectViolations = (
  result: FrameResult,
  alertThreshold: number,
): ViolationType[] => {
  if (result.status === "no-face") {
    return ["NO_FACE"];
  }
  if (result.status !== "ok") {
    return [];
  }

  const violations: ViolationType[] = [];
  if (result.flags.lookingAway) {
    violations.push("LOOKING_AWAY");
  }
  if (result.flags.excessiveBlinking) {
    violations.push("EXCESSIVE_BLINKING");
  }
  if (result.flags.suspiciousMovement) {
    violations.push("SUSPICIOUS_MOVEMENT");
  }
  if (result.attentionScore < alertThreshold) {
    violations.push("LOW_ATTENTION");
  }
  return violations;
};

const createCounts = (): Record<ViolationType, number> => ({
  LOOKING_AWAY: 0,
  EXCESSIVE_BLINKING: 0,
  SUSPICIOUS_MOVEMENT: 0,
  LOW_ATTENTION: 0,
  NO_FACE: 0,
});

export class ViolationTracker {
  private readonly alertThreshold: number;

  private readonly maxConsecutiveViolations: number;

  private log: RingBuffer<ViolationEntry>;

  private counts = createCounts();

  private totalEntries = 0;

  private consecutive = 0;

  private alert: AlertState = {
    activeViolations: [],
    consecutiveViolations: 0,
    critical: false,
  };

  constructor(options: ViolationTrackerOptions) {
    this.alertThreshold = options.alertThreshold;
    this.maxConsecutiveViolations = options.maxConsecutiveViolations;
    this.log = RingBuffer.create<ViolationEntry>(options.logCapacity);
  }

  /**
   * Violating frames raise the consecutive counter and are logged; clean
   * frames lower it, never below zero. A frame without a face only lights
   * the `NO_FACE` indicator: the counter and the log are left as they were.
   */
  record(result: FrameResult, rates: DetectionRates): AlertState {
    const violations = collectViolations(result, this.alertThreshold);

    if (result.status === "no-face") {
      this.alert = {
        activeViolations: violations,
        consecutiveViolations: this.consecutive,
        critical: false,
      };
      return this.getAlertState();
    }

    if (violations.length === 0) {
      this.consecutive = Math.max(0, this.consecutive - 1);
      this.alert = {
        activeViolations: [],
        consecutiveViolations: this.consecutive,
        critical: false,
      };
      return this.getAlertState();
    }

    this.consecutive += 1;
    this.totalEntries += 1;
    violations.forEach((violation) => {
      this.counts[violation] += 1;
    });
    this.log = this.log.append({
      timestamp: result.timestamp,
      frameId: result.frameId,
      violations,
      attentionScore: result.attentionScore,
      gazeDirection: { ...result.gazeDirection },
    });

    const lowDetection =
      rates.faceDetectionRate < CRITICAL_DETECTION_RATE ||
      rates.eyeDetectionRate < CRITICAL_DETECTION_RATE;

    this.alert = {
      activeViolations: violations,
      consecutiveViolations: this.consecutive,
      critical:
        this.consecutive >= this.maxConsecutiveViolations && lowDetection,
    };
    return this.getAlertState();
  }

  getAlertState(): AlertState {
    return {
      ...this.alert,
      activeViolations: [...this.alert.activeViolations],
    };
  }

  /** Frames that raised at least one violation, including evicted entries. */
  get totalViolations(): number {
    return this.totalEntries;
  }

  recentViolations(count: number): ViolationEntry[] {
    return this.log.last(count);
  }

  /** Descending by count; ties keep the declaration order of the types. */
  mostCommonViolations(limit = 5): ViolationCount[] {
    return VIOLATION_TYPES.map((type) => ({ type, count: this.counts[type] }))
      .filter((entry) => entry.count > 0)
      .sort((a, b) => b.count - a.count)
      .slice(0, limit);
  }
}
