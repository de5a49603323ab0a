import type { SessionReport } from "../../shared/types/session";
import type { SessionStatistics } from "./session-statistics";
import type { ViolationTracker } from "./violation-tracker";

export const RECENT_VIOLATIONS_IN_REPORT = 10;
export const TOP_VIOLATIONS_IN_REPORT = 5;

export const buildSessionReport = (
  statistics: SessionStatistics,
  tracker: ViolationTracker,
  now: number,
): SessionReport => {
  const rates = statistics.getDetectionRates();
  return {
    sessionDurationMs: Math.max(0, now - statistics.startedAt),
    totalFramesProcessed: statistics.framesProcessed,
    faceDetectionRate: rates.faceDetectionRate,
    eyeDetectionRate: rates.eyeDetectionRate,
    totalViolations: tracker.totalViolations,
    recentViolations: tracker.recentViolations(RECENT_VIOLATIONS_IN_REPORT),
    attention: statistics.getAttentionStatistics(),
    mostCommonViolations: tracker.mostCommonViolations(
      TOP_VIOLATIONS_IN_REPORT,
    ),
  };
};
