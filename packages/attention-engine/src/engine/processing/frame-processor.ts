import { RingBuffer } from "../../shared/buffers/ring-buffer";
import { type Logger, getLogger } from "../../shared/logger";
import { type Clock, resolveTimestamp } from "../../shared/time";
import type {
  EyeMetrics,
  EyeSide,
  FrameFlags,
  FrameResult,
  PupilEstimate,
} from "../../shared/types/engine-output";
import type { FrameImage } from "../../shared/types/frame";
import type { PixelPoint, Vector2 } from "../../shared/types/geometry";
import type { FaceDetection } from "../../shared/types/landmarks";
import type {
  AlertState,
  SessionReport,
  SessionSummary,
} from "../../shared/types/session";
import { parseFaceDetection } from "../../shared/validation/landmarks";
import {
  BlinkDetector,
  type BlinkState,
  EAR_HISTORY_CAPACITY,
} from "../blink/blink-detector";
import { type FrameEar, computeFrameEar } from "../blink/ear";
import {
  type EngineConfig,
  type EngineConfigOverrides,
  resolveEngineConfig,
} from "../config/engine-config";
import {
  type CalibrationReference,
  commitCalibration,
  createUncalibratedReference,
  isLookingAway,
} from "../gaze/calibration-store";
import { averageGaze, estimateGaze } from "../gaze/gaze-estimator";
import {
  MovementAnalyzer,
  type MovementState,
  createInitialMovementState,
} from "../movement/movement-analyzer";
import { PupilLocator } from "../pupil/pupil-locator";
import { EYE_SIDES } from "../regions/eye-landmarks";
import {
  type EyeRegion,
  type EyeRegions,
  extractEyeRegions,
} from "../regions/eye-region-extractor";
import {
  computeAttentionScore,
  getAttentionZone,
} from "../scoring/attention-scorer";
import { captureEngineException } from "../sentry";
import { classifyEyeStatus } from "../session/eye-status";
import { buildSessionReport } from "../session/session-report";
import { SessionStatistics } from "../session/session-statistics";
import { ViolationTracker } from "../session/violation-tracker";
import { buildEmptyFrameResult, buildEyeMetrics } from "./output-builder";
import { type StageFailure, runStage } from "./stage-result";

export const GAZE_HISTORY_CAPACITY = 60;
const RECENT_SAMPLES_IN_SUMMARY = 30;

type PupilLocatorLike = Pick<PupilLocator, "locate">;

type FaultReporter = (
  error: unknown,
  context: Record<string, unknown>,
) => void;

export type FrameProcessorOptions = {
  /** Explicit tunables; applied over defaults and environment overrides. */
  config?: EngineConfigOverrides | null;
  /** Environment reader for config resolution (primarily for tests). */
  readEnv?: (key: string) => string | undefined;
  /** Wall-clock source in milliseconds; blink rates are per minute of it. */
  clock?: Clock;
  pupilLocator?: PupilLocatorLike;
  logger?: Logger;
  reportFault?: FaultReporter;
};

type EngineState = {
  readonly blink: BlinkState;
  readonly calibration: CalibrationReference;
  readonly movement: MovementState;
  readonly gazeHistory: RingBuffer<Vector2>;
  /** Averaged gaze of the last successful frame. */
  readonly lastGaze: Vector2 | null;
  readonly lookingAway: boolean;
};

type EyePupilEstimates = Partial<Record<EyeSide, PupilEstimate>>;

type FrameGaze = {
  perEye: Partial<Record<EyeSide, Vector2>>;
  average: Vector2;
  lookingAway: boolean;
};

const pupilPoint = (pupil: PupilEstimate | undefined): PixelPoint | null => {
  return pupil?.found ? pupil.center : null;
};

const earFor = (ear: FrameEar, eye: EyeSide): number => {
  return eye === "left" ? ear.left : ear.right;
};

const mean = (values: readonly number[]): number => {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
};

/**
 * Turns a stream of landmark detections and frames into per-frame attention
 * results. Owns every rolling history; a frame either commits a complete next
 * state or leaves the previous one untouched.
 */
export class FrameProcessor {
  private readonly config: Readonly<EngineConfig>;

  private readonly clock: Clock;

  private readonly logger: Logger;

  private readonly reportFault: FaultReporter;

  private readonly pupilLocator: PupilLocatorLike;

  private readonly blinkDetector: BlinkDetector;

  private readonly movementAnalyzer: MovementAnalyzer;

  private readonly violations: ViolationTracker;

  private readonly statistics: SessionStatistics;

  private state: EngineState;

  private frameCounter = 0;

  constructor(options: FrameProcessorOptions = {}) {
    this.config = resolveEngineConfig(options.config, {
      readEnv: options.readEnv,
    });
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? getLogger("frame-processor");
    this.reportFault = options.reportFault ?? captureEngineException;
    this.pupilLocator = options.pupilLocator ?? new PupilLocator();
    this.blinkDetector = new BlinkDetector({
      earThreshold: this.config.earThreshold,
      blinkFrames: this.config.blinkFrames,
    });
    this.movementAnalyzer = new MovementAnalyzer({
      movementThreshold: this.config.movementThreshold,
    });
    this.violations = new ViolationTracker({
      alertThreshold: this.config.alertThreshold,
      maxConsecutiveViolations: this.config.maxConsecutiveViolations,
      logCapacity: this.config.violationLogCapacity,
    });

    const now = this.now();
    this.statistics = new SessionStatistics(now);
    this.state = {
      blink: this.blinkDetector.createInitialState(now),
      calibration: createUncalibratedReference(),
      movement: createInitialMovementState(),
      gazeHistory: RingBuffer.create<Vector2>(GAZE_HISTORY_CAPACITY),
      lastGaze: null,
      lookingAway: false,
    };
  }

  getConfig(): Readonly<EngineConfig> {
    return this.config;
  }

  process(detection: FaceDetection | null, frame: FrameImage): FrameResult {
    this.frameCounter += 1;
    const frameId = this.frameCounter;
    const timestamp = this.now();

    const result = detection
      ? this.runPipeline(detection, frame, frameId, timestamp)
      : buildEmptyFrameResult(frameId, timestamp, "no-face");

    this.recordSession(result);
    return result;
  }

  /**
   * Entry point for untrusted provider output. Anything that is not a valid
   * detection is processed as a frame without a face.
   */
  processPayload(payload: unknown, frame: FrameImage): FrameResult {
    if (payload === null || payload === undefined) {
      return this.process(null, frame);
    }

    const parsed = parseFaceDetection(payload);
    if (!parsed.ok) {
      this.logger.warn("Discarding invalid face detection payload", {
        issue: parsed.issue,
        index: parsed.index,
      });
      return this.process(null, frame);
    }
    return this.process(parsed.detection, frame);
  }

  /**
   * Records the neutral gaze. Without an argument the last successful frame's
   * averaged gaze is used; returns false when there is none yet.
   */
  calibrate(gaze?: Vector2): boolean {
    const reference = gaze ?? this.state.lastGaze;
    if (!reference) {
      this.logger.warn("Calibration requested before any gaze was measured");
      return false;
    }
    if (!Number.isFinite(reference.x) || !Number.isFinite(reference.y)) {
      this.logger.warn("Ignoring non-finite calibration vector", {
        x: reference.x,
        y: reference.y,
      });
      return false;
    }

    this.state = {
      ...this.state,
      calibration: commitCalibration(
        this.state.calibration,
        reference,
        this.now(),
      ),
    };
    this.logger.info("Gaze calibration committed", {
      centerX: reference.x,
      centerY: reference.y,
    });
    return true;
  }

  getCalibration(): CalibrationReference {
    return this.state.calibration;
  }

  getSummary(): SessionSummary {
    const { blink, movement, gazeHistory } = this.state;
    const currentFlags: FrameFlags = {
      lookingAway: this.state.lookingAway,
      excessiveBlinking: blink.excessiveBlinking,
      suspiciousMovement: movement.suspicious,
    };
    return {
      totalBlinks: blink.totalBlinks,
      averageEar: mean(blink.earHistory.last(EAR_HISTORY_CAPACITY)),
      recentMovementSamples: movement.movementHistory.last(
        RECENT_SAMPLES_IN_SUMMARY,
      ),
      recentGazeSamples: gazeHistory
        .last(RECENT_SAMPLES_IN_SUMMARY)
        .map((vector) => ({ ...vector })),
      currentFlags,
    };
  }

  /** Every retained frame-level gaze vector, oldest first. */
  getGazeHistory(): Vector2[] {
    return this.state.gazeHistory.toArray().map((vector) => ({ ...vector }));
  }

  getAlertState(): AlertState {
    return this.violations.getAlertState();
  }

  getSessionReport(now?: number): SessionReport {
    return buildSessionReport(
      this.statistics,
      this.violations,
      now ?? this.now(),
    );
  }

  private now(): number {
    return resolveTimestamp(this.clock());
  }

  private runPipeline(
    detection: FaceDetection,
    frame: FrameImage,
    frameId: number,
    timestamp: number,
  ): FrameResult {
    const { landmarks } = detection;
    const previous = this.state;

    const regions = runStage("eye-regions", () =>
      extractEyeRegions(landmarks, frame),
    );
    if (!regions.ok) {
      return this.fail(regions, frameId, timestamp);
    }

    const pupils = runStage("pupils", () => this.locatePupils(regions.value));
    if (!pupils.ok) {
      return this.fail(pupils, frameId, timestamp);
    }

    const blink = runStage("blink", () => {
      const ear = computeFrameEar(landmarks, frame);
      return {
        ear,
        step: this.blinkDetector.step(previous.blink, ear.average, timestamp),
      };
    });
    if (!blink.ok) {
      return this.fail(blink, frameId, timestamp);
    }

    const gaze = runStage("gaze", () =>
      this.estimateFrameGaze(regions.value, pupils.value, previous),
    );
    if (!gaze.ok) {
      return this.fail(gaze, frameId, timestamp);
    }

    const movement = runStage("movement", () =>
      this.movementAnalyzer.step(previous.movement, {
        left: pupilPoint(pupils.value.left),
        right: pupilPoint(pupils.value.right),
      }),
    );
    if (!movement.ok) {
      return this.fail(movement, frameId, timestamp);
    }

    const blinkOutput = blink.value.step.output;
    const movementOutput = movement.value.output;
    const scoring = runStage("scoring", () => {
      const attentionScore = computeAttentionScore({
        lookingAway: gaze.value.lookingAway,
        excessiveBlinking: blinkOutput.excessiveBlinking,
        suspiciousMovement: movementOutput.suspicious,
        blinkRate: blinkOutput.blinkRate,
      });
      return { attentionScore, zone: getAttentionZone(attentionScore) };
    });
    if (!scoring.ok) {
      return this.fail(scoring, frameId, timestamp);
    }

    const eyeMetrics = (eye: EyeSide): EyeMetrics | null => {
      const pupil = pupils.value[eye];
      if (!regions.value[eye] || !pupil) {
        return null;
      }
      return buildEyeMetrics({
        ear: earFor(blink.value.ear, eye),
        gazeDirection: gaze.value.perEye[eye] ?? { x: 0, y: 0 },
        pupil,
        blinkDetected: blinkOutput.blinkDetected,
      });
    };

    this.state = {
      blink: blink.value.step.state,
      calibration: previous.calibration,
      movement: movement.value.state,
      gazeHistory: previous.gazeHistory.append(gaze.value.average),
      lastGaze: gaze.value.average,
      lookingAway: gaze.value.lookingAway,
    };

    if (blinkOutput.blinkDetected) {
      this.logger.debug("Blink detected", {
        frameId,
        totalBlinks: blink.value.step.state.totalBlinks,
      });
    }

    return Object.freeze({
      frameId,
      timestamp,
      status: "ok",
      leftEye: eyeMetrics("left"),
      rightEye: eyeMetrics("right"),
      blinkData: blinkOutput,
      gazeDirection: { ...gaze.value.average },
      movementData: movementOutput,
      attentionScore: scoring.value.attentionScore,
      attentionZone: scoring.value.zone,
      flags: {
        lookingAway: gaze.value.lookingAway,
        excessiveBlinking: blinkOutput.excessiveBlinking,
        suspiciousMovement: movement.value.state.suspicious,
      },
    } satisfies FrameResult);
  }

  private locatePupils(regions: EyeRegions): EyePupilEstimates {
    const pupils: EyePupilEstimates = {};
    EYE_SIDES.forEach((eye) => {
      const region = regions[eye];
      if (region) {
        pupils[eye] = this.pupilLocator.locate(
          region.image,
          region.boundingBox,
        );
      }
    });
    return pupils;
  }

  private estimateFrameGaze(
    regions: EyeRegions,
    pupils: EyePupilEstimates,
    state: EngineState,
  ): FrameGaze {
    const perEye: Partial<Record<EyeSide, Vector2>> = {};
    const vectors: Vector2[] = [];

    EYE_SIDES.forEach((eye) => {
      const region: EyeRegion | undefined = regions[eye];
      const pupil = pupils[eye];
      if (!region || !pupil) {
        return;
      }
      const vector = estimateGaze(region.landmarks, pupil);
      perEye[eye] = vector;
      vectors.push(vector);
    });

    const average = averageGaze(vectors);
    return {
      perEye,
      average,
      lookingAway: isLookingAway(state.calibration, average, {
        horizontal: this.config.lookAwayThresholdX,
        vertical: this.config.lookAwayThresholdY,
      }),
    };
  }

  private fail(
    failure: StageFailure,
    frameId: number,
    timestamp: number,
  ): FrameResult {
    const message =
      failure.error.cause instanceof Error
        ? failure.error.cause.message
        : failure.error.message;

    this.logger.error("Frame processing stage failed", {
      frameId,
      stage: failure.stage,
      error: message,
    });
    this.reportFault(failure.error, { frameId, stage: failure.stage });

    return buildEmptyFrameResult(frameId, timestamp, "faulted", {
      stage: failure.stage,
      message,
    });
  }

  private recordSession(result: FrameResult): void {
    this.statistics.record(result, classifyEyeStatus(result));
    if (result.status === "faulted") {
      return;
    }
    this.violations.record(result, this.statistics.getDetectionRates());
  }
}
