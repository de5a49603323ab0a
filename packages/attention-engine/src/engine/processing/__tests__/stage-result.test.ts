import { describe, expect, it } from "vitest";
import {
  buildEmptyFrameResult,
  buildEyeMetrics,
  toPupilCenter,
} from "../output-builder";
import { EngineStageError, runStage } from "../stage-result";

describe("runStage", () => {
  it("wraps the stage value", () => {
    expect(runStage("scoring", () => 42)).toEqual({ ok: true, value: 42 });
  });

  it("captures thrown errors with the stage name", () => {
    const cause = new Error("no gradient");
    const result = runStage("gaze", () => {
      throw cause;
    });

    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.stage).toBe("gaze");
    expect(result.error).toBeInstanceOf(EngineStageError);
    expect(result.error.message).toBe('Stage "gaze" failed: no gradient');
    expect(result.error.cause).toBe(cause);
  });

  it("describes non-error throws", () => {
    const result = runStage("blink", () => {
      throw "closed";
    });

    expect(result.ok ? null : result.error.message).toBe(
      'Stage "blink" failed: closed',
    );
  });
});

describe("output builder", () => {
  it("uses the origin as the missing-pupil sentinel", () => {
    expect(toPupilCenter({ found: false })).toEqual({ x: 0, y: 0 });
    expect(
      toPupilCenter({ found: true, center: { x: 5, y: 6 }, method: "contour" }),
    ).toEqual({ x: 5, y: 6 });
  });

  it("tells a pupil on the frame corner from a missing one", () => {
    const base = { ear: 0.3, gazeDirection: { x: 0, y: 0 } };
    const corner = buildEyeMetrics({
      ...base,
      pupil: { found: true, center: { x: 0, y: 0 }, method: "contour" },
      blinkDetected: false,
    });
    const missing = buildEyeMetrics({
      ...base,
      pupil: { found: false },
      blinkDetected: false,
    });

    expect(corner.pupilCenter).toEqual(missing.pupilCenter);
    expect(corner.pupil.found).toBe(true);
    expect(missing.pupil.found).toBe(false);
  });

  it("builds a frozen zeroed result", () => {
    const result = buildEmptyFrameResult(7, 1_500, "faulted", {
      stage: "pupils",
      message: "boom",
    });

    expect(Object.isFrozen(result)).toBe(true);
    expect(result).toEqual({
      frameId: 7,
      timestamp: 1_500,
      status: "faulted",
      leftEye: null,
      rightEye: null,
      blinkData: {
        blinkDetected: false,
        ear: 0,
        blinkRate: 0,
        excessiveBlinking: false,
      },
      gazeDirection: { x: 0, y: 0 },
      movementData: { movementMagnitude: 0, suspicious: false },
      attentionScore: 0,
      attentionZone: "RED",
      flags: {
        lookingAway: false,
        excessiveBlinking: false,
        suspiciousMovement: false,
      },
      fault: { stage: "pupils", message: "boom" },
    });
  });

  it("omits the fault for frames without a face", () => {
    expect(buildEmptyFrameResult(1, 0, "no-face")).not.toHaveProperty("fault");
  });
});
