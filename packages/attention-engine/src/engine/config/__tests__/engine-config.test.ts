import { describe, expect, it } from "vitest";
import {
  DEFAULT_ENGINE_CONFIG,
  createEnvOverrides,
  resolveEngineConfig,
} from "../engine-config";

const envFrom =
  (values: Record<string, string>) =>
  (key: string): string | undefined =>
    values[key];

describe("resolveEngineConfig", () => {
  it("returns the defaults when nothing overrides them", () => {
    const config = resolveEngineConfig(null, { readEnv: envFrom({}) });

    expect(config).toEqual({
      earThreshold: 0.25,
      blinkFrames: 3,
      movementThreshold: 10,
      lookAwayThresholdX: 40,
      lookAwayThresholdY: 30,
      alertThreshold: 60,
      maxConsecutiveViolations: 5,
      violationLogCapacity: 500,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("applies environment overrides", () => {
    const config = resolveEngineConfig(undefined, {
      readEnv: envFrom({
        ATTENTION_EAR_THRESHOLD: "0.2",
        ATTENTION_BLINK_FRAMES: "4",
        ATTENTION_LOOK_AWAY_X: "35",
      }),
    });

    expect(config.earThreshold).toBe(0.2);
    expect(config.blinkFrames).toBe(4);
    expect(config.lookAwayThresholdX).toBe(35);
    expect(config.lookAwayThresholdY).toBe(30);
  });

  it("lets explicit overrides win over the environment", () => {
    const config = resolveEngineConfig(
      { earThreshold: 0.3 },
      { readEnv: envFrom({ ATTENTION_EAR_THRESHOLD: "0.2" }) },
    );

    expect(config.earThreshold).toBe(0.3);
  });

  it("clamps and rounds out-of-range overrides", () => {
    const config = resolveEngineConfig(
      { blinkFrames: 2.6, alertThreshold: 250, movementThreshold: Number.NaN },
      { readEnv: envFrom({}) },
    );

    expect(config.blinkFrames).toBe(3);
    expect(config.alertThreshold).toBe(100);
    expect(config.movementThreshold).toBe(
      DEFAULT_ENGINE_CONFIG.movementThreshold,
    );
  });
});

describe("createEnvOverrides", () => {
  it("ignores malformed values", () => {
    expect(
      createEnvOverrides(
        envFrom({
          ATTENTION_MOVEMENT_THRESHOLD: "fast",
          ATTENTION_MAX_VIOLATIONS: "8",
        }),
      ),
    ).toEqual({ maxConsecutiveViolations: 8 });
  });
});
