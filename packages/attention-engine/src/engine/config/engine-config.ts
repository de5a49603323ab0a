import { clamp, getEnvVar, parseNumericEnv } from "../../shared/env";

export type EngineConfig = {
  /** EAR below this value counts as a closed-eye sample. */
  earThreshold: number;
  /** Closed samples required before a reopening counts as a blink. */
  blinkFrames: number;
  /**
   * Pixel displacement per frame. A 30-sample mean above twice this value is
   * suspicious.
   */
  movementThreshold: number;
  lookAwayThresholdX: number;
  lookAwayThresholdY: number;
  /** Scores below this value are logged as low attention. */
  alertThreshold: number;
  maxConsecutiveViolations: number;
  violationLogCapacity: number;
};

export type EngineConfigOverrides = Partial<EngineConfig>;

type EnvReader = (key: string) => string | undefined;

type NumericBounds = {
  min: number;
  max: number;
  integer?: boolean;
};

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  earThreshold: 0.25,
  blinkFrames: 3,
  movementThreshold: 10,
  lookAwayThresholdX: 40,
  lookAwayThresholdY: 30,
  alertThreshold: 60,
  maxConsecutiveViolations: 5,
  violationLogCapacity: 500,
});

const CONFIG_BOUNDS: Record<keyof EngineConfig, NumericBounds> = {
  earThreshold: { min: 0.01, max: 1 },
  blinkFrames: { min: 1, max: 120, integer: true },
  movementThreshold: { min: 0.1, max: 1000 },
  lookAwayThresholdX: { min: 1, max: 1000 },
  lookAwayThresholdY: { min: 1, max: 1000 },
  alertThreshold: { min: 0, max: 100 },
  maxConsecutiveViolations: { min: 1, max: 10_000, integer: true },
  violationLogCapacity: { min: 1, max: 100_000, integer: true },
};

const ENV_KEYS: Partial<Record<keyof EngineConfig, string>> = {
  earThreshold: "ATTENTION_EAR_THRESHOLD",
  blinkFrames: "ATTENTION_BLINK_FRAMES",
  movementThreshold: "ATTENTION_MOVEMENT_THRESHOLD",
  lookAwayThresholdX: "ATTENTION_LOOK_AWAY_X",
  lookAwayThresholdY: "ATTENTION_LOOK_AWAY_Y",
  alertThreshold: "ATTENTION_ALERT_THRESHOLD",
  maxConsecutiveViolations: "ATTENTION_MAX_VIOLATIONS",
};

const CONFIG_KEYS: readonly (keyof EngineConfig)[] = [
  "earThreshold",
  "blinkFrames",
  "movementThreshold",
  "lookAwayThresholdX",
  "lookAwayThresholdY",
  "alertThreshold",
  "maxConsecutiveViolations",
  "violationLogCapacity",
];

const clampSetting = (key: keyof EngineConfig, value: number): number => {
  const bounds = CONFIG_BOUNDS[key];
  if (!Number.isFinite(value)) {
    return DEFAULT_ENGINE_CONFIG[key];
  }
  const numeric = bounds.integer ? Math.round(value) : value;
  return clamp(numeric, bounds.min, bounds.max);
};

export const createEnvOverrides = (
  readEnv: EnvReader = getEnvVar,
): EngineConfigOverrides => {
  const overrides: EngineConfigOverrides = {};

  CONFIG_KEYS.forEach((key) => {
    const envKey = ENV_KEYS[key];
    if (!envKey) {
      return;
    }
    const parsed = parseNumericEnv(readEnv(envKey), CONFIG_BOUNDS[key]);
    if (parsed !== null) {
      overrides[key] = parsed;
    }
  });

  return overrides;
};

const mergeEngineConfig = (
  config: EngineConfig,
  overrides?: EngineConfigOverrides | null,
): EngineConfig => {
  const next: EngineConfig = { ...config };
  if (!overrides) {
    return next;
  }

  CONFIG_KEYS.forEach((key) => {
    const value = overrides[key];
    if (value !== undefined) {
      next[key] = clampSetting(key, value);
    }
  });

  return next;
};

export type ResolveEngineConfigOptions = {
  readEnv?: EnvReader;
};

/**
 * Defaults, then environment overrides, then explicit overrides. The result is
 * frozen; the processor keeps it for its whole lifetime.
 */
export const resolveEngineConfig = (
  overrides?: EngineConfigOverrides | null,
  options: ResolveEngineConfigOptions = {},
): Readonly<EngineConfig> => {
  const fromEnv = mergeEngineConfig(
    DEFAULT_ENGINE_CONFIG,
    createEnvOverrides(options.readEnv),
  );
  return Object.freeze(mergeEngineConfig(fromEnv, overrides));
};
