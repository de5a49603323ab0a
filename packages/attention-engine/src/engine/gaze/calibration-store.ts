import { type Vector2, ZERO_VECTOR } from "../../shared/types/geometry";

export type GazeBounds = {
  left: number;
  right: number;
  up: number;
  down: number;
};

export type CalibrationReference = {
  readonly calibrated: boolean;
  readonly center: Vector2;
  readonly bounds: GazeBounds;
  readonly calibratedAt: number | null;
};

export type LookAwayThresholds = {
  horizontal: number;
  vertical: number;
};

export const DEFAULT_GAZE_BOUNDS: Readonly<GazeBounds> = Object.freeze({
  left: -50,
  right: 50,
  up: -30,
  down: 30,
});

export const createUncalibratedReference = (): CalibrationReference => ({
  calibrated: false,
  center: { ...ZERO_VECTOR },
  bounds: { ...DEFAULT_GAZE_BOUNDS },
  calibratedAt: null,
});

/**
 * Records `gaze` as the neutral centre. Every commit replaces the previous
 * reference; nothing ever reverts to the uncalibrated state.
 */
export const commitCalibration = (
  reference: CalibrationReference,
  gaze: Vector2,
  now: number,
): CalibrationReference => ({
  calibrated: true,
  center: { x: gaze.x, y: gaze.y },
  bounds: { ...reference.bounds },
  calibratedAt: now,
});

/** Always false until a calibration has been committed. */
export const isLookingAway = (
  reference: CalibrationReference,
  gaze: Vector2,
  thresholds: LookAwayThresholds,
): boolean => {
  if (!reference.calibrated) {
    return false;
  }
  const deviationX = Math.abs(gaze.x - reference.center.x);
  const deviationY = Math.abs(gaze.y - reference.center.y);
  return (
    deviationX > thresholds.horizontal || deviationY > thresholds.vertical
  );
};
