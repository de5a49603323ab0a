import { RingBuffer } from "../../shared/buffers/ring-buffer";
import type { EyeSide, MovementData } from "../../shared/types/engine-output";
import { type PixelPoint, distance } from "../../shared/types/geometry";
import { EYE_SIDES } from "../regions/eye-landmarks";

export const MOVEMENT_HISTORY_CAPACITY = 90;
export const MOVEMENT_WINDOW = 30;

export type EyePupils = Readonly<Record<EyeSide, PixelPoint | null>>;

export type MovementState = {
  /** Last recorded pair; displacement is measured only from a complete one. */
  readonly previousPupils: EyePupils | null;
  readonly movementHistory: RingBuffer<number>;
  readonly suspicious: boolean;
};

export type MovementStep = {
  state: MovementState;
  output: MovementData;
};

const STILL: MovementData = Object.freeze({
  movementMagnitude: 0,
  suspicious: false,
});

export const createInitialMovementState = (): MovementState => ({
  previousPupils: null,
  movementHistory: RingBuffer.create<number>(MOVEMENT_HISTORY_CAPACITY),
  suspicious: false,
});

type CompletePair = Readonly<Record<EyeSide, PixelPoint>>;

const isCompletePair = (
  pupils: EyePupils | null,
): pupils is CompletePair =>
  pupils !== null && pupils.left !== null && pupils.right !== null;

const copyPupils = (pupils: EyePupils): EyePupils => ({
  left: pupils.left ? { ...pupils.left } : null,
  right: pupils.right ? { ...pupils.right } : null,
});

const mean = (values: readonly number[]): number => {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
};

export class MovementAnalyzer {
  private readonly movementThreshold: number;

  constructor(options: { movementThreshold: number }) {
    this.movementThreshold = options.movementThreshold;
  }

  step(state: MovementState, pupils: EyePupils): MovementStep {
    const { previousPupils } = state;
    // Re-seed until both eyes have been seen in the same frame.
    if (!isCompletePair(previousPupils)) {
      return {
        state: { ...state, previousPupils: copyPupils(pupils) },
        output: { ...STILL },
      };
    }

    // An eye missing from this frame is left out rather than counted as still.
    const displacements: number[] = [];
    EYE_SIDES.forEach((eye) => {
      const current = pupils[eye];
      const previous = previousPupils[eye];
      if (current && previous) {
        displacements.push(distance(current, previous));
      }
    });

    if (displacements.length === 0) {
      return { state, output: { ...STILL } };
    }

    const movementMagnitude = mean(displacements);
    const movementHistory = state.movementHistory.append(movementMagnitude);

    let { suspicious } = state;
    if (movementHistory.size >= MOVEMENT_WINDOW) {
      const recent = mean(movementHistory.last(MOVEMENT_WINDOW));
      suspicious = recent > this.movementThreshold * 2;
    }

    return {
      state: {
        previousPupils: copyPupils(pupils),
        movementHistory,
        suspicious,
      },
      output: { movementMagnitude, suspicious },
    };
  }
}
