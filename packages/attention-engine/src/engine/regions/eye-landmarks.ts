import type { EyeSide } from "../../shared/types/engine-output";

/** Face mesh contour of each eye, 16 points. */
export const EYE_CONTOUR_INDICES: Readonly<Record<EyeSide, readonly number[]>> =
  {
    left: [
      33, 7, 163, 144, 145, 153, 154, 155, 133, 173, 157, 158, 159, 160, 161,
      246,
    ],
    right: [
      362, 382, 381, 380, 374, 373, 390, 249, 263, 466, 388, 387, 386, 385,
      384, 398,
    ],
  };

/**
 * Six-point eye model for EAR, ordered: outer corner, upper lid (two points),
 * inner corner, lower lid (two points, mirrored).
 */
export const EYE_EAR_INDICES: Readonly<Record<EyeSide, readonly number[]>> = {
  left: [33, 160, 158, 133, 153, 144],
  right: [362, 385, 387, 263, 373, 380],
};

export const EYE_SIDES: readonly EyeSide[] = ["left", "right"];
