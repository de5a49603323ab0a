export type LandmarkPoint = {
  readonly x: number;
  readonly y: number;
  readonly z?: number;
};

/** Face mesh points for one detected face, normalised to [0, 1]. */
export type LandmarkSet = readonly LandmarkPoint[];

export type NormalizedBoundingBox = {
  xMin: number;
  yMin: number;
  width: number;
  height: number;
};

export type FaceDetection = {
  landmarks: LandmarkSet;
  boundingBox?: NormalizedBoundingBox | null;
};
