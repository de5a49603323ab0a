export type FrameChannels = 1 | 3 | 4;

/**
 * Row-major interleaved pixels. Three and four channel frames are RGB(A),
 * matching `ImageData`; single channel frames are already grayscale.
 */
export type FrameImage = {
  width: number;
  height: number;
  channels: FrameChannels;
  data: Uint8Array | Uint8ClampedArray;
};

export type GrayImage = {
  width: number;
  height: number;
  data: Uint8ClampedArray;
};
