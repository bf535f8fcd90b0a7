/** Interleaved 8-bit RGB raster, row-major. */
export interface RgbImage {
  width: number;
  height: number;
  data: Uint8ClampedArray;
}

/** Planar float tensor (CHW) with an implied batch size of one. */
export interface ChannelTensor {
  channels: number;
  height: number;
  width: number;
  data: Float32Array;
}

export type Rgb = [number, number, number];

export type ColorSpace = "rgb" | "lab";
