import { fromRgb, toRgb } from "./color";
import type { ChannelTensor, ColorSpace, RgbImage } from "./types";

export function createTensor(channels: number, height: number, width: number): ChannelTensor {
  return { channels, height, width, data: new Float32Array(channels * height * width) };
}

/**
 * Writes an RGB image into three planes of `target` starting at
 * `channelOffset`, converted to `space` and normalized to [-1, 1].
 */
export function writeImageChannels(
  target: ChannelTensor,
  channelOffset: number,
  image: RgbImage,
  space: ColorSpace
): void {
  if (image.width !== target.width || image.height !== target.height) {
    throw new Error(
      `Image ${image.width}x${image.height} does not fit tensor ${target.width}x${target.height}`
    );
  }
  if (channelOffset + 3 > target.channels) {
    throw new RangeError(`Channel offset ${channelOffset} overflows ${target.channels} channels`);
  }
  const converted = fromRgb(image, space);
  const planeSize = target.width * target.height;
  for (let c = 0; c < 3; c++) {
    const base = (channelOffset + c) * planeSize;
    for (let p = 0; p < planeSize; p++) {
      target.data[base + p] = normalize(converted.data[p * 3 + c]);
    }
  }
}

/** Reads three planes starting at `channelOffset` back into an RGB image. */
export function readImageChannels(
  source: ChannelTensor,
  channelOffset: number,
  space: ColorSpace
): RgbImage {
  if (channelOffset + 3 > source.channels) {
    throw new RangeError(`Channel offset ${channelOffset} overflows ${source.channels} channels`);
  }
  const planeSize = source.width * source.height;
  const data = new Uint8ClampedArray(planeSize * 3);
  for (let c = 0; c < 3; c++) {
    const base = (channelOffset + c) * planeSize;
    for (let p = 0; p < planeSize; p++) {
      data[p * 3 + c] = denormalize(source.data[base + p]);
    }
  }
  return toRgb({ width: source.width, height: source.height, data }, space);
}

export function normalize(value: number): number {
  return (value / 255 - 0.5) / 0.5;
}

export function denormalize(value: number): number {
  return Math.round((value * 0.5 + 0.5) * 255);
}
