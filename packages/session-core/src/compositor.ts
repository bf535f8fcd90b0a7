import { concatHorizontal } from "@viewsynth/image-core";
import type { Rgb, RgbImage } from "@viewsynth/image-core";

export const BACKGROUND_FILL: Rgb = [255, 255, 255];

export interface FrameParts {
  sketch: RgbImage;
  central: RgbImage;
  synthesized: RgbImage;
  source: RgbImage;
}

/** 1 where the normal sketch is exactly black, i.e. outside the object. */
export function backgroundMask(sketch: RgbImage): Uint8Array {
  const mask = new Uint8Array(sketch.width * sketch.height);
  for (let p = 0; p < mask.length; p++) {
    const i = p * 3;
    if (sketch.data[i] === 0 && sketch.data[i + 1] === 0 && sketch.data[i + 2] === 0) {
      mask[p] = 1;
    }
  }
  return mask;
}

export function maskSynthesis(synthesized: RgbImage, mask: Uint8Array): RgbImage {
  if (mask.length !== synthesized.width * synthesized.height) {
    throw new Error("Mask does not match the synthesized image");
  }
  const data = new Uint8ClampedArray(synthesized.data);
  for (let p = 0; p < mask.length; p++) {
    if (!mask[p]) continue;
    data[p * 3] = BACKGROUND_FILL[0];
    data[p * 3 + 1] = BACKGROUND_FILL[1];
    data[p * 3 + 2] = BACKGROUND_FILL[2];
  }
  return { width: synthesized.width, height: synthesized.height, data };
}

/** [sketch | central reference | masked synthesis | source], left to right. */
export function composeFrame(parts: FrameParts): RgbImage {
  const masked = maskSynthesis(parts.synthesized, backgroundMask(parts.sketch));
  return concatHorizontal([parts.sketch, parts.central, masked, parts.source]);
}
