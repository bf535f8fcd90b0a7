import { createTensor, readImageChannels, writeImageChannels } from "@viewsynth/image-core";
import type { ChannelTensor, ColorSpace, RgbImage } from "@viewsynth/image-core";
import { planeCount } from "@viewsynth/plane-core";
import type { ObjectClass } from "@viewsynth/plane-core";

export interface SynthesisInputParts {
  objectClass: ObjectClass;
  sketch: RgbImage;
  central: RgbImage;
  warpedPlanes: RgbImage[];
  colorSpace: ColorSpace;
}

/** sketch (3) + central reference (3) + 3 per plane; 21 for car, 18 for chair. */
export function synthesisChannelCount(objectClass: ObjectClass): number {
  return 6 + 3 * planeCount(objectClass);
}

/**
 * Stacks the model input as [sketch][central][plane 1]…[plane N], each image
 * converted to the model's colour space and normalized to [-1, 1].
 */
export function assembleSynthesisInput(parts: SynthesisInputParts): ChannelTensor {
  const expectedPlanes = planeCount(parts.objectClass);
  if (parts.warpedPlanes.length !== expectedPlanes) {
    throw new RangeError(
      `${parts.objectClass} expects ${expectedPlanes} planes, got ${parts.warpedPlanes.length}`
    );
  }
  const { width, height } = parts.sketch;
  const tensor = createTensor(synthesisChannelCount(parts.objectClass), height, width);

  writeImageChannels(tensor, 0, parts.sketch, parts.colorSpace);
  writeImageChannels(tensor, 3, parts.central, parts.colorSpace);
  parts.warpedPlanes.forEach((plane, i) => {
    writeImageChannels(tensor, 6 + 3 * i, plane, parts.colorSpace);
  });
  return tensor;
}

/** Model output (first three channels) back to an RGB image. */
export function decodeSynthesis(output: ChannelTensor, colorSpace: ColorSpace): RgbImage {
  return readImageChannels(output, 0, colorSpace);
}
