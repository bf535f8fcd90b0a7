import type { ChannelTensor } from "@viewsynth/image-core";

export type TensorLayout = "nchw" | "nhwc";

export interface LayoutTensor {
  shape: [number, number, number, number];
  data: Float32Array;
}

/** Batch-of-one model input in the requested memory layout. */
export function toLayout(tensor: ChannelTensor, layout: TensorLayout): LayoutTensor {
  const { channels, height, width } = tensor;
  if (layout === "nchw") {
    return { shape: [1, channels, height, width], data: new Float32Array(tensor.data) };
  }
  const planeSize = height * width;
  const data = new Float32Array(tensor.data.length);
  for (let c = 0; c < channels; c++) {
    for (let p = 0; p < planeSize; p++) {
      data[p * channels + c] = tensor.data[c * planeSize + p];
    }
  }
  return { shape: [1, height, width, channels], data };
}

export function fromLayout(
  data: ArrayLike<number>,
  shape: readonly number[],
  layout: TensorLayout
): ChannelTensor {
  if (shape.length !== 4 || shape[0] !== 1) {
    throw new RangeError(`Expected a [1, *, *, *] output, got [${shape.join(", ")}]`);
  }
  const [, d1, d2, d3] = shape;
  const channels = layout === "nchw" ? d1 : d3;
  const height = layout === "nchw" ? d2 : d1;
  const width = layout === "nchw" ? d3 : d2;
  if (data.length !== channels * height * width) {
    throw new RangeError(`Output has ${data.length} values for shape [${shape.join(", ")}]`);
  }

  const out = new Float32Array(data.length);
  if (layout === "nchw") {
    out.set(Array.from(data));
  } else {
    const planeSize = height * width;
    for (let p = 0; p < planeSize; p++) {
      for (let c = 0; c < channels; c++) {
        out[c * planeSize + p] = data[p * channels + c];
      }
    }
  }
  return { channels, height, width, data: out };
}
