import * as tf from "@tensorflow/tfjs-core";
import "@tensorflow/tfjs-backend-cpu";
import { loadGraphModel } from "@tensorflow/tfjs-converter";
import type { GraphModel } from "@tensorflow/tfjs-converter";
import type { ChannelTensor } from "@viewsynth/image-core";
import { consoleLogger } from "@viewsynth/session-core";
import type { Logger, SynthesisModel } from "@viewsynth/session-core";
import { readModelArtifacts } from "./artifacts";
import { fromLayout, toLayout } from "./layout";
import type { TensorLayout } from "./layout";

export interface TfjsSynthesisModelOptions {
  /** Memory layout the graph expects for its input and produces on output. */
  layout?: TensorLayout;
  logger?: Logger;
}

let backendReady: Promise<void> | null = null;

export async function ensureCpuBackend(): Promise<void> {
  if (backendReady) return backendReady;
  backendReady = (async () => {
    if (tf.getBackend() !== "cpu") {
      await tf.setBackend("cpu");
    }
    await tf.ready();
  })();
  return backendReady;
}

export class TfjsSynthesisModel implements SynthesisModel {
  private constructor(
    private readonly model: GraphModel,
    private readonly layout: TensorLayout
  ) {}

  static async load(modelDir: string, options: TfjsSynthesisModelOptions = {}): Promise<TfjsSynthesisModel> {
    const logger = options.logger ?? consoleLogger;
    await ensureCpuBackend();
    const artifacts = await readModelArtifacts(modelDir);
    const model = await loadGraphModel(tf.io.fromMemory(artifacts));
    logger.info(`Loaded synthesis model from ${modelDir} (${tf.getBackend()})`);
    return new TfjsSynthesisModel(model, options.layout ?? "nchw");
  }

  async synthesize(input: ChannelTensor): Promise<ChannelTensor> {
    const { shape, data } = toLayout(input, this.layout);
    const x = tf.tensor4d(data, shape);
    let outputs: tf.Tensor[] = [];
    try {
      const result = await this.model.executeAsync(x);
      outputs = Array.isArray(result) ? result : [result];
      const [first] = outputs;
      if (!first) {
        throw new Error("Synthesis graph produced no output");
      }
      return fromLayout(await first.data(), first.shape, this.layout);
    } finally {
      x.dispose();
      tf.dispose(outputs);
    }
  }

  dispose(): void {
    this.model.dispose();
  }
}

/** Stand-in model that returns the central reference channels unchanged. */
export class EchoSynthesisModel implements SynthesisModel {
  async synthesize(input: ChannelTensor): Promise<ChannelTensor> {
    if (input.channels < 6) {
      throw new RangeError(`Expected at least 6 input channels, got ${input.channels}`);
    }
    const planeSize = input.width * input.height;
    return {
      channels: 3,
      height: input.height,
      width: input.width,
      data: input.data.slice(3 * planeSize, 6 * planeSize),
    };
  }
}
