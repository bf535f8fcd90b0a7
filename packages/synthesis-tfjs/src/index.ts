export { TfjsSynthesisModel, EchoSynthesisModel, ensureCpuBackend } from "./TfjsSynthesisModel";
export type { TfjsSynthesisModelOptions } from "./TfjsSynthesisModel";
export { MODEL_FILE, concatShards, modelJsonSchema, readModelArtifacts } from "./artifacts";
export type { ModelJson } from "./artifacts";
export { fromLayout, toLayout } from "./layout";
export type { LayoutTensor, TensorLayout } from "./layout";
