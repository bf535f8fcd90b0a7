import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { io } from "@tensorflow/tfjs-core";
import { ConfigurationError } from "@viewsynth/session-core";

const weightEntrySchema = z.object({
  name: z.string(),
  shape: z.array(z.number().int().nonnegative()),
  dtype: z.enum(["float32", "int32", "bool", "string", "complex64"]),
  quantization: z
    .object({
      dtype: z.enum(["uint16", "uint8", "float16"]),
      scale: z.number().optional(),
      min: z.number().optional(),
    })
    .optional(),
});

export const modelJsonSchema = z.object({
  format: z.string().optional(),
  generatedBy: z.string().optional(),
  convertedBy: z.string().nullable().optional(),
  modelTopology: z.record(z.string(), z.unknown()),
  weightsManifest: z.array(
    z.object({
      paths: z.array(z.string()),
      weights: z.array(weightEntrySchema),
    })
  ),
  signature: z.record(z.string(), z.unknown()).optional(),
  userDefinedMetadata: z.record(z.string(), z.record(z.string(), z.unknown())).optional(),
});

export type ModelJson = z.infer<typeof modelJsonSchema>;

export const MODEL_FILE = "model.json";

/**
 * Reads a converted graph model (`model.json` plus binary weight shards) from
 * disk into in-memory artifacts for `tf.io.fromMemory`.
 */
export async function readModelArtifacts(modelDir: string): Promise<io.ModelArtifacts> {
  const modelPath = path.join(modelDir, MODEL_FILE);
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(modelPath, "utf8"));
  } catch (err) {
    throw new ConfigurationError(`Cannot read ${modelPath}`, { cause: err });
  }
  const parsed = modelJsonSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${modelPath}: ${parsed.error.message}`);
  }
  const manifest = parsed.data;

  const shardPaths = manifest.weightsManifest.flatMap((group) =>
    group.paths.map((p) => path.join(modelDir, p))
  );
  const shards = await Promise.all(
    shardPaths.map(async (shard) => {
      try {
        return await readFile(shard);
      } catch (err) {
        throw new ConfigurationError(`Missing weight shard ${shard}`, { cause: err });
      }
    })
  );

  return {
    format: manifest.format,
    generatedBy: manifest.generatedBy,
    convertedBy: manifest.convertedBy,
    modelTopology: manifest.modelTopology,
    weightSpecs: manifest.weightsManifest.flatMap((group) => group.weights),
    weightData: concatShards(shards),
    signature: manifest.signature,
    userDefinedMetadata: manifest.userDefinedMetadata,
  };
}

export function concatShards(shards: Uint8Array[]): ArrayBuffer {
  const total = shards.reduce((sum, shard) => sum + shard.byteLength, 0);
  const buffer = new ArrayBuffer(total);
  const view = new Uint8Array(buffer);
  let offset = 0;
  for (const shard of shards) {
    view.set(shard, offset);
    offset += shard.byteLength;
  }
  return buffer;
}
