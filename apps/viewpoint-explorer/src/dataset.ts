import { readFile } from "node:fs/promises";
import path from "node:path";
import sharp from "sharp";
import { z } from "zod";
import type { FrameSize } from "@viewsynth/geometry-core";
import type { RgbImage } from "@viewsynth/image-core";
import { getClassDefinition } from "@viewsynth/plane-core";
import type { ObjectClass } from "@viewsynth/plane-core";
import { ArrayTextureDataset, ConfigurationError, consoleLogger } from "@viewsynth/session-core";
import type { Logger, TextureExample } from "@viewsynth/session-core";
import { DATASET_MANIFEST } from "./config";

export const FAST_LOAD_LIMIT = 100;

const vec2Schema = z.tuple([z.number(), z.number()]);

const planeEntrySchema = z.object({
  /** Defaults to the example's source image. */
  image: z.string().optional(),
  keypoints: z.array(vec2Schema),
  visible: z.boolean(),
});

const exampleSchema = z.object({
  id: z.string(),
  image: z.string(),
  central: z.string(),
  planes: z.array(planeEntrySchema),
});

export const manifestSchema = z.object({
  objectClass: z.enum(["car", "chair"]),
  examples: z.array(exampleSchema),
});

export type DatasetManifest = z.infer<typeof manifestSchema>;
type ExampleEntry = z.infer<typeof exampleSchema>;

export interface DatasetOptions {
  objectClass: ObjectClass;
  frame: FrameSize;
  /** Keep only the first FAST_LOAD_LIMIT records. */
  fastLoad?: boolean;
  logger?: Logger;
}

/** Decodes any image sharp reads into frame-sized RGB. */
export async function readRgbImage(file: string, frame: FrameSize): Promise<RgbImage> {
  try {
    const { data, info } = await sharp(file)
      .removeAlpha()
      .toColourspace("srgb")
      .resize(frame.width, frame.height, { fit: "fill" })
      .raw()
      .toBuffer({ resolveWithObject: true });
    if (info.channels !== 3) {
      throw new Error(`expected 3 channels, got ${info.channels}`);
    }
    return { width: info.width, height: info.height, data: new Uint8ClampedArray(data) };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Cannot read image ${file}: ${reason}`, { cause: err });
  }
}

export function validateExample(entry: ExampleEntry, objectClass: ObjectClass): void {
  const { planes } = getClassDefinition(objectClass);
  if (entry.planes.length !== planes.length) {
    throw new ConfigurationError(
      `Example ${entry.id} has ${entry.planes.length} planes, ${objectClass} needs ${planes.length}`
    );
  }
  entry.planes.forEach((plane, i) => {
    const expected = planes[i].keypoints.length;
    if (plane.keypoints.length !== expected) {
      throw new ConfigurationError(
        `Example ${entry.id} plane ${planes[i].name} has ${plane.keypoints.length} keypoints, expected ${expected}`
      );
    }
  });
}

export async function readManifest(datasetDir: string): Promise<DatasetManifest> {
  const file = path.join(datasetDir, DATASET_MANIFEST);
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(file, "utf8"));
  } catch (err) {
    throw new ConfigurationError(`Cannot read dataset manifest ${file}`, { cause: err });
  }
  const parsed = manifestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid dataset manifest ${file}: ${parsed.error.message}`);
  }
  return parsed.data;
}

/**
 * Loads every record of `<datasetDir>/index.json` with its images resized to
 * the frame. Paths in the manifest are relative to the dataset directory.
 */
export async function loadTextureDataset(
  datasetDir: string,
  options: DatasetOptions
): Promise<ArrayTextureDataset> {
  const logger = options.logger ?? consoleLogger;
  const manifest = await readManifest(datasetDir);
  if (manifest.objectClass !== options.objectClass) {
    throw new ConfigurationError(
      `Dataset ${datasetDir} holds ${manifest.objectClass} examples, not ${options.objectClass}`
    );
  }

  const entries = options.fastLoad ? manifest.examples.slice(0, FAST_LOAD_LIMIT) : manifest.examples;
  if (!entries.length) {
    throw new ConfigurationError(`Dataset ${datasetDir} has no examples`);
  }
  entries.forEach((entry) => validateExample(entry, options.objectClass));

  const read = (relative: string) => readRgbImage(path.join(datasetDir, relative), options.frame);
  const examples: TextureExample[] = [];
  for (const entry of entries) {
    const image = await read(entry.image);
    const central = await read(entry.central);
    const planes = await Promise.all(
      entry.planes.map((plane) => (plane.image ? read(plane.image) : Promise.resolve(image)))
    );
    examples.push({
      id: entry.id,
      image,
      central,
      planes,
      planeKeypoints: entry.planes.map((plane) => plane.keypoints),
      planeVisibility: entry.planes.map((plane) => plane.visible),
    });
  }

  logger.info(`Loaded ${examples.length} of ${manifest.examples.length} examples from ${datasetDir}`);
  return new ArrayTextureDataset(examples);
}
