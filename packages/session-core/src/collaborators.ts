import type { CameraPose, Keypoints3D, Vec2 } from "@viewsynth/geometry-core";
import type { ChannelTensor, RgbImage } from "@viewsynth/image-core";
import type { ObjectClass } from "@viewsynth/plane-core";

/** Number of CAD models per class; NEXT_MODEL wraps at this size. */
export const CAD_CATALOG_SIZE = 10;

export interface MeshData {
  /** xyz triples */
  vertices: Float32Array;
  /** Per-vertex unit normals, xyz triples. */
  normals: Float32Array;
  /** Vertex index triples. */
  triangles: Uint32Array;
}

export interface CadModel {
  cadIndex: number;
  mesh: MeshData;
  keypoints: Keypoints3D;
}

export interface MeshKeypointStore {
  load(objectClass: ObjectClass, cadIndex: number): Promise<CadModel>;
}

/** Produces the normal/silhouette sketch; background pixels are pure black. */
export interface Renderer {
  render(pose: CameraPose, mesh: MeshData): Promise<RgbImage>;
}

export interface TextureExample {
  id: string;
  image: RgbImage;
  central: RgbImage;
  /** Plane images in source image coordinates, canonical order. */
  planes: RgbImage[];
  planeKeypoints: Vec2[][];
  planeVisibility: boolean[];
}

/** Indexed examples; iterating yields them in index order. */
export interface TextureDataset extends Iterable<TextureExample> {
  readonly size: number;
  get(index: number): TextureExample;
}

export interface SynthesisModel {
  synthesize(input: ChannelTensor): Promise<ChannelTensor>;
}

export interface FrameSink {
  show(frame: RgbImage): Promise<void>;
  /** Persists the frame under `name` and returns where it went. */
  persist(frame: RgbImage, name: string): Promise<string>;
}

export class ArrayTextureDataset implements TextureDataset {
  constructor(private readonly examples: TextureExample[]) {}

  get size(): number {
    return this.examples.length;
  }

  get(index: number): TextureExample {
    const example = this.examples[index];
    if (!example) {
      throw new RangeError(`Example ${index} out of range (size ${this.examples.length})`);
    }
    return example;
  }

  *[Symbol.iterator](): Iterator<TextureExample> {
    yield* this.examples;
  }
}
