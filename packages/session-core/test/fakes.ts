import type { CameraPose, Keypoints3D, Vec2 } from "@viewsynth/geometry-core";
import { createImage, createTensor } from "@viewsynth/image-core";
import type { ChannelTensor, Rgb, RgbImage } from "@viewsynth/image-core";
import { planeCount } from "@viewsynth/plane-core";
import type { ObjectClass, VisibilityPredicate, VisibilityQuery } from "@viewsynth/plane-core";
import { ArrayTextureDataset } from "../src/collaborators";
import type {
  CadModel,
  FrameSink,
  MeshData,
  MeshKeypointStore,
  Renderer,
  SynthesisModel,
  TextureExample,
} from "../src/collaborators";
import type { Logger } from "../src/logger";

export const FRAME = { width: 8, height: 8 };
export const SKETCH_FILL: Rgb = [128, 128, 255];
export const CENTRAL_FILL: Rgb = [200, 100, 50];
export const SOURCE_FILL: Rgb = [10, 20, 30];

export const UNIT_CHAIR: Keypoints3D = {
  back_upper_left: [-0.5, 0.5, 1],
  back_upper_right: [0.5, 0.5, 1],
  seat_upper_left: [-0.5, 0.5, 0],
  seat_upper_right: [0.5, 0.5, 0],
  seat_lower_left: [-0.5, -0.5, 0],
  seat_lower_right: [0.5, -0.5, 0],
  leg_upper_left: [-0.5, 0.5, -1],
  leg_upper_right: [0.5, 0.5, -1],
  leg_lower_left: [-0.5, -0.5, -1],
  leg_lower_right: [0.5, -0.5, -1],
};

const EMPTY_MESH: MeshData = {
  vertices: new Float32Array(0),
  normals: new Float32Array(0),
  triangles: new Uint32Array(0),
};

export class FakeStore implements MeshKeypointStore {
  readonly loads: number[] = [];
  failWith: Error | null = null;

  async load(_objectClass: ObjectClass, cadIndex: number): Promise<CadModel> {
    if (this.failWith) throw this.failWith;
    this.loads.push(cadIndex);
    return { cadIndex, mesh: EMPTY_MESH, keypoints: UNIT_CHAIR };
  }
}

/** Object silhouette is the 4x4 block at (2..5, 2..5); everything else is black. */
export class FakeRenderer implements Renderer {
  readonly poses: CameraPose[] = [];
  failWith: Error | null = null;

  async render(pose: CameraPose): Promise<RgbImage> {
    if (this.failWith) throw this.failWith;
    this.poses.push(pose);
    const image = createImage(pose.intrinsics.width, pose.intrinsics.height);
    for (let y = 2; y < 6; y++) {
      for (let x = 2; x < 6; x++) {
        const i = (y * image.width + x) * 3;
        image.data.set(SKETCH_FILL, i);
      }
    }
    return image;
  }
}

/** Every plane is visible except the indices listed in `hidden`. */
export class FakePredicate implements VisibilityPredicate {
  readonly queries: VisibilityQuery[] = [];
  hidden: number[] = [];

  visibleAt(query: VisibilityQuery): boolean[] {
    this.queries.push(query);
    return Array.from({ length: planeCount(query.objectClass) }, (_, i) => !this.hidden.includes(i));
  }
}

/** Returns the central reference channels (3..5) as the synthesized image. */
export class EchoModel implements SynthesisModel {
  readonly inputs: ChannelTensor[] = [];

  async synthesize(input: ChannelTensor): Promise<ChannelTensor> {
    this.inputs.push(input);
    const planeSize = input.width * input.height;
    const output = createTensor(3, input.height, input.width);
    output.data.set(input.data.subarray(3 * planeSize, 6 * planeSize));
    return output;
  }
}

export class MemorySink implements FrameSink {
  readonly shown: RgbImage[] = [];
  readonly persisted: string[] = [];

  async show(frame: RgbImage): Promise<void> {
    this.shown.push(frame);
  }

  async persist(_frame: RgbImage, name: string): Promise<string> {
    this.persisted.push(name);
    return `/dump/${name}.png`;
  }
}

export class RecordingLogger implements Logger {
  readonly lines: string[] = [];

  info(message: string): void {
    this.lines.push(`info ${message}`);
  }

  warn(message: string): void {
    this.lines.push(`warn ${message}`);
  }

  error(message: string): void {
    this.lines.push(`error ${message}`);
  }
}

export function chairExample(id: string): TextureExample {
  const count = planeCount("chair");
  return {
    id,
    image: createImage(FRAME.width, FRAME.height, SOURCE_FILL),
    central: createImage(FRAME.width, FRAME.height, CENTRAL_FILL),
    planes: Array.from({ length: count }, () => createImage(FRAME.width, FRAME.height, [90, 90, 90])),
    planeKeypoints: Array.from({ length: count }, (): Vec2[] => [
      [-1, -1],
      [1, -1],
      [1, 1],
      [-1, 1],
    ]),
    planeVisibility: new Array<boolean>(count).fill(false),
  };
}

export function createFakes() {
  return {
    store: new FakeStore(),
    renderer: new FakeRenderer(),
    dataset: new ArrayTextureDataset([chairExample("first"), chairExample("second")]),
    predicate: new FakePredicate(),
    model: new EchoModel(),
    sink: new MemorySink(),
  };
}
