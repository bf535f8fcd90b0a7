import { readFile } from "node:fs/promises";
import path from "node:path";
import type { BufferGeometry } from "three";
import { PLYLoader } from "three/examples/jsm/loaders/PLYLoader.js";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigurationError } from "@viewsynth/geometry-core";
import type { Keypoints3D } from "@viewsynth/geometry-core";
import type { CadModel, MeshData, MeshKeypointStore } from "@viewsynth/session-core";

const keypointFileSchema = z.object({
  kpoints_3d: z.record(z.string(), z.tuple([z.number(), z.number(), z.number()])),
});

export function cadBaseName(objectClass: string, cadIndex: number): string {
  return `pascal_${objectClass}_cad_${String(cadIndex).padStart(3, "0")}`;
}

/** Copies position, normals and faces out of a parsed geometry. */
export function toMeshData(geometry: BufferGeometry): MeshData {
  if (!geometry.hasAttribute("position")) {
    throw new ConfigurationError("Mesh has no vertex positions");
  }
  geometry.computeVertexNormals();
  const position = geometry.getAttribute("position");
  const normal = geometry.getAttribute("normal");

  const vertices = new Float32Array(position.count * 3);
  const normals = new Float32Array(position.count * 3);
  for (let i = 0; i < position.count; i++) {
    vertices[i * 3] = position.getX(i);
    vertices[i * 3 + 1] = position.getY(i);
    vertices[i * 3 + 2] = position.getZ(i);
    normals[i * 3] = normal.getX(i);
    normals[i * 3 + 1] = normal.getY(i);
    normals[i * 3 + 2] = normal.getZ(i);
  }

  const index = geometry.getIndex();
  const triangles = index
    ? Uint32Array.from({ length: index.count }, (_, i) => index.getX(i))
    : Uint32Array.from({ length: position.count - (position.count % 3) }, (_, i) => i);

  return { vertices, normals, triangles };
}

export function parseKeypointYaml(text: string, source: string): Keypoints3D {
  const parsed = keypointFileSchema.safeParse(parseYaml(text));
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid keypoint metadata in ${source}: ${parsed.error.message}`);
  }
  return parsed.data.kpoints_3d;
}

/**
 * Reads `<root>/pascal_<class>_cad_<NNN>.ply` and the sibling `.yaml` holding
 * `kpoints_3d`.
 */
export class PlyMeshKeypointStore implements MeshKeypointStore {
  private readonly loader = new PLYLoader();

  constructor(private readonly root: string) {}

  async load(objectClass: string, cadIndex: number): Promise<CadModel> {
    const base = path.join(this.root, cadBaseName(objectClass, cadIndex));
    const [plyBytes, yamlText] = await Promise.all([
      readRequired(`${base}.ply`),
      readRequired(`${base}.yaml`).then((bytes) => bytes.toString("utf8")),
    ]);

    const data = new ArrayBuffer(plyBytes.byteLength);
    new Uint8Array(data).set(plyBytes);
    const mesh = toMeshData(this.loader.parse(data));
    const keypoints = parseKeypointYaml(yamlText, `${base}.yaml`);

    return { cadIndex, mesh, keypoints };
  }
}

async function readRequired(file: string): Promise<Buffer> {
  try {
    return await readFile(file);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      throw new ConfigurationError(`Missing CAD file ${file}`, { cause: err });
    }
    throw err;
  }
}
