import { projectToPixel } from "@viewsynth/geometry-core";
import type { CameraPose } from "@viewsynth/geometry-core";
import { createImage } from "@viewsynth/image-core";
import type { Rgb, RgbImage } from "@viewsynth/image-core";
import type { MeshData, Renderer } from "@viewsynth/session-core";

const NEAR = 1e-6;
const EDGE_EPSILON = -1e-9;

/** Unit normal to 8-bit colour, `(n + 1) / 2 · 255` per axis. */
export function normalColor(nx: number, ny: number, nz: number): Rgb {
  return [toByte(nx), toByte(ny), toByte(nz)];
}

function toByte(n: number): number {
  return Math.round(((n + 1) / 2) * 255);
}

function edge(ax: number, ay: number, bx: number, by: number, px: number, py: number): number {
  return (bx - ax) * (py - ay) - (by - ay) * (px - ax);
}

/**
 * Z-buffered rasterisation of the mesh, each covered pixel coloured by its
 * perspective-correct interpolated world normal. Uncovered pixels stay black.
 * Triangles with a vertex at or behind the camera plane are skipped.
 */
export function rasterizeNormals(pose: CameraPose, mesh: MeshData): RgbImage {
  const { width, height } = pose.intrinsics;
  const image = createImage(width, height);
  const depth = new Float64Array(width * height).fill(Infinity);

  const vertexCount = Math.floor(mesh.vertices.length / 3);
  const screen = new Float64Array(vertexCount * 3);
  for (let i = 0; i < vertexCount; i++) {
    const p = projectToPixel(
      [mesh.vertices[i * 3], mesh.vertices[i * 3 + 1], mesh.vertices[i * 3 + 2]],
      pose
    );
    screen[i * 3] = p.u;
    screen[i * 3 + 1] = p.v;
    screen[i * 3 + 2] = p.depth;
  }

  const { normals, triangles } = mesh;
  for (let t = 0; t + 2 < triangles.length; t += 3) {
    const a = triangles[t];
    const b = triangles[t + 1];
    const c = triangles[t + 2];
    if (a >= vertexCount || b >= vertexCount || c >= vertexCount) continue;

    const ax = screen[a * 3], ay = screen[a * 3 + 1], az = screen[a * 3 + 2];
    const bx = screen[b * 3], by = screen[b * 3 + 1], bz = screen[b * 3 + 2];
    const cx = screen[c * 3], cy = screen[c * 3 + 1], cz = screen[c * 3 + 2];
    if (az <= NEAR || bz <= NEAR || cz <= NEAR) continue;

    const area = edge(ax, ay, bx, by, cx, cy);
    if (Math.abs(area) < 1e-12) continue;

    const minX = Math.max(0, Math.floor(Math.min(ax, bx, cx)));
    const maxX = Math.min(width - 1, Math.ceil(Math.max(ax, bx, cx)));
    const minY = Math.max(0, Math.floor(Math.min(ay, by, cy)));
    const maxY = Math.min(height - 1, Math.ceil(Math.max(ay, by, cy)));

    for (let y = minY; y <= maxY; y++) {
      for (let x = minX; x <= maxX; x++) {
        const px = x + 0.5;
        const py = y + 0.5;
        const wa = edge(bx, by, cx, cy, px, py) / area;
        const wb = edge(cx, cy, ax, ay, px, py) / area;
        const wc = edge(ax, ay, bx, by, px, py) / area;
        if (wa < EDGE_EPSILON || wb < EDGE_EPSILON || wc < EDGE_EPSILON) continue;

        const z = 1 / (wa / az + wb / bz + wc / cz);
        const pixel = y * width + x;
        if (z >= depth[pixel]) continue;

        const ka = (wa / az) * z;
        const kb = (wb / bz) * z;
        const kc = (wc / cz) * z;
        const nx = ka * normals[a * 3] + kb * normals[b * 3] + kc * normals[c * 3];
        const ny = ka * normals[a * 3 + 1] + kb * normals[b * 3 + 1] + kc * normals[c * 3 + 1];
        const nz = ka * normals[a * 3 + 2] + kb * normals[b * 3 + 2] + kc * normals[c * 3 + 2];
        const length = Math.hypot(nx, ny, nz);
        if (length === 0) continue;

        depth[pixel] = z;
        image.data.set(normalColor(nx / length, ny / length, nz / length), pixel * 3);
      }
    }
  }

  return image;
}

export class NormalSketchRenderer implements Renderer {
  async render(pose: CameraPose, mesh: MeshData): Promise<RgbImage> {
    return rasterizeNormals(pose, mesh);
  }
}
