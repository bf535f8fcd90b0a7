import { InvalidGeometryError } from "./errors";
import type { CameraPose, Keypoints2D, Keypoints3D, Vec2, Vec3 } from "./types";

const MIN_DEPTH = 1e-6;

export interface ProjectedPoint {
  u: number;
  v: number;
  depth: number;
}

export interface ProjectionOptions {
  /** Throw on points behind the camera instead of clamping them to the border. */
  strict?: boolean;
}

export interface KeypointProjection {
  points: Keypoints2D;
  behindCamera: string[];
}

export function toCameraFrame(point: Vec3, pose: CameraPose): Vec3 {
  const { rotation: r, translation: t } = pose.extrinsics;
  return [
    r[0][0] * point[0] + r[0][1] * point[1] + r[0][2] * point[2] + t[0],
    r[1][0] * point[0] + r[1][1] * point[1] + r[1][2] * point[2] + t[1],
    r[2][0] * point[0] + r[2][1] * point[1] + r[2][2] * point[2] + t[2],
  ];
}

/** Pinhole projection to pixel coordinates. Depth is left unclamped. */
export function projectToPixel(point: Vec3, pose: CameraPose): ProjectedPoint {
  const [x, y, z] = toCameraFrame(point, pose);
  const { focal, cx, cy } = pose.intrinsics;
  const depth = z > MIN_DEPTH ? z : MIN_DEPTH;
  return { u: (focal * x) / depth + cx, v: (focal * y) / depth + cy, depth: z };
}

export function pixelToNormalized(u: number, v: number, pose: CameraPose): Vec2 {
  const { cx, cy, width, height } = pose.intrinsics;
  return [clampUnit((u - cx) / (width / 2)), clampUnit((v - cy) / (height / 2))];
}

/**
 * Projects every named keypoint into normalized [-1,1]² image coordinates.
 * Output always has one entry per input name.
 */
export function projectKeypoints(
  keypoints: Keypoints3D,
  pose: CameraPose,
  options: ProjectionOptions = {}
): KeypointProjection {
  const points: Keypoints2D = {};
  const behindCamera: string[] = [];

  for (const [name, point] of Object.entries(keypoints)) {
    const projected = projectToPixel(point, pose);
    if (projected.depth <= MIN_DEPTH) {
      if (options.strict) {
        throw new InvalidGeometryError(`Keypoint ${name} projects behind the camera`);
      }
      behindCamera.push(name);
    }
    points[name] = pixelToNormalized(projected.u, projected.v, pose);
  }

  return { points, behindCamera };
}

function clampUnit(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(-1, value));
}
