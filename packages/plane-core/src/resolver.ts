import { ConfigurationError } from "@viewsynth/geometry-core";
import type { Keypoints2D, Keypoints3D, Vec2 } from "@viewsynth/geometry-core";
import { getClassDefinition } from "./catalog";
import type { ObjectClass } from "./catalog";
import { DEFAULT_BIN_DEG, viewpointBucket } from "./visibility";
import type { VisibilityPredicate } from "./visibility";

export interface ResolvedPlane {
  name: string;
  keypoints: Vec2[];
  visible: boolean;
}

export interface PlaneLayoutRequest {
  objectClass: ObjectClass;
  cadIndex: number;
  azimuthDeg: number;
  elevationDeg: number;
  keypoints2d: Keypoints2D;
  keypoints3d: Keypoints3D;
  predicate: VisibilityPredicate;
  binDeg?: number;
}

/** One entry per catalog plane, in canonical order. */
export function resolvePlanes(request: PlaneLayoutRequest): ResolvedPlane[] {
  const definition = getClassDefinition(request.objectClass);
  const bucket = viewpointBucket(
    request.azimuthDeg,
    request.elevationDeg,
    request.binDeg ?? request.predicate.binDeg ?? DEFAULT_BIN_DEG
  );
  const visibility = request.predicate.visibleAt({
    objectClass: request.objectClass,
    cadIndex: request.cadIndex,
    bucket,
    keypoints3d: request.keypoints3d,
  });
  if (visibility.length !== definition.planes.length) {
    throw new ConfigurationError(
      `Visibility predicate returned ${visibility.length} flags for ${definition.planes.length} planes`
    );
  }

  return definition.planes.map((plane, i) => ({
    name: plane.name,
    keypoints: plane.keypoints.map((name) => {
      const point = request.keypoints2d[name];
      if (!point) {
        throw new ConfigurationError(`Missing 2D keypoint ${name} for plane ${plane.name}`);
      }
      return point;
    }),
    visible: visibility[i],
  }));
}
