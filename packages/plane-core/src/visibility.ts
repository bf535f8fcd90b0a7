import { z } from "zod";
import { cameraCentre, ConfigurationError } from "@viewsynth/geometry-core";
import type { Keypoints3D, Vec3 } from "@viewsynth/geometry-core";
import { getClassDefinition } from "./catalog";
import type { ClassDefinition, ObjectClass } from "./catalog";

export const DEFAULT_BIN_DEG = 10;

export interface ViewpointBucket {
  azimuthDeg: number;
  elevationDeg: number;
}

export interface VisibilityQuery {
  objectClass: ObjectClass;
  cadIndex: number;
  bucket: ViewpointBucket;
  keypoints3d: Keypoints3D;
}

/** Per-plane visibility, in catalog order, for a discretized viewpoint. */
export interface VisibilityPredicate {
  /** Bucket width the predicate was built for, when it has one. */
  readonly binDeg?: number;
  visibleAt(query: VisibilityQuery): boolean[];
}

export function viewpointBucket(
  azimuthDeg: number,
  elevationDeg: number,
  binDeg = DEFAULT_BIN_DEG
): ViewpointBucket {
  const az = Math.round(azimuthDeg / binDeg) * binDeg;
  return {
    azimuthDeg: ((az % 360) + 360) % 360,
    elevationDeg: Math.round(elevationDeg / binDeg) * binDeg,
  };
}

export function bucketKey(bucket: ViewpointBucket): string {
  return `${bucket.azimuthDeg}_${bucket.elevationDeg}`;
}

export const visibilityTableSchema = z.object({
  objectClass: z.enum(["car", "chair"]),
  binDeg: z.number().positive().default(DEFAULT_BIN_DEG),
  models: z.record(z.string(), z.record(z.string(), z.array(z.boolean()))),
});

export type VisibilityTable = z.infer<typeof visibilityTableSchema>;

/** Precomputed visibility keyed by CAD index, then by `"<az>_<el>"` bucket. */
export class TableVisibilityPredicate implements VisibilityPredicate {
  constructor(private readonly table: VisibilityTable) {}

  static fromJson(raw: unknown): TableVisibilityPredicate {
    const parsed = visibilityTableSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid visibility table: ${parsed.error.message}`);
    }
    return new TableVisibilityPredicate(parsed.data);
  }

  get binDeg(): number {
    return this.table.binDeg;
  }

  visibleAt(query: VisibilityQuery): boolean[] {
    if (query.objectClass !== this.table.objectClass) {
      throw new ConfigurationError(
        `Visibility table is for ${this.table.objectClass}, not ${query.objectClass}`
      );
    }
    const key = bucketKey(query.bucket);
    const entry = this.table.models[String(query.cadIndex)]?.[key];
    if (!entry) {
      throw new RangeError(`No visibility entry for CAD ${query.cadIndex} at ${key}`);
    }
    return [...entry];
  }
}

/**
 * Visibility from plane orientation: a plane is visible when its outward
 * normal faces a camera placed at the bucket centre. Outward means away from
 * the centroid of all model keypoints.
 */
export class OrientationVisibilityPredicate implements VisibilityPredicate {
  constructor(private readonly radius = 7) {}

  visibleAt(query: VisibilityQuery): boolean[] {
    const definition = getClassDefinition(query.objectClass);
    const camera = cameraCentre(query.bucket.azimuthDeg, query.bucket.elevationDeg, this.radius);
    const modelCentroid = centroid(Object.values(query.keypoints3d));

    return definition.planes.map((plane) => {
      const points = planePoints3D(definition, plane.name, query.keypoints3d);
      const planeCentroid = centroid(points);
      const normal = newellNormal(points);
      if (dot(normal, sub(planeCentroid, modelCentroid)) < 0) {
        normal[0] = -normal[0];
        normal[1] = -normal[1];
        normal[2] = -normal[2];
      }
      return dot(normal, sub([camera.x, camera.y, camera.z], planeCentroid)) > 0;
    });
  }
}

function planePoints3D(definition: ClassDefinition, planeName: string, keypoints: Keypoints3D): Vec3[] {
  const plane = definition.planes.find((p) => p.name === planeName);
  if (!plane) throw new ConfigurationError(`Unknown plane ${planeName}`);
  return plane.keypoints.map((name) => {
    const point = keypoints[name];
    if (!point) {
      throw new ConfigurationError(`Missing 3D keypoint ${name} for plane ${planeName}`);
    }
    return point;
  });
}

function newellNormal(points: Vec3[]): Vec3 {
  const n: Vec3 = [0, 0, 0];
  for (let i = 0; i < points.length; i++) {
    const a = points[i];
    const b = points[(i + 1) % points.length];
    n[0] += (a[1] - b[1]) * (a[2] + b[2]);
    n[1] += (a[2] - b[2]) * (a[0] + b[0]);
    n[2] += (a[0] - b[0]) * (a[1] + b[1]);
  }
  return n;
}

function centroid(points: Vec3[]): Vec3 {
  if (!points.length) return [0, 0, 0];
  const sum = points.reduce<Vec3>(
    (acc, p) => [acc[0] + p[0], acc[1] + p[1], acc[2] + p[2]],
    [0, 0, 0]
  );
  return [sum[0] / points.length, sum[1] / points.length, sum[2] / points.length];
}

function sub(a: Vec3, b: Vec3): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

function dot(a: Vec3, b: Vec3): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
}
