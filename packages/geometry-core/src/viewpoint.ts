import { Vector3 } from "three";
import type { CameraPose, FrameSize, Mat3, Vec3, Viewpoint, ViewpointControls } from "./types";

const DEG2RAD = Math.PI / 180;

export function clampPitch(pitchDeg: number): number {
  return Math.min(Math.max(pitchDeg, -90), 90);
}

export function clampRadius(radius: number, minRadius: number, maxRadius: number): number {
  return Math.min(Math.max(radius, Math.max(minRadius, 0)), maxRadius);
}

/** Controller yaw to dataset azimuth; the datasets put azimuth 0 a quarter turn from yaw 0. */
export function yawToAzimuth(yawDeg: number): number {
  return (((yawDeg + 90) % 360) + 360) % 360;
}

export function pitchToElevation(pitchDeg: number): number {
  return 90 - pitchDeg;
}

export function toViewpoint(
  controls: ViewpointControls,
  options: { focal: number; minRadius: number; maxRadius: number }
): Viewpoint {
  const pitchDeg = clampPitch(controls.pitchDeg);
  return {
    azimuthDeg: yawToAzimuth(controls.yawDeg),
    elevationDeg: pitchToElevation(pitchDeg),
    pitchDeg,
    radius: clampRadius(controls.radius, options.minRadius, options.maxRadius),
    focal: options.focal,
  };
}

/** Camera centre on the sphere around the origin, world z up. */
export function cameraCentre(azimuthDeg: number, elevationDeg: number, radius: number): Vector3 {
  const az = azimuthDeg * DEG2RAD;
  const el = elevationDeg * DEG2RAD;
  return new Vector3(
    Math.cos(el) * Math.cos(az),
    -Math.cos(el) * Math.sin(az),
    Math.sin(el)
  ).multiplyScalar(radius);
}

export function toCameraPose(viewpoint: Viewpoint, frame: FrameSize): CameraPose {
  const az = viewpoint.azimuthDeg * DEG2RAD;
  const centre = cameraCentre(viewpoint.azimuthDeg, viewpoint.elevationDeg, viewpoint.radius);

  // Derived from the angles rather than the centre so radius 0 stays finite.
  const forward = cameraCentre(viewpoint.azimuthDeg, viewpoint.elevationDeg, 1).negate();
  const right = new Vector3(Math.sin(az), Math.cos(az), 0);
  const down = new Vector3().crossVectors(forward, right);

  const rotation: Mat3 = [toVec3(right), toVec3(down), toVec3(forward)];
  const translation: Vec3 = [-right.dot(centre), -down.dot(centre), -forward.dot(centre)];

  return {
    intrinsics: {
      focal: viewpoint.focal,
      cx: frame.width / 2,
      cy: frame.height / 2,
      width: frame.width,
      height: frame.height,
    },
    extrinsics: { rotation, translation },
  };
}

/** Camera centre in world coordinates, recovered from the extrinsics (C = -Rᵀt). */
export function poseCentre(pose: CameraPose): Vec3 {
  const { rotation: r, translation: t } = pose.extrinsics;
  return [
    -(r[0][0] * t[0] + r[1][0] * t[1] + r[2][0] * t[2]),
    -(r[0][1] * t[0] + r[1][1] * t[1] + r[2][1] * t[2]),
    -(r[0][2] * t[0] + r[1][2] * t[1] + r[2][2] * t[2]),
  ];
}

function toVec3(v: Vector3): Vec3 {
  return [v.x, v.y, v.z];
}
