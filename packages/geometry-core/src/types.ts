export type Vec2 = [number, number];
export type Vec3 = [number, number, number];

/** Row-major 3×3 matrix. */
export type Mat3 = [Vec3, Vec3, Vec3];

export interface FrameSize {
  width: number;
  height: number;
}

export interface CameraIntrinsics {
  focal: number;
  cx: number;
  cy: number;
  width: number;
  height: number;
}

/** World → camera transform. Camera frame is x right, y down, z forward. */
export interface CameraExtrinsics {
  rotation: Mat3;
  translation: Vec3;
}

export interface CameraPose {
  readonly intrinsics: CameraIntrinsics;
  readonly extrinsics: CameraExtrinsics;
}

/** Raw operator controls, before clamping and convention bridging. */
export interface ViewpointControls {
  yawDeg: number;
  pitchDeg: number;
  radius: number;
}

export interface Viewpoint {
  azimuthDeg: number;
  elevationDeg: number;
  /** Pitch after clamping; the controller's own elevation axis. */
  pitchDeg: number;
  radius: number;
  focal: number;
}

export type ViewpointCommand =
  | { type: "ROTATE"; dYawDeg: number; dPitchDeg: number }
  | { type: "ZOOM"; delta: number };

export interface ViewpointConfig {
  yawDeg?: number;
  pitchDeg?: number;
  radius?: number;
  minRadius?: number;
  maxRadius?: number;
  focal?: number;
  frame?: FrameSize;
}

export type Keypoints3D = Record<string, Vec3>;
export type Keypoints2D = Record<string, Vec2>;
