import { clampPitch, clampRadius, toCameraPose, toViewpoint } from "./viewpoint";
import type {
  CameraPose,
  Viewpoint,
  ViewpointCommand,
  ViewpointConfig,
  ViewpointControls,
} from "./types";

const DEFAULT_CONFIG: Required<ViewpointConfig> = {
  yawDeg: 0,
  pitchDeg: 90,
  radius: 7,
  minRadius: 1,
  maxRadius: 20,
  focal: 1000,
  frame: { width: 128, height: 128 },
};

function mergeConfig(config?: ViewpointConfig): Required<ViewpointConfig> {
  return {
    ...DEFAULT_CONFIG,
    ...config,
    frame: { ...DEFAULT_CONFIG.frame, ...(config?.frame ?? {}) },
  };
}

/**
 * Turns viewpoint commands into new controls and controls into camera poses.
 * Holds configuration only; the controls themselves belong to the caller.
 */
export class ViewpointController {
  private readonly config: Required<ViewpointConfig>;

  constructor(config?: ViewpointConfig) {
    this.config = mergeConfig(config);
    if (this.config.minRadius > this.config.maxRadius) {
      throw new RangeError(
        `minRadius ${this.config.minRadius} exceeds maxRadius ${this.config.maxRadius}`
      );
    }
  }

  initialControls(): ViewpointControls {
    return {
      yawDeg: this.config.yawDeg,
      pitchDeg: clampPitch(this.config.pitchDeg),
      radius: clampRadius(this.config.radius, this.config.minRadius, this.config.maxRadius),
    };
  }

  apply(controls: ViewpointControls, command: ViewpointCommand): ViewpointControls {
    switch (command.type) {
      case "ROTATE":
        return {
          ...controls,
          yawDeg: controls.yawDeg + command.dYawDeg,
          pitchDeg: clampPitch(controls.pitchDeg + command.dPitchDeg),
        };
      case "ZOOM":
        return {
          ...controls,
          radius: clampRadius(
            controls.radius + command.delta,
            this.config.minRadius,
            this.config.maxRadius
          ),
        };
      default:
        return controls;
    }
  }

  toViewpoint(controls: ViewpointControls): Viewpoint {
    return toViewpoint(controls, this.config);
  }

  toCameraPose(controls: ViewpointControls): CameraPose {
    return toCameraPose(this.toViewpoint(controls), this.config.frame);
  }

  getConfig(): Required<ViewpointConfig> {
    return { ...this.config, frame: { ...this.config.frame } };
  }
}

export { DEFAULT_CONFIG as defaultViewpointConfig };
