import type { ViewpointCommand } from "@viewsynth/geometry-core";
import { UnsupportedEventError } from "./errors";
import { describeEvent } from "./events";
import type { SessionEvent } from "./events";

export interface StepConfig {
  yawStepDeg: number;
  pitchStepDeg: number;
  radiusStep: number;
  catalogSize: number;
}

export type SessionEffect =
  | { type: "RENDER"; command?: ViewpointCommand }
  | { type: "LOAD_MODEL"; cadIndex: number }
  | { type: "SELECT_EXAMPLE" }
  | { type: "DUMP" };

/**
 * Maps one event to the effect the session performs. Scalar viewpoint
 * changes come back as a command for the viewpoint controller.
 */
export function transition(
  current: { cadIndex: number },
  event: SessionEvent,
  steps: StepConfig
): SessionEffect {
  switch (event.type) {
    case "ROTATE_UP":
      return { type: "RENDER", command: { type: "ROTATE", dYawDeg: 0, dPitchDeg: steps.pitchStepDeg } };
    case "ROTATE_DOWN":
      return { type: "RENDER", command: { type: "ROTATE", dYawDeg: 0, dPitchDeg: -steps.pitchStepDeg } };
    case "ROTATE_RIGHT":
      return { type: "RENDER", command: { type: "ROTATE", dYawDeg: steps.yawStepDeg, dPitchDeg: 0 } };
    case "ROTATE_LEFT":
      return { type: "RENDER", command: { type: "ROTATE", dYawDeg: -steps.yawStepDeg, dPitchDeg: 0 } };
    case "ZOOM_OUT":
      return { type: "RENDER", command: { type: "ZOOM", delta: steps.radiusStep } };
    case "ZOOM_IN":
      return { type: "RENDER", command: { type: "ZOOM", delta: -steps.radiusStep } };
    case "NEXT_MODEL":
      return { type: "LOAD_MODEL", cadIndex: (current.cadIndex + 1) % steps.catalogSize };
    case "NEXT_EXAMPLE":
      return { type: "SELECT_EXAMPLE" };
    case "DUMP_FRAME":
      return { type: "DUMP" };
    case "NO_OP":
      return { type: "RENDER" };
    default: {
      const unknownEvent: never = event;
      throw new UnsupportedEventError(describeEvent(unknownEvent));
    }
  }
}
