import type { Keypoints3D } from "@viewsynth/geometry-core";

/** A box-shaped car: front at +X, left at +Y, roof at z = 2. */
export const BOX_CAR: Keypoints3D = {
  left_front_wheel: [2, 1, 0],
  left_back_wheel: [-2, 1, 0],
  right_front_wheel: [2, -1, 0],
  right_back_wheel: [-2, -1, 0],
  left_front_light: [2, 1, 1],
  right_front_light: [2, -1, 1],
  left_back_trunk: [-2, 1, 1],
  right_back_trunk: [-2, -1, 1],
  upper_left_windshield: [1, 1, 2],
  upper_right_windshield: [1, -1, 2],
  upper_left_rearwindow: [-1, 1, 2],
  upper_right_rearwindow: [-1, -1, 2],
};
