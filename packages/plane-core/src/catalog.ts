export type ObjectClass = "car" | "chair";

export const OBJECT_CLASSES: readonly ObjectClass[] = ["car", "chair"];

export interface PlaneDefinition {
  name: string;
  /** Three (affine) or four (homography) keypoint names, in boundary order. */
  keypoints: string[];
}

export interface ClassDefinition {
  objectClass: ObjectClass;
  planes: PlaneDefinition[];
}

/** Canonical plane order per class. Warping never crosses plane identities. */
export const PLANE_CATALOG: Record<ObjectClass, ClassDefinition> = {
  car: {
    objectClass: "car",
    planes: [
      {
        name: "left_side",
        keypoints: ["left_front_light", "left_back_trunk", "left_back_wheel", "left_front_wheel"],
      },
      {
        name: "right_side",
        keypoints: ["right_front_light", "right_back_trunk", "right_back_wheel", "right_front_wheel"],
      },
      {
        name: "roof",
        keypoints: [
          "upper_left_windshield",
          "upper_right_windshield",
          "upper_right_rearwindow",
          "upper_left_rearwindow",
        ],
      },
      {
        name: "front",
        keypoints: ["left_front_light", "right_front_light", "right_front_wheel", "left_front_wheel"],
      },
      {
        name: "back",
        keypoints: ["left_back_trunk", "right_back_trunk", "right_back_wheel", "left_back_wheel"],
      },
    ],
  },
  chair: {
    objectClass: "chair",
    planes: [
      {
        name: "back",
        keypoints: ["back_upper_left", "back_upper_right", "seat_upper_right", "seat_upper_left"],
      },
      {
        name: "seat",
        keypoints: ["seat_upper_left", "seat_upper_right", "seat_lower_right", "seat_lower_left"],
      },
      {
        name: "left_side",
        keypoints: ["seat_upper_left", "seat_lower_left", "leg_lower_left", "leg_upper_left"],
      },
      {
        name: "right_side",
        keypoints: ["seat_upper_right", "seat_lower_right", "leg_lower_right", "leg_upper_right"],
      },
    ],
  },
};

export function isObjectClass(value: string): value is ObjectClass {
  return OBJECT_CLASSES.some((objectClass) => objectClass === value);
}

export function getClassDefinition(objectClass: ObjectClass): ClassDefinition {
  return PLANE_CATALOG[objectClass];
}

export function planeCount(objectClass: ObjectClass): number {
  return PLANE_CATALOG[objectClass].planes.length;
}
