import { describe, expect, it } from "vitest";
import { ConfigurationError } from "@viewsynth/geometry-core";
import type { Keypoints3D } from "@viewsynth/geometry-core";
import {
  bucketKey,
  OrientationVisibilityPredicate,
  TableVisibilityPredicate,
  viewpointBucket,
} from "../src";
import { BOX_CAR } from "./fixtures";

describe("viewpointBucket", () => {
  it("rounds to the nearest bin and wraps azimuth", () => {
    expect(viewpointBucket(94, 3)).toEqual({ azimuthDeg: 90, elevationDeg: 0 });
    expect(viewpointBucket(356, 26)).toEqual({ azimuthDeg: 0, elevationDeg: 30 });
    expect(viewpointBucket(100, 40, 15)).toEqual({ azimuthDeg: 105, elevationDeg: 45 });
  });

  it("formats bucket keys", () => {
    expect(bucketKey({ azimuthDeg: 180, elevationDeg: 20 })).toBe("180_20");
  });
});

describe("TableVisibilityPredicate", () => {
  const predicate = TableVisibilityPredicate.fromJson({
    objectClass: "chair",
    models: { "0": { "90_0": [true, false, true, false] } },
  });

  it("looks up flags by CAD index and bucket", () => {
    const flags = predicate.visibleAt({
      objectClass: "chair",
      cadIndex: 0,
      bucket: { azimuthDeg: 90, elevationDeg: 0 },
      keypoints3d: {},
    });
    expect(flags).toEqual([true, false, true, false]);
    expect(predicate.binDeg).toBe(10);
  });

  it("fails on missing entries", () => {
    expect(() =>
      predicate.visibleAt({
        objectClass: "chair",
        cadIndex: 3,
        bucket: { azimuthDeg: 90, elevationDeg: 0 },
        keypoints3d: {},
      })
    ).toThrow(new RangeError("No visibility entry for CAD 3 at 90_0"));
  });

  it("fails for another class", () => {
    expect(() =>
      predicate.visibleAt({
        objectClass: "car",
        cadIndex: 0,
        bucket: { azimuthDeg: 90, elevationDeg: 0 },
        keypoints3d: {},
      })
    ).toThrow(/is for chair/);
  });

  it("rejects malformed tables", () => {
    expect(() => TableVisibilityPredicate.fromJson({ objectClass: "sofa", models: {} })).toThrow(
      ConfigurationError
    );
  });
});

describe("OrientationVisibilityPredicate", () => {
  const predicate = new OrientationVisibilityPredicate();

  it("sees only the right side from the default viewpoint", () => {
    const flags = predicate.visibleAt({
      objectClass: "car",
      cadIndex: 0,
      bucket: { azimuthDeg: 90, elevationDeg: 0 },
      keypoints3d: BOX_CAR,
    });
    expect(flags).toEqual([false, true, false, false, false]);
  });

  it("sees only the roof from straight above", () => {
    const flags = predicate.visibleAt({
      objectClass: "car",
      cadIndex: 0,
      bucket: { azimuthDeg: 0, elevationDeg: 90 },
      keypoints3d: BOX_CAR,
    });
    expect(flags).toEqual([false, false, true, false, false]);
  });

  it("requires every plane keypoint", () => {
    const partial: Keypoints3D = { ...BOX_CAR };
    delete partial.upper_left_windshield;
    expect(() =>
      predicate.visibleAt({
        objectClass: "car",
        cadIndex: 0,
        bucket: { azimuthDeg: 0, elevationDeg: 90 },
        keypoints3d: partial,
      })
    ).toThrow(/upper_left_windshield/);
  });
});
