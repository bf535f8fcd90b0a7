import { describe, expect, it } from "vitest";
import type { Vec2 } from "@viewsynth/geometry-core";
import { createImage, getPixel, setPixel } from "@viewsynth/image-core";
import type { RgbImage } from "@viewsynth/image-core";
import { canonicalCorners, getClassDefinition, toPixel, warpUnwarpPlanes } from "../src";
import type { ClassDefinition } from "../src";

const FRAME = { width: 128, height: 128 };
const SMALL = { width: 16, height: 16 };

const SQUARE: Vec2[] = [
  [-0.5, -0.5],
  [0.5, -0.5],
  [0.5, 0.5],
  [-0.5, 0.5],
];
// A parallelogram, so the square maps onto it with an affine homography.
const SHEARED: Vec2[] = [
  [-0.6, -0.4],
  [0.4, -0.5],
  [0.5, 0.5],
  [-0.5, 0.6],
];

function gradient(size: { width: number; height: number }): RgbImage {
  const image = createImage(size.width, size.height);
  for (let y = 0; y < size.height; y++) {
    for (let x = 0; x < size.width; x++) {
      setPixel(image, x, y, [2 * x, 2 * y, 77]);
    }
  }
  return image;
}

function isBlank(image: RgbImage): boolean {
  return image.data.every((v) => v === 0);
}

const SINGLE_PLANE: ClassDefinition = {
  objectClass: "chair",
  planes: [{ name: "panel", keypoints: ["a", "b", "c", "d"] }],
};

describe("coordinate helpers", () => {
  it("maps normalized corners to the frame edges", () => {
    expect(toPixel([[-1, -1], [1, 1], [0, 0]], FRAME)).toEqual([
      [0, 0],
      [128, 128],
      [64, 64],
    ]);
  });

  it("uses the first corners for triangular planes", () => {
    expect(canonicalCorners(3, SMALL)).toEqual([
      [0, 0],
      [16, 0],
      [16, 16],
    ]);
  });
});

describe("warpUnwarpPlanes", () => {
  it("returns one image per plane for every visibility combination", () => {
    const definition = getClassDefinition("car");
    const planes = Array.from({ length: 5 }, () => createImage(16, 16, [90, 90, 90]));
    const quads = Array.from({ length: 5 }, () => SQUARE);
    const combos: Array<[boolean[], boolean[]]> = [
      [[true, true, true, true, true], [true, true, true, true, true]],
      [[false, false, false, false, false], [false, false, false, false, false]],
      [[true, false, true, false, true], [false, true, true, false, false]],
    ];

    for (const [srcVisible, dstVisible] of combos) {
      const result = warpUnwarpPlanes(
        { srcPlanes: planes, srcKeypoints: quads, dstKeypoints: quads, srcVisible, dstVisible, frame: SMALL },
        definition
      );
      expect(result.warped).toHaveLength(5);
      expect(result.unwarped).toHaveLength(5);
      for (const image of [...result.warped, ...result.unwarped]) {
        expect(image.width).toBe(16);
        expect(image.height).toBe(16);
      }
    }
  });

  it("zero-fills when source data is missing entirely", () => {
    const result = warpUnwarpPlanes(
      { srcPlanes: [], srcKeypoints: [], dstKeypoints: [], srcVisible: [], dstVisible: [], frame: SMALL },
      getClassDefinition("chair")
    );
    expect(result.warped).toHaveLength(4);
    expect(result.unwarped).toHaveLength(4);
    expect(result.warped.every(isBlank)).toBe(true);
  });

  it("blanks the warp but keeps the unwarp when the target hides the plane", () => {
    const result = warpUnwarpPlanes(
      {
        srcPlanes: [createImage(16, 16, [200, 200, 200])],
        srcKeypoints: [SQUARE],
        dstKeypoints: [SQUARE],
        srcVisible: [true],
        dstVisible: [false],
        frame: SMALL,
      },
      SINGLE_PLANE
    );
    expect(isBlank(result.warped[0])).toBe(true);
    expect(getPixel(result.unwarped[0], 8, 8)).toEqual([200, 200, 200]);
  });

  it("blanks both stacks when the source hides the plane", () => {
    const result = warpUnwarpPlanes(
      {
        srcPlanes: [createImage(16, 16, [200, 200, 200])],
        srcKeypoints: [SQUARE],
        dstKeypoints: [SQUARE],
        srcVisible: [false],
        dstVisible: [true],
        frame: SMALL,
      },
      SINGLE_PLANE
    );
    expect(isBlank(result.warped[0])).toBe(true);
    expect(isBlank(result.unwarped[0])).toBe(true);
  });

  it("masks the warp to the target quadrilateral", () => {
    const result = warpUnwarpPlanes(
      {
        srcPlanes: [createImage(16, 16, [200, 200, 200])],
        srcKeypoints: [SQUARE],
        dstKeypoints: [SQUARE],
        srcVisible: [true],
        dstVisible: [true],
        frame: SMALL,
      },
      SINGLE_PLANE
    );
    // SQUARE spans pixels 4..12; pixel 8 is inside, pixel 1 outside.
    expect(getPixel(result.warped[0], 8, 8)).toEqual([200, 200, 200]);
    expect(getPixel(result.warped[0], 1, 1)).toEqual([0, 0, 0]);
    expect(result.degenerate).toEqual([]);
  });

  it("unwarps the plane region onto the whole canonical frame", () => {
    const src = createImage(128, 128);
    for (let y = 32; y < 96; y++) {
      for (let x = 32; x < 96; x++) setPixel(src, x, y, [255, 255, 255]);
    }
    const result = warpUnwarpPlanes(
      { srcPlanes: [src], srcKeypoints: [SQUARE], dstKeypoints: [SHEARED], srcVisible: [true], dstVisible: [true], frame: FRAME },
      SINGLE_PLANE
    );
    expect(getPixel(result.unwarped[0], 64, 64)).toEqual([255, 255, 255]);
    expect(getPixel(result.unwarped[0], 10, 100)).toEqual([255, 255, 255]);
  });

  it("falls back to the identity warp for collapsed target points", () => {
    const src = gradient(SMALL);
    const collapsed: Vec2[] = [
      [1, 1],
      [1, 1],
      [1, 1],
      [1, 1],
    ];
    const result = warpUnwarpPlanes(
      { srcPlanes: [src], srcKeypoints: [SQUARE], dstKeypoints: [collapsed], srcVisible: [true], dstVisible: [true], frame: SMALL },
      SINGLE_PLANE
    );
    expect(result.degenerate).toEqual([0]);
    expect(result.warped[0].data).toEqual(src.data);
  });

  it("warps triangular planes with an affine map", () => {
    const triangle: ClassDefinition = {
      objectClass: "chair",
      planes: [{ name: "gusset", keypoints: ["a", "b", "c"] }],
    };
    const src = createImage(16, 16, [50, 150, 250]);
    const result = warpUnwarpPlanes(
      {
        srcPlanes: [src],
        srcKeypoints: [[[-0.5, -0.5], [0.5, -0.5], [0.5, 0.5]]],
        dstKeypoints: [[[-1, -1], [1, -1], [1, 1]]],
        srcVisible: [true],
        dstVisible: [true],
        frame: SMALL,
      },
      triangle
    );
    // Upper-right half of the frame is inside the target triangle.
    expect(getPixel(result.warped[0], 12, 3)).toEqual([50, 150, 250]);
    expect(getPixel(result.warped[0], 3, 12)).toEqual([0, 0, 0]);
    expect(result.degenerate).toEqual([]);
  });

  it("reproduces the plane after warping to another layout and back", () => {
    const original = gradient(FRAME);
    const forward = warpUnwarpPlanes(
      { srcPlanes: [original], srcKeypoints: [SQUARE], dstKeypoints: [SHEARED], srcVisible: [true], dstVisible: [true], frame: FRAME },
      SINGLE_PLANE
    );
    const back = warpUnwarpPlanes(
      { srcPlanes: forward.warped, srcKeypoints: [SHEARED], dstKeypoints: [SQUARE], srcVisible: [true], dstVisible: [true], frame: FRAME },
      SINGLE_PLANE
    );

    let worst = 0;
    for (let y = 40; y < 88; y++) {
      for (let x = 40; x < 88; x++) {
        const a = getPixel(original, x, y);
        const b = getPixel(back.warped[0], x, y);
        for (let c = 0; c < 3; c++) worst = Math.max(worst, Math.abs(a[c] - b[c]));
      }
    }
    expect(worst).toBeLessThanOrEqual(2);
  });
});
