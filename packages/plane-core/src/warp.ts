import { applyTransform, solvePlaneTransform } from "@viewsynth/geometry-core";
import type { FrameSize, Vec2 } from "@viewsynth/geometry-core";
import { createImage, pointInPolygon, sampleBilinear } from "@viewsynth/image-core";
import type { Rgb, RgbImage } from "@viewsynth/image-core";
import type { ClassDefinition } from "./catalog";

export interface PlaneWarpInput {
  /** Plane images in source image coordinates, canonical order. */
  srcPlanes: RgbImage[];
  srcKeypoints: Vec2[][];
  dstKeypoints: Vec2[][];
  srcVisible: boolean[];
  dstVisible: boolean[];
  frame: FrameSize;
}

export interface PlaneWarpOptions {
  minTriangleArea?: number;
}

export interface PlaneWarpResult {
  warped: RgbImage[];
  unwarped: RgbImage[];
  /** Plane indices whose correspondences fell back to the identity warp. */
  degenerate: number[];
}

/** Normalized [-1,1] to continuous pixel coordinates. */
export function toPixel(points: Vec2[], size: FrameSize): Vec2[] {
  return points.map(([x, y]) => [((x + 1) * size.width) / 2, ((y + 1) * size.height) / 2]);
}

/** Corners of the plane's own axis-aligned frame, one per defining keypoint. */
export function canonicalCorners(count: number, size: FrameSize): Vec2[] {
  const corners: Vec2[] = [
    [0, 0],
    [size.width, 0],
    [size.width, size.height],
    [0, size.height],
  ];
  return corners.slice(0, count);
}

/**
 * Resamples `src` so that the points `srcPx` land on `dstPx` in an output of
 * `size`, masked to the `dstPx` polygon. Returns null when the
 * correspondences are degenerate.
 */
export function resamplePlane(
  src: RgbImage,
  srcPx: Vec2[],
  dstPx: Vec2[],
  size: FrameSize,
  options: PlaneWarpOptions = {}
): RgbImage | null {
  // Inverse map: output pixel -> source pixel.
  const transform = solvePlaneTransform(dstPx, srcPx, options.minTriangleArea);
  if (!transform) return null;

  const out = createImage(size.width, size.height);
  const px: Rgb = [0, 0, 0];
  for (let y = 0; y < size.height; y++) {
    for (let x = 0; x < size.width; x++) {
      const cx = x + 0.5;
      const cy = y + 0.5;
      if (!pointInPolygon(cx, cy, dstPx)) continue;
      const [sx, sy] = applyTransform(transform, cx, cy);
      if (!Number.isFinite(sx) || !Number.isFinite(sy)) continue;
      sampleBilinear(src, sx, sy, px);
      const i = (y * size.width + x) * 3;
      out.data[i] = px[0];
      out.data[i + 1] = px[1];
      out.data[i + 2] = px[2];
    }
  }
  return out;
}

/**
 * Warps every source plane to the target layout and unwarps it to its
 * canonical frame. Always returns exactly one image per catalog plane in
 * each stack; missing or invisible data is zero-filled.
 */
export function warpUnwarpPlanes(
  input: PlaneWarpInput,
  definition: ClassDefinition,
  options: PlaneWarpOptions = {}
): PlaneWarpResult {
  const { frame } = input;
  const warped: RgbImage[] = [];
  const unwarped: RgbImage[] = [];
  const degenerate: number[] = [];

  definition.planes.forEach((plane, i) => {
    const src = input.srcPlanes[i];
    const srcPoints = input.srcKeypoints[i];
    const dstPoints = input.dstKeypoints[i];
    const srcVisible = Boolean(input.srcVisible[i]) && src !== undefined && srcPoints !== undefined;
    const dstVisible = Boolean(input.dstVisible[i]) && dstPoints !== undefined;

    if (!srcVisible) {
      warped.push(createImage(frame.width, frame.height));
      unwarped.push(createImage(frame.width, frame.height));
      return;
    }

    const srcPx = toPixel(srcPoints, src);
    let planeDegenerate = false;

    const canonical = resamplePlane(
      src,
      srcPx,
      canonicalCorners(plane.keypoints.length, frame),
      frame,
      options
    );
    if (canonical) {
      unwarped.push(canonical);
    } else {
      unwarped.push(identityResample(src, frame));
      planeDegenerate = true;
    }

    if (dstVisible) {
      const target = resamplePlane(src, srcPx, toPixel(dstPoints, frame), frame, options);
      if (target) {
        warped.push(target);
      } else {
        warped.push(identityResample(src, frame));
        planeDegenerate = true;
      }
    } else {
      warped.push(createImage(frame.width, frame.height));
    }

    if (planeDegenerate) degenerate.push(i);
  });

  return { warped, unwarped, degenerate };
}

function identityResample(src: RgbImage, size: FrameSize): RgbImage {
  if (src.width === size.width && src.height === size.height) {
    return { width: src.width, height: src.height, data: new Uint8ClampedArray(src.data) };
  }
  const out = createImage(size.width, size.height);
  const px: Rgb = [0, 0, 0];
  for (let y = 0; y < size.height; y++) {
    for (let x = 0; x < size.width; x++) {
      sampleBilinear(src, x + 0.5, y + 0.5, px);
      const i = (y * size.width + x) * 3;
      out.data[i] = px[0];
      out.data[i + 1] = px[1];
      out.data[i + 2] = px[2];
    }
  }
  return out;
}
