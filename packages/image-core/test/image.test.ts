import { describe, expect, it } from "vitest";
import type { Rgb } from "../src";
import {
  concatHorizontal,
  createImage,
  getPixel,
  imagesEqual,
  pointInPolygon,
  sampleBilinear,
  setPixel,
} from "../src";

describe("sampleBilinear", () => {
  it("returns the exact pixel at its centre", () => {
    const image = createImage(4, 4);
    setPixel(image, 2, 1, [200, 100, 50]);
    expect(sampleBilinear(image, 2.5, 1.5, [0, 0, 0])).toEqual([200, 100, 50]);
  });

  it("interpolates between neighbouring centres", () => {
    const image = createImage(2, 1);
    setPixel(image, 0, 0, [0, 0, 0]);
    setPixel(image, 1, 0, [100, 200, 40]);
    const out: Rgb = [0, 0, 0];
    sampleBilinear(image, 1, 0.5, out);
    expect(out).toEqual([50, 100, 20]);
  });

  it("reads black outside the image", () => {
    const image = createImage(2, 2, [255, 255, 255]);
    expect(sampleBilinear(image, -3, -3, [1, 1, 1])).toEqual([0, 0, 0]);
  });
});

describe("pointInPolygon", () => {
  const square: Array<[number, number]> = [[0, 0], [10, 0], [10, 10], [0, 10]];

  it("accepts interior points for either winding", () => {
    expect(pointInPolygon(5, 5, square)).toBe(true);
    expect(pointInPolygon(5, 5, [...square].reverse())).toBe(true);
  });

  it("rejects exterior points", () => {
    expect(pointInPolygon(15, 5, square)).toBe(false);
    expect(pointInPolygon(5, -1, square)).toBe(false);
  });
});

describe("concatHorizontal", () => {
  it("places tiles left to right", () => {
    const a = createImage(2, 2, [10, 10, 10]);
    const b = createImage(3, 2, [20, 20, 20]);
    const out = concatHorizontal([a, b]);
    expect(out.width).toBe(5);
    expect(out.height).toBe(2);
    expect(getPixel(out, 1, 1)).toEqual([10, 10, 10]);
    expect(getPixel(out, 2, 0)).toEqual([20, 20, 20]);
    expect(getPixel(out, 4, 1)).toEqual([20, 20, 20]);
  });

  it("rejects tiles of different heights", () => {
    expect(() => concatHorizontal([createImage(2, 2), createImage(2, 3)])).toThrow(/height/);
  });
});

describe("imagesEqual", () => {
  it("compares size and content", () => {
    const a = createImage(2, 2, [1, 2, 3]);
    expect(imagesEqual(a, createImage(2, 2, [1, 2, 3]))).toBe(true);
    expect(imagesEqual(a, createImage(2, 2, [1, 2, 4]))).toBe(false);
    expect(imagesEqual(a, createImage(1, 4, [1, 2, 3]))).toBe(false);
  });
});
