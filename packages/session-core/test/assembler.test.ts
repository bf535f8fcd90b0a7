import { describe, expect, it } from "vitest";
import { createImage, getPixel, normalize } from "@viewsynth/image-core";
import { assembleSynthesisInput, decodeSynthesis, synthesisChannelCount } from "../src/assembler";

const blank = () => createImage(4, 2);

describe("synthesisChannelCount", () => {
  it("counts sketch, reference and three channels per plane", () => {
    expect(synthesisChannelCount("car")).toBe(21);
    expect(synthesisChannelCount("chair")).toBe(18);
  });
});

describe("assembleSynthesisInput", () => {
  it("stacks images in channel order", () => {
    const sketch = createImage(4, 2, [255, 0, 0]);
    const central = createImage(4, 2, [0, 255, 0]);
    const planes = [blank(), blank(), blank(), createImage(4, 2, [0, 0, 255])];

    const tensor = assembleSynthesisInput({
      objectClass: "chair",
      sketch,
      central,
      warpedPlanes: planes,
      colorSpace: "rgb",
    });

    const planeSize = 8;
    const at = (channel: number) => tensor.data[channel * planeSize];
    expect(tensor.channels).toBe(18);
    expect(at(0)).toBe(1);
    expect(at(1)).toBe(-1);
    expect(at(4)).toBe(1);
    expect(at(6)).toBe(-1);
    expect(at(17)).toBe(1);
    expect(at(15)).toBe(-1);
  });

  it("rejects a plane stack of the wrong length", () => {
    expect(() =>
      assembleSynthesisInput({
        objectClass: "car",
        sketch: blank(),
        central: blank(),
        warpedPlanes: [blank(), blank(), blank(), blank()],
        colorSpace: "rgb",
      })
    ).toThrow("car expects 5 planes, got 4");
  });

  it("rejects planes of a different size", () => {
    expect(() =>
      assembleSynthesisInput({
        objectClass: "chair",
        sketch: blank(),
        central: blank(),
        warpedPlanes: [blank(), blank(), blank(), createImage(2, 2)],
        colorSpace: "rgb",
      })
    ).toThrow("does not fit");
  });
});

describe("decodeSynthesis", () => {
  it("reads the first three channels back to RGB", () => {
    const tensor = {
      channels: 3,
      height: 1,
      width: 1,
      data: new Float32Array([normalize(10), normalize(128), normalize(250)]),
    };
    expect(getPixel(decodeSynthesis(tensor, "rgb"), 0, 0)).toEqual([10, 128, 250]);
  });
});
