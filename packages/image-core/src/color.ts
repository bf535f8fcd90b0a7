import type { ColorSpace, Rgb, RgbImage } from "./types";

// sRGB (D65) → XYZ, and the D65 white point.
const RGB_TO_XYZ = [
  [0.412453, 0.35758, 0.180423],
  [0.212671, 0.71516, 0.072169],
  [0.019334, 0.119193, 0.950227],
];
const XYZ_TO_RGB = [
  [3.240479, -1.53715, -0.498535],
  [-0.969256, 1.875991, 0.041556],
  [0.055648, -0.204043, 1.057311],
];
const WHITE = [0.950456, 1, 1.088754];

const EPSILON = 0.008856;
const KAPPA = 903.3;

function toLinear(c: number): number {
  return c <= 0.04045 ? c / 12.92 : Math.pow((c + 0.055) / 1.055, 2.4);
}

function toGamma(c: number): number {
  return c <= 0.0031308 ? 12.92 * c : 1.055 * Math.pow(c, 1 / 2.4) - 0.055;
}

function f(t: number): number {
  return t > EPSILON ? Math.cbrt(t) : 7.787 * t + 16 / 116;
}

function fInverse(t: number): number {
  const cube = t * t * t;
  return cube > EPSILON ? cube : (t - 16 / 116) / 7.787;
}

/** RGB to 8-bit LAB: L scaled to 0..255, a and b offset by 128. */
export function rgbToLab8(rgb: Rgb): Rgb {
  const lin = rgb.map((c) => toLinear(c / 255));
  const xyz = RGB_TO_XYZ.map((row) => row[0] * lin[0] + row[1] * lin[1] + row[2] * lin[2]);
  const [x, y, z] = xyz.map((v, i) => v / WHITE[i]);

  const L = y > EPSILON ? 116 * Math.cbrt(y) - 16 : KAPPA * y;
  const a = 500 * (f(x) - f(y));
  const b = 200 * (f(y) - f(z));
  return [clamp8((L * 255) / 100), clamp8(a + 128), clamp8(b + 128)];
}

export function lab8ToRgb(lab: Rgb): Rgb {
  const L = (lab[0] * 100) / 255;
  const a = lab[1] - 128;
  const b = lab[2] - 128;

  const fy = (L + 16) / 116;
  const y = L > KAPPA * EPSILON ? fy * fy * fy : L / KAPPA;
  const x = fInverse(fy + a / 500);
  const z = fInverse(fy - b / 200);
  const xyz = [x * WHITE[0], y * WHITE[1], z * WHITE[2]];

  const lin = XYZ_TO_RGB.map((row) => row[0] * xyz[0] + row[1] * xyz[1] + row[2] * xyz[2]);
  return [
    clamp8(toGamma(Math.max(0, lin[0])) * 255),
    clamp8(toGamma(Math.max(0, lin[1])) * 255),
    clamp8(toGamma(Math.max(0, lin[2])) * 255),
  ];
}

/** Converts an RGB image into the given colour space (identity for "rgb"). */
export function fromRgb(image: RgbImage, space: ColorSpace): RgbImage {
  return space === "rgb" ? image : mapPixels(image, rgbToLab8);
}

/** Converts an image stored in the given colour space back to RGB. */
export function toRgb(image: RgbImage, space: ColorSpace): RgbImage {
  return space === "rgb" ? image : mapPixels(image, lab8ToRgb);
}

function mapPixels(image: RgbImage, fn: (px: Rgb) => Rgb): RgbImage {
  const data = new Uint8ClampedArray(image.data.length);
  const px: Rgb = [0, 0, 0];
  for (let i = 0; i < data.length; i += 3) {
    px[0] = image.data[i];
    px[1] = image.data[i + 1];
    px[2] = image.data[i + 2];
    const out = fn(px);
    data[i] = out[0];
    data[i + 1] = out[1];
    data[i + 2] = out[2];
  }
  return { width: image.width, height: image.height, data };
}

function clamp8(value: number): number {
  return Math.min(255, Math.max(0, Math.round(value)));
}
