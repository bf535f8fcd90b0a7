import type { Rgb, RgbImage } from "./types";

export function createImage(width: number, height: number, fill: Rgb = [0, 0, 0]): RgbImage {
  const data = new Uint8ClampedArray(width * height * 3);
  if (fill[0] !== 0 || fill[1] !== 0 || fill[2] !== 0) {
    for (let i = 0; i < data.length; i += 3) {
      data[i] = fill[0];
      data[i + 1] = fill[1];
      data[i + 2] = fill[2];
    }
  }
  return { width, height, data };
}

export function getPixel(image: RgbImage, x: number, y: number): Rgb {
  const i = (y * image.width + x) * 3;
  return [image.data[i], image.data[i + 1], image.data[i + 2]];
}

export function setPixel(image: RgbImage, x: number, y: number, rgb: Rgb): void {
  const i = (y * image.width + x) * 3;
  image.data[i] = rgb[0];
  image.data[i + 1] = rgb[1];
  image.data[i + 2] = rgb[2];
}

/**
 * Bilinear sample at continuous pixel coordinates (pixel centres sit at
 * i + 0.5). Taps outside the image read as black. Writes into `out`.
 */
export function sampleBilinear(image: RgbImage, x: number, y: number, out: Rgb): Rgb {
  const fx = x - 0.5;
  const fy = y - 0.5;
  const x0 = Math.floor(fx);
  const y0 = Math.floor(fy);
  const tx = fx - x0;
  const ty = fy - y0;
  out[0] = 0;
  out[1] = 0;
  out[2] = 0;

  accumulate(image, x0, y0, (1 - tx) * (1 - ty), out);
  accumulate(image, x0 + 1, y0, tx * (1 - ty), out);
  accumulate(image, x0, y0 + 1, (1 - tx) * ty, out);
  accumulate(image, x0 + 1, y0 + 1, tx * ty, out);
  return out;
}

function accumulate(image: RgbImage, x: number, y: number, weight: number, out: Rgb): void {
  if (weight === 0 || x < 0 || y < 0 || x >= image.width || y >= image.height) return;
  const i = (y * image.width + x) * 3;
  out[0] += image.data[i] * weight;
  out[1] += image.data[i + 1] * weight;
  out[2] += image.data[i + 2] * weight;
}

/** Even-odd rule; works for any simple polygon, either winding. */
export function pointInPolygon(x: number, y: number, polygon: Array<[number, number]>): boolean {
  let inside = false;
  for (let i = 0, j = polygon.length - 1; i < polygon.length; j = i++) {
    const [xi, yi] = polygon[i];
    const [xj, yj] = polygon[j];
    if (yi > y !== yj > y && x < ((xj - xi) * (y - yi)) / (yj - yi) + xi) {
      inside = !inside;
    }
  }
  return inside;
}

/** Tiles images left to right. All tiles must share a height. */
export function concatHorizontal(images: RgbImage[]): RgbImage {
  if (!images.length) throw new Error("Nothing to concatenate");
  const height = images[0].height;
  for (const image of images) {
    if (image.height !== height) {
      throw new Error(`Tile height ${image.height} does not match ${height}`);
    }
  }
  const width = images.reduce((sum, image) => sum + image.width, 0);
  const out = createImage(width, height);

  let offset = 0;
  for (const image of images) {
    for (let y = 0; y < height; y++) {
      const src = image.data.subarray(y * image.width * 3, (y + 1) * image.width * 3);
      out.data.set(src, (y * width + offset) * 3);
    }
    offset += image.width;
  }
  return out;
}

export function imagesEqual(a: RgbImage, b: RgbImage): boolean {
  if (a.width !== b.width || a.height !== b.height) return false;
  for (let i = 0; i < a.data.length; i++) {
    if (a.data[i] !== b.data[i]) return false;
  }
  return true;
}
