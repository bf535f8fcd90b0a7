import type { Viewpoint } from "@viewsynth/geometry-core";

/** Integer zero-padded to `width`, sign included in the width. */
export function padInt(value: number, width = 3): string {
  const n = Math.trunc(value);
  const sign = n < 0 ? "-" : "";
  return sign + String(Math.abs(n)).padStart(width - sign.length, "0");
}

export function dumpName(dumpId: number, viewpoint: Viewpoint): string {
  return [
    padInt(dumpId),
    "el",
    padInt(viewpoint.elevationDeg),
    "az",
    padInt(viewpoint.azimuthDeg),
    "rad",
    padInt(viewpoint.radius),
  ].join("_");
}
