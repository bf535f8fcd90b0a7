export * from "./types";
export * from "./image";
export * from "./color";
export * from "./tensor";
