export * from "./catalog";
export * from "./visibility";
export * from "./resolver";
export * from "./warp";
