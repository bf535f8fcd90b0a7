export * from "./types";
export * from "./errors";
export * from "./viewpoint";
export * from "./projection";
export * from "./homography";
export { ViewpointController, defaultViewpointConfig } from "./ViewpointController";
