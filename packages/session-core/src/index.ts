export * from "./errors";
export * from "./logger";
export * from "./events";
export * from "./collaborators";
export * from "./naming";
export * from "./assembler";
export * from "./compositor";
export * from "./transitions";
export * from "./ViewpointSession";
export * from "./runSession";
