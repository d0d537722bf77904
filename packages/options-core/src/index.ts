// packages/options-core/src/index.ts
export * from "./types";
export * from "./errors";
export * from "./logger";
export * from "./parse";
export * from "./configuration";
export * from "./scheme-configuration";
export * from "./signing-keys";
export * from "./ticket";
export * from "./defaults";
export * from "./configure";
export * from "./registry";
