// packages/bearer/src/index.ts
export * from "./claims";
export * from "./verifier";
export * from "./middleware";
