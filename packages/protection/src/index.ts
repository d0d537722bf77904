// packages/protection/src/index.ts
export {
  createDataProtectionProvider,
  type DataProtectionConfig,
  type NestedDataProtector,
} from "./provider";
