export { DocumentSchema, UnitSchema, SettingsSchema } from "./schema.js";
export type { DesiredDocument, UnitDefinition, Settings } from "./schema.js";
export { loadDocument } from "./loader.js";
export type { LoadDocumentResult } from "./loader.js";
export { mergeOverrides } from "./merge.js";
export {
  expandPath,
  getConfigDir,
  getCacheDir,
  getDefaultDocumentPath,
  getLocalOverridePath,
  resolveSourcePath,
} from "./path.js";
