export {
  resolveArgSpec,
  formatSignature,
  type ArgSpec,
  type PartialBinding,
  type SignatureOptions,
} from "./argspec.js";
export {
  structureDocstring,
  serializeDetail,
  type DocstringSections,
  type FunctionDetail,
  type StructureOptions,
} from "./docstring.js";
export {
  createReferenceResolver,
  type DocInfo,
  type ReferenceResolver,
  type ReferenceResolverOptions,
} from "./references.js";
export {
  createParserConfig,
  reverseDuplicates,
  type ParserConfig,
  type ParserConfigOptions,
} from "./config.js";
export { isPageKind, type SymbolHost, type DeclaredSignature } from "./host.js";
export { buildPage, buildGuidesMarkdown } from "./page-builder.js";
export type {
  PageInfo,
  FunctionPageInfo,
  ClassPageInfo,
  ModulePageInfo,
  MemberInfo,
} from "./page-info.js";
export {
  renderPage,
  renderDefinedIn,
  buildCompatibility,
  buildFunctionDetails,
} from "./pretty-docs.js";
export { buildGlobalIndex } from "./global-index.js";
export {
  generatePages,
  type GeneratePagesOptions,
  type GeneratedPages,
  type PageError,
  type ProgressInfo,
} from "./generator.js";
export {
  loadManifest,
  parseManifest,
  createManifestHost,
  createParserConfigFromManifest,
} from "./manifest.js";
export { documentationPath, relativePathToRoot, documentUrl } from "./paths.js";
export {
  ManifestSchema,
  SymbolRecordSchema,
  type Manifest,
  type SymbolRecord,
  type SymbolKind,
  type SourceLocation,
  type GuideRef,
} from "./schema.js";
export {
  UnresolvedReferenceError,
  OverBoundArgSpecError,
  UnsupportedSymbolError,
  UnknownPageKindError,
  ManifestError,
} from "./errors.js";
