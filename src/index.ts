// spokehub: public library surface
// Import this to embed hub/spoke versioning in your own application.

export { TypeCatalog, extractWireTag, normalizeTypeNode } from "./catalog.js";
export { parseConfig, parseConfigFile, parseQualifiedType } from "./parser.js";
export { validateConfig, isValidVersion } from "./validator.js";
export {
  SchemaRegistry,
  compareVersions,
  formatApiVersion,
  parseApiVersion,
  pluralize,
  stabilityLevel,
} from "./registry.js";
export {
  planConversion,
  generateConversions,
  pinModules,
  describePlan,
  lossyFields,
  defaultLocalPackage,
} from "./generator.js";
export {
  ConversionRegistry,
  compileConverter,
  typedConverter,
  isConversionPlan,
  loadPlans,
  writePlans,
} from "./converter.js";
export {
  VersionNegotiator,
  decodeAsSpoke,
  parseAcceptVersion,
  resolveVersion,
} from "./negotiation.js";
export { createVersionedRequestHandler, createVersionedNodeServer } from "./server.js";
export { HubResourceHandler } from "./handler.js";
export { MemoryStorageBackend } from "./storage.js";
export { loadProject, planProject, loadConversions } from "./project.js";
export { createStderrLogger, silentLogger } from "./logger.js";
export {
  SpokehubError,
  ConfigError,
  CatalogLookupError,
  ConversionGenerationError,
  RequestVersionError,
  RequestDecodeError,
  RequestAbortedError,
  RuntimeConversionError,
} from "./errors.js";
export type {
  FieldMeta,
  TypeInfo,
  FieldRename,
  VersionMapping,
  APIResource,
  ExposedType,
  ImportedPackage,
  APIImport,
  APIGroup,
  ApisConfig,
  ResourceMetadata,
  VersionedEnvelope,
  Converter,
  Stability,
} from "./model.js";
export type {
  ConversionPlan,
  FieldMapping,
  ObjectMapping,
  GenerateOptions,
} from "./generator.js";
export type { NegotiationState, NegotiatedResponse, Dispatch } from "./negotiation.js";
export type { VersionedServerOptions } from "./server.js";
export type { ResourceHandler } from "./handler.js";
export type { StorageBackend } from "./storage.js";
export type { Logger } from "./logger.js";
export type { LoadedProject, ProjectOptions } from "./project.js";
