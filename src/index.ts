export { ok, err, Result } from "neverthrow";

export {
  type ValidationError,
  type ValidationErrorKind,
  AttributeValidationError,
  DslUsageError,
  DuplicateDeclarationError,
  formatPath,
} from "./core/errors.js";
export { type JsonObject, camelToSnakeCase } from "./core/util.js";

export {
  type BlockListNode,
  type BranchNode,
  type ChildNode,
  type LeafNode,
  branchToObject,
  createBranch,
} from "./core/document.js";
export { type BlockBody, BlockBuilder } from "./core/builder.js";
export {
  type CommitMode,
  type SynthesisDocument,
  type ToJsonOptions,
  commitModeFor,
  createDocument,
  mergeDocuments,
  serialize,
  toJson,
} from "./core/synthesize.js";
export { type Category, type TerraformJson, CATEGORIES } from "./core/terraform-json.js";
export {
  type RawToken,
  type RefToken,
  type Token,
  dataAddress,
  isInterpolation,
  parseRef,
  raw,
  ref,
  resourceAddress,
  tokenToString,
} from "./core/tokens.js";

export * from "./schema/index.js";

export {
  type Annotation,
  type AnnotationLevel,
  Annotations,
  formatAnnotation,
} from "./facade/annotations.js";
export {
  type ReferenceSource,
  type ResourceReference,
  ALWAYS_EXPORTED,
  makeDataReference,
  makeReference,
} from "./facade/reference.js";
export {
  type AnyResourceType,
  type AttributeInput,
  type ResourceType,
  type ResourceTypeOptions,
  defineResourceType,
} from "./facade/resource-type.js";
export { ResourceRegistry } from "./facade/registry.js";
export { type DuplicatePolicy, type SessionOptions, Session } from "./facade/session.js";

export * as aws from "./resources/aws/index.js";

export { type Config, type ConfigError, parseConfig, readConfig } from "./cli/config.js";
export { type Declarations, applyDeclarations, parseDeclarations } from "./cli/declarations.js";
export { type CliError, type SynthOptions, type SynthReport, runSynth } from "./cli/synth.js";
