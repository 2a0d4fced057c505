export {
  type AttributesOf,
  type ArrayBounds,
  type CheckScope,
  type DefaultFn,
  type FieldKind,
  type FieldSpec,
  type FieldType,
  type FieldValue,
  type Presence,
  type Shape,
  type ValidationContext,
  arrayOf,
  computed,
  defaultContext,
  defaulted,
  optional,
  recordOf,
  required,
  value,
} from "./field.js";
export {
  type Invariant,
  anyOf,
  atMostOneOf,
  between,
  exactlyOneOf,
  forbiddenUnless,
  invariant,
  ordered,
  references,
  requiredWhen,
  uniqueBy,
} from "./invariants.js";
export {
  type NoDerived,
  type ValidatedAttributes,
  type ValidatedOf,
  SchemaDefinition,
  defineSchema,
} from "./define.js";
export { nested, validate, validateOrThrow } from "./validate.js";
