import { err, ok, type Result } from "neverthrow";
import {
  AttributeValidationError,
  constraintViolation,
  invariantViolation,
  missingRequiredField,
  type ValidationError,
} from "../core/errors.js";
import { normalizeKeys } from "../core/util.js";
import type { SchemaDefinition, ValidatedAttributes } from "./define.js";
import {
  type AttributesOf,
  type CheckScope,
  defaultContext,
  type FieldType,
  type Shape,
  type ValidationContext,
} from "./field.js";

const isAbsent = (value: unknown): boolean => value === undefined || value === null;

function validateFields<S extends Shape>(
  schema: SchemaDefinition<S, unknown>,
  raw: unknown,
  scope: CheckScope,
): Result<AttributesOf<S>, ValidationError> {
  const fieldNames = schema.fieldNames;
  const input = normalizeKeys(raw, fieldNames);
  if (input === undefined) {
    return err(constraintViolation(scope.schema, scope.path, "must be a mapping of attributes"));
  }

  for (const name of fieldNames) {
    if (schema.fields[name]?.presence === "required" && isAbsent(input.get(name))) {
      return err(missingRequiredField(scope.schema, [...scope.path, name]));
    }
  }

  const values = new Map<string, unknown>();
  for (const name of fieldNames) {
    const field = schema.fields[name];
    const rawValue = input.get(name);
    if (field === undefined || isAbsent(rawValue)) continue;

    const result = field.type.check(rawValue, { ...scope, path: [...scope.path, name] });
    if (result.isErr()) {
      return err(result.error);
    }
    values.set(name, result.value);
  }

  for (const name of fieldNames) {
    const field = schema.fields[name];
    if (field?.defaultValue === undefined || values.has(name)) continue;

    const fallback = field.defaultValue(Object.fromEntries(values), scope.context);
    const result = field.type.check(fallback, { ...scope, path: [...scope.path, name] });
    if (result.isErr()) {
      return err(result.error);
    }
    values.set(name, result.value);
  }

  const ordered = fieldNames.flatMap((name) =>
    values.has(name) ? [[name, values.get(name)] as const] : [],
  );
  // Every present key passed its field check and every required key is present.
  const attributes = Object.freeze(Object.fromEntries(ordered)) as AttributesOf<S>;

  for (const inv of schema.invariants) {
    const message = inv.check(attributes, scope.context);
    if (message !== undefined) {
      return err(invariantViolation(scope.schema, scope.path, inv.name, message));
    }
  }

  return ok(attributes);
}

export function validate<S extends Shape, D>(
  schema: SchemaDefinition<S, D>,
  raw: unknown,
  context: ValidationContext = defaultContext,
): Result<ValidatedAttributes<AttributesOf<S>, D>, ValidationError> {
  const scope: CheckScope = { schema: schema.name, path: [], context };
  return validateFields(schema, raw, scope).map((attributes) => {
    const derived = schema.derive(attributes);
    Object.freeze(derived);
    return Object.freeze({ schema: schema.name, attributes, derived });
  });
}

export function validateOrThrow<S extends Shape, D>(
  schema: SchemaDefinition<S, D>,
  raw: unknown,
  context: ValidationContext = defaultContext,
): ValidatedAttributes<AttributesOf<S>, D> {
  const result = validate(schema, raw, context);
  if (result.isErr()) {
    throw new AttributeValidationError(result.error);
  }
  return result.value;
}

/** Field type for a nested attribute record checked against its own schema. */
export const nested = <S extends Shape>(
  schema: SchemaDefinition<S, unknown>,
): FieldType<AttributesOf<S>> => ({
  kind: "nested",
  check: (raw, scope) => validateFields(schema, raw, scope),
});
