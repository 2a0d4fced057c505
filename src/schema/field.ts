import { err, ok, type Result } from "neverthrow";
import type { z } from "zod";
import { constraintViolation, type ValidationError } from "../core/errors.js";
import { toEntries } from "../core/util.js";

export type ValidationContext = {
  readonly now: () => Date;
};

export const defaultContext: ValidationContext = {
  now: () => new Date(),
};

export type CheckScope = {
  readonly schema: string;
  readonly path: readonly string[];
  readonly context: ValidationContext;
};

export type FieldKind = "value" | "nested" | "array" | "record";

export type FieldType<T> = {
  readonly kind: FieldKind;
  readonly check: (raw: unknown, scope: CheckScope) => Result<T, ValidationError>;
};

export type Presence = "required" | "optional" | "defaulted";

export type DefaultFn<T> = (
  siblings: Readonly<Record<string, unknown>>,
  context: ValidationContext,
) => T;

export type FieldSpec<T, P extends Presence = Presence> = {
  readonly type: FieldType<T>;
  readonly presence: P;
  readonly defaultValue?: DefaultFn<T>;
};

export type Shape = { readonly [name: string]: FieldSpec<unknown> };

export type FieldValue<F> = F extends { readonly type: FieldType<infer T> } ? T : never;

type OptionalKeys<S extends Shape> = {
  [K in keyof S]: S[K]["presence"] extends "optional" ? K : never;
}[keyof S];

type RequiredKeys<S extends Shape> = Exclude<keyof S, OptionalKeys<S>>;

type Simplify<T> = { [K in keyof T]: T[K] } & {};

export type AttributesOf<S extends Shape> = Simplify<
  { readonly [K in RequiredKeys<S>]: FieldValue<S[K]> } & {
    readonly [K in OptionalKeys<S>]?: FieldValue<S[K]>;
  }
>;

export const required = <T>(type: FieldType<T>): FieldSpec<T, "required"> => ({
  type,
  presence: "required",
});

export const optional = <T>(type: FieldType<T>): FieldSpec<T, "optional"> => ({
  type,
  presence: "optional",
});

export const defaulted = <T>(type: FieldType<T>, value: T): FieldSpec<T, "defaulted"> => ({
  type,
  presence: "defaulted",
  defaultValue: () => value,
});

/** A default derived from already validated sibling fields. */
export const computed = <T>(type: FieldType<T>, fn: DefaultFn<T>): FieldSpec<T, "defaulted"> => ({
  type,
  presence: "defaulted",
  defaultValue: fn,
});

export const value = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): FieldType<T> => ({
  kind: "value",
  check: (raw, scope) => {
    const result = schema.safeParse(raw);
    if (result.success) {
      return ok(result.data);
    }
    const issue = result.error.issues[0];
    const path = [...scope.path, ...(issue?.path ?? []).map(String)];
    return err(constraintViolation(scope.schema, path, issue?.message ?? "Invalid value"));
  },
});

export type ArrayBounds = {
  readonly min?: number;
  readonly max?: number;
  readonly message?: string;
};

export const arrayOf = <T>(
  element: FieldType<T>,
  bounds: ArrayBounds = {},
): FieldType<readonly T[]> => ({
  kind: "array",
  check: (raw, scope) => {
    if (!Array.isArray(raw)) {
      return err(constraintViolation(scope.schema, scope.path, "must be an array"));
    }
    const { min, max } = bounds;
    if (min !== undefined && raw.length < min) {
      const reason = bounds.message ?? `must contain at least ${min} item(s)`;
      return err(constraintViolation(scope.schema, scope.path, reason));
    }
    if (max !== undefined && raw.length > max) {
      const reason = bounds.message ?? `must contain at most ${max} item(s)`;
      return err(constraintViolation(scope.schema, scope.path, reason));
    }

    const items: T[] = [];
    for (const [index, item] of raw.entries()) {
      const result = element.check(item, { ...scope, path: [...scope.path, String(index)] });
      if (result.isErr()) {
        return err(result.error);
      }
      items.push(result.value);
    }
    return ok(items);
  },
});

/** String-keyed map whose keys are kept verbatim, such as resource tags. */
export const recordOf = <T>(element: FieldType<T>): FieldType<Readonly<Record<string, T>>> => ({
  kind: "record",
  check: (raw, scope) => {
    const entries = toEntries(raw);
    if (entries === undefined) {
      return err(constraintViolation(scope.schema, scope.path, "must be a mapping"));
    }
    const record: Record<string, T> = {};
    for (const [key, item] of entries) {
      if (key.trim() === "") {
        return err(constraintViolation(scope.schema, scope.path, "keys must not be empty"));
      }
      const result = element.check(item, { ...scope, path: [...scope.path, key] });
      if (result.isErr()) {
        return err(result.error);
      }
      record[key] = result.value;
    }
    return ok(record);
  },
});
