import type { Result } from "neverthrow";
import type { BlockBuilder } from "../core/builder.js";
import type { ValidationError } from "../core/errors.js";
import type { AttributesOf, Shape, ValidationContext } from "../schema/field.js";
import type { SchemaDefinition, ValidatedAttributes } from "../schema/define.js";
import { validate } from "../schema/validate.js";

export interface ResourceType<A, D> {
  readonly type: string;
  /** Attribute names exposed as interpolation strings on the reference. */
  readonly outputs: readonly string[];
  validate(
    raw: unknown,
    context: ValidationContext,
  ): Result<ValidatedAttributes<A, D>, ValidationError>;
  render(validated: ValidatedAttributes<A, D>, block: BlockBuilder): void;
  /** Non-fatal findings recorded on the session as warnings. */
  warnings(validated: ValidatedAttributes<A, D>): readonly string[];
}

/** Raw attributes as callers pass them: a plain record or a `Map`. */
export type AttributeInput =
  | Readonly<Record<string, unknown>>
  | ReadonlyMap<string | symbol, unknown>;

export type AnyResourceType = ResourceType<unknown, unknown>;

export type ResourceTypeOptions<S extends Shape, D> = {
  readonly type: string;
  readonly schema: SchemaDefinition<S, D>;
  readonly outputs: readonly string[];
  readonly render?: (
    validated: ValidatedAttributes<AttributesOf<S>, D>,
    block: BlockBuilder,
  ) => void;
  readonly warnings?: (validated: ValidatedAttributes<AttributesOf<S>, D>) => readonly string[];
};

export function defineResourceType<S extends Shape, D>(
  options: ResourceTypeOptions<S, D>,
): ResourceType<AttributesOf<S>, D> {
  const { type, schema, outputs, render, warnings } = options;
  return {
    type,
    outputs,
    validate: (raw, context) => validate(schema, raw, context),
    render: render ?? ((validated, block) => block.attributes(validated.attributes)),
    warnings: warnings ?? (() => []),
  };
}
