import { z } from "zod";
import type { BlockBuilder } from "../../core/builder.js";
import { type FieldType, recordOf, value } from "../../schema/field.js";

export const ARN_PATTERN = /^arn:aws[a-zA-Z-]*:[a-z0-9-]+:[a-z0-9-]*:(\d{12})?:.+$/;

export const ACCOUNT_ID_PATTERN = /^\d{12}$/;

export const stringList: FieldType<readonly string[]> = value(z.array(z.string()).readonly());

export const tags: FieldType<Readonly<Record<string, string>>> = recordOf(
  value(z.string({ invalid_type_error: "tag values must be strings" })),
);

export const enumOf = <const T extends readonly [string, ...string[]]>(
  values: T,
  message?: string,
) =>
  value(
    z.enum(values, {
      errorMap: () => ({ message: message ?? `must be one of: ${values.join(", ")}` }),
    }),
  );

export const integer = (bounds: { readonly min?: number; readonly max?: number } = {}) => {
  let schema = z.number({ invalid_type_error: "must be an integer" }).int("must be an integer");
  if (bounds.min !== undefined) {
    schema = schema.gte(bounds.min, `must be greater than or equal to ${bounds.min}`);
  }
  if (bounds.max !== undefined) {
    schema = schema.lte(bounds.max, `must be less than or equal to ${bounds.max}`);
  }
  return value(schema);
};

export const bool = value(z.boolean({ invalid_type_error: "must be a boolean" }));

export const str = value(z.string({ invalid_type_error: "must be a string" }));

export function renderTags(block: BlockBuilder, values: Readonly<Record<string, string>>): void {
  if (Object.keys(values).length > 0) {
    block.block("tags", (t) => t.attributes(values));
  }
}
