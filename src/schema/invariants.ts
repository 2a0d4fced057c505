import type { ValidationContext } from "./field.js";

export type Invariant<A> = {
  readonly name: string;
  /** Returns the violation message, or `undefined` when the invariant holds. */
  readonly check: (attrs: A, context: ValidationContext) => string | undefined;
};

type Attrs = Readonly<Record<string, unknown>>;

const isPresent = (value: unknown): boolean => {
  if (value === undefined || value === null) return false;
  if (typeof value === "string") return value !== "";
  if (Array.isArray(value)) return value.length > 0;
  return true;
};

export const invariant = <A>(
  name: string,
  holds: (attrs: A, context: ValidationContext) => boolean,
  message: string | ((attrs: A) => string),
): Invariant<A> => ({
  name,
  check: (attrs, context) => {
    if (holds(attrs, context)) return undefined;
    return typeof message === "string" ? message : message(attrs);
  },
});

export const exactlyOneOf = (fields: readonly string[], message?: string): Invariant<Attrs> => ({
  name: `exactly_one_of(${fields.join(",")})`,
  check: (attrs) => {
    const count = fields.filter((f) => isPresent(attrs[f])).length;
    if (count === 1) return undefined;
    return message ?? `exactly one of ${fields.join(", ")} must be specified`;
  },
});

export const anyOf = (fields: readonly string[], message?: string): Invariant<Attrs> => ({
  name: `any_of(${fields.join(",")})`,
  check: (attrs) => {
    if (fields.some((f) => isPresent(attrs[f]))) return undefined;
    return message ?? `one of ${fields.join(", ")} must be specified`;
  },
});

export const atMostOneOf = (fields: readonly string[], message?: string): Invariant<Attrs> => ({
  name: `at_most_one_of(${fields.join(",")})`,
  check: (attrs) => {
    const count = fields.filter((f) => isPresent(attrs[f])).length;
    if (count <= 1) return undefined;
    return message ?? `only one of ${fields.join(", ")} can be specified`;
  },
});

export const requiredWhen = <A extends Attrs>(
  field: string,
  when: (attrs: A) => boolean,
  message: string | ((attrs: A) => string),
): Invariant<A> =>
  invariant(`required_when(${field})`, (attrs) => !when(attrs) || isPresent(attrs[field]), message);

export const forbiddenUnless = <A extends Attrs>(
  field: string,
  unless: (attrs: A) => boolean,
  message: string | ((attrs: A) => string),
): Invariant<A> =>
  invariant(
    `forbidden_unless(${field})`,
    (attrs) => unless(attrs) || !isPresent(attrs[field]),
    message,
  );

/** `lower <= upper` whenever both are numbers. */
export const ordered = (
  lower: string,
  upper: string,
  message?: (lowerValue: number, upperValue: number) => string,
): Invariant<Attrs> => ({
  name: `ordered(${lower},${upper})`,
  check: (attrs) => {
    const a = attrs[lower];
    const b = attrs[upper];
    if (typeof a !== "number" || typeof b !== "number" || a <= b) return undefined;
    return message?.(a, b) ?? `${lower} (${a}) cannot be greater than ${upper} (${b})`;
  },
});

/** `lower <= field <= upper` whenever `field` is set. */
export const between = (field: string, lower: string, upper: string): Invariant<Attrs> => ({
  name: `between(${field})`,
  check: (attrs) => {
    const v = attrs[field];
    if (typeof v !== "number") return undefined;
    const lowerValue = attrs[lower];
    const upperValue = attrs[upper];
    const min = typeof lowerValue === "number" ? lowerValue : 0;
    const max = typeof upperValue === "number" ? upperValue : 0;
    if (v >= min && v <= max) return undefined;
    return `${field} (${v}) must be between ${lower} (${min}) and ${upper} (${max})`;
  },
});

/** Every element of an array field must have a distinct key. */
export const uniqueBy = (
  field: string,
  key: (item: unknown) => unknown,
  message: string,
): Invariant<Attrs> => ({
  name: `unique_by(${field})`,
  check: (attrs) => {
    const items = attrs[field];
    if (!Array.isArray(items)) return undefined;
    const keys = items.map(key);
    return new Set(keys).size === keys.length ? undefined : message;
  },
});

/**
 * Values picked from one part of the payload must appear among the values
 * declared elsewhere in the same payload.
 */
export const references = <A>(
  name: string,
  declared: (attrs: A) => readonly string[],
  referenced: (attrs: A) => readonly string[],
  message: (missing: string) => string,
): Invariant<A> => ({
  name,
  check: (attrs) => {
    const known = new Set(declared(attrs));
    const missing = referenced(attrs).find((v) => !known.has(v));
    return missing === undefined ? undefined : message(missing);
  },
});
