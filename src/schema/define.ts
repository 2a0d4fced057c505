import type { AttributesOf, Shape } from "./field.js";
import type { Invariant } from "./invariants.js";

export type NoDerived = Readonly<Record<string, never>>;

/**
 * Declarative description of one attribute record: ordered fields, then
 * cross-field invariants, then derived read-only properties.
 */
export class SchemaDefinition<S extends Shape, D = NoDerived> {
  constructor(
    readonly name: string,
    readonly fields: S,
    readonly invariants: readonly Invariant<AttributesOf<S>>[],
    readonly derive: (attrs: AttributesOf<S>) => D,
  ) {}

  get fieldNames(): readonly string[] {
    return Object.keys(this.fields);
  }

  withInvariants(invariants: readonly Invariant<AttributesOf<S>>[]): SchemaDefinition<S, D> {
    return new SchemaDefinition(
      this.name,
      this.fields,
      [...this.invariants, ...invariants],
      this.derive,
    );
  }

  withDerived<D2>(derive: (attrs: AttributesOf<S>) => D2): SchemaDefinition<S, D2> {
    return new SchemaDefinition(this.name, this.fields, this.invariants, derive);
  }
}

export const defineSchema = <S extends Shape>(name: string, fields: S): SchemaDefinition<S> =>
  new SchemaDefinition<S>(name, fields, [], () => ({}));

export type ValidatedAttributes<A, D> = {
  readonly schema: string;
  readonly attributes: A;
  readonly derived: D;
};

export type ValidatedOf<T> =
  T extends SchemaDefinition<infer S, infer D> ? ValidatedAttributes<AttributesOf<S>, D> : never;
