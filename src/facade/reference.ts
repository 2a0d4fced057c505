import { dataAddress, ref, resourceAddress, tokenToString } from "../core/tokens.js";

export const ALWAYS_EXPORTED = ["id", "arn"] as const;

export type ResourceReference<A = Readonly<Record<string, unknown>>, D = unknown> = {
  readonly type: string;
  readonly name: string;
  /** `type.name`, or `data.type.name` for data sources. */
  readonly address: string;
  readonly attributes: A;
  readonly derived: D;
  readonly outputs: Readonly<Record<string, string>>;
  readonly id: string;
  readonly arn: string;
  attr(attribute: string): string;
};

export type ReferenceSource<A, D> = {
  readonly attributes: A;
  readonly derived: D;
};

function buildReference<A, D>(
  type: string,
  name: string,
  address: string,
  source: ReferenceSource<A, D>,
  outputNames: readonly string[],
): ResourceReference<A, D> {
  const attr = (attribute: string): string => tokenToString(ref(address, attribute));
  const outputs = Object.freeze(
    Object.fromEntries(
      [...new Set([...ALWAYS_EXPORTED, ...outputNames])].map((output) => [output, attr(output)]),
    ),
  );

  return Object.freeze({
    type,
    name,
    address,
    attributes: source.attributes,
    derived: source.derived,
    outputs,
    id: attr("id"),
    arn: attr("arn"),
    attr,
  });
}

export const makeReference = <A, D>(
  type: string,
  name: string,
  source: ReferenceSource<A, D>,
  outputNames: readonly string[] = [],
): ResourceReference<A, D> =>
  buildReference(type, name, resourceAddress(type, name), source, outputNames);

export const makeDataReference = <A, D>(
  type: string,
  name: string,
  source: ReferenceSource<A, D>,
  outputNames: readonly string[] = [],
): ResourceReference<A, D> =>
  buildReference(type, name, dataAddress(type, name), source, outputNames);
