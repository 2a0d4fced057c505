export type Token = RefToken | RawToken;

/** `${address.attribute}` where address is `type.name` or `data.type.name`. */
export type RefToken = {
  readonly kind: "ref";
  readonly address: string;
  readonly attribute: string;
};

export type RawToken = {
  readonly kind: "raw";
  readonly expression: string;
};

export const ref = (address: string, attribute: string): RefToken => ({
  kind: "ref",
  address,
  attribute,
});

export const raw = (expression: string): RawToken => ({ kind: "raw", expression });

export function tokenToString(token: Token): string {
  switch (token.kind) {
    case "ref":
      return `\${${token.address}.${token.attribute}}`;
    case "raw":
      return `\${${token.expression}}`;
  }
}

export const resourceAddress = (type: string, name: string): string => `${type}.${name}`;

export const dataAddress = (type: string, name: string): string => `data.${type}.${name}`;

const REF_PATTERN = /^\$\{((?:data\.)?[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+)\.([A-Za-z0-9_.[\]*-]+)\}$/;

export function parseRef(value: string): RefToken | undefined {
  const match = REF_PATTERN.exec(value);
  const [, address, attribute] = match ?? [];
  if (address === undefined || attribute === undefined) {
    return undefined;
  }
  return ref(address, attribute);
}

export const isInterpolation = (value: unknown): value is string =>
  typeof value === "string" && value.startsWith("${") && value.endsWith("}");
