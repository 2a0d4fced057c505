export type ValidationError =
  | {
      readonly kind: "missing_required_field";
      readonly schema: string;
      readonly path: readonly string[];
      readonly message: string;
    }
  | {
      readonly kind: "constraint_violation";
      readonly schema: string;
      readonly path: readonly string[];
      readonly reason: string;
      readonly message: string;
    }
  | {
      readonly kind: "invariant_violation";
      readonly schema: string;
      readonly path: readonly string[];
      readonly invariant: string;
      readonly message: string;
    };

export type ValidationErrorKind = ValidationError["kind"];

export const missingRequiredField = (
  schema: string,
  path: readonly string[],
): ValidationError => ({
  kind: "missing_required_field",
  schema,
  path,
  message: `${formatPath(path)} is required`,
});

export const constraintViolation = (
  schema: string,
  path: readonly string[],
  reason: string,
): ValidationError => ({
  kind: "constraint_violation",
  schema,
  path,
  reason,
  message: path.length > 0 ? `${formatPath(path)}: ${reason}` : reason,
});

export const invariantViolation = (
  schema: string,
  path: readonly string[],
  invariant: string,
  message: string,
): ValidationError => ({
  kind: "invariant_violation",
  schema,
  path,
  invariant,
  message,
});

export const formatPath = (path: readonly string[]): string =>
  path.reduce((acc, part) => {
    if (/^\d+$/.test(part)) return `${acc}[${part}]`;
    return acc === "" ? part : `${acc}.${part}`;
  }, "");

export class AttributeValidationError extends Error {
  readonly error: ValidationError;

  constructor(error: ValidationError) {
    super(`${error.schema}: ${error.message}`);
    this.name = "AttributeValidationError";
    this.error = error;
  }

  get kind(): ValidationErrorKind {
    return this.error.kind;
  }
}

export class DslUsageError extends Error {
  readonly path: readonly string[];

  constructor(message: string, path: readonly string[] = []) {
    super(path.length > 0 ? `${path.join(".")}: ${message}` : message);
    this.name = "DslUsageError";
    this.path = path;
  }
}

export class DuplicateDeclarationError extends Error {
  readonly category: string;
  readonly key: readonly string[];

  constructor(category: string, key: readonly string[]) {
    super(`${category} ${key.join(".")} is already declared`);
    this.name = "DuplicateDeclarationError";
    this.category = category;
    this.key = key;
  }
}
