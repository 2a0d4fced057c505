import { type BlockBody, BlockBuilder } from "../core/builder.js";
import { type BranchNode, branchToObject, createBranch } from "../core/document.js";
import {
  AttributeValidationError,
  DslUsageError,
  DuplicateDeclarationError,
} from "../core/errors.js";
import {
  commitEntry,
  commitModeFor,
  createDocument,
  hasEntry,
  serialize,
  type SynthesisDocument,
  toJson,
  type ToJsonOptions,
} from "../core/synthesize.js";
import type { Category, TerraformJson } from "../core/terraform-json.js";
import type { JsonObject } from "../core/util.js";
import type { NoDerived } from "../schema/define.js";
import { defaultContext, type ValidationContext } from "../schema/field.js";
import { type Annotation, Annotations } from "./annotations.js";
import { makeDataReference, makeReference, type ResourceReference } from "./reference.js";
import type { ResourceRegistry } from "./registry.js";
import type { ResourceType } from "./resource-type.js";

export type DuplicatePolicy = "overwrite" | "error";

export type SessionOptions = {
  readonly onDuplicate?: DuplicatePolicy;
  readonly context?: ValidationContext;
  readonly registry?: ResourceRegistry;
};

type RawReference = ResourceReference<JsonObject, NoDerived>;

const noDerived: NoDerived = {};

function requireName(value: string, label: string, category: Category): string {
  if (value.trim() === "") {
    throw new DslUsageError(`${category} requires a ${label}`, [category]);
  }
  return value;
}

/**
 * One synthesis run: root entry points write into a single document, and
 * every block body is built on a detached branch that is committed only
 * once the body returns.
 */
export class Session {
  readonly document: SynthesisDocument = createDocument();
  readonly context: ValidationContext;
  readonly onDuplicate: DuplicatePolicy;
  private readonly notes = new Annotations();
  private readonly registry: ResourceRegistry | undefined;

  constructor(options: SessionOptions = {}) {
    this.onDuplicate = options.onDuplicate ?? "overwrite";
    this.context = options.context ?? defaultContext;
    this.registry = options.registry;
  }

  get annotations(): readonly Annotation[] {
    return this.notes.all;
  }

  terraform(body: BlockBody): this {
    this.reenter("terraform", body);
    return this;
  }

  locals(body: BlockBody): this {
    this.reenter("locals", body);
    return this;
  }

  provider(name: string, body: BlockBody): this {
    const key = [requireName(name, "name", "provider")];
    this.commit("provider", key, this.build("provider", key, body));
    return this;
  }

  resource(type: string, name: string, body: BlockBody): RawReference {
    const key = [requireName(type, "type", "resource"), requireName(name, "name", "resource")];
    const branch = this.build("resource", key, body);
    this.commit("resource", key, branch);
    return makeReference(type, name, { attributes: branchToObject(branch), derived: noDerived });
  }

  data(type: string, name: string, body: BlockBody): RawReference {
    const key = [requireName(type, "type", "data"), requireName(name, "name", "data")];
    const branch = this.build("data", key, body);
    this.commit("data", key, branch);
    return makeDataReference(type, name, {
      attributes: branchToObject(branch),
      derived: noDerived,
    });
  }

  variable(name: string, body: BlockBody): string {
    const key = [requireName(name, "name", "variable")];
    this.commit("variable", key, this.build("variable", key, body));
    return `\${var.${name}}`;
  }

  output(name: string, body: BlockBody): this {
    const key = [requireName(name, "name", "output")];
    this.commit("output", key, this.build("output", key, body));
    return this;
  }

  /**
   * Validates `raw` against the resource type, renders the validated
   * attributes and commits them as `resource.<type>.<name>`.
   */
  declare<A, D>(
    resourceType: ResourceType<A, D>,
    name: string,
    raw: unknown,
  ): ResourceReference<A, D> {
    const key = [resourceType.type, requireName(name, "name", "resource")];
    const result = resourceType.validate(raw, this.context);
    if (result.isErr()) {
      throw new AttributeValidationError(result.error);
    }
    const validated = result.value;
    const branch = this.build("resource", key, (block) => resourceType.render(validated, block));
    this.commit("resource", key, branch);

    for (const warning of resourceType.warnings(validated)) {
      this.notes.addWarning(["resource", ...key], warning);
    }
    return makeReference(resourceType.type, name, validated, resourceType.outputs);
  }

  /**
   * Declares a resource by type name. Types missing from the registry are
   * written as given and noted as unvalidated.
   */
  declareByName(type: string, name: string, raw: unknown): ResourceReference<unknown, unknown> {
    requireName(type, "type", "resource");
    requireName(name, "name", "resource");
    const resourceType = this.registry?.get(type);
    if (resourceType !== undefined) {
      return this.declare(resourceType, name, raw);
    }
    const reference = this.resource(type, name, (block) => block.attributes(raw));
    this.notes.addInfo(
      ["resource", type, name],
      `resource type ${type} is not registered; attributes were not validated`,
    );
    return reference;
  }

  serialize(): TerraformJson {
    return serialize(this.document);
  }

  toJson(options?: ToJsonOptions): string {
    return toJson(this.document, options);
  }

  private build(category: Category, key: readonly string[], body: BlockBody): BranchNode {
    const branch = createBranch();
    body(new BlockBuilder(branch, [category, ...key]));
    return branch;
  }

  private reenter(category: Category, body: BlockBody): void {
    commitEntry(this.document, category, [], this.build(category, [], body));
  }

  private commit(category: Category, key: readonly string[], branch: BranchNode): void {
    if (commitModeFor(category) === "replace" && hasEntry(this.document, category, key)) {
      if (this.onDuplicate === "error") {
        throw new DuplicateDeclarationError(category, key);
      }
      this.notes.addWarning(
        [category, ...key],
        `${category} ${key.join(".")} was declared more than once; the last declaration wins`,
      );
    }
    commitEntry(this.document, category, key, branch);
  }
}
