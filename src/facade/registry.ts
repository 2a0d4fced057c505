import { DslUsageError } from "../core/errors.js";
import type { AnyResourceType } from "./resource-type.js";

/** Explicit lookup of resource types by their Terraform type name. */
export class ResourceRegistry {
  private readonly types = new Map<string, AnyResourceType>();

  register(...resourceTypes: readonly AnyResourceType[]): this {
    for (const resourceType of resourceTypes) {
      if (this.types.has(resourceType.type)) {
        throw new DslUsageError(`resource type ${resourceType.type} is already registered`);
      }
      this.types.set(resourceType.type, resourceType);
    }
    return this;
  }

  get(type: string): AnyResourceType | undefined {
    return this.types.get(type);
  }

  has(type: string): boolean {
    return this.types.has(type);
  }

  get typeNames(): readonly string[] {
    return [...this.types.keys()].sort();
  }
}
