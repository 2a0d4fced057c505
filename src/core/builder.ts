import { type BranchNode, openChild, setAttribute } from "./document.js";
import { DslUsageError } from "./errors.js";
import { isPlainObject, toEntries } from "./util.js";

export type BlockBody = (block: BlockBuilder) => void;

/**
 * Fluent view over one branch of a document tree.
 *
 * `set` writes a leaf, `block` opens a nested block (repeated names accumulate
 * as sibling blocks), and `attributes` maps a plain record onto the tree with
 * nested records becoming blocks.
 */
export class BlockBuilder {
  constructor(
    readonly node: BranchNode,
    readonly path: readonly string[] = [],
  ) {}

  set(name: string, ...values: readonly unknown[]): this {
    if (values.length === 0) {
      throw new DslUsageError(`'${name}' needs a value`, this.path);
    }
    return this.invoke(name, values);
  }

  /** Sets `name` only when `value` is neither `undefined` nor `null`. */
  setIfPresent(name: string, value: unknown): this {
    if (value === undefined || value === null) return this;
    return this.invoke(name, [value]);
  }

  block(name: string, body: BlockBody): this {
    return this.invoke(name, [], body);
  }

  /**
   * Dynamic entry point shared by `set` and `block`: a single argument is
   * stored as is, several become an array, and a body opens a block.
   */
  invoke(name: string, args: readonly unknown[], body?: BlockBody): this {
    if (name === "") {
      throw new DslUsageError("attribute name must not be empty", this.path);
    }
    if (body !== undefined && args.length > 0) {
      throw new DslUsageError(`'${name}' cannot take both a value and a block body`, this.path);
    }

    if (body !== undefined) {
      const child = openChild(this.node, name, this.path);
      body(new BlockBuilder(child, [...this.path, name]));
      return this;
    }

    if (args.length === 0) {
      throw new DslUsageError(`'${name}' needs a value or a block body`, this.path);
    }
    setAttribute(this.node, name, args.length === 1 ? args[0] : args, this.path);
    return this;
  }

  attributes(record: unknown): this {
    const entries = toEntries(record);
    if (entries === undefined) {
      throw new DslUsageError("attributes must be a mapping", this.path);
    }
    for (const [name, value] of entries) {
      if (value === undefined || value === null) continue;
      if (isPlainObject(value) || value instanceof Map) {
        this.block(name, (b) => b.attributes(value));
      } else {
        this.set(name, value);
      }
    }
    return this;
  }
}
