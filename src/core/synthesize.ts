import {
  type BranchNode,
  type ChildNode,
  branchToObject,
  cloneBranch,
  createBranch,
  mergeBranch,
} from "./document.js";
import { DslUsageError } from "./errors.js";
import type { Category, ProviderEntry, TerraformJson } from "./terraform-json.js";
import type { JsonObject } from "./util.js";

export type SynthesisDocument = {
  readonly root: BranchNode;
};

/**
 * How a committed block lands at its key:
 * - `replace`: the new block takes the key, last write wins.
 * - `append`: the new block joins the blocks already at the key.
 * - `merge`: the block's children join the branch at the key, leaves replacing
 *   leaves and blocks accumulating.
 */
export type CommitMode = "replace" | "append" | "merge";

export const KEY_DEPTH: Readonly<Record<Category, number>> = {
  terraform: 0,
  provider: 1,
  resource: 2,
  data: 2,
  variable: 1,
  output: 1,
  locals: 0,
};

export const commitModeFor = (category: Category): CommitMode => {
  if (KEY_DEPTH[category] === 0) return "merge";
  return category === "provider" ? "append" : "replace";
};

export function createDocument(): SynthesisDocument {
  return { root: createBranch() };
}

function ensureBranch(node: BranchNode, name: string, path: readonly string[]): BranchNode {
  const existing = node.children.get(name);
  if (existing === undefined) {
    const branch = createBranch();
    node.children.set(name, branch);
    return branch;
  }
  if (existing.kind !== "branch") {
    throw new DslUsageError(`'${name}' is not a single block`, path);
  }
  return existing;
}

/**
 * Writes `branch` into the document under `category` and `key`.
 * Returns `true` when an existing block was overwritten.
 */
export function commitEntry(
  document: SynthesisDocument,
  category: Category,
  key: readonly string[],
  branch: BranchNode,
  mode: CommitMode = commitModeFor(category),
): boolean {
  let parent = ensureBranch(document.root, category, []);
  const path: string[] = [category];
  for (const name of key.slice(0, -1)) {
    parent = ensureBranch(parent, name, path);
    path.push(name);
  }

  const last = key.at(-1);
  if (mode === "merge" || last === undefined) {
    const target = last === undefined ? parent : ensureBranch(parent, last, path);
    const merged = cloneBranch(target);
    mergeBranch(merged, branch, last === undefined ? path : [...path, last]);
    target.children.clear();
    for (const [name, child] of merged.children) {
      target.children.set(name, child);
    }
    return false;
  }

  const existing = parent.children.get(last);
  if (mode === "replace") {
    parent.children.set(last, branch);
    return existing !== undefined;
  }

  switch (existing?.kind) {
    case undefined:
      parent.children.set(last, branch);
      break;
    case "leaf":
      throw new DslUsageError(`'${last}' is already declared as a value`, path);
    case "branch":
      parent.children.set(last, { kind: "blocks", items: [existing, branch] });
      break;
    case "blocks":
      existing.items.push(branch);
      break;
  }
  return false;
}

export function hasEntry(
  document: SynthesisDocument,
  category: Category,
  key: readonly string[],
): boolean {
  let current: ChildNode | undefined = document.root.children.get(category);
  for (const name of key) {
    if (current?.kind !== "branch") return false;
    current = current.children.get(name);
  }
  return current !== undefined;
}

function categoryBranch(document: SynthesisDocument, category: Category): BranchNode | undefined {
  const node = document.root.children.get(category);
  return node?.kind === "branch" && node.children.size > 0 ? node : undefined;
}

function branchesOf(child: ChildNode): readonly BranchNode[] {
  switch (child.kind) {
    case "leaf":
      return [];
    case "branch":
      return [child];
    case "blocks":
      return child.items;
  }
}

function singleBlocks(branch: BranchNode): Record<string, JsonObject> {
  const result: Record<string, JsonObject> = {};
  for (const [name, child] of branch.children) {
    if (child.kind === "branch") {
      result[name] = branchToObject(child);
    }
  }
  return result;
}

function objectAt(document: SynthesisDocument, category: Category): JsonObject | undefined {
  const branch = categoryBranch(document, category);
  return branch === undefined ? undefined : branchToObject(branch);
}

function blocksAt(
  document: SynthesisDocument,
  category: Category,
): Record<string, JsonObject> | undefined {
  const branch = categoryBranch(document, category);
  return branch === undefined ? undefined : singleBlocks(branch);
}

function typedBlocksAt(
  document: SynthesisDocument,
  category: Category,
): Record<string, Record<string, JsonObject>> | undefined {
  const branch = categoryBranch(document, category);
  if (branch === undefined) return undefined;

  const result: Record<string, Record<string, JsonObject>> = {};
  for (const [type, child] of branch.children) {
    if (child.kind === "branch" && child.children.size > 0) {
      result[type] = singleBlocks(child);
    }
  }
  return result;
}

function providersAt(document: SynthesisDocument): Record<string, ProviderEntry> | undefined {
  const branch = categoryBranch(document, "provider");
  if (branch === undefined) return undefined;

  const result: Record<string, ProviderEntry> = {};
  for (const [name, child] of branch.children) {
    const blocks = branchesOf(child).map(branchToObject);
    const [first] = blocks;
    if (first === undefined) continue;
    result[name] = child.kind === "blocks" ? blocks : first;
  }
  return result;
}

export function serialize(document: SynthesisDocument): TerraformJson {
  const terraform = objectAt(document, "terraform");
  const provider = providersAt(document);
  const resource = typedBlocksAt(document, "resource");
  const data = typedBlocksAt(document, "data");
  const variable = blocksAt(document, "variable");
  const output = blocksAt(document, "output");
  const locals = objectAt(document, "locals");

  return {
    ...(terraform !== undefined ? { terraform } : {}),
    ...(provider !== undefined ? { provider } : {}),
    ...(resource !== undefined ? { resource } : {}),
    ...(data !== undefined ? { data } : {}),
    ...(variable !== undefined ? { variable } : {}),
    ...(output !== undefined ? { output } : {}),
    ...(locals !== undefined ? { locals } : {}),
  };
}

export type ToJsonOptions = {
  readonly pretty?: boolean;
};

export function toJson(document: SynthesisDocument, options: ToJsonOptions = {}): string {
  const { pretty = true } = options;
  return JSON.stringify(serialize(document), null, pretty ? 2 : undefined);
}

function entriesAt(
  branch: BranchNode,
  depth: number,
  prefix: readonly string[] = [],
): readonly (readonly [readonly string[], ChildNode])[] {
  if (depth === 0) return [[prefix, branch]];

  return [...branch.children].flatMap<readonly [readonly string[], ChildNode]>(([name, child]) => {
    const key = [...prefix, name];
    if (depth === 1) return [[key, child] as const];
    return child.kind === "branch" ? entriesAt(child, depth - 1, key) : [];
  });
}

/**
 * Combines independently built documents in argument order. Keyed blocks
 * follow the same rules as repeated declarations within one document.
 */
export function mergeDocuments(...documents: readonly SynthesisDocument[]): SynthesisDocument {
  const merged = createDocument();

  for (const document of documents) {
    for (const [category, node] of document.root.children) {
      if (!isCategory(category) || node.kind !== "branch") continue;

      for (const [key, child] of entriesAt(node, KEY_DEPTH[category])) {
        for (const branch of branchesOf(child)) {
          commitEntry(merged, category, key, cloneBranch(branch));
        }
      }
    }
  }

  return merged;
}

const isCategory = (name: string): name is Category => Object.hasOwn(KEY_DEPTH, name);
