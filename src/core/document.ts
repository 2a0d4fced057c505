import { DslUsageError } from "./errors.js";
import type { JsonObject } from "./util.js";

export type LeafNode = {
  readonly kind: "leaf";
  readonly value: unknown;
};

export type BranchNode = {
  readonly kind: "branch";
  readonly children: Map<string, ChildNode>;
};

/** Sibling branches produced by opening the same block name more than once. */
export type BlockListNode = {
  readonly kind: "blocks";
  readonly items: BranchNode[];
};

export type DocumentNode = LeafNode | BranchNode;

export type ChildNode = DocumentNode | BlockListNode;

export function createBranch(): BranchNode {
  return { kind: "branch", children: new Map() };
}

export function setAttribute(
  node: BranchNode,
  name: string,
  value: unknown,
  path: readonly string[] = [],
): void {
  if (value === undefined) {
    throw new DslUsageError(`attribute '${name}' has no value`, path);
  }
  putLeaf(node, name, { kind: "leaf", value: cloneValue(name, value, path) }, path);
}

export function openChild(
  node: BranchNode,
  name: string,
  path: readonly string[] = [],
): BranchNode {
  const child = createBranch();
  attachBranch(node, name, child, path);
  return child;
}

/**
 * Writes the children of `source` into `target` as if they had been declared
 * there: leaves replace leaves, branches join the blocks already at the name.
 */
export function mergeBranch(
  target: BranchNode,
  source: BranchNode,
  path: readonly string[] = [],
): void {
  for (const [name, child] of source.children) {
    switch (child.kind) {
      case "leaf":
        putLeaf(target, name, child, path);
        break;
      case "branch":
        attachBranch(target, name, child, path);
        break;
      case "blocks":
        for (const item of child.items) attachBranch(target, name, item, path);
        break;
    }
  }
}

function putLeaf(node: BranchNode, name: string, leaf: LeafNode, path: readonly string[]): void {
  const existing = node.children.get(name);
  if (existing !== undefined && existing.kind !== "leaf") {
    throw new DslUsageError(`'${name}' is already declared as a block`, path);
  }
  node.children.set(name, leaf);
}

function attachBranch(
  node: BranchNode,
  name: string,
  child: BranchNode,
  path: readonly string[],
): void {
  const existing = node.children.get(name);
  switch (existing?.kind) {
    case undefined:
      node.children.set(name, child);
      break;
    case "leaf":
      throw new DslUsageError(`'${name}' is already declared as a value`, path);
    case "branch":
      node.children.set(name, { kind: "blocks", items: [existing, child] });
      break;
    case "blocks":
      existing.items.push(child);
      break;
  }
}

function cloneValue(name: string, value: unknown, path: readonly string[]): unknown {
  try {
    return structuredClone(value);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new DslUsageError(`'${name}' is not a plain data value: ${reason}`, path);
  }
}

export function getChild(node: BranchNode, ...path: readonly string[]): ChildNode | undefined {
  let current: ChildNode = node;
  for (const name of path) {
    if (current.kind !== "branch") {
      return undefined;
    }
    const next = current.children.get(name);
    if (next === undefined) {
      return undefined;
    }
    current = next;
  }
  return current;
}

export function cloneBranch(node: BranchNode): BranchNode {
  const children = new Map<string, ChildNode>();
  for (const [name, child] of node.children) {
    children.set(name, cloneChild(child));
  }
  return { kind: "branch", children };
}

function cloneChild(child: ChildNode): ChildNode {
  switch (child.kind) {
    case "leaf":
      return { kind: "leaf", value: structuredClone(child.value) };
    case "branch":
      return cloneBranch(child);
    case "blocks":
      return { kind: "blocks", items: child.items.map(cloneBranch) };
  }
}

export function branchToObject(node: BranchNode): JsonObject {
  const result: JsonObject = {};
  for (const [name, child] of node.children) {
    result[name] = childToValue(child);
  }
  return result;
}

function childToValue(child: ChildNode): unknown {
  switch (child.kind) {
    case "leaf":
      return structuredClone(child.value);
    case "branch":
      return branchToObject(child);
    case "blocks":
      return child.items.map(branchToObject);
  }
}
