import { describe, expect, test } from "vitest";
import {
  branchToObject,
  cloneBranch,
  createBranch,
  getChild,
  openChild,
  setAttribute,
} from "./document.js";
import { DslUsageError } from "./errors.js";

describe("setAttribute", () => {
  test("stores a leaf value", () => {
    const root = createBranch();
    setAttribute(root, "name", "app");
    expect(getChild(root, "name")).toEqual({ kind: "leaf", value: "app" });
  });

  test("later scalar replaces earlier one", () => {
    const root = createBranch();
    setAttribute(root, "count", 1);
    setAttribute(root, "count", 2);
    expect(branchToObject(root)).toEqual({ count: 2 });
  });

  test("copies the value so later mutation does not leak in", () => {
    const root = createBranch();
    const subnets = ["subnet-a"];
    setAttribute(root, "subnets", subnets);
    subnets.push("subnet-b");
    expect(branchToObject(root)).toEqual({ subnets: ["subnet-a"] });
  });

  test("rejects undefined", () => {
    const root = createBranch();
    expect(() => setAttribute(root, "name", undefined)).toThrow("attribute 'name' has no value");
  });

  test("rejects values that are not plain data", () => {
    const root = createBranch();
    const path = ["resource", "aws_lambda_function", "fn"];
    expect(() => setAttribute(root, "handler", () => "ok", path)).toThrow(DslUsageError);
    expect(root.children.size).toBe(0);
  });

  test("rejects a name already used by a block", () => {
    const root = createBranch();
    openChild(root, "ingress");
    expect(() => setAttribute(root, "ingress", "x", ["resource"])).toThrow(
      new DslUsageError("'ingress' is already declared as a block", ["resource"]),
    );
  });
});

describe("openChild", () => {
  test("opening the same name twice produces sibling blocks in order", () => {
    const root = createBranch();
    setAttribute(openChild(root, "ingress"), "port", 80);
    setAttribute(openChild(root, "ingress"), "port", 443);
    setAttribute(openChild(root, "ingress"), "port", 22);

    expect(getChild(root, "ingress")?.kind).toBe("blocks");
    expect(branchToObject(root)).toEqual({
      ingress: [{ port: 80 }, { port: 443 }, { port: 22 }],
    });
  });

  test("rejects a name already used by a value", () => {
    const root = createBranch();
    setAttribute(root, "tags", "x");
    expect(() => openChild(root, "tags")).toThrow("'tags' is already declared as a value");
  });
});

describe("getChild", () => {
  test("walks nested branches", () => {
    const root = createBranch();
    const config = openChild(root, "config");
    setAttribute(config, "enabled", true);
    expect(getChild(root, "config", "enabled")).toEqual({ kind: "leaf", value: true });
  });

  test("returns undefined for missing paths", () => {
    const root = createBranch();
    expect(getChild(root, "missing", "deeper")).toBeUndefined();
  });
});

describe("cloneBranch", () => {
  test("clone is independent of its source", () => {
    const root = createBranch();
    setAttribute(openChild(root, "block"), "a", 1);

    const copy = cloneBranch(root);
    setAttribute(openChild(copy, "block"), "a", 2);

    expect(branchToObject(root)).toEqual({ block: { a: 1 } });
    expect(branchToObject(copy)).toEqual({ block: [{ a: 1 }, { a: 2 }] });
  });
});

describe("branchToObject", () => {
  test("preserves insertion order of keys", () => {
    const root = createBranch();
    setAttribute(root, "zeta", 1);
    setAttribute(root, "alpha", 2);
    setAttribute(root, "mid", 3);
    expect(Object.keys(branchToObject(root))).toEqual(["zeta", "alpha", "mid"]);
  });
});
