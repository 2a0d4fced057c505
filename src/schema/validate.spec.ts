import { describe, expect, test } from "vitest";
import { z } from "zod";
import { AttributeValidationError } from "../core/errors.js";
import { defineSchema } from "./define.js";
import { arrayOf, computed, defaulted, optional, recordOf, required, value } from "./field.js";
import { ordered } from "./invariants.js";
import { nested, validate, validateOrThrow } from "./validate.js";

const server = defineSchema("test_server", {
  name: required(value(z.string().min(1, "must not be empty"))),
  port: defaulted(value(z.number().int()), 8080),
  labels: defaulted(recordOf(value(z.string())), {}),
  replicas: optional(value(z.number())),
  display_name: computed(value(z.string()), (siblings) => `server-${String(siblings["name"])}`),
}).withDerived((attrs) => ({ url: `http://${attrs.name}:${attrs.port}` }));

describe("validate", () => {
  test("fills defaults and computed defaults", () => {
    const result = validate(server, { name: "api" })._unsafeUnwrap();
    expect(result.schema).toBe("test_server");
    expect(result.attributes).toEqual({
      name: "api",
      port: 8080,
      labels: {},
      display_name: "server-api",
    });
    expect(result.derived).toEqual({ url: "http://api:8080" });
  });

  test("given values win over defaults", () => {
    const result = validate(server, { name: "api", port: 9090, replicas: 3 })._unsafeUnwrap();
    expect(result.attributes.port).toBe(9090);
    expect(result.attributes.replicas).toBe(3);
    expect(result.derived.url).toBe("http://api:9090");
  });

  test("accepts camelCase keys", () => {
    const result = validate(server, { name: "api", displayName: "API" })._unsafeUnwrap();
    expect(result.attributes.display_name).toBe("API");
  });

  test("accepts a Map of attributes", () => {
    const raw = new Map<string, unknown>([["name", "api"]]);
    expect(validate(server, raw)._unsafeUnwrap().attributes.name).toBe("api");
  });

  test("drops unknown keys", () => {
    const result = validate(server, { name: "api", colour: "blue" })._unsafeUnwrap();
    expect(Object.keys(result.attributes)).toEqual(["name", "port", "labels", "display_name"]);
  });

  test("freezes attributes and derived values", () => {
    const result = validate(server, { name: "api" })._unsafeUnwrap();
    expect(Object.isFrozen(result.attributes)).toBe(true);
    expect(Object.isFrozen(result.derived)).toBe(true);
  });

  test("reports missing required fields", () => {
    expect(validate(server, {})._unsafeUnwrapErr()).toEqual({
      kind: "missing_required_field",
      schema: "test_server",
      path: ["name"],
      message: "name is required",
    });
  });

  test("null counts as missing", () => {
    expect(validate(server, { name: null })._unsafeUnwrapErr().kind).toBe("missing_required_field");
  });

  test("reports constraint violations", () => {
    const error = validate(server, { name: "" })._unsafeUnwrapErr();
    expect(error.message).toBe("name: must not be empty");
  });

  test("rejects a non-mapping payload", () => {
    const error = validate(server, "api")._unsafeUnwrapErr();
    expect(error.message).toBe("must be a mapping of attributes");
  });
});

describe("invariants", () => {
  const range = defineSchema("test_range", {
    min: required(value(z.number())),
    max: required(value(z.number())),
  }).withInvariants([ordered("min", "max")]);

  test("run after field checks", () => {
    expect(validate(range, { min: 5, max: 1 })._unsafeUnwrapErr()).toEqual({
      kind: "invariant_violation",
      schema: "test_range",
      path: [],
      invariant: "ordered(min,max)",
      message: "min (5) cannot be greater than max (1)",
    });
  });

  test("pass when satisfied", () => {
    expect(validate(range, { min: 1, max: 5 }).isOk()).toBe(true);
  });
});

describe("nested", () => {
  const pool = defineSchema("test_pool", {
    servers: required(arrayOf(nested(server), { min: 1 })),
  });

  test("validates nested records with defaults", () => {
    const result = validate(pool, { servers: [{ name: "a" }] })._unsafeUnwrap();
    expect(result.attributes.servers[0]?.port).toBe(8080);
  });

  test("reports nested paths", () => {
    expect(validate(pool, { servers: [{ name: "a" }, {}] })._unsafeUnwrapErr().message).toBe(
      "servers[1].name is required",
    );
  });

  test("enforces array bounds", () => {
    expect(validate(pool, { servers: [] })._unsafeUnwrapErr().message).toBe(
      "servers: must contain at least 1 item(s)",
    );
  });
});

describe("validation context", () => {
  const stamped = defineSchema("test_stamp", {
    stamp: computed(value(z.string()), (_siblings, context) => context.now().toISOString()),
  });

  test("computed defaults read the injected clock", () => {
    const context = { now: () => new Date("2024-01-02T03:04:05.000Z") };
    expect(validate(stamped, {}, context)._unsafeUnwrap().attributes.stamp).toBe(
      "2024-01-02T03:04:05.000Z",
    );
  });
});

describe("validateOrThrow", () => {
  test("throws AttributeValidationError", () => {
    expect(() => validateOrThrow(server, {})).toThrow(AttributeValidationError);
    expect(() => validateOrThrow(server, {})).toThrow("test_server: name is required");
  });

  test("returns validated attributes", () => {
    expect(validateOrThrow(server, { name: "web" }).attributes.name).toBe("web");
  });
});
