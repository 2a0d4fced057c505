import { describe, expect, test } from "vitest";
import { z } from "zod";
import {
  AttributeValidationError,
  DslUsageError,
  DuplicateDeclarationError,
} from "../core/errors.js";
import { ResourceRegistry } from "./registry.js";
import { Session } from "./session.js";
import { defineSchema } from "../schema/define.js";
import { defaulted, required, value } from "../schema/field.js";
import { invariant } from "../schema/invariants.js";
import { defineResourceType } from "./resource-type.js";

const bucketSchema = defineSchema("test_bucket", {
  bucket: required(value(z.string().min(3, "bucket name is too short"))),
  public: defaulted(value(z.boolean()), false),
  retention_days: defaulted(value(z.number().int()), 30),
})
  .withInvariants([
    invariant(
      "retention_positive",
      (attrs) => attrs.retention_days > 0,
      (attrs) => `retention_days (${attrs.retention_days}) must be positive`,
    ),
  ])
  .withDerived((attrs) => ({ isPublic: attrs.public }));

const testBucket = defineResourceType({
  type: "test_bucket",
  schema: bucketSchema,
  outputs: ["bucket_domain_name"],
  warnings: ({ derived }) => (derived.isPublic ? ["bucket is public"] : []),
});

describe("Session root entry points", () => {
  test("terraform re-entry merges into one block", () => {
    const session = new Session();
    session.terraform((t) => t.set("required_version", ">= 1.5"));
    session.terraform((t) =>
      t.block("required_providers", (p) => p.block("aws", (a) => a.set("source", "hashicorp/aws"))),
    );

    expect(session.serialize().terraform).toEqual({
      required_version: ">= 1.5",
      required_providers: { aws: { source: "hashicorp/aws" } },
    });
  });

  test("locals re-entry overwrites scalars and keeps the rest", () => {
    const session = new Session();
    session.locals((l) => l.set("env", "dev").set("team", "platform"));
    session.locals((l) => l.set("env", "prod"));

    expect(session.serialize().locals).toEqual({ env: "prod", team: "platform" });
  });

  test("a provider declared once is an object", () => {
    const session = new Session();
    session.provider("aws", (p) => p.set("region", "us-east-1"));
    expect(session.serialize().provider).toEqual({ aws: { region: "us-east-1" } });
  });

  test("aliased providers accumulate", () => {
    const session = new Session();
    session.provider("aws", (p) => p.set("region", "us-east-1"));
    session.provider("aws", (p) => p.set("region", "eu-west-1").set("alias", "eu"));
    expect(session.serialize().provider).toEqual({
      aws: [{ region: "us-east-1" }, { region: "eu-west-1", alias: "eu" }],
    });
  });

  test("resource returns a reference", () => {
    const session = new Session();
    const bucket = session.resource("aws_s3_bucket", "logs", (r) => r.set("bucket", "app-logs"));

    expect(bucket.type).toBe("aws_s3_bucket");
    expect(bucket.name).toBe("logs");
    expect(bucket.id).toBe("${aws_s3_bucket.logs.id}");
    expect(bucket.arn).toBe("${aws_s3_bucket.logs.arn}");
    expect(bucket.attr("bucket_domain_name")).toBe("${aws_s3_bucket.logs.bucket_domain_name}");
    expect(bucket.attributes).toEqual({ bucket: "app-logs" });
    expect(session.serialize().resource).toEqual({
      aws_s3_bucket: { logs: { bucket: "app-logs" } },
    });
  });

  test("references can be used as attribute values", () => {
    const session = new Session();
    const bucket = session.resource("aws_s3_bucket", "logs", (r) => r.set("bucket", "app-logs"));
    session.resource("aws_s3_bucket_policy", "logs", (r) => r.set("bucket", bucket.id));

    expect(session.serialize().resource?.["aws_s3_bucket_policy"]).toEqual({
      logs: { bucket: "${aws_s3_bucket.logs.id}" },
    });
  });

  test("data returns a data reference", () => {
    const session = new Session();
    const ami = session.data("aws_ami", "ubuntu", (d) => d.set("most_recent", true));

    expect(ami.address).toBe("data.aws_ami.ubuntu");
    expect(ami.id).toBe("${data.aws_ami.ubuntu.id}");
    expect(session.serialize().data).toEqual({ aws_ami: { ubuntu: { most_recent: true } } });
  });

  test("variable returns its interpolation", () => {
    const session = new Session();
    const region = session.variable("region", (v) =>
      v.set("type", "string").set("default", "us-east-1"),
    );

    expect(region).toBe("${var.region}");
    expect(session.serialize().variable).toEqual({
      region: { type: "string", default: "us-east-1" },
    });
  });

  test("output", () => {
    const session = new Session();
    session.output("bucket_id", (o) => o.set("value", "${aws_s3_bucket.logs.id}"));
    expect(session.serialize().output).toEqual({
      bucket_id: { value: "${aws_s3_bucket.logs.id}" },
    });
  });

  test("blank names are rejected", () => {
    const session = new Session();
    expect(() => session.resource("aws_s3_bucket", " ", () => undefined)).toThrow(DslUsageError);
    expect(() => session.provider("", () => undefined)).toThrow("provider requires a name");
  });

  test("a failing body leaves the document unchanged", () => {
    const session = new Session();
    expect(() =>
      session.resource("aws_s3_bucket", "logs", (r) => {
        r.set("bucket", "app-logs");
        throw new Error("boom");
      }),
    ).toThrow("boom");
    expect(session.serialize()).toEqual({});
  });
});

describe("Session duplicates", () => {
  test("last declaration wins with a warning", () => {
    const session = new Session();
    session.resource("aws_s3_bucket", "logs", (r) => r.set("bucket", "first"));
    session.resource("aws_s3_bucket", "logs", (r) => r.set("bucket", "second"));

    expect(session.serialize().resource).toEqual({ aws_s3_bucket: { logs: { bucket: "second" } } });
    expect(session.annotations).toEqual([
      {
        level: "warning",
        path: ["resource", "aws_s3_bucket", "logs"],
        message:
          "resource aws_s3_bucket.logs was declared more than once; the last declaration wins",
      },
    ]);
  });

  test("onDuplicate error throws and keeps the first declaration", () => {
    const session = new Session({ onDuplicate: "error" });
    session.resource("aws_s3_bucket", "logs", (r) => r.set("bucket", "first"));

    expect(() =>
      session.resource("aws_s3_bucket", "logs", (r) => r.set("bucket", "second")),
    ).toThrow(new DuplicateDeclarationError("resource", ["aws_s3_bucket", "logs"]));
    expect(session.serialize().resource).toEqual({ aws_s3_bucket: { logs: { bucket: "first" } } });
  });

  test("providers never count as duplicates", () => {
    const session = new Session({ onDuplicate: "error" });
    session.provider("aws", (p) => p.set("region", "us-east-1"));
    session.provider("aws", (p) => p.set("region", "eu-west-1"));
    expect(session.annotations).toEqual([]);
  });
});

describe("Session.declare", () => {
  test("validates, renders and returns a typed reference", () => {
    const session = new Session();
    const ref = session.declare(testBucket, "logs", { bucket: "app-logs" });

    expect(ref.attributes).toEqual({ bucket: "app-logs", public: false, retention_days: 30 });
    expect(ref.derived.isPublic).toBe(false);
    expect(ref.outputs).toEqual({
      id: "${test_bucket.logs.id}",
      arn: "${test_bucket.logs.arn}",
      bucket_domain_name: "${test_bucket.logs.bucket_domain_name}",
    });
    expect(session.serialize().resource).toEqual({
      test_bucket: { logs: { bucket: "app-logs", public: false, retention_days: 30 } },
    });
  });

  test("validation failures throw and write nothing", () => {
    const session = new Session();
    expect(() => session.declare(testBucket, "logs", { bucket: "ab" })).toThrow(
      "test_bucket: bucket: bucket name is too short",
    );
    expect(() => session.declare(testBucket, "logs", { bucket: "abc", retention_days: 0 })).toThrow(
      AttributeValidationError,
    );
    expect(session.serialize()).toEqual({});
  });

  test("resource warnings become annotations", () => {
    const session = new Session();
    session.declare(testBucket, "site", { bucket: "site", public: true });

    expect(session.annotations).toEqual([
      { level: "warning", path: ["resource", "test_bucket", "site"], message: "bucket is public" },
    ]);
  });
});

describe("Session.declareByName", () => {
  test("uses the registry for known types", () => {
    const session = new Session({ registry: new ResourceRegistry().register(testBucket) });
    const ref = session.declareByName("test_bucket", "logs", { bucket: "app-logs" });

    expect(ref.attributes).toEqual({ bucket: "app-logs", public: false, retention_days: 30 });
    expect(session.annotations).toEqual([]);
  });

  test("passes unknown types through with a note", () => {
    const session = new Session({ registry: new ResourceRegistry() });
    session.declareByName("aws_sns_topic", "alerts", { name: "alerts", tags: { Team: "ops" } });

    expect(session.serialize().resource).toEqual({
      aws_sns_topic: { alerts: { name: "alerts", tags: { Team: "ops" } } },
    });
    expect(session.annotations).toEqual([
      {
        level: "info",
        path: ["resource", "aws_sns_topic", "alerts"],
        message: "resource type aws_sns_topic is not registered; attributes were not validated",
      },
    ]);
  });

  test("a rejected declaration leaves no note", () => {
    const session = new Session();

    expect(() => session.declareByName("aws_sns_topic", " ", { name: "alerts" })).toThrow(
      "resource: resource requires a name",
    );
    expect(() => session.declareByName("aws_sns_topic", "alerts", "not a mapping")).toThrow(
      "resource.aws_sns_topic.alerts: attributes must be a mapping",
    );
    expect(session.annotations).toEqual([]);
    expect(session.serialize()).toEqual({});
  });
});

describe("Session.toJson", () => {
  test("compact output", () => {
    const session = new Session();
    session.variable("region", (v) => v.set("type", "string"));
    expect(session.toJson({ pretty: false })).toBe('{"variable":{"region":{"type":"string"}}}');
  });
});
