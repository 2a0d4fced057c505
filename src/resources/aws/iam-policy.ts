import { z } from "zod";
import { type AttributeInput, defineResourceType } from "../../facade/resource-type.js";
import type { Session } from "../../facade/session.js";
import { defineSchema, type ValidatedOf } from "../../schema/define.js";
import {
  arrayOf,
  type AttributesOf,
  defaulted,
  optional,
  required,
  value,
} from "../../schema/field.js";
import { invariant } from "../../schema/invariants.js";
import { nested } from "../../schema/validate.js";
import { enumOf, renderTags, str, tags } from "./common.js";

export const MAX_POLICY_LENGTH = 6144;

export const DANGEROUS_ACTIONS = [
  "iam:*",
  "iam:CreateRole",
  "iam:AttachRolePolicy",
  "iam:PutRolePolicy",
];

const stringOrList = value(z.union([z.string(), z.array(z.string())]));
const mapping = value(z.record(z.unknown()));
const principal = value(z.union([z.literal("*"), z.record(z.unknown())]));

const statement = defineSchema("aws_iam_policy.statement", {
  Sid: optional(str),
  Effect: required(enumOf(["Allow", "Deny"])),
  Action: required(stringOrList),
  Resource: required(stringOrList),
  Condition: optional(mapping),
  Principal: optional(principal),
  NotAction: optional(stringOrList),
  NotResource: optional(stringOrList),
  NotPrincipal: optional(principal),
});

const policyDocument = defineSchema("aws_iam_policy.policy", {
  Version: defaulted(str, "2012-10-17"),
  Statement: required(
    arrayOf(nested(statement), {
      min: 1,
      message: "Policy document must have at least one statement",
    }),
  ),
});

export type PolicyStatement = AttributesOf<typeof statement.fields>;
export type PolicyDocument = AttributesOf<typeof policyDocument.fields>;

const toList = (entry: string | readonly string[]): readonly string[] =>
  typeof entry === "string" ? [entry] : entry;

const unique = (values: readonly string[]): readonly string[] => [...new Set(values)];

const matchesAction = (pattern: string, action: string): boolean =>
  pattern === action ||
  pattern === "*" ||
  (pattern.endsWith("*") && action.startsWith(pattern.slice(0, -1)));

/** Whether any Allow statement grants `action`, honouring trailing `*` wildcards. */
export const allowsAction = (policy: PolicyDocument, action: string): boolean =>
  policy.Statement.some(
    (s) =>
      s.Effect === "Allow" && toList(s.Action).some((pattern) => matchesAction(pattern, action)),
  );

/** A bare `*` in the string or list form of an Allow statement's Action or Resource. */
export const hasWildcardPermissions = (policy: PolicyDocument): boolean =>
  policy.Statement.some(
    (s) =>
      s.Effect === "Allow" &&
      (toList(s.Action).includes("*") || toList(s.Resource).includes("*")),
  );

export type SecurityLevel = "high_risk" | "medium_risk" | "low_risk";

export const iamPolicySchema = defineSchema("aws_iam_policy", {
  name: required(value(z.string().max(128, "Policy name cannot exceed 128 characters"))),
  path: defaulted(
    value(
      z
        .string()
        .regex(
          /^\/[\w+=,.@-]*\/?$/,
          "Path must start and end with '/' and contain only valid characters",
        )
        .max(512, "Path cannot exceed 512 characters"),
    ),
    "/",
  ),
  description: optional(str),
  policy: required(nested(policyDocument)),
  tags: defaulted(tags, {}),
})
  .withInvariants([
    invariant(
      "policy_length",
      (attrs) => JSON.stringify(attrs.policy).length <= MAX_POLICY_LENGTH,
      `Policy document cannot exceed ${MAX_POLICY_LENGTH} characters`,
    ),
  ])
  .withDerived((attrs) => {
    const statements = attrs.policy.Statement;
    const allActions = unique(statements.flatMap((s) => toList(s.Action)));
    const allResources = unique(statements.flatMap((s) => toList(s.Resource)));
    const wildcard = hasWildcardPermissions(attrs.policy);

    let securityLevel: SecurityLevel = "low_risk";
    if (wildcard) {
      securityLevel = "high_risk";
    } else if (
      allowsAction(attrs.policy, "iam:*") ||
      allowsAction(attrs.policy, "sts:AssumeRole")
    ) {
      securityLevel = "medium_risk";
    }

    const conditions = statements.filter((s) => s.Condition !== undefined).length;

    return {
      usesReservedName: attrs.name.startsWith("AWS") || attrs.name.includes("Amazon"),
      allActions,
      allResources,
      hasWildcardPermissions: wildcard,
      securityLevel,
      complexityScore: statements.length + allActions.length + allResources.length + conditions * 2,
      serviceRolePolicy: allActions.some((action) => action.startsWith("sts:AssumeRole")),
    };
  });

export type IamPolicy = ValidatedOf<typeof iamPolicySchema>;

export function securityWarnings(validated: IamPolicy): readonly string[] {
  const { attributes, derived } = validated;
  const warnings: string[] = [];

  if (derived.hasWildcardPermissions) {
    warnings.push(
      "Policy contains wildcard (*) permissions - consider principle of least privilege",
    );
  }
  for (const action of DANGEROUS_ACTIONS) {
    if (allowsAction(attributes.policy, action)) {
      warnings.push(`Policy allows potentially dangerous action: ${action}`);
    }
  }
  if (derived.allResources.some((r) => r.endsWith(":root") || r === "*")) {
    warnings.push("Policy grants access to root resources - review necessity");
  }
  return warnings;
}

export const iamPolicy = defineResourceType({
  type: "aws_iam_policy",
  schema: iamPolicySchema,
  outputs: ["name", "path", "policy", "policy_id", "tags_all"],
  render: ({ attributes: policy }, b) => {
    b.set("name", policy.name)
      .set("path", policy.path)
      .setIfPresent("description", policy.description)
      .set("policy", JSON.stringify(policy.policy));
    renderTags(b, policy.tags);
  },
  warnings: securityWarnings,
});

export const awsIamPolicy = (session: Session, name: string, attributes: AttributeInput) =>
  session.declare(iamPolicy, name, attributes);
